import { z } from "zod";
import type { LanguageModel, OutputSchema } from "@colloquy/types";
import { ColloquyError, silentLogger, type Logger } from "@colloquy/core";
import { parseStructuredText } from "./model-adapter.js";

export interface OpenAIAdapterOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
  /** Cap for free-text completions. */
  maxOutputTokens?: number;
  /** Cap for JSON replies, which need more room than spoken summaries. */
  structuredMaxOutputTokens?: number;
  baseUrl?: string;
  logger?: Logger;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }) }))
    .default([]),
});

interface ChatMessage {
  role: "system" | "user";
  content: string;
}

/**
 * LanguageModel for the OpenAI Chat Completions API.
 * Uses the REST API directly.
 */
export class OpenAIAdapter implements LanguageModel {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxOutputTokens: number;
  private readonly structuredMaxOutputTokens: number;
  private readonly baseUrl: string;
  private readonly log: Logger;

  constructor(opts: OpenAIAdapterOptions) {
    if (!opts.apiKey) throw new ColloquyError("CONFIG_ERROR", "OpenAI API key is required");
    this.apiKey = opts.apiKey;
    this.model = opts.model ?? "gpt-4o-mini";
    this.temperature = opts.temperature ?? 0.7;
    this.maxOutputTokens = opts.maxOutputTokens ?? 300;
    this.structuredMaxOutputTokens = opts.structuredMaxOutputTokens ?? 2000;
    this.baseUrl = opts.baseUrl ?? "https://api.openai.com/v1";
    this.log = opts.logger ?? silentLogger;
  }

  async generate(prompt: string): Promise<string> {
    const content = await this.complete([{ role: "user", content: prompt }], this.maxOutputTokens);
    return content ?? "";
  }

  async generateStructured<T>(
    systemPrompt: string,
    userPrompt: string,
    schema: OutputSchema<T>,
    schemaName: string
  ): Promise<T> {
    const content = await this.complete(
      [
        {
          role: "system",
          content: `${systemPrompt}\n\nRespond only with a JSON object matching ${schemaName}.`,
        },
        { role: "user", content: userPrompt },
      ],
      this.structuredMaxOutputTokens,
      true
    );
    return parseStructuredText(content, schema, schemaName);
  }

  private async complete(
    messages: ChatMessage[],
    maxTokens: number,
    json = false
  ): Promise<string | null | undefined> {
    const body = {
      model: this.model,
      messages,
      temperature: this.temperature,
      max_tokens: maxTokens,
      ...(json ? { response_format: { type: "json_object" } } : {}),
    };

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new ColloquyError("COLLABORATOR_ERROR", "OpenAI request failed", { cause: err });
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new ColloquyError(
        "COLLABORATOR_ERROR",
        `OpenAI API error ${response.status}: ${errorText}`
      );
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ColloquyError("COLLABORATOR_ERROR", "OpenAI returned an unexpected response body");
    }
    this.log.debug("Chat completion received", { model: this.model, json, maxTokens });
    return parsed.data.choices[0]?.message.content;
  }
}

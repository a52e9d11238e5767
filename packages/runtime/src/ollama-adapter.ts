import { z } from "zod";
import type { LanguageModel, OutputSchema } from "@colloquy/types";
import { ColloquyError, silentLogger, type Logger } from "@colloquy/core";
import { parseStructuredText } from "./model-adapter.js";

export interface OllamaAdapterOptions {
  model?: string;
  baseUrl?: string;
  temperature?: number;
  logger?: Logger;
}

const OllamaChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({ role: z.string(), content: z.string() }),
  done: z.boolean().optional(),
});

/**
 * LanguageModel for a local Ollama instance.
 * Defaults to http://localhost:11434 and model "llama3.2".
 */
export class OllamaAdapter implements LanguageModel {
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly log: Logger;

  constructor(opts: OllamaAdapterOptions = {}) {
    this.model = opts.model ?? "llama3.2";
    this.baseUrl = opts.baseUrl ?? "http://localhost:11434";
    this.temperature = opts.temperature ?? 0.7;
    this.log = opts.logger ?? silentLogger;
  }

  generate(prompt: string): Promise<string> {
    return this.chat([{ role: "user", content: prompt }]);
  }

  async generateStructured<T>(
    systemPrompt: string,
    userPrompt: string,
    schema: OutputSchema<T>,
    schemaName: string
  ): Promise<T> {
    const content = await this.chat(
      [
        {
          role: "system",
          content: `${systemPrompt}\n\nRespond only with a JSON object matching ${schemaName}.`,
        },
        { role: "user", content: userPrompt },
      ],
      true
    );
    return parseStructuredText(content, schema, schemaName);
  }

  private async chat(
    messages: Array<{ role: "system" | "user"; content: string }>,
    json = false
  ): Promise<string> {
    const body = {
      model: this.model,
      messages,
      stream: false,
      options: { temperature: this.temperature },
      ...(json ? { format: "json" } : {}),
    };

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/chat`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
      });
    } catch (err) {
      this.log.error("Ollama connection failed", { baseUrl: this.baseUrl });
      throw new ColloquyError("COLLABORATOR_ERROR", "Ollama request failed", { cause: err });
    }

    if (!response.ok) {
      throw new ColloquyError(
        "COLLABORATOR_ERROR",
        `Ollama API error ${response.status}: ${await response.text()}`
      );
    }

    const parsed = OllamaChatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ColloquyError("COLLABORATOR_ERROR", "Ollama returned an unexpected response body");
    }
    return parsed.data.message.content;
  }
}

import { z } from "zod";
import type { SearchService } from "@colloquy/types";
import { ColloquyError, silentLogger, type Logger } from "@colloquy/core";
import { postJson } from "../http.js";

export interface TavilySearchOptions {
  apiKey: string;
  maxResults?: number;
  searchDepth?: "basic" | "advanced";
  baseUrl?: string;
  logger?: Logger;
}

const TavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().default("No title"),
        url: z.string().default(""),
        content: z.string().default("No content available"),
      })
    )
    .default([]),
});

export type TavilyResult = z.infer<typeof TavilyResponseSchema>["results"][number];

export function formatSearchResults(results: ReadonlyArray<TavilyResult>): string {
  if (results.length === 0) return "No results found.";
  return results
    .map((r, i) => `${i + 1}. ${r.title}\n   URL: ${r.url}\n   ${r.content}\n`)
    .join("\n");
}

/** Web search through the Tavily REST API. */
export class TavilySearch implements SearchService {
  private readonly apiKey: string;
  private readonly maxResults: number;
  private readonly searchDepth: "basic" | "advanced";
  private readonly baseUrl: string;
  private readonly log: Logger;

  constructor(opts: TavilySearchOptions) {
    if (!opts.apiKey) throw new ColloquyError("CONFIG_ERROR", "Tavily API key is required");
    this.apiKey = opts.apiKey;
    this.maxResults = opts.maxResults ?? 5;
    this.searchDepth = opts.searchDepth ?? "advanced";
    this.baseUrl = opts.baseUrl ?? "https://api.tavily.com";
    this.log = opts.logger ?? silentLogger;
  }

  async search(query: string): Promise<string> {
    const response = await postJson(
      "Tavily",
      `${this.baseUrl}/search`,
      { query, max_results: this.maxResults, search_depth: this.searchDepth },
      { Authorization: `Bearer ${this.apiKey}` }
    );
    const parsed = TavilyResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ColloquyError("COLLABORATOR_ERROR", "Tavily returned an unexpected response body");
    }
    this.log.debug("Search results received", { query, results: parsed.data.results.length });
    return formatSearchResults(parsed.data.results);
  }
}

import fs from "node:fs/promises";
import yaml from "js-yaml";
import { z } from "zod";
import { ColloquyError } from "./errors.js";
import { parseLogLevel } from "./logger.js";

export const DEFAULT_CONFIG_PATH = "colloquy.config.yaml";

const LlmSchema = z.object({
  provider: z.enum(["openai", "ollama"]).default("openai"),
  model: z.string().min(1).default("gpt-4o-mini"),
  temperature: z.number().min(0).max(2).default(0.7),
  maxOutputTokens: z.number().int().positive().default(300),
  /** Structured replies are JSON and need more room than spoken summaries. */
  structuredMaxOutputTokens: z.number().int().positive().default(2000),
  apiKey: z.string().default(""),
  baseUrl: z.string().url().optional(),
});

const SearchSchema = z.object({
  apiKey: z.string().default(""),
  maxResults: z.number().int().min(1).max(20).default(5),
  searchDepth: z.enum(["basic", "advanced"]).default("advanced"),
});

const ElevenLabsSchema = z.object({
  apiKey: z.string().default(""),
  researcherVoiceId: z.string().default("uYXf8XasLslADfZ2MB4u"),
  validatorVoiceId: z.string().default("jRAAK67SEFE9m7ci5DhD"),
  modelId: z.string().default("eleven_flash_v2_5"),
  outputFormat: z.string().default("mp3_44100_128"),
});

const GroqSchema = z.object({
  apiKey: z.string().default(""),
  researcherVoiceId: z.string().default("Arista-PlayAI"),
  validatorVoiceId: z.string().default("Fritz-PlayAI"),
  modelId: z.string().default("playai-tts"),
  outputFormat: z.enum(["mp3", "wav"]).default("wav"),
});

const TtsSchema = z.object({
  provider: z.enum(["none", "elevenlabs", "groq"]).default("none"),
  elevenlabs: ElevenLabsSchema.default({}),
  groq: GroqSchema.default({}),
});

const ContextSchema = z.object({
  maxExchanges: z.number().int().min(1).default(5),
  maxTokens: z.number().int().positive().default(10_000),
  tokenizerModel: z.string().default("gpt-4o"),
});

export const ConfigSchema = z.object({
  llm: LlmSchema.default({}),
  search: SearchSchema.default({}),
  tts: TtsSchema.default({}),
  context: ContextSchema.default({}),
  validator: z
    .object({ confidenceThreshold: z.number().int().min(0).max(100).default(70) })
    .default({}),
  persistence: z.object({ dbPath: z.string().min(1).default("data/checkpoints.db") }).default({}),
  logging: z
    .object({ level: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info") })
    .default({}),
  telegram: z.object({ botToken: z.string().default("") }).default({}),
});

export type ColloquyConfig = z.infer<typeof ConfigSchema>;

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Validate a raw config object and overlay secrets from the environment.
 * Environment values win over the file.
 */
export function parseConfig(raw: unknown, env: Environment = {}): ColloquyConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ColloquyError("CONFIG_ERROR", `Invalid configuration: ${issues}`);
  }

  const config = result.data;
  return {
    ...config,
    llm: { ...config.llm, apiKey: env.OPENAI_API_KEY ?? config.llm.apiKey },
    search: { ...config.search, apiKey: env.TAVILY_API_KEY ?? config.search.apiKey },
    tts: {
      ...config.tts,
      elevenlabs: {
        ...config.tts.elevenlabs,
        apiKey: env.ELEVENLABS_API_KEY ?? config.tts.elevenlabs.apiKey,
      },
      groq: { ...config.tts.groq, apiKey: env.GROQ_API_KEY ?? config.tts.groq.apiKey },
    },
    logging: {
      level: env.LOG_LEVEL ? parseLogLevel(env.LOG_LEVEL) : config.logging.level,
    },
    telegram: { botToken: env.BOT_TOKEN ?? config.telegram.botToken },
  };
}

/**
 * Load configuration from a YAML file. A missing file means "all defaults".
 */
export async function loadConfig(
  path: string = DEFAULT_CONFIG_PATH,
  env: Environment = process.env
): Promise<ColloquyConfig> {
  let text: string;
  try {
    text = await fs.readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return parseConfig({}, env);
    }
    throw new ColloquyError("CONFIG_ERROR", `Cannot read config file ${path}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (err) {
    throw new ColloquyError("CONFIG_ERROR", `Config file ${path} is not valid YAML`, {
      cause: err,
    });
  }
  return parseConfig(raw, env);
}

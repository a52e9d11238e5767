import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { loadConfig, parseConfig } from "./config.js";
import { isColloquyError } from "./errors.js";

describe("parseConfig", () => {
  it("fills every default from an empty document", () => {
    const config = parseConfig({});
    expect(config.llm).toEqual({
      provider: "openai",
      model: "gpt-4o-mini",
      temperature: 0.7,
      maxOutputTokens: 300,
      structuredMaxOutputTokens: 2000,
      apiKey: "",
    });
    expect(config.context).toEqual({ maxExchanges: 5, maxTokens: 10_000, tokenizerModel: "gpt-4o" });
    expect(config.validator.confidenceThreshold).toBe(70);
    expect(config.tts.provider).toBe("none");
    expect(config.persistence.dbPath).toBe("data/checkpoints.db");
    expect(config.logging.level).toBe("info");
  });

  it("treats a null document as empty", () => {
    expect(parseConfig(null).search.maxResults).toBe(5);
  });

  it("overlays secrets and log level from the environment", () => {
    const config = parseConfig(
      { llm: { apiKey: "from-file" }, logging: { level: "debug" } },
      { OPENAI_API_KEY: "test-openai", TAVILY_API_KEY: "test-tavily", LOG_LEVEL: "warn" }
    );
    expect(config.llm.apiKey).toBe("test-openai");
    expect(config.search.apiKey).toBe("test-tavily");
    expect(config.tts.groq.apiKey).toBe("");
    expect(config.logging.level).toBe("warn");
  });

  it("keeps file values when the environment is silent", () => {
    const config = parseConfig({ llm: { apiKey: "from-file" } }, {});
    expect(config.llm.apiKey).toBe("from-file");
  });

  it("reports every invalid field", () => {
    let caught: unknown;
    try {
      parseConfig({ context: { maxExchanges: 0 }, tts: { provider: "espeak" } });
    } catch (err) {
      caught = err;
    }
    expect(isColloquyError(caught, "CONFIG_ERROR")).toBe(true);
    if (caught instanceof Error) {
      expect(caught.message).toContain("context.maxExchanges");
      expect(caught.message).toContain("tts.provider");
    }
  });
});

describe("loadConfig", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "colloquy-config-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("reads YAML", async () => {
    const file = path.join(tmpDir, "colloquy.config.yaml");
    await fs.writeFile(
      file,
      ["context:", "  maxExchanges: 3", "tts:", "  provider: groq", "validator:", "  confidenceThreshold: 80"].join("\n")
    );

    const config = await loadConfig(file, {});
    expect(config.context.maxExchanges).toBe(3);
    expect(config.tts.provider).toBe("groq");
    expect(config.tts.groq.outputFormat).toBe("wav");
    expect(config.validator.confidenceThreshold).toBe(80);
  });

  it("falls back to defaults when the file is missing", async () => {
    const config = await loadConfig(path.join(tmpDir, "absent.yaml"), {});
    expect(config.context.maxExchanges).toBe(5);
  });

  it("rejects malformed YAML", async () => {
    const file = path.join(tmpDir, "broken.yaml");
    await fs.writeFile(file, "context: [unclosed");
    await expect(loadConfig(file, {})).rejects.toMatchObject({ code: "CONFIG_ERROR" });
  });
});

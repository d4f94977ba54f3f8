import { describe, expect, it } from "vitest";

import { ConfigError, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      llm: {
        apiKey: undefined,
        baseURL: "https://api.openai.com/v1",
        model: "gpt-4o-mini",
        embeddingModel: "text-embedding-3-small",
      },
      workflow: { timeoutMs: 600_000 },
      storageDir: "./storage",
      uploadDir: "./data",
      server: { host: "0.0.0.0", port: 8000 },
      logLevel: "info",
    });
  });

  it("prefers LLM_API_KEY and reads numbers from strings", () => {
    const config = loadConfig({
      LLM_API_KEY: "test-secret",
      OPENAI_API_KEY: "other-secret",
      LLM_BASE_URL: "http://localhost:11434/v1",
      WORKFLOW_TIMEOUT_MS: "30000",
      PORT: "9000",
      LOG_LEVEL: "debug",
    });

    expect(config.llm.apiKey).toBe("test-secret");
    expect(config.llm.baseURL).toBe("http://localhost:11434/v1");
    expect(config.workflow.timeoutMs).toBe(30_000);
    expect(config.server.port).toBe(9000);
    expect(config.logLevel).toBe("debug");
  });

  it("uses OPENAI_API_KEY when LLM_API_KEY is blank", () => {
    expect(loadConfig({ LLM_API_KEY: " ", OPENAI_API_KEY: "test-secret" }).llm.apiKey).toBe("test-secret");
  });

  it("lists every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: "not-a-port", LOG_LEVEL: "loud", WORKFLOW_TIMEOUT_MS: "-5" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues.map((issue) => issue.split(":")[0]).sort()).toEqual([
        "LOG_LEVEL",
        "PORT",
        "WORKFLOW_TIMEOUT_MS",
      ]);
    }
  });
});

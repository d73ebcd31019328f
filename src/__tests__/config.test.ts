import { describe, expect, it } from "vitest";
import { loadConfig } from "../lib/config";
import { ValidationError } from "../lib/errors";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config.server.port).toBe(5442);
    expect(config.llm).toMatchObject({
      provider: "openai",
      model: "gpt-4o-mini",
      fallbackProviders: [],
      generationTimeoutMs: 60000,
    });
    expect(config.embedding).toEqual({
      provider: "openai",
      model: "text-embedding-3-small",
      dimensions: 1536,
      timeoutMs: 10000,
    });
    expect(config.storage.backend).toBe("memory");
    expect(config.search).toEqual({
      cacheTtlSeconds: 300,
      cacheMaxEntries: 100,
      batchConcurrency: 5,
      thresholdPolicy: "global",
    });
    expect(config.rag).toMatchObject({
      useLLMQueryAnalysis: true,
      queryAnalysisTimeoutMs: 15000,
      fallbackResults: 5,
      fallbackThreshold: 0.7,
      intelligentThreshold: 0.6,
    });
    expect(config.conversations).toEqual({
      maxMessages: 100,
      maxSessions: 1000,
      expireHours: 24,
      maintenanceIntervalMs: 600000,
    });
  });

  it("follows the chosen provider for model defaults", () => {
    const config = loadConfig({
      LLM_PROVIDER: "ollama",
      LLM_FALLBACK_PROVIDERS: "openai, ollama",
    });

    expect(config.llm.model).toBe("qwen2.5:7b-instruct-q4_K_M");
    expect(config.llm.fallbackProviders).toEqual(["openai", "ollama"]);
    expect(config.embedding).toMatchObject({ provider: "ollama", model: "nomic-embed-text" });
  });

  it("selects postgres when a connection string is given", () => {
    const config = loadConfig({ DATABASE_URL: "postgres://localhost/docent" });

    expect(config.storage.backend).toBe("postgres");
    expect(config.storage.connectionString).toBe("postgres://localhost/docent");
  });

  it("parses numbers and booleans from strings", () => {
    const config = loadConfig({
      PORT: "8080",
      QUERY_ANALYSIS_USE_LLM: "0",
      QUERY_ANALYSIS_TIMEOUT_MS: "2500",
      SEARCH_THRESHOLD_POLICY: "hybrid-only",
    });

    expect(config.server.port).toBe(8080);
    expect(config.rag.useLLMQueryAnalysis).toBe(false);
    expect(config.rag.queryAnalysisTimeoutMs).toBe(2500);
    expect(config.search.thresholdPolicy).toBe("hybrid-only");
  });

  it("names the offending field", () => {
    const thrown = (() => {
      try {
        loadConfig({ PORT: "not-a-port" });
      } catch (error) {
        return error;
      }
      return undefined;
    })();

    expect(thrown).toBeInstanceOf(ValidationError);
    expect(thrown).toMatchObject({ field: "PORT" });
  });
});

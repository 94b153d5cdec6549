import { describe, expect, it } from "vitest";
import { loadEnv, pipelineOverridesFromEnv } from "../../config/env";
import { PipelineConfigSchema, createPipelineConfig } from "../../config/pipeline";
import { buildAllowList, describeSchema, ARGO_SCHEMA } from "../../config/schema";

describe("createPipelineConfig", () => {
  it("fills in defaults and freezes the result", () => {
    const config = createPipelineConfig();
    expect(config.retrieval.topK).toBe(5);
    expect(config.validation).toEqual({ defaultRowLimit: 200, maxRows: 1000 });
    expect(config.orchestration).toEqual({ maxRegenerations: 2, requestTimeoutMs: 60_000 });
    expect(config.schema).toEqual(ARGO_SCHEMA);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.validation)).toBe(true);
  });

  it("merges partial overrides", () => {
    const config = createPipelineConfig({ generation: { maxRetries: 0 } });
    expect(config.generation).toEqual({ maxRetries: 0, initialDelayMs: 250, backoffFactor: 2, timeoutMs: 20_000, maxTokens: 512 });
  });

  it("rejects a default bound above the ceiling", () => {
    expect(() => createPipelineConfig({ validation: { defaultRowLimit: 2000, maxRows: 1000 } })).toThrow(
      "defaultRowLimit must not exceed maxRows"
    );
  });

  it("rejects out-of-range and unknown settings", () => {
    expect(() => createPipelineConfig({ retrieval: { topK: 0 } })).toThrow();
    expect(() => createPipelineConfig({ retrieval: { topK: 21 } })).toThrow();
    expect(PipelineConfigSchema.safeParse({ verbose: true }).success).toBe(false);
  });
});

describe("loadEnv", () => {
  it("applies defaults", () => {
    const env = loadEnv({});
    expect(env).toMatchObject({
      PORT: 3000,
      OPENAI_MODEL: "gpt-4o-mini",
      OPENAI_EMBEDDING_MODEL: "text-embedding-3-small",
      CHROMA_URL: "http://localhost:8000",
      CHROMA_COLLECTION: "ocean_context",
      MAX_CONCURRENT_REQUESTS: 8,
      PG_POOL_MAX: 10
    });
    expect(env.OPENAI_API_KEY).toBeUndefined();
  });

  it("coerces numbers and ignores blank values", () => {
    const env = loadEnv({ PORT: "8080", QUERY_MAX_ROWS: "500", RETRIEVAL_TOP_K: "  " });
    expect(env.PORT).toBe(8080);
    expect(env.QUERY_MAX_ROWS).toBe(500);
    expect(env.RETRIEVAL_TOP_K).toBeUndefined();
  });

  it("names invalid variables", () => {
    expect(() => loadEnv({ PORT: "not-a-port" })).toThrow("Invalid environment configuration");
  });

  it("feeds pipeline overrides", () => {
    const config = createPipelineConfig(pipelineOverridesFromEnv(loadEnv({ QUERY_MAX_ROWS: "500", QUERY_TIMEOUT_MS: "2500" })));
    expect(config.validation).toEqual({ defaultRowLimit: 200, maxRows: 500 });
    expect(config.execution.timeoutMs).toBe(2500);
    expect(config.retrieval.topK).toBe(5);
  });
});

describe("schema catalog", () => {
  it("lower-cases the allow-list", () => {
    const allowList = buildAllowList({
      tables: [{ name: "Argo_Profiles", description: "", columns: [{ name: "Platform_ID", type: "numeric", sqlType: "INTEGER", description: "" }] }]
    });
    expect([...allowList.entries()]).toEqual([["argo_profiles", new Set(["platform_id"])]]);
  });

  it("describes tables and columns for the model", () => {
    const text = describeSchema({
      tables: [{ name: "argo_profiles", description: "", columns: [{ name: "pressure", type: "numeric", sqlType: "REAL", description: "" }] }]
    });
    expect(text).toBe("Table argo_profiles\n  - pressure (REAL)");
  });
});

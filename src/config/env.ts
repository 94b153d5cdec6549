import dotenv from "dotenv";
import { z } from "zod";
import type { PipelineConfigInput } from "./pipeline";

dotenv.config();

const optionalInt = z.coerce.number().int().positive().optional();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  DATABASE_URL: z.string().min(1).optional(),
  PGHOST: z.string().optional(),
  PGPORT: optionalInt,
  PGUSER: z.string().optional(),
  PGPASSWORD: z.string().optional(),
  PGDATABASE: z.string().optional(),
  PGSSLMODE: z.string().optional(),
  PG_POOL_MAX: z.coerce.number().int().positive().default(10),
  CHROMA_URL: z.string().url().default("http://localhost:8000"),
  CHROMA_COLLECTION: z.string().min(1).default("ocean_context"),
  MAX_CONCURRENT_REQUESTS: z.coerce.number().int().positive().default(8),
  RETRIEVAL_TOP_K: optionalInt,
  QUERY_DEFAULT_ROW_LIMIT: optionalInt,
  QUERY_MAX_ROWS: optionalInt,
  QUERY_TIMEOUT_MS: optionalInt,
  LLM_TIMEOUT_MS: optionalInt,
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).optional(),
  MAX_REGENERATIONS: z.coerce.number().int().min(0).optional(),
  REQUEST_TIMEOUT_MS: optionalInt
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const blanksRemoved = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const result = EnvSchema.safeParse(blanksRemoved);
  if (!result.success) {
    throw new Error(`Invalid environment configuration: ${JSON.stringify(result.error.format())}`);
  }
  return result.data;
}

/** Pipeline overrides taken from the environment; unset variables keep the defaults. */
export function pipelineOverridesFromEnv(env: Env): PipelineConfigInput {
  return {
    retrieval: { topK: env.RETRIEVAL_TOP_K },
    generation: { timeoutMs: env.LLM_TIMEOUT_MS, maxRetries: env.LLM_MAX_RETRIES },
    validation: { defaultRowLimit: env.QUERY_DEFAULT_ROW_LIMIT, maxRows: env.QUERY_MAX_ROWS },
    execution: { timeoutMs: env.QUERY_TIMEOUT_MS },
    orchestration: { maxRegenerations: env.MAX_REGENERATIONS, requestTimeoutMs: env.REQUEST_TIMEOUT_MS }
  };
}

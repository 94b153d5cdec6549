import { z } from "zod";
import { ARGO_SCHEMA, SchemaCatalogSchema } from "./schema";

const positiveInt = z.number().int().positive();

export const PipelineConfigSchema = z
  .object({
    schema: SchemaCatalogSchema.default(ARGO_SCHEMA),
    retrieval: z
      .object({
        topK: positiveInt.max(20).default(5)
      })
      .default({}),
    prompt: z
      .object({
        maxContextChars: positiveInt.default(4000),
        maxHistoryTurns: z.number().int().min(0).default(3)
      })
      .default({}),
    generation: z
      .object({
        maxRetries: z.number().int().min(0).max(10).default(2),
        initialDelayMs: z.number().int().min(0).default(250),
        backoffFactor: z.number().min(1).default(2),
        timeoutMs: positiveInt.default(20_000),
        maxTokens: positiveInt.default(512)
      })
      .default({}),
    validation: z
      .object({
        defaultRowLimit: positiveInt.default(200),
        maxRows: positiveInt.default(1000)
      })
      .default({})
      .refine((value) => value.defaultRowLimit <= value.maxRows, {
        message: "defaultRowLimit must not exceed maxRows"
      }),
    execution: z
      .object({
        timeoutMs: positiveInt.default(10_000)
      })
      .default({}),
    summary: z
      .object({
        maxTableRows: positiveInt.default(20),
        maxTokens: positiveInt.default(400),
        timeoutMs: positiveInt.default(15_000)
      })
      .default({}),
    orchestration: z
      .object({
        maxRegenerations: z.number().int().min(0).max(5).default(2),
        requestTimeoutMs: positiveInt.default(60_000)
      })
      .default({})
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Validates overrides against the defaults and returns a frozen configuration.
 * Throws a ZodError describing every invalid field.
 */
export function createPipelineConfig(input: PipelineConfigInput = {}): Readonly<PipelineConfig> {
  return deepFreeze(PipelineConfigSchema.parse(input));
}

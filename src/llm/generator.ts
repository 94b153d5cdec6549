import { z } from "zod";
import {
  GeneratorOutputInvalidError,
  GeneratorUnavailableError,
  LanguageModelError,
  isAbortError
} from "../errors";
import { STATEMENT_KEYWORDS } from "../sql/keywords";
import type { CandidateQuery, Prompt, TokenUsage } from "../types";
import { cleanNullBytes, describeError, safeJsonParse, withRetry } from "../utils";
import type { Completion, LanguageModel } from "./client";
import { renderPromptMessages } from "./prompt";

export interface GenerationPolicy {
  maxRetries: number;
  initialDelayMs: number;
  backoffFactor: number;
  timeoutMs: number;
  maxTokens: number;
}

export interface GenerateOptions {
  /** Corrections from earlier rejected attempts, sent after the question. */
  feedback?: readonly string[];
  signal?: AbortSignal;
}

export const MALFORMED_OUTPUT_CORRECTION =
  "Your previous reply was not a single SQL statement. Reply with exactly one PostgreSQL SELECT statement and nothing else.";

const SqlEnvelopeSchema = z.union([z.object({ sql: z.string() }), z.object({ query: z.string() })]);

const FENCE_PATTERN = /```[A-Za-z]*[ \t]*\r?\n?([\s\S]*?)```/g;

/**
 * Pulls one SQL statement out of raw model output: a bare statement, a single
 * fenced block or a `{"sql": "..."}` object. Returns null when the output is
 * prose, empty or holds several code blocks. Stacked statements inside one
 * block are left for the validator.
 */
export function extractStatement(output: string): string | null {
  let text = cleanNullBytes(output).trim();

  const fences = [...text.matchAll(FENCE_PATTERN)];
  if (fences.length > 1) {
    return null;
  }
  if (fences.length === 1) {
    text = fences[0][1].trim();
  }

  if (text.startsWith("{")) {
    const envelope = SqlEnvelopeSchema.safeParse(safeJsonParse(text));
    if (!envelope.success) {
      return null;
    }
    text = ("sql" in envelope.data ? envelope.data.sql : envelope.data.query).trim();
  }

  text = text.replace(/[\s;]+$/, "");
  const leadingWord = /^\(*\s*([A-Za-z]+)/.exec(text);
  if (!leadingWord || !STATEMENT_KEYWORDS.has(leadingWord[1].toLowerCase())) {
    return null;
  }
  return text;
}

function addUsage(total: TokenUsage, usage: TokenUsage): TokenUsage {
  return {
    promptTokens: total.promptTokens + usage.promptTokens,
    completionTokens: total.completionTokens + usage.completionTokens
  };
}

export class QueryGenerator {
  private readonly model: LanguageModel;

  private readonly policy: GenerationPolicy;

  constructor(model: LanguageModel, policy: GenerationPolicy) {
    this.model = model;
    this.policy = policy;
  }

  /**
   * One candidate per call. Transport failures are retried with backoff and
   * end in GeneratorUnavailable; unparseable output gets a single re-prompt
   * and then GeneratorOutputInvalid.
   */
  async generate(prompt: Prompt, options: GenerateOptions = {}): Promise<CandidateQuery> {
    const corrections = [...(options.feedback ?? [])];
    let attempts = 0;
    let usage: TokenUsage = { promptTokens: 0, completionTokens: 0 };

    for (let round = 0; round < 2; round += 1) {
      const completion = await this.callModel(prompt, corrections, options.signal, () => {
        attempts += 1;
        return attempts;
      });
      usage = addUsage(usage, completion.usage);

      const statement = extractStatement(completion.text);
      if (statement) {
        return { text: statement, model: completion.model, usage, attempts };
      }
      console.warn("Model output was not a SQL statement", { round: round + 1, length: completion.text.length });
      corrections.push(MALFORMED_OUTPUT_CORRECTION);
    }

    throw new GeneratorOutputInvalidError("Model output did not contain a single SQL statement", attempts);
  }

  private async callModel(
    prompt: Prompt,
    corrections: readonly string[],
    signal: AbortSignal | undefined,
    countAttempt: () => number
  ): Promise<Completion> {
    const { maxRetries, initialDelayMs, backoffFactor, timeoutMs, maxTokens } = this.policy;
    const messages = renderPromptMessages(prompt, corrections);
    let attempts = 0;

    try {
      return await withRetry(
        () => {
          attempts = countAttempt();
          return this.model.complete({ messages, maxTokens, timeoutMs, signal });
        },
        {
          retries: maxRetries,
          initialDelayMs,
          factor: backoffFactor,
          signal,
          shouldRetry: (error) => error instanceof LanguageModelError && error.retryable,
          onRetry: (error, attempt, delayMs) => {
            console.warn("Model call failed, retrying", { attempt, delayMs, reason: describeError(error) });
          }
        }
      );
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      throw new GeneratorUnavailableError(`Language model unavailable: ${describeError(error)}`, attempts, { cause: error });
    }
  }
}

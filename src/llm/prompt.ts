import { describeSchema, toAllowedTables, type SchemaCatalog } from "../config/schema";
import { rankByScore } from "../retrieval/store";
import type { ContextChunk, HistoryTurn, Prompt } from "../types";
import type { ChatMessage } from "./client";

export const FORBIDDEN_OPERATIONS = [
  "schema changes (CREATE, ALTER, DROP, TRUNCATE, COMMENT, RENAME)",
  "data changes (INSERT, UPDATE, DELETE, MERGE, COPY)",
  "more than one statement",
  "administrative commands (GRANT, REVOKE, SET, VACUUM, ANALYZE, EXPLAIN, LOCK)",
  "server-side functions such as pg_sleep, pg_read_file, dblink, set_config and nextval",
  "SELECT ... INTO and row locking (FOR UPDATE, FOR SHARE)"
] as const;

export const OUTPUT_FORMAT =
  "Exactly one PostgreSQL SELECT statement (a WITH ... SELECT is fine). No explanation, no markdown, no trailing semicolon.";

export interface PromptComposerOptions {
  schema: SchemaCatalog;
  maxContextChars: number;
  maxHistoryTurns: number;
  maxRows: number;
}

/** Keeps the best-scoring chunks whose combined text fits in `maxChars`, dropping the weakest first. */
export function selectChunks(chunks: readonly ContextChunk[], maxChars: number): ContextChunk[] {
  const selected: ContextChunk[] = [];
  let used = 0;
  for (const chunk of rankByScore(chunks)) {
    if (used + chunk.text.length > maxChars) {
      break;
    }
    selected.push(chunk);
    used += chunk.text.length;
  }
  return selected;
}

function freezePrompt(prompt: Prompt): Prompt {
  Object.freeze(prompt.chunks);
  Object.freeze(prompt.history);
  Object.freeze(prompt.constraints.allowedTables);
  Object.freeze(prompt.constraints.forbiddenOperations);
  Object.freeze(prompt.constraints);
  return Object.freeze(prompt);
}

export class PromptComposer {
  private readonly options: PromptComposerOptions;

  private readonly system: string;

  constructor(options: PromptComposerOptions) {
    this.options = options;
    this.system = buildSystemPrompt(options);
  }

  /** Same inputs, same Prompt. */
  compose(question: string, history: readonly HistoryTurn[], chunks: readonly ContextChunk[]): Prompt {
    const { maxContextChars, maxHistoryTurns, schema, maxRows } = this.options;
    const recentHistory = maxHistoryTurns === 0 ? [] : history.slice(-maxHistoryTurns);
    return freezePrompt({
      system: this.system,
      chunks: selectChunks(chunks, maxContextChars),
      history: recentHistory.map((turn) => ({ question: turn.question, answer: turn.answer })),
      question: question.trim(),
      constraints: {
        allowedTables: toAllowedTables(schema),
        forbiddenOperations: [...FORBIDDEN_OPERATIONS],
        outputFormat: OUTPUT_FORMAT,
        maxRows
      }
    });
  }
}

export function buildSystemPrompt({ schema, maxRows }: Pick<PromptComposerOptions, "schema" | "maxRows">): string {
  return [
    "You are an oceanographer's assistant that turns questions about ARGO float measurements into PostgreSQL queries.",
    "",
    "Queryable tables and columns (nothing else exists):",
    describeSchema(schema),
    "",
    "Never use:",
    ...FORBIDDEN_OPERATIONS.map((operation) => `- ${operation}`),
    "",
    `Return at most ${maxRows} rows. Quote the column "timestamp" only if you must; it is a plain column name here.`,
    "When a question names a region, filter on latitude and longitude ranges.",
    "",
    `Output: ${OUTPUT_FORMAT}`
  ].join("\n");
}

function renderContext(chunks: readonly ContextChunk[]): string {
  return chunks.map((chunk, index) => `[${index + 1}] ${chunk.text}`).join("\n\n");
}

/**
 * Chat messages for a Prompt. `corrections` (feedback on a malformed or
 * rejected attempt) are appended after the question and never change the Prompt.
 */
export function renderPromptMessages(prompt: Prompt, corrections: readonly string[] = []): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: "system", content: prompt.system }];

  for (const turn of prompt.history) {
    messages.push({ role: "user", content: turn.question });
    messages.push({ role: "assistant", content: turn.answer });
  }

  const context =
    prompt.chunks.length > 0
      ? ["Background notes about the floats (may help pick platform ids or regions):", renderContext(prompt.chunks), ""]
      : [];
  messages.push({ role: "user", content: [...context, `Question: ${prompt.question}`].join("\n") });

  for (const correction of corrections) {
    messages.push({ role: "user", content: correction });
  }
  return messages;
}

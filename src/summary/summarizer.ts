import { z } from "zod";
import { LanguageModelError, SummarizerUnavailableError, isAbortError, userMessageFor } from "../errors";
import type { ChatMessage, LanguageModel } from "../llm/client";
import type { Answer, AnswerTrace, CellValue, ChartSpec, JsonCell, SuccessfulExecution, TableExcerpt } from "../types";
import { cleanNullBytes, describeError, safeJsonParse, withRetry } from "../utils";
import { chartCandidates, shapeChart, type ChartCandidate } from "./chart";

export interface SummarizerOptions {
  model: LanguageModel;
  maxTableRows: number;
  maxTokens: number;
  timeoutMs: number;
  retry: { maxRetries: number; initialDelayMs: number; backoffFactor: number };
}

export const NO_DATA_SUMMARY = "No matching data was found for this question.";

const SummaryResponseSchema = z.object({
  summary: z.string().trim().min(1),
  chart: z.enum(["map", "profile", "line", "scatter", "bar"]).nullable().optional()
});

type SummaryResponse = z.infer<typeof SummaryResponseSchema>;

export function toJsonCell(value: CellValue): JsonCell {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "number" && !Number.isFinite(value)) return null;
  return value;
}

export function buildTableExcerpt(result: SuccessfulExecution, maxRows: number): TableExcerpt {
  const rows = result.rows
    .slice(0, maxRows)
    .map((row) => Object.fromEntries(result.columns.map((column) => [column.name, toJsonCell(row[column.name] ?? null)])));
  return {
    columns: result.columns.map((column) => ({ ...column })),
    rows,
    totalRows: result.rowCount,
    truncated: result.truncated || result.rowCount > maxRows
  };
}

function formatCell(value: JsonCell): string {
  if (value === null) return "no value";
  if (typeof value === "number") return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(4)));
  return String(value);
}

/** Wording used when the model cannot phrase the answer. */
export function templatedSummary(result: SuccessfulExecution): string {
  if (result.rowCount === 1) {
    const [row] = result.rows;
    const pairs = result.columns.slice(0, 4).map((column) => `${column.name}: ${formatCell(toJsonCell(row[column.name] ?? null))}`);
    return `Found 1 matching row (${pairs.join(", ")}).`;
  }
  const suffix = result.truncated ? " The result was cut off at the row limit." : "";
  return `Found ${result.rowCount} matching rows.${suffix} ${userMessageFor("SummarizerUnavailable")}`;
}

function buildMessages(question: string, excerpt: TableExcerpt, candidates: readonly ChartCandidate[]): ChatMessage[] {
  const kinds = candidates.map((candidate) => candidate.kind);
  const chartRule =
    kinds.length > 0
      ? `"chart" must be one of ${JSON.stringify(kinds)} or null.`
      : `"chart" must be null.`;
  return [
    {
      role: "system",
      content: [
        "You are a helpful oceanographer assistant. You are given rows computed for a user's question about ARGO floats.",
        "Write a concise one-paragraph answer using only numbers that appear in the rows. Do not mention databases, tables or SQL.",
        `Reply with a single JSON object: {"summary": string, "chart": string | null}. ${chartRule}`
      ].join("\n")
    },
    {
      role: "user",
      content: [
        `Question: ${question}`,
        `Rows (${excerpt.rows.length} of ${excerpt.totalRows}${excerpt.truncated ? ", truncated" : ""}):`,
        JSON.stringify(excerpt.rows)
      ].join("\n")
    }
  ];
}

/**
 * Turns an execution result into an Answer. Empty results never reach the
 * model; model failures degrade to a templated summary.
 */
export class ResultSummarizer {
  private readonly options: SummarizerOptions;

  constructor(options: SummarizerOptions) {
    this.options = options;
  }

  async summarize(question: string, result: SuccessfulExecution, signal?: AbortSignal): Promise<Answer> {
    const excerpt = buildTableExcerpt(result, this.options.maxTableRows);
    const trace: AnswerTrace = {
      query: result.query,
      attempts: 0,
      model: null,
      durationMs: result.durationMs,
      failure: null,
      warnings: []
    };

    if (result.rowCount === 0) {
      return { status: "no_data", summary: NO_DATA_SUMMARY, chart: null, table: excerpt, trace };
    }

    const candidates = chartCandidates(result.columns, result.rowCount);
    try {
      const response = await this.askModel(question, excerpt, candidates, signal);
      const chosen = this.pickCandidate(response, candidates);
      return {
        status: "answered",
        summary: cleanNullBytes(response.summary).trim(),
        chart: chosen ? shapeChart(chosen, result.rows) : null,
        table: excerpt,
        trace
      };
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      console.warn("Summary model failed, using templated summary", { reason: describeError(error) });
      const fallback: ChartSpec | null = candidates.length > 0 ? shapeChart(candidates[0], result.rows) : null;
      return {
        status: "answered",
        summary: templatedSummary(result),
        chart: fallback,
        table: excerpt,
        trace: { ...trace, warnings: ["SummarizerUnavailable"] }
      };
    }
  }

  private pickCandidate(response: SummaryResponse, candidates: readonly ChartCandidate[]): ChartCandidate | null {
    if (response.chart === null) {
      return null;
    }
    const requested = candidates.find((candidate) => candidate.kind === response.chart);
    return requested ?? candidates[0] ?? null;
  }

  private async askModel(
    question: string,
    excerpt: TableExcerpt,
    candidates: readonly ChartCandidate[],
    signal?: AbortSignal
  ): Promise<SummaryResponse> {
    const { model, maxTokens, timeoutMs, retry } = this.options;
    const messages = buildMessages(question, excerpt, candidates);

    const completion = await withRetry(() => model.complete({ messages, maxTokens, timeoutMs, json: true, signal }), {
      retries: retry.maxRetries,
      initialDelayMs: retry.initialDelayMs,
      factor: retry.backoffFactor,
      signal,
      shouldRetry: (error) => error instanceof LanguageModelError && error.retryable
    });

    const parsed = SummaryResponseSchema.safeParse(safeJsonParse(cleanNullBytes(completion.text)));
    if (!parsed.success) {
      throw new SummarizerUnavailableError("Summary model returned an unexpected shape");
    }
    return parsed.data;
  }
}

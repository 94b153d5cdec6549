import type { PipelineErrorKind } from "./errors";

export interface HistoryTurn {
  question: string;
  answer: string;
}

export interface Question {
  readonly text: string;
  readonly history: readonly HistoryTurn[];
  readonly askedAt: Date;
}

export interface ContextChunk {
  readonly id: string;
  readonly text: string;
  readonly embedding: readonly number[];
  readonly score: number;
}

export interface AllowedTable {
  table: string;
  columns: string[];
}

export interface GenerationConstraints {
  allowedTables: AllowedTable[];
  forbiddenOperations: string[];
  outputFormat: string;
  maxRows: number;
}

export interface Prompt {
  readonly system: string;
  readonly chunks: readonly ContextChunk[];
  readonly history: readonly HistoryTurn[];
  readonly question: string;
  readonly constraints: GenerationConstraints;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface CandidateQuery {
  text: string;
  model: string;
  usage: TokenUsage;
  attempts: number;
}

export type ViolationCode = Extract<PipelineErrorKind, "SyntaxInvalid" | "OperationForbidden" | "SchemaViolation">;

export interface Violation {
  code: ViolationCode;
  message: string;
}

export type ValidationVerdict =
  | {
      accepted: true;
      normalizedQuery: string;
      rowLimit: number;
      boundInjected: boolean;
      violations: [];
    }
  | {
      accepted: false;
      violations: [Violation];
    };

export type ColumnType = "numeric" | "text" | "temporal" | "boolean" | "unknown";

export interface ColumnMeta {
  name: string;
  type: ColumnType;
}

export type CellValue = number | string | boolean | Date | null;

export type ResultRow = Record<string, CellValue>;

export type ExecutionFailureKind = Extract<PipelineErrorKind, "ExecutorTimeout" | "ExecutorDataStoreError">;

export interface ExecutionFailure {
  kind: ExecutionFailureKind;
  message: string;
  code?: string;
}

export type ExecutionResult =
  | {
      ok: true;
      query: string;
      rows: ResultRow[];
      columns: ColumnMeta[];
      rowCount: number;
      truncated: boolean;
      durationMs: number;
    }
  | {
      ok: false;
      query: string;
      failure: ExecutionFailure;
      durationMs: number;
    };

export type SuccessfulExecution = Extract<ExecutionResult, { ok: true }>;

export interface GeoPoint {
  lat: number;
  lon: number;
  label?: string;
}

export interface XYPoint {
  x: number | string;
  y: number;
}

export type XYChartKind = "line" | "scatter" | "bar" | "profile";

export type ChartKind = XYChartKind | "map";

export type ChartSpec =
  | { kind: "map"; points: GeoPoint[] }
  | { kind: XYChartKind; xField: string; yField: string; points: XYPoint[] };

export type JsonCell = number | string | boolean | null;

export interface TableExcerpt {
  columns: ColumnMeta[];
  rows: Array<Record<string, JsonCell>>;
  totalRows: number;
  truncated: boolean;
}

export type AnswerStatus = "answered" | "no_data" | "cannot_answer" | "timeout" | "error";

export interface AnswerTrace {
  query: string | null;
  attempts: number;
  model: string | null;
  durationMs: number | null;
  failure: PipelineErrorKind | null;
  warnings: string[];
}

export interface Answer {
  status: AnswerStatus;
  summary: string;
  chart: ChartSpec | null;
  table: TableExcerpt | null;
  trace: AnswerTrace;
}

export function createQuestion(text: string, history: HistoryTurn[] = [], askedAt: Date = new Date()): Question {
  return Object.freeze({
    text: text.trim(),
    history: Object.freeze(history.map((turn) => Object.freeze({ ...turn }))),
    askedAt
  });
}

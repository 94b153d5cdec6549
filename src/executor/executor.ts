import { PipelineAbortedError } from "../errors";
import type { CellValue, ColumnMeta, ColumnType, ExecutionFailure, ExecutionResult, ResultRow } from "../types";
import { describeError, errorCode, linkedAbortController, throwIfAborted, withTimeout } from "../utils";

export interface RawField {
  name: string;
  dataTypeID: number;
}

export interface RawResult {
  rows: Array<Record<string, unknown>>;
  fields: RawField[];
}

export interface DataStoreRunOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/** Runs one read-only query. Implementations hold a connection only for the duration of `run`. */
export interface DataStore {
  run(query: string, options: DataStoreRunOptions): Promise<RawResult>;
}

export interface ExecuteOptions {
  timeoutMs: number;
  rowLimit: number;
  signal?: AbortSignal;
}

export const QUERY_CANCELED = "57014";

const NUMERIC_TYPES = new Set([20, 21, 23, 26, 700, 701, 1700]);
const TEXT_TYPES = new Set([18, 19, 25, 1042, 1043]);
const TEMPORAL_TYPES = new Set([1082, 1114, 1184]);
const BOOLEAN_TYPE = 16;

class QueryTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Query exceeded ${timeoutMs} ms`);
    this.name = "QueryTimeoutError";
  }
}

export function columnTypeFor(dataTypeID: number): ColumnType {
  if (NUMERIC_TYPES.has(dataTypeID)) return "numeric";
  if (TEXT_TYPES.has(dataTypeID)) return "text";
  if (TEMPORAL_TYPES.has(dataTypeID)) return "temporal";
  if (dataTypeID === BOOLEAN_TYPE) return "boolean";
  return "unknown";
}

function toNumber(value: unknown): CellValue {
  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function toDate(value: unknown): CellValue {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  const parsed = new Date(String(value));
  return Number.isNaN(parsed.getTime()) ? String(value) : parsed;
}

function toBoolean(value: unknown): CellValue {
  if (typeof value === "boolean") return value;
  if (value === "t" || value === "true") return true;
  if (value === "f" || value === "false") return false;
  return String(value);
}

function toLooseCell(value: unknown): CellValue {
  if (typeof value === "number" || typeof value === "string" || typeof value === "boolean" || value instanceof Date) {
    return value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  return JSON.stringify(value) ?? String(value);
}

export function convertCell(value: unknown, type: ColumnType): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  switch (type) {
    case "numeric":
      return toNumber(value);
    case "temporal":
      return toDate(value);
    case "boolean":
      return toBoolean(value);
    case "text":
      return String(value);
    default:
      return toLooseCell(value);
  }
}

const SQLSTATE_CLASS_MESSAGES: Record<string, string> = {
  "08": "The float database is unreachable.",
  "22": "The query hit a data error (for example a division by zero or an invalid date).",
  "25": "The float database refused the query because it would change data.",
  "28": "The float database rejected the service credentials.",
  "42": "The query does not match the float database schema.",
  "53": "The float database is out of resources.",
  "57": "The float database is shutting down or unavailable."
};

const NETWORK_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "ETIMEDOUT", "EHOSTUNREACH"]);

export function classifyFailure(error: unknown): ExecutionFailure {
  const code = errorCode(error);
  if (error instanceof QueryTimeoutError || code === QUERY_CANCELED) {
    return { kind: "ExecutorTimeout", message: "The query exceeded the execution time limit.", code };
  }
  if (code && NETWORK_CODES.has(code)) {
    return { kind: "ExecutorDataStoreError", message: SQLSTATE_CLASS_MESSAGES["08"], code };
  }
  const classMessage = code ? SQLSTATE_CLASS_MESSAGES[code.slice(0, 2)] : undefined;
  return {
    kind: "ExecutorDataStoreError",
    message: classMessage ?? "The float database could not run the query.",
    code
  };
}

/**
 * Runs validated queries under a wall-clock timer and a row ceiling. Failures
 * come back as values; only a caller abort is thrown.
 */
export class QueryExecutor {
  private readonly store: DataStore;

  constructor(store: DataStore) {
    this.store = store;
  }

  async execute(query: string, { timeoutMs, rowLimit, signal }: ExecuteOptions): Promise<ExecutionResult> {
    throwIfAborted(signal);
    const started = Date.now();
    const controller = linkedAbortController(signal);

    try {
      const raw = await withTimeout(this.store.run(query, { timeoutMs, signal: controller.signal }), timeoutMs, () => {
        controller.abort();
        return new QueryTimeoutError(timeoutMs);
      });

      const columns: ColumnMeta[] = raw.fields.map((field) => ({ name: field.name, type: columnTypeFor(field.dataTypeID) }));
      const ceiling = Math.max(0, rowLimit);
      const truncated = raw.rows.length > ceiling;
      const rows: ResultRow[] = raw.rows.slice(0, ceiling).map((row) =>
        Object.fromEntries(columns.map((column) => [column.name, convertCell(row[column.name], column.type)]))
      );

      return { ok: true, query, rows, columns, rowCount: rows.length, truncated, durationMs: Date.now() - started };
    } catch (error) {
      if (signal?.aborted) {
        throw new PipelineAbortedError();
      }
      const failure = classifyFailure(error);
      console.error("Query execution failed", { kind: failure.kind, code: failure.code ?? null, detail: describeError(error) });
      return { ok: false, query, failure, durationMs: Date.now() - started };
    }
  }
}

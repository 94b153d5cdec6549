export const PIPELINE_ERROR_KINDS = [
  "RetrieverEmpty",
  "GeneratorUnavailable",
  "GeneratorOutputInvalid",
  "SyntaxInvalid",
  "OperationForbidden",
  "SchemaViolation",
  "ExecutorTimeout",
  "ExecutorDataStoreError",
  "SummarizerUnavailable",
  "CannotAnswer"
] as const;

export type PipelineErrorKind = (typeof PIPELINE_ERROR_KINDS)[number];

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class GeneratorUnavailableError extends PipelineError {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super("GeneratorUnavailable", message, options);
    this.attempts = attempts;
  }
}

export class GeneratorOutputInvalidError extends PipelineError {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super("GeneratorOutputInvalid", message, options);
    this.attempts = attempts;
  }
}

export class SummarizerUnavailableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SummarizerUnavailable", message, options);
  }
}

/**
 * Raised by a language model adapter. `retryable` marks transport-level
 * failures (connection, timeout, rate limit, 5xx) that backoff may cure.
 */
export class LanguageModelError extends Error {
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LanguageModelError";
    this.retryable = retryable;
  }
}

/** The caller went away; nothing downstream may run. */
export class PipelineAbortedError extends Error {
  constructor(message = "Pipeline aborted") {
    super(message);
    this.name = "PipelineAbortedError";
  }
}

const USER_MESSAGES: Record<PipelineErrorKind, string> = {
  RetrieverEmpty: "No background context was available for this question.",
  GeneratorUnavailable:
    "The question could not be translated into a database query because the language service is unavailable. Please try again later.",
  GeneratorOutputInvalid: "The question could not be safely translated into a database query.",
  SyntaxInvalid: "The question could not be safely translated into a database query.",
  OperationForbidden: "The question could not be safely translated into a database query.",
  SchemaViolation:
    "The question refers to data that is not part of the float measurement dataset, so it could not be safely translated into a database query.",
  ExecutorTimeout: "The query took too long to run. Try narrowing the question to fewer floats or a shorter time range.",
  ExecutorDataStoreError: "The float database could not complete the query. Please try again later.",
  SummarizerUnavailable: "Here are the matching measurements.",
  CannotAnswer: "The question could not be safely translated into a database query. Try rephrasing it."
};

export function userMessageFor(kind: PipelineErrorKind): string {
  return USER_MESSAGES[kind];
}

export function isAbortError(error: unknown): boolean {
  if (error instanceof PipelineAbortedError) {
    return true;
  }
  return error instanceof Error && (error.name === "AbortError" || error.name === "APIUserAbortError");
}

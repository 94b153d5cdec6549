import { PipelineAbortedError } from "./errors";

export interface RetryOptions {
  retries?: number;
  initialDelayMs?: number;
  factor?: number;
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  cooldownMs?: number;
}

interface CircuitBreakerState {
  failures: number;
  openedAt: number | null;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new PipelineAbortedError());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new PipelineAbortedError());
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new PipelineAbortedError();
  }
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 2, initialDelayMs = 250, factor = 2, signal, shouldRetry = () => true, onRetry } = options;
  let attempt = 0;
  let delay = initialDelayMs;
  while (true) {
    throwIfAborted(signal);
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= retries || signal?.aborted || !shouldRetry(error)) {
        throw error;
      }
      onRetry?.(error, attempt + 1, delay);
      await sleep(delay, signal);
      delay *= factor;
      attempt += 1;
    }
  }
}

/**
 * Rejects with `onTimeout()` when `promise` has not settled after `ms`.
 * The underlying work is not cancelled; pass an AbortSignal to it for that.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/** A controller that aborts when any of the given signals does. */
export function linkedAbortController(...signals: Array<AbortSignal | undefined>): AbortController {
  const controller = new AbortController();
  for (const signal of signals) {
    if (!signal) continue;
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    signal.addEventListener("abort", () => controller.abort(signal.reason), { once: true });
  }
  return controller;
}

export class CircuitBreaker {
  private readonly state: CircuitBreakerState = { failures: 0, openedAt: null };

  private readonly failureThreshold: number;

  private readonly cooldownMs: number;

  constructor({ failureThreshold = 3, cooldownMs = 15_000 }: CircuitBreakerOptions = {}) {
    this.failureThreshold = failureThreshold;
    this.cooldownMs = cooldownMs;
  }

  exec<T>(action: () => Promise<T>): Promise<T> {
    if (this.isOpen()) {
      return Promise.reject(new CircuitOpenError());
    }

    return action()
      .then((result) => {
        this.reset();
        return result;
      })
      .catch((error: unknown) => {
        this.recordFailure();
        throw error;
      });
  }

  private recordFailure(): void {
    this.state.failures += 1;
    if (this.state.failures >= this.failureThreshold) {
      this.state.openedAt = Date.now();
    }
  }

  private reset(): void {
    this.state.failures = 0;
    this.state.openedAt = null;
  }

  private isOpen(): boolean {
    if (this.state.openedAt === null) {
      return false;
    }
    const elapsed = Date.now() - this.state.openedAt;
    if (elapsed > this.cooldownMs) {
      this.reset();
      return false;
    }
    return true;
  }
}

export class CircuitOpenError extends Error {
  constructor() {
    super("Circuit breaker is open");
    this.name = "CircuitOpenError";
  }
}

const breakerMap = new Map<string, CircuitBreaker>();

export function getCircuitBreaker(host: string, options?: CircuitBreakerOptions): CircuitBreaker {
  const key = host.toLowerCase();
  let breaker = breakerMap.get(key);
  if (!breaker) {
    breaker = new CircuitBreaker(options);
    breakerMap.set(key, breaker);
  }
  return breaker;
}

export function safeJsonParse<T = unknown>(input: string): T | null {
  try {
    return JSON.parse(input) as T;
  } catch (_error) {
    return null;
  }
}

export function cleanNullBytes(text: string): string {
  return text.replace(/\u0000/g, "");
}

const CREDENTIAL_PATTERNS: Array<[RegExp, string]> = [
  [/\b([a-z][a-z0-9+.-]*:\/\/)[^\s:/@]+:[^\s@]+@/gi, "$1***:***@"],
  [/\b(password|passwd|pwd)\s*=\s*\S+/gi, "$1=***"],
  [/\b(sk-[A-Za-z0-9_-]{8,})/g, "sk-***"]
];

/** Strips connection-string credentials, password assignments and API keys from a message. */
export function redactSecrets(message: string): string {
  return CREDENTIAL_PATTERNS.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), message);
}

export function describeError(error: unknown): string {
  return redactSecrets(error instanceof Error ? error.message : String(error));
}

export function errorCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/** Settles like `promise`, or rejects with PipelineAbortedError as soon as `signal` aborts. */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_resolve, reject) => {
    onAbort = () => reject(new PipelineAbortedError());
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return Promise.race([promise, aborted]).finally(() => {
    if (onAbort) signal.removeEventListener("abort", onAbort);
  });
}

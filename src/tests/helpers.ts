import type { Completion, CompletionRequest, LanguageModel } from "../llm/client";
import type { DataStore, DataStoreRunOptions, RawResult } from "../executor/executor";
import type { Embedder } from "../retrieval/embeddings";
import { abortable } from "../utils";

export const OID = { int4: 23, float8: 701, text: 25, timestamp: 1114, bool: 16, jsonb: 3802 } as const;

/** Bag-of-words vectors over a fixed vocabulary. */
export class KeywordEmbedder implements Embedder {
  readonly vocabulary: readonly string[];

  readonly calls: string[] = [];

  constructor(vocabulary: readonly string[]) {
    this.vocabulary = vocabulary;
  }

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    const words = text.toLowerCase().split(/[^a-z0-9_]+/);
    return this.vocabulary.map((term) => words.filter((word) => word === term).length);
  }
}

export type ScriptStep = string | Error | ((request: CompletionRequest) => Promise<string> | string);

/** Replies with the scripted steps in order; a step that is an Error is thrown. */
export class ScriptedLanguageModel implements LanguageModel {
  readonly requests: CompletionRequest[] = [];

  private readonly steps: ScriptStep[];

  constructor(steps: ScriptStep[]) {
    this.steps = [...steps];
  }

  get remaining(): number {
    return this.steps.length;
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    this.requests.push(request);
    const step = this.steps.shift();
    if (step === undefined) {
      throw new Error("Scripted model ran out of replies");
    }
    if (step instanceof Error) {
      throw step;
    }
    const text = typeof step === "string" ? step : await step(request);
    return { text, model: "test-model", usage: { promptTokens: 10, completionTokens: 5 } };
  }
}

export type DataStoreHandler = (query: string, options: DataStoreRunOptions) => Promise<RawResult> | RawResult;

export class FakeDataStore implements DataStore {
  readonly queries: string[] = [];

  private readonly handler: DataStoreHandler;

  constructor(handler: DataStoreHandler) {
    this.handler = handler;
  }

  async run(query: string, options: DataStoreRunOptions): Promise<RawResult> {
    this.queries.push(query);
    return this.handler(query, options);
  }
}

/** Settles only when `signal` aborts. */
export function hangUntilAborted<T>(signal?: AbortSignal): Promise<T> {
  return abortable(new Promise<T>(() => undefined), signal);
}

export function sqlError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

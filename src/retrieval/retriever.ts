import type { ContextChunk } from "../types";
import { abortable, throwIfAborted } from "../utils";
import type { Embedder } from "./embeddings";
import { rankByScore, type ContextStore } from "./store";

export interface RetrieverOptions {
  embedder: Embedder;
  store: ContextStore;
  topK: number;
}

/**
 * Finds the context chunks closest to a question. An empty store yields an
 * empty list; embedding and store failures propagate to the caller.
 *
 * An abort rejects at once, but neither the embedding client nor the Chroma
 * client takes a signal, so a request already sent runs to completion and
 * its result is dropped.
 */
export class Retriever {
  private readonly options: RetrieverOptions;

  constructor(options: RetrieverOptions) {
    this.options = options;
  }

  async retrieve(question: string, k: number = this.options.topK, signal?: AbortSignal): Promise<ContextChunk[]> {
    const text = question.trim();
    if (!text || k <= 0) {
      return [];
    }
    throwIfAborted(signal);
    const embedding = await abortable(this.options.embedder.embed(text, signal), signal);
    const chunks = await abortable(this.options.store.search(embedding, k), signal);
    return rankByScore(chunks).slice(0, k);
  }
}

import type { ContextChunk } from "../types";

export interface StoredChunk {
  id: string;
  text: string;
  embedding: number[];
}

/** Read-only similarity search over pre-embedded context chunks. */
export interface ContextStore {
  search(embedding: readonly number[], k: number): Promise<ContextChunk[]>;
}

export function cosineSimilarity(left: readonly number[], right: readonly number[]): number {
  if (left.length !== right.length) {
    throw new Error(`Embedding dimension mismatch: ${left.length} vs ${right.length}`);
  }
  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;
  for (let index = 0; index < left.length; index += 1) {
    dot += left[index] * right[index];
    leftNorm += left[index] * left[index];
    rightNorm += right[index] * right[index];
  }
  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }
  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
}

/** Descending score; equal scores keep their incoming order. */
export function rankByScore<T extends { score: number }>(items: readonly T[]): T[] {
  return [...items].sort((left, right) => right.score - left.score);
}

export class InMemoryContextStore implements ContextStore {
  private readonly chunks: StoredChunk[] = [];

  constructor(chunks: StoredChunk[] = []) {
    this.add(chunks);
  }

  get size(): number {
    return this.chunks.length;
  }

  add(chunks: StoredChunk[]): void {
    for (const chunk of chunks) {
      this.chunks.push({ ...chunk, embedding: [...chunk.embedding] });
    }
  }

  async search(embedding: readonly number[], k: number): Promise<ContextChunk[]> {
    if (k <= 0) {
      return [];
    }
    const scored = this.chunks.map((chunk) => ({
      id: chunk.id,
      text: chunk.text,
      embedding: chunk.embedding,
      score: cosineSimilarity(embedding, chunk.embedding)
    }));
    return rankByScore(scored).slice(0, k);
  }
}

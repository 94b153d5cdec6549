import { ChromaClient, IncludeEnum, type Collection } from "chromadb";
import type { ContextChunk } from "../types";
import type { Embedder } from "./embeddings";
import { rankByScore, type ContextStore } from "./store";

export interface ChromaContextStoreOptions {
  url: string;
  collection: string;
  embedder: Embedder;
}

/** Maps a Chroma distance (smaller is closer) onto a similarity in (0, 1]. */
export function distanceToScore(distance: number): number {
  return 1 / (1 + Math.max(0, distance));
}

export class ChromaContextStore implements ContextStore {
  private readonly client: ChromaClient;

  private readonly options: ChromaContextStoreOptions;

  private collection: Promise<Collection> | null = null;

  constructor(options: ChromaContextStoreOptions) {
    this.options = options;
    this.client = new ChromaClient({ path: options.url });
  }

  async search(embedding: readonly number[], k: number): Promise<ContextChunk[]> {
    if (k <= 0) {
      return [];
    }
    const collection = await this.getCollection();
    const result = await collection.query({
      queryEmbeddings: [[...embedding]],
      nResults: k,
      include: [IncludeEnum.Documents, IncludeEnum.Distances, IncludeEnum.Embeddings]
    });

    const ids = result.ids[0] ?? [];
    const documents = result.documents[0] ?? [];
    const distances = result.distances?.[0] ?? [];
    const embeddings = result.embeddings?.[0] ?? [];

    const chunks = ids.flatMap((id, index) => {
      const text = documents[index];
      if (!text) {
        return [];
      }
      return [
        {
          id,
          text,
          embedding: embeddings[index] ?? [],
          score: distanceToScore(distances[index] ?? Number.POSITIVE_INFINITY)
        }
      ];
    });
    return rankByScore(chunks).slice(0, k);
  }

  private getCollection(): Promise<Collection> {
    if (!this.collection) {
      const { embedder } = this.options;
      this.collection = this.client
        .getCollection({
          name: this.options.collection,
          embeddingFunction: {
            generate: (texts: string[]) => Promise.all(texts.map((text) => embedder.embed(text)))
          }
        })
        .catch((error: unknown) => {
          this.collection = null;
          throw error;
        });
    }
    return this.collection;
  }
}

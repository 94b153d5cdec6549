import { OpenAIEmbeddings } from "@langchain/openai";
import { abortable, throwIfAborted } from "../utils";

/** Turns text into the vector space the context store was indexed with. */
export interface Embedder {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface OpenAiEmbedderOptions {
  apiKey?: string;
  model: string;
  baseURL?: string;
}

export class OpenAiEmbedder implements Embedder {
  private readonly embeddings: OpenAIEmbeddings;

  constructor({ apiKey, model, baseURL }: OpenAiEmbedderOptions) {
    this.embeddings = new OpenAIEmbeddings({
      apiKey,
      model,
      maxRetries: 1,
      configuration: baseURL ? { baseURL } : undefined
    });
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    throwIfAborted(signal);
    // embedQuery takes no signal; the request itself is not cancelled
    return abortable(this.embeddings.embedQuery(text), signal);
  }
}

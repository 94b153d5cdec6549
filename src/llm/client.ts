import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { LanguageModelError, PipelineAbortedError } from "../errors";
import type { TokenUsage } from "../types";
import { CircuitOpenError, getCircuitBreaker, redactSecrets, type CircuitBreaker } from "../utils";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  maxTokens: number;
  temperature?: number;
  /** Ask the model for a JSON object. */
  json?: boolean;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface Completion {
  text: string;
  model: string;
  usage: TokenUsage;
}

/** The only seam between the pipeline and a hosted chat model. */
export interface LanguageModel {
  complete(request: CompletionRequest): Promise<Completion>;
}

export interface OpenAiLanguageModelOptions {
  apiKey?: string;
  baseURL?: string;
  model: string;
}

function toOpenAiMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    default:
      return { role: "user", content: message.content };
  }
}

/**
 * Sorts SDK failures into retryable transport problems (connection, timeout,
 * rate limit, 5xx) and everything else. Caller aborts become PipelineAbortedError.
 */
export function toLanguageModelError(error: unknown, signal?: AbortSignal): Error {
  if (error instanceof OpenAI.APIUserAbortError || signal?.aborted) {
    return new PipelineAbortedError();
  }
  if (error instanceof CircuitOpenError) {
    return new LanguageModelError("Language model circuit is open", false, { cause: error });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new LanguageModelError(`Language model unreachable: ${redactSecrets(error.message)}`, true, { cause: error });
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status ?? 0;
    const retryable = status === 408 || status === 409 || status === 429 || status >= 500;
    return new LanguageModelError(`Language model returned ${status || "an error"}: ${redactSecrets(error.message)}`, retryable, {
      cause: error
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new LanguageModelError(redactSecrets(message), false, { cause: error });
}

export class OpenAiLanguageModel implements LanguageModel {
  private readonly client: OpenAI;

  private readonly model: string;

  private readonly breaker: CircuitBreaker;

  constructor({ apiKey, baseURL, model }: OpenAiLanguageModelOptions) {
    if (!apiKey) {
      throw new Error("OPENAI_API_KEY is not configured");
    }
    // retries are driven by the pipeline's own backoff policy
    this.client = new OpenAI({ apiKey, baseURL, maxRetries: 0 });
    this.model = model;
    this.breaker = getCircuitBreaker(new URL(this.client.baseURL).host);
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    try {
      const response = await this.breaker.exec(() =>
        this.client.chat.completions.create(
          {
            model: this.model,
            messages: request.messages.map(toOpenAiMessage),
            max_tokens: request.maxTokens,
            temperature: request.temperature ?? 0,
            response_format: request.json ? { type: "json_object" } : undefined
          },
          { signal: request.signal, timeout: request.timeoutMs }
        )
      );

      return {
        text: response.choices[0]?.message?.content ?? "",
        model: response.model,
        usage: {
          promptTokens: response.usage?.prompt_tokens ?? 0,
          completionTokens: response.usage?.completion_tokens ?? 0
        }
      };
    } catch (error) {
      throw toLanguageModelError(error, request.signal);
    }
  }
}

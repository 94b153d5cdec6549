import OpenAI from "openai";
import { describe, expect, it } from "vitest";
import { LanguageModelError, PipelineAbortedError } from "../../errors";
import { OpenAiLanguageModel, toLanguageModelError } from "../../llm/client";
import { CircuitOpenError } from "../../utils";

function retryable(error: Error): boolean {
  if (!(error instanceof LanguageModelError)) {
    throw new Error(`Expected a LanguageModelError, got ${error.name}`);
  }
  return error.retryable;
}

describe("toLanguageModelError", () => {
  it("marks rate limits, conflicts and server errors as retryable", () => {
    for (const status of [408, 409, 429, 500, 503]) {
      expect(retryable(toLanguageModelError(new OpenAI.APIError(status, undefined, "upstream", undefined)))).toBe(true);
    }
  });

  it("does not retry client errors", () => {
    expect(retryable(toLanguageModelError(new OpenAI.APIError(400, undefined, "bad request", undefined)))).toBe(false);
    expect(retryable(toLanguageModelError(new OpenAI.APIError(401, undefined, "no key", undefined)))).toBe(false);
  });

  it("retries connection failures but not an open circuit", () => {
    expect(retryable(toLanguageModelError(new OpenAI.APIConnectionError({ message: "socket hang up" })))).toBe(true);
    expect(retryable(toLanguageModelError(new CircuitOpenError()))).toBe(false);
  });

  it("turns caller aborts into PipelineAbortedError", () => {
    expect(toLanguageModelError(new OpenAI.APIUserAbortError())).toBeInstanceOf(PipelineAbortedError);
    const controller = new AbortController();
    controller.abort();
    expect(toLanguageModelError(new Error("whatever"), controller.signal)).toBeInstanceOf(PipelineAbortedError);
  });

  it("redacts keys from messages", () => {
    const error = toLanguageModelError(new Error("Incorrect API key provided: sk-testsecret1234"));
    expect(error.message).toBe("Incorrect API key provided: sk-***");
  });
});

describe("OpenAiLanguageModel", () => {
  it("requires an API key", () => {
    expect(() => new OpenAiLanguageModel({ model: "gpt-4o-mini" })).toThrow("OPENAI_API_KEY is not configured");
  });
});

import { describe, expect, it } from "vitest";
import { ARGO_SCHEMA } from "../../config/schema";
import { GeneratorOutputInvalidError, GeneratorUnavailableError, LanguageModelError, PipelineAbortedError } from "../../errors";
import { MALFORMED_OUTPUT_CORRECTION, QueryGenerator, extractStatement, type GenerationPolicy } from "../../llm/generator";
import { PromptComposer } from "../../llm/prompt";
import { ScriptedLanguageModel } from "../helpers";

const POLICY: GenerationPolicy = { maxRetries: 2, initialDelayMs: 0, backoffFactor: 2, timeoutMs: 1000, maxTokens: 256 };

const prompt = new PromptComposer({ schema: ARGO_SCHEMA, maxContextChars: 1000, maxHistoryTurns: 3, maxRows: 1000 }).compose(
  "What is the warmest reading?",
  [],
  []
);

describe("extractStatement", () => {
  it.each([
    ["SELECT 1", "SELECT 1"],
    ["```sql\nSELECT MAX(temperature) FROM argo_profiles;\n```", "SELECT MAX(temperature) FROM argo_profiles"],
    ['{"sql": "SELECT 1;"}', "SELECT 1"],
    ['{"query": " select 2 "}', "select 2"],
    ["SELECT\u0000 1", "SELECT 1"],
    ["SELECT 1; DROP TABLE argo_profiles", "SELECT 1; DROP TABLE argo_profiles"]
  ])("reads %j", (output, expected) => {
    expect(extractStatement(output)).toBe(expected);
  });

  it.each([
    "Sure! Here is the query you asked for.",
    "",
    "```sql\nSELECT 1\n```\nor\n```sql\nSELECT 2\n```",
    '{"answer": 1}'
  ])("refuses %j", (output) => {
    expect(extractStatement(output)).toBeNull();
  });
});

describe("QueryGenerator", () => {
  it("returns the first well-formed candidate", async () => {
    const model = new ScriptedLanguageModel(["SELECT MAX(temperature) FROM argo_profiles"]);
    const candidate = await new QueryGenerator(model, POLICY).generate(prompt);
    expect(candidate).toEqual({
      text: "SELECT MAX(temperature) FROM argo_profiles",
      model: "test-model",
      usage: { promptTokens: 10, completionTokens: 5 },
      attempts: 1
    });
    expect(model.requests[0]).toMatchObject({ maxTokens: 256, timeoutMs: 1000 });
  });

  it("re-prompts once after malformed output", async () => {
    const model = new ScriptedLanguageModel(["I think you want the maximum.", "SELECT 1"]);
    const candidate = await new QueryGenerator(model, POLICY).generate(prompt);
    expect(candidate.attempts).toBe(2);
    expect(candidate.usage).toEqual({ promptTokens: 20, completionTokens: 10 });
    const retry = model.requests[1].messages;
    expect(retry[retry.length - 1]).toEqual({ role: "user", content: MALFORMED_OUTPUT_CORRECTION });
  });

  it("gives up with GeneratorOutputInvalid after a second malformed reply", async () => {
    const model = new ScriptedLanguageModel(["no idea", "still no idea"]);
    const failure = new QueryGenerator(model, POLICY).generate(prompt);
    await expect(failure).rejects.toBeInstanceOf(GeneratorOutputInvalidError);
    await expect(failure).rejects.toMatchObject({ kind: "GeneratorOutputInvalid", attempts: 2 });
  });

  it("retries transport failures with backoff", async () => {
    const model = new ScriptedLanguageModel([
      new LanguageModelError("connection reset", true),
      new LanguageModelError("rate limited", true),
      "SELECT 1"
    ]);
    const candidate = await new QueryGenerator(model, POLICY).generate(prompt);
    expect(candidate.attempts).toBe(3);
  });

  it("reports GeneratorUnavailable once retries are spent", async () => {
    const model = new ScriptedLanguageModel([
      new LanguageModelError("down", true),
      new LanguageModelError("down", true),
      new LanguageModelError("down", true),
      "SELECT 1"
    ]);
    const failure = new QueryGenerator(model, POLICY).generate(prompt);
    await expect(failure).rejects.toBeInstanceOf(GeneratorUnavailableError);
    await expect(failure).rejects.toMatchObject({ attempts: 3 });
    expect(model.remaining).toBe(1);
  });

  it("does not retry failures that backoff cannot cure", async () => {
    const model = new ScriptedLanguageModel([new LanguageModelError("bad request", false), "SELECT 1"]);
    await expect(new QueryGenerator(model, POLICY).generate(prompt)).rejects.toMatchObject({
      kind: "GeneratorUnavailable",
      attempts: 1
    });
  });

  it("appends earlier rejections after the question", async () => {
    const model = new ScriptedLanguageModel(["SELECT 1"]);
    await new QueryGenerator(model, POLICY).generate(prompt, { feedback: ["The previous query was rejected."] });
    const { messages } = model.requests[0];
    expect(messages[messages.length - 2].content).toBe("Question: What is the warmest reading?");
    expect(messages[messages.length - 1].content).toBe("The previous query was rejected.");
  });

  it("does not call the model after the caller has gone away", async () => {
    const model = new ScriptedLanguageModel(["SELECT 1"]);
    const controller = new AbortController();
    controller.abort();
    await expect(new QueryGenerator(model, POLICY).generate(prompt, { signal: controller.signal })).rejects.toBeInstanceOf(
      PipelineAbortedError
    );
    expect(model.requests).toHaveLength(0);
  });
});

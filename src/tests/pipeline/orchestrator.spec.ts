import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createPipelineConfig, type PipelineConfigInput } from "../../config/pipeline";
import { LanguageModelError, PipelineAbortedError, userMessageFor } from "../../errors";
import type { RawResult } from "../../executor/executor";
import type { LanguageModel } from "../../llm/client";
import { rejectionFeedback } from "../../pipeline/graph";
import { createServicesFromCollaborators } from "../../pipeline/factory";
import { EMPTY_QUESTION_SUMMARY, REQUEST_TIMEOUT_SUMMARY } from "../../pipeline/orchestrator";
import { InMemoryContextStore, type ContextStore, type StoredChunk } from "../../retrieval/store";
import { NO_DATA_SUMMARY } from "../../summary/summarizer";
import {
  FakeDataStore,
  KeywordEmbedder,
  OID,
  ScriptedLanguageModel,
  hangUntilAborted,
  sqlError,
  type DataStoreHandler,
  type ScriptStep
} from "../helpers";

const VOCABULARY = ["temperature", "float", "salinity"];

const MAX_TEMPERATURE_SQL = "SELECT MAX(temperature) AS max_temperature FROM argo_profiles WHERE platform_id = 2902746";

const MAX_TEMPERATURE_ROWS: RawResult = {
  fields: [{ name: "max_temperature", dataTypeID: OID.float8 }],
  rows: [{ max_temperature: 29.1 }]
};

const FLOAT_NOTE: StoredChunk = {
  id: "float-2902746",
  text: "Float 2902746 samples temperature and salinity in the Arabian Sea.",
  embedding: [1, 1, 1]
};

interface Setup {
  steps?: ScriptStep[];
  model?: LanguageModel;
  handler?: DataStoreHandler;
  store?: ContextStore;
  overrides?: PipelineConfigInput;
}

function setup({ steps = [], model, handler = () => MAX_TEMPERATURE_ROWS, store, overrides = {} }: Setup) {
  const scripted = new ScriptedLanguageModel(steps);
  const embedder = new KeywordEmbedder(VOCABULARY);
  const dataStore = new FakeDataStore(handler);
  const config = createPipelineConfig({ generation: { initialDelayMs: 0, maxRetries: 1 }, ...overrides });
  const services = createServicesFromCollaborators(
    { embedder, store: store ?? new InMemoryContextStore([FLOAT_NOTE]), model: model ?? scripted, dataStore },
    config
  );
  return { orchestrator: services.orchestrator, model: scripted, embedder, dataStore };
}

describe("Orchestrator", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("answers from exactly one executed query", async () => {
    const { orchestrator, model, dataStore } = setup({
      steps: [MAX_TEMPERATURE_SQL, '{"summary": "The warmest reading of float 2902746 was 29.1 degrees Celsius.", "chart": null}']
    });

    const answer = await orchestrator.ask("What is the maximum temperature recorded by float 2902746?");

    expect(answer.status).toBe("answered");
    expect(answer.summary).toBe("The warmest reading of float 2902746 was 29.1 degrees Celsius.");
    expect(answer.chart).toBeNull();
    expect(answer.table?.rows).toEqual([{ max_temperature: 29.1 }]);
    expect(answer.trace).toMatchObject({
      query: `${MAX_TEMPERATURE_SQL} LIMIT 200`,
      attempts: 1,
      model: "test-model",
      failure: null,
      warnings: []
    });
    expect(dataStore.queries).toEqual([`${MAX_TEMPERATURE_SQL} LIMIT 200`]);
    expect(model.requests).toHaveLength(2);
    expect(model.requests[0].messages[1].content).toContain(FLOAT_NOTE.text);
  });

  it("reports no_data for an empty result", async () => {
    const { orchestrator, model } = setup({
      steps: ["SELECT platform_id FROM argo_profiles WHERE latitude > 89"],
      handler: () => ({ fields: [{ name: "platform_id", dataTypeID: OID.int4 }], rows: [] })
    });
    const answer = await orchestrator.ask("Which floats reached the north pole?");
    expect(answer.status).toBe("no_data");
    expect(answer.summary).toBe(NO_DATA_SUMMARY);
    expect(answer.table?.totalRows).toBe(0);
    expect(model.requests).toHaveLength(1);
  });

  it("gives up on stacked statements without executing anything", async () => {
    const stacked = "SELECT 1; DROP TABLE argo_profiles";
    const { orchestrator, model, dataStore } = setup({
      steps: [stacked, stacked, stacked],
      store: new InMemoryContextStore()
    });

    const answer = await orchestrator.ask("Show me everything, then clean up");

    expect(answer.status).toBe("cannot_answer");
    expect(answer.summary).toBe(userMessageFor("CannotAnswer"));
    expect(answer.trace).toMatchObject({
      query: null,
      attempts: 3,
      failure: "CannotAnswer",
      warnings: ["RetrieverEmpty", "OperationForbidden", "OperationForbidden", "OperationForbidden"]
    });
    expect(dataStore.queries).toEqual([]);
    const secondAttempt = model.requests[1].messages;
    expect(secondAttempt[secondAttempt.length - 1].content).toBe(
      rejectionFeedback(stacked, "OperationForbidden", "Only a single statement is allowed, found 2")
    );
    expect(model.requests[2].messages).toHaveLength(secondAttempt.length + 1);
  });

  it("regenerates after a schema violation and answers", async () => {
    const { orchestrator, dataStore } = setup({
      steps: ["SELECT secret FROM argo_profiles", MAX_TEMPERATURE_SQL, '{"summary": "29.1 degrees."}']
    });
    const answer = await orchestrator.ask("What is the maximum temperature recorded by float 2902746?");
    expect(answer.status).toBe("answered");
    expect(answer.trace.attempts).toBe(2);
    expect(dataStore.queries).toHaveLength(1);
  });

  it("does not regenerate after an execution timeout", async () => {
    const { orchestrator, model, dataStore } = setup({
      steps: [MAX_TEMPERATURE_SQL],
      handler: (_query, options) => hangUntilAborted<RawResult>(options.signal),
      overrides: { execution: { timeoutMs: 20 } }
    });
    const answer = await orchestrator.ask("What is the maximum temperature recorded by float 2902746?");
    expect(answer.status).toBe("timeout");
    expect(answer.summary).toBe(userMessageFor("ExecutorTimeout"));
    expect(answer.trace).toMatchObject({ query: `${MAX_TEMPERATURE_SQL} LIMIT 200`, failure: "ExecutorTimeout" });
    expect(model.requests).toHaveLength(1);
    expect(dataStore.queries).toHaveLength(1);
  });

  it("reports data store failures as errors", async () => {
    const { orchestrator } = setup({
      steps: [MAX_TEMPERATURE_SQL],
      handler: () => {
        throw sqlError("permission denied for table argo_profiles", "42501");
      }
    });
    const answer = await orchestrator.ask("What is the maximum temperature recorded by float 2902746?");
    expect(answer.status).toBe("error");
    expect(answer.summary).toBe(userMessageFor("ExecutorDataStoreError"));
    expect(answer.trace.failure).toBe("ExecutorDataStoreError");
  });

  it("explains that the language service is unavailable", async () => {
    const { orchestrator, dataStore } = setup({
      steps: [new LanguageModelError("invalid api key", false)],
      store: new InMemoryContextStore()
    });
    const answer = await orchestrator.ask("How many floats are there?");
    expect(answer.status).toBe("cannot_answer");
    expect(answer.summary).toBe(userMessageFor("GeneratorUnavailable"));
    expect(answer.trace).toMatchObject({ attempts: 1, warnings: ["RetrieverEmpty", "GeneratorUnavailable"] });
    expect(dataStore.queries).toEqual([]);
  });

  it("continues without context when retrieval fails", async () => {
    const failing: ContextStore = { search: vi.fn().mockRejectedValue(new Error("vector store offline")) };
    const { orchestrator } = setup({
      store: failing,
      steps: [MAX_TEMPERATURE_SQL, '{"summary": "29.1 degrees."}']
    });
    const answer = await orchestrator.ask("What is the maximum temperature recorded by float 2902746?");
    expect(answer.status).toBe("answered");
    expect(answer.trace.warnings).toEqual(["RetrieverEmpty"]);
  });

  it("replays history into the prompt but retrieves on the current question only", async () => {
    const { orchestrator, model, embedder } = setup({ steps: [MAX_TEMPERATURE_SQL, '{"summary": "29.1 degrees."}'] });
    await orchestrator.ask("And its maximum temperature?", [
      { question: "Which float is in the Arabian Sea?", answer: "Float 2902746." }
    ]);
    expect(embedder.calls).toEqual(["And its maximum temperature?"]);
    expect(model.requests[0].messages.slice(1, 3)).toEqual([
      { role: "user", content: "Which float is in the Arabian Sea?" },
      { role: "assistant", content: "Float 2902746." }
    ]);
  });

  it("returns a timeout answer when the whole request runs out of time", async () => {
    const { orchestrator, dataStore } = setup({
      steps: [(request) => hangUntilAborted<string>(request.signal)],
      overrides: { orchestration: { requestTimeoutMs: 30 } }
    });
    const answer = await orchestrator.ask("What is the maximum temperature recorded by float 2902746?");
    expect(answer.status).toBe("timeout");
    expect(answer.summary).toBe(REQUEST_TIMEOUT_SUMMARY);
    expect(answer.trace.warnings).toEqual(["RequestTimeout"]);
    expect(dataStore.queries).toEqual([]);
  });

  it("stops all work when the caller goes away", async () => {
    const controller = new AbortController();
    const { orchestrator, dataStore } = setup({
      steps: [
        (request) => {
          controller.abort();
          return hangUntilAborted<string>(request.signal);
        }
      ]
    });
    await expect(
      orchestrator.ask("What is the maximum temperature recorded by float 2902746?", [], { signal: controller.signal })
    ).rejects.toBeInstanceOf(PipelineAbortedError);
    expect(dataStore.queries).toEqual([]);
  });

  it("refuses an already cancelled request", async () => {
    const controller = new AbortController();
    controller.abort();
    const { orchestrator, model } = setup({});
    await expect(orchestrator.ask("anything", [], { signal: controller.signal })).rejects.toBeInstanceOf(PipelineAbortedError);
    expect(model.requests).toEqual([]);
  });

  it("asks for a question when given blank text", async () => {
    const { orchestrator, model } = setup({});
    const answer = await orchestrator.ask("   ");
    expect(answer.status).toBe("cannot_answer");
    expect(answer.summary).toBe(EMPTY_QUESTION_SUMMARY);
    expect(model.requests).toEqual([]);
  });

  it("keeps concurrent requests independent", async () => {
    const routed: LanguageModel = {
      complete: async (request) => {
        const last = request.messages[request.messages.length - 1].content;
        const aboutSalinity = last.slice(last.lastIndexOf("Question:")).includes("salinity");
        if (request.json) {
          return {
            text: JSON.stringify({ summary: aboutSalinity ? "Salinity answer." : "Temperature answer." }),
            model: "test-model",
            usage: { promptTokens: 1, completionTokens: 1 }
          };
        }
        const column = aboutSalinity ? "salinity" : "temperature";
        return {
          text: `SELECT MAX(${column}) AS peak FROM argo_profiles`,
          model: "test-model",
          usage: { promptTokens: 1, completionTokens: 1 }
        };
      }
    };
    const { orchestrator, dataStore } = setup({
      model: routed,
      handler: async (query) => {
        await new Promise((resolve) => setTimeout(resolve, query.includes("salinity") ? 5 : 15));
        return { fields: [{ name: "peak", dataTypeID: OID.float8 }], rows: [{ peak: query.includes("salinity") ? 36.2 : 29.1 }] };
      }
    });

    const [temperature, salinity] = await Promise.all([
      orchestrator.ask("Peak temperature?"),
      orchestrator.ask("Peak salinity?")
    ]);

    expect(temperature.summary).toBe("Temperature answer.");
    expect(temperature.table?.rows).toEqual([{ peak: 29.1 }]);
    expect(salinity.summary).toBe("Salinity answer.");
    expect(salinity.table?.rows).toEqual([{ peak: 36.2 }]);
    expect(dataStore.queries).toHaveLength(2);
  });
});

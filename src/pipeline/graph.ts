import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import type { PipelineConfig } from "../config/pipeline";
import { GeneratorOutputInvalidError, GeneratorUnavailableError, isAbortError, userMessageFor } from "../errors";
import type { QueryExecutor } from "../executor/executor";
import type { QueryGenerator } from "../llm/generator";
import type { PromptComposer } from "../llm/prompt";
import type { Retriever } from "../retrieval/retriever";
import type { QueryValidator } from "../sql/validator";
import type { ResultSummarizer } from "../summary/summarizer";
import type { Answer, AnswerStatus } from "../types";
import { describeError, throwIfAborted } from "../utils";
import type { PipelineState } from "./state";

export interface PipelineStages {
  retriever: Retriever;
  composer: PromptComposer;
  generator: QueryGenerator;
  validator: QueryValidator;
  executor: QueryExecutor;
  summarizer: ResultSummarizer;
}

export const PipelineAnnotation = Annotation.Root({
  state: Annotation<PipelineState>()
});

type GraphState = typeof PipelineAnnotation.State;
type GraphUpdate = typeof PipelineAnnotation.Update;

const OUTPUT_INVALID_FEEDBACK =
  "Your earlier replies could not be read as a SQL statement. Reply with one PostgreSQL SELECT statement only.";

export function rejectionFeedback(query: string, code: string, message: string): string {
  return [`The previous query was rejected (${code}: ${message}).`, "Previous query:", query, "Write a corrected query."].join("\n");
}

function requireValue<T>(value: T | null, stage: string): T {
  if (value === null) {
    throw new Error(`Pipeline reached ${stage} without its input`);
  }
  return value;
}

function terminalAnswer(state: PipelineState, status: AnswerStatus, summary: string, failure: Answer["trace"]["failure"]): Answer {
  const execution = state.execution;
  return {
    status,
    summary,
    chart: null,
    table: null,
    trace: {
      query: execution ? execution.query : null,
      attempts: state.attempts,
      model: state.candidate?.model ?? null,
      durationMs: execution ? execution.durationMs : null,
      failure,
      warnings: [...state.warnings]
    }
  };
}

/**
 * Wires the stages into retrieve → compose → generate → validate → execute →
 * summarize. Rejected or unreadable candidates loop back to generate until the
 * regeneration budget is spent; execution failures end the run without one.
 */
export function buildPipelineGraph(stages: PipelineStages, config: Readonly<PipelineConfig>, signal: AbortSignal) {
  const maxGenerations = 1 + config.orchestration.maxRegenerations;

  const retrieve = async ({ state }: GraphState): Promise<GraphUpdate> => {
    throwIfAborted(signal);
    let chunks = state.chunks;
    try {
      chunks = await stages.retriever.retrieve(state.question.text, config.retrieval.topK, signal);
    } catch (error) {
      if (isAbortError(error)) throw error;
      console.warn("Context retrieval failed, continuing without context", { reason: describeError(error) });
      chunks = [];
    }
    const warnings = chunks.length === 0 ? [...state.warnings, "RetrieverEmpty"] : state.warnings;
    return { state: { ...state, chunks, warnings } };
  };

  const compose = async ({ state }: GraphState): Promise<GraphUpdate> => {
    throwIfAborted(signal);
    const prompt = stages.composer.compose(state.question.text, state.question.history, state.chunks);
    return { state: { ...state, prompt } };
  };

  const generate = async ({ state }: GraphState): Promise<GraphUpdate> => {
    throwIfAborted(signal);
    const prompt = requireValue(state.prompt, "generate");
    const generations = state.generations + 1;
    try {
      const candidate = await stages.generator.generate(prompt, { feedback: state.feedback, signal });
      return {
        state: { ...state, candidate, verdict: null, generations, attempts: state.attempts + candidate.attempts, failure: null }
      };
    } catch (error) {
      if (error instanceof GeneratorUnavailableError || error instanceof GeneratorOutputInvalidError) {
        const feedback = error instanceof GeneratorOutputInvalidError ? [...state.feedback, OUTPUT_INVALID_FEEDBACK] : state.feedback;
        return {
          state: {
            ...state,
            candidate: null,
            verdict: null,
            generations,
            attempts: state.attempts + error.attempts,
            feedback,
            failure: error.kind,
            failures: [...state.failures, error.kind],
            errors: [...state.errors, `${error.kind}: ${error.message}`]
          }
        };
      }
      throw error;
    }
  };

  const validate = async ({ state }: GraphState): Promise<GraphUpdate> => {
    throwIfAborted(signal);
    const candidate = requireValue(state.candidate, "validate");
    const verdict = stages.validator.validate(candidate);
    if (verdict.accepted) {
      return { state: { ...state, verdict, failure: null } };
    }
    const [violation] = verdict.violations;
    console.warn("Generated query rejected", { code: violation.code, message: violation.message, generation: state.generations });
    return {
      state: {
        ...state,
        verdict,
        failure: violation.code,
        failures: [...state.failures, violation.code],
        feedback: [...state.feedback, rejectionFeedback(candidate.text, violation.code, violation.message)],
        errors: [...state.errors, `${violation.code}: ${violation.message}`]
      }
    };
  };

  const execute = async ({ state }: GraphState): Promise<GraphUpdate> => {
    throwIfAborted(signal);
    const verdict = requireValue(state.verdict, "execute");
    if (!verdict.accepted) {
      throw new Error("Pipeline reached execute with a rejected query");
    }
    const execution = await stages.executor.execute(verdict.normalizedQuery, {
      timeoutMs: config.execution.timeoutMs,
      rowLimit: verdict.rowLimit,
      signal
    });
    return { state: { ...state, execution, failure: execution.ok ? null : execution.failure.kind } };
  };

  const summarize = async ({ state }: GraphState): Promise<GraphUpdate> => {
    throwIfAborted(signal);
    const execution = requireValue(state.execution, "summarize");
    if (!execution.ok) {
      throw new Error("Pipeline reached summarize with a failed execution");
    }
    const answer = await stages.summarizer.summarize(state.question.text, execution, signal);
    return {
      state: {
        ...state,
        answer: {
          ...answer,
          trace: {
            ...answer.trace,
            attempts: state.attempts,
            model: state.candidate?.model ?? null,
            warnings: [...state.warnings, ...answer.trace.warnings]
          }
        }
      }
    };
  };

  const reportExecutionFailure = async ({ state }: GraphState): Promise<GraphUpdate> => {
    const execution = requireValue(state.execution, "report_failure");
    const kind = execution.ok ? "ExecutorDataStoreError" : execution.failure.kind;
    const status: AnswerStatus = kind === "ExecutorTimeout" ? "timeout" : "error";
    return { state: { ...state, answer: terminalAnswer(state, status, userMessageFor(kind), kind) } };
  };

  const cannotAnswer = async ({ state }: GraphState): Promise<GraphUpdate> => {
    const summary = state.failure === "GeneratorUnavailable" ? userMessageFor("GeneratorUnavailable") : userMessageFor("CannotAnswer");
    const answer = terminalAnswer(state, "cannot_answer", summary, "CannotAnswer");
    return { state: { ...state, answer: { ...answer, trace: { ...answer.trace, warnings: [...answer.trace.warnings, ...state.failures] } } } };
  };

  const afterGenerate = ({ state }: GraphState): "validate" | "generate" | "cannot_answer" => {
    if (state.candidate) return "validate";
    if (state.failure === "GeneratorOutputInvalid" && state.generations < maxGenerations) return "generate";
    return "cannot_answer";
  };

  const afterValidate = ({ state }: GraphState): "execute" | "generate" | "cannot_answer" => {
    if (state.verdict?.accepted) return "execute";
    return state.generations < maxGenerations ? "generate" : "cannot_answer";
  };

  const afterExecute = ({ state }: GraphState): "summarize" | "report_failure" =>
    state.execution?.ok ? "summarize" : "report_failure";

  return new StateGraph(PipelineAnnotation)
    .addNode("retrieve", retrieve)
    .addNode("compose", compose)
    .addNode("generate", generate)
    .addNode("validate", validate)
    .addNode("execute", execute)
    .addNode("summarize", summarize)
    .addNode("report_failure", reportExecutionFailure)
    .addNode("cannot_answer", cannotAnswer)
    .addEdge(START, "retrieve")
    .addEdge("retrieve", "compose")
    .addEdge("compose", "generate")
    .addConditionalEdges("generate", afterGenerate, ["validate", "generate", "cannot_answer"])
    .addConditionalEdges("validate", afterValidate, ["execute", "generate", "cannot_answer"])
    .addConditionalEdges("execute", afterExecute, ["summarize", "report_failure"])
    .addEdge("summarize", END)
    .addEdge("report_failure", END)
    .addEdge("cannot_answer", END)
    .compile();
}

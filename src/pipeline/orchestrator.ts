import type { PipelineConfig } from "../config/pipeline";
import { PipelineAbortedError } from "../errors";
import { createQuestion, type Answer, type AnswerStatus, type HistoryTurn, type Question } from "../types";
import { abortable, describeError, linkedAbortController } from "../utils";
import { buildPipelineGraph, type PipelineStages } from "./graph";
import { createInitialState } from "./state";

export interface AskOptions {
  /** Aborted when the caller goes away; ask() then rejects with PipelineAbortedError. */
  signal?: AbortSignal;
}

export const EMPTY_QUESTION_SUMMARY = "Please ask a question about the float measurements.";
export const REQUEST_TIMEOUT_SUMMARY =
  "Answering this question took too long. Try narrowing it to fewer floats or a shorter time range.";
export const UNEXPECTED_FAILURE_SUMMARY = "Something went wrong while answering this question. Please try again later.";

function fallbackAnswer(status: AnswerStatus, summary: string, warnings: string[], durationMs: number): Answer {
  return {
    status,
    summary,
    chart: null,
    table: null,
    trace: { query: null, attempts: 0, model: null, durationMs, failure: status === "cannot_answer" ? "CannotAnswer" : null, warnings }
  };
}

/**
 * Entry point of the question-answering pipeline. Holds only immutable
 * configuration and stateless stages, so concurrent ask() calls share nothing
 * beyond the context store and the database pool behind them.
 */
export class Orchestrator {
  private readonly stages: PipelineStages;

  private readonly config: Readonly<PipelineConfig>;

  constructor(stages: PipelineStages, config: Readonly<PipelineConfig>) {
    this.stages = stages;
    this.config = config;
  }

  async ask(question: string | Question, history: readonly HistoryTurn[] = [], options: AskOptions = {}): Promise<Answer> {
    const started = Date.now();
    const asked = typeof question === "string" ? createQuestion(question, [...history]) : question;
    if (options.signal?.aborted) {
      throw new PipelineAbortedError("Request was cancelled");
    }
    if (!asked.text) {
      return fallbackAnswer("cannot_answer", EMPTY_QUESTION_SUMMARY, [], 0);
    }

    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(), this.config.orchestration.requestTimeoutMs);
    const controller = linkedAbortController(options.signal, deadline.signal);

    try {
      const graph = buildPipelineGraph(this.stages, this.config, controller.signal);
      const result = await abortable(graph.invoke({ state: createInitialState(asked) }), controller.signal);
      const answer = result.state.answer;
      if (!answer) {
        throw new Error("Pipeline finished without an answer");
      }
      return answer;
    } catch (error) {
      if (options.signal?.aborted) {
        throw new PipelineAbortedError("Request was cancelled");
      }
      if (deadline.signal.aborted) {
        console.warn("Request deadline exceeded", { timeoutMs: this.config.orchestration.requestTimeoutMs });
        return fallbackAnswer("timeout", REQUEST_TIMEOUT_SUMMARY, ["RequestTimeout"], Date.now() - started);
      }
      console.error("Pipeline failed", { reason: describeError(error) });
      return fallbackAnswer("error", UNEXPECTED_FAILURE_SUMMARY, [], Date.now() - started);
    } finally {
      clearTimeout(timer);
      if (!controller.signal.aborted) {
        controller.abort();
      }
    }
  }
}

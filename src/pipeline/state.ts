import type { PipelineErrorKind } from "../errors";
import type {
  Answer,
  CandidateQuery,
  ContextChunk,
  ExecutionResult,
  Prompt,
  Question,
  ValidationVerdict
} from "../types";

/** Everything one request accumulates on its way through the graph. */
export interface PipelineState {
  question: Question;
  chunks: ContextChunk[];
  prompt: Prompt | null;
  candidate: CandidateQuery | null;
  verdict: ValidationVerdict | null;
  execution: ExecutionResult | null;
  answer: Answer | null;
  /** Calls to the query generator, the first included. */
  generations: number;
  /** Language model calls across all generations. */
  attempts: number;
  /** Corrections carried into the next generation. */
  feedback: string[];
  /** Most recent failure class; cleared by a fresh candidate. */
  failure: PipelineErrorKind | null;
  /** Every generation or validation failure, oldest first. */
  failures: PipelineErrorKind[];
  warnings: string[];
  errors: string[];
}

export function createInitialState(question: Question): PipelineState {
  return {
    question,
    chunks: [],
    prompt: null,
    candidate: null,
    verdict: null,
    execution: null,
    answer: null,
    generations: 0,
    attempts: 0,
    feedback: [],
    failure: null,
    failures: [],
    warnings: [],
    errors: []
  };
}

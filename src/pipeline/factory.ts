import type { Pool } from "pg";
import { createPool } from "../config/db";
import type { Env } from "../config/env";
import { pipelineOverridesFromEnv } from "../config/env";
import { createPipelineConfig, type PipelineConfig } from "../config/pipeline";
import { QueryExecutor, type DataStore } from "../executor/executor";
import { PgDataStore } from "../executor/pg-store";
import { OpenAiLanguageModel, type LanguageModel } from "../llm/client";
import { QueryGenerator } from "../llm/generator";
import { PromptComposer } from "../llm/prompt";
import { ChromaContextStore } from "../retrieval/chroma";
import { OpenAiEmbedder, type Embedder } from "../retrieval/embeddings";
import { Retriever } from "../retrieval/retriever";
import type { ContextStore } from "../retrieval/store";
import { QueryValidator } from "../sql/validator";
import { ResultSummarizer } from "../summary/summarizer";
import type { PipelineStages } from "./graph";
import { Orchestrator } from "./orchestrator";

export interface PipelineCollaborators {
  embedder: Embedder;
  store: ContextStore;
  model: LanguageModel;
  dataStore: DataStore;
}

export interface Services {
  config: Readonly<PipelineConfig>;
  stages: PipelineStages;
  orchestrator: Orchestrator;
  pool: Pool | null;
}

export function createStages(collaborators: PipelineCollaborators, config: Readonly<PipelineConfig>): PipelineStages {
  const { generation, summary } = config;
  return {
    retriever: new Retriever({ embedder: collaborators.embedder, store: collaborators.store, topK: config.retrieval.topK }),
    composer: new PromptComposer({
      schema: config.schema,
      maxContextChars: config.prompt.maxContextChars,
      maxHistoryTurns: config.prompt.maxHistoryTurns,
      maxRows: config.validation.maxRows
    }),
    generator: new QueryGenerator(collaborators.model, generation),
    validator: QueryValidator.fromConfig(config),
    executor: new QueryExecutor(collaborators.dataStore),
    summarizer: new ResultSummarizer({
      model: collaborators.model,
      maxTableRows: summary.maxTableRows,
      maxTokens: summary.maxTokens,
      timeoutMs: summary.timeoutMs,
      retry: generation
    })
  };
}

export function createServicesFromCollaborators(collaborators: PipelineCollaborators, config: Readonly<PipelineConfig>): Services {
  const stages = createStages(collaborators, config);
  return { config, stages, orchestrator: new Orchestrator(stages, config), pool: null };
}

/** Production wiring: OpenAI for embeddings and generation, Chroma for context, PostgreSQL for data. */
export function createServices(env: Env): Services {
  const config = createPipelineConfig(pipelineOverridesFromEnv(env));
  const pool = createPool(env);
  const embedder = new OpenAiEmbedder({ apiKey: env.OPENAI_API_KEY, model: env.OPENAI_EMBEDDING_MODEL, baseURL: env.OPENAI_BASE_URL });
  const services = createServicesFromCollaborators(
    {
      embedder,
      store: new ChromaContextStore({ url: env.CHROMA_URL, collection: env.CHROMA_COLLECTION, embedder }),
      model: new OpenAiLanguageModel({ apiKey: env.OPENAI_API_KEY, baseURL: env.OPENAI_BASE_URL, model: env.OPENAI_MODEL }),
      dataStore: new PgDataStore(pool)
    },
    config
  );
  return { ...services, pool };
}

import {
  createConsoleLogger,
  createOpenAICompatibleProvider,
  createTextCompletion,
  type Logger,
} from "@formpilot/core";
import { FileVectorStore, createDocumentIndexer, createRetrievalEngine } from "@formpilot/rag";

import type { AppConfig } from "./config.js";
import { createCompletionDocumentParser } from "./documentParser.js";
import { createCompletionFieldExtractor } from "./fieldExtractor.js";
import type { JobApplicationServices } from "./services.js";
import { createJobApplicationWorkflow } from "./workflow.js";

/** Chunks retrieved per field question. */
const RESUME_TOP_K = 5;

export const createJobApplicationServices = (config: AppConfig, logger: Logger): JobApplicationServices => {
  const provider = createOpenAICompatibleProvider({
    name: "llm",
    baseURL: config.llm.baseURL,
    apiKey: config.llm.apiKey,
  });

  const completion = createTextCompletion({ model: provider.chatModel(config.llm.model) });
  const engine = createRetrievalEngine({
    embedder: provider.textEmbeddingModel(config.llm.embeddingModel),
    store: new FileVectorStore({ directory: config.storageDir }),
    completion,
  });

  return {
    completion,
    parser: createCompletionDocumentParser({ completion, logger: logger.child("parser") }),
    fieldExtractor: createCompletionFieldExtractor({ completion, logger: logger.child("fields") }),
    indexer: createDocumentIndexer({ engine, topK: RESUME_TOP_K }),
  };
};

/** The job application workflow wired to the configured model endpoint. */
export const createJobApplicationFromConfig = (
  config: AppConfig,
  logger: Logger = createConsoleLogger({ name: "job-application", level: config.logLevel }),
) =>
  createJobApplicationWorkflow({
    ...createJobApplicationServices(config, logger),
    logger,
    timeoutMs: config.workflow.timeoutMs,
  });

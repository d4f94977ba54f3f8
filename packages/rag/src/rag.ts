import type { TextCompletion } from "@formpilot/core";
import type { EmbeddingModel } from "ai";

import { splitText } from "./chunker.js";
import { toRagDocument, type RagDocumentInput } from "./document.js";
import { resolveEmbedder, type Embedder } from "./embedder.js";
import { RagError } from "./errors.js";
import {
  DEFAULT_TOP_K,
  type RagNamespace,
  type VectorRecord,
  type VectorSearchResult,
  type VectorStore,
} from "./stores/types.js";

/** Builds the completion prompt from a question and the chunks retrieved for it. */
export type AnswerTemplate = (question: string, results: VectorSearchResult[]) => string;

export interface RetrievalEngineOptions {
  embedder: Embedder | EmbeddingModel<string>;
  store: VectorStore;
  completion: TextCompletion;
  chunking?: { size?: number; overlap?: number };
  template?: AnswerTemplate;
}

export interface RetrievalAnswer {
  text: string;
  sources: VectorSearchResult[];
}

export interface RetrievalEngine {
  /** Chunks, embeds and stores the documents. Resolves to the number of chunks stored. */
  ingest(namespace: RagNamespace, documents: RagDocumentInput[]): Promise<number>;
  hasNamespace(namespace: RagNamespace): Promise<boolean>;
  answer(
    namespace: RagNamespace,
    question: string,
    options?: { topK?: number; signal?: AbortSignal },
  ): Promise<RetrievalAnswer>;
}

export const formatChunks = (results: VectorSearchResult[]) =>
  results
    .map((result, index) => `Chunk ${index + 1} (score ${result.score.toFixed(3)}):\n${result.chunk.text}`)
    .join("\n\n");

export const groundedAnswerTemplate: AnswerTemplate = (question, results) =>
  [
    "Answer the question using only the context below. If the context does not hold the answer, say that you don't know.",
    "",
    "Context:",
    formatChunks(results),
    "",
    `Question: ${question}`,
    "Answer:",
  ].join("\n");

const checkNamespace = (namespace: RagNamespace) => {
  if (namespace.trim() === "") {
    throw new RagError("RAG_NAMESPACE_REQUIRED", "namespace is required");
  }
  return namespace;
};

/**
 * Embeds documents into a vector store and answers questions from the chunks
 * closest to them.
 */
export function createRetrievalEngine({
  embedder,
  store,
  completion,
  chunking = {},
  template = groundedAnswerTemplate,
}: RetrievalEngineOptions): RetrievalEngine {
  const embed = resolveEmbedder(embedder);
  const chunkOptions = { chunkSize: chunking.size ?? 512, chunkOverlap: chunking.overlap ?? 50 };

  const embedAll = async (texts: string[]) => {
    const vectors = await embed(texts);
    if (vectors.length !== texts.length) {
      throw new RagError("RAG_EMBED_ERROR", `Expected ${texts.length} embeddings, received ${vectors.length}`);
    }
    return vectors;
  };

  return {
    async ingest(namespace, inputs) {
      checkNamespace(namespace);
      const chunks = inputs.map(toRagDocument).flatMap((document) =>
        splitText(document.text, chunkOptions).map((chunk) => ({ document, chunk })),
      );
      if (chunks.length === 0) {
        return 0;
      }

      const vectors = await embedAll(chunks.map(({ chunk }) => chunk.content));
      const records = chunks.map(
        ({ document, chunk }, index): VectorRecord => ({
          id: `${document.id}::${chunk.index}`,
          vector: vectors[index] ?? [],
          text: chunk.content,
          namespace,
          documentId: document.id,
          chunkIndex: chunk.index,
          source: document.source,
        }),
      );

      await store.upsert({ namespace, vectors: records });
      return records.length;
    },

    async hasNamespace(namespace) {
      return store.hasNamespace(checkNamespace(namespace));
    },

    async answer(namespace, question, options = {}) {
      checkNamespace(namespace);
      if (question.trim() === "") {
        throw new RagError("RAG_CONFIG_ERROR", "question is required");
      }

      const [queryVector = []] = await embedAll([question]);
      const sources = await store.query({ namespace, queryVector, topK: options.topK ?? DEFAULT_TOP_K });
      const text = await completion.complete(template(question, sources), { signal: options.signal });
      return { text, sources };
    },
  };
}

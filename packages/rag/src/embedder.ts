import { embedMany, type EmbeddingModel } from "ai";

import { RagError } from "./errors.js";

export type Embedder = (values: string[]) => Promise<number[][]>;

/**
 * Accepts either a plain embedding function or an AI SDK embedding model.
 */
export function resolveEmbedder(embedder: Embedder | EmbeddingModel<string>): Embedder {
  if (typeof embedder === "function") {
    return embedder;
  }

  return async (values: string[]) => {
    try {
      const { embeddings } = await embedMany({ model: embedder, values });
      return embeddings;
    } catch (error) {
      throw new RagError("RAG_EMBED_ERROR", "Failed to embed values", error);
    }
  };
}

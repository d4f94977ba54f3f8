import type { Embedder } from "./embedder.js";

/**
 * Deterministic embedder for tests: one dimension per vocabulary word,
 * counting its occurrences in the lower-cased text.
 */
export const createKeywordEmbedder = (vocabulary: readonly string[]): Embedder => async (values) =>
  values.map((value) => {
    const words = value.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
    return vocabulary.map((term) => words.filter((word) => word === term).length);
  });

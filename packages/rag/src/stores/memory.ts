import { RagError } from "../errors.js";
import {
  DEFAULT_TOP_K,
  type RagNamespace,
  type VectorQuery,
  type VectorRecord,
  type VectorSearchResult,
  type VectorStore,
} from "./types.js";

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new RagError("RAG_EMBED_ERROR", "Embedding dimensions do not match");
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  a.forEach((left, index) => {
    const right = b[index] ?? 0;
    dot += left * right;
    normA += left * left;
    normB += right * right;
  });
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class MemoryVectorStore implements VectorStore {
  private readonly data = new Map<RagNamespace, VectorRecord[]>();

  async upsert(input: { namespace: RagNamespace; vectors: VectorRecord[] }): Promise<void> {
    const incoming = new Set(input.vectors.map((vector) => vector.id));
    const existing = this.data.get(input.namespace) ?? [];
    this.data.set(input.namespace, [
      ...existing.filter((item) => !incoming.has(item.id)),
      ...input.vectors,
    ]);
  }

  async hasNamespace(namespace: RagNamespace): Promise<boolean> {
    return (this.data.get(namespace)?.length ?? 0) > 0;
  }

  /** Records stored under `namespace`, in insertion order. */
  records(namespace: RagNamespace): VectorRecord[] {
    return [...(this.data.get(namespace) ?? [])];
  }

  async query(input: VectorQuery): Promise<VectorSearchResult[]> {
    const vectors = this.data.get(input.namespace) ?? [];

    return vectors
      .map((vector) => ({ vector, score: cosineSimilarity(input.queryVector, vector.vector) }))
      .sort((left, right) => right.score - left.score)
      .slice(0, input.topK ?? DEFAULT_TOP_K)
      .map(({ vector, score }) => ({
        chunk: {
          id: vector.id,
          documentId: vector.documentId,
          text: vector.text,
          index: vector.chunkIndex,
          source: vector.source,
        },
        score,
      }));
  }
}

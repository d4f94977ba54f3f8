export type RagNamespace = string;

export interface VectorRecord {
  id: string;
  vector: number[];
  text: string;
  namespace: RagNamespace;
  documentId: string;
  chunkIndex: number;
  source?: string;
}

export interface ChunkedDocument {
  id: string;
  documentId: string;
  text: string;
  index: number;
  source?: string;
}

export interface VectorSearchResult {
  chunk: ChunkedDocument;
  score: number;
}

export interface VectorQuery {
  namespace: RagNamespace;
  queryVector: number[];
  topK?: number;
}

export interface VectorStore {
  upsert(input: { namespace: RagNamespace; vectors: VectorRecord[] }): Promise<void>;
  query(input: VectorQuery): Promise<VectorSearchResult[]>;
  hasNamespace(namespace: RagNamespace): Promise<boolean>;
}

export const DEFAULT_TOP_K = 5;

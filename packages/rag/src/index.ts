export { RagError } from "./errors.js";
export type { RagErrorCode } from "./errors.js";
export { toRagDocument } from "./document.js";
export type { RagDocument, RagDocumentInput } from "./document.js";
export { splitText, DEFAULT_SEPARATORS } from "./chunker.js";
export type { ChunkOptions, TextChunk } from "./chunker.js";
export { resolveEmbedder } from "./embedder.js";
export type { Embedder } from "./embedder.js";
export { createRetrievalEngine, formatChunks, groundedAnswerTemplate } from "./rag.js";
export type { AnswerTemplate, RetrievalAnswer, RetrievalEngine, RetrievalEngineOptions } from "./rag.js";
export { MemoryVectorStore, cosineSimilarity } from "./stores/memory.js";
export { FileVectorStore } from "./stores/file.js";
export type { FileVectorStoreOptions } from "./stores/file.js";
export { DEFAULT_TOP_K } from "./stores/types.js";
export type {
  ChunkedDocument,
  RagNamespace,
  VectorQuery,
  VectorRecord,
  VectorSearchResult,
  VectorStore,
} from "./stores/types.js";
export { createDocumentIndexer } from "./documentIndexer.js";
export type { DocumentIndexer, DocumentIndexerOptions, DocumentIndexHandle } from "./documentIndexer.js";
export { createKeywordEmbedder } from "./testing.js";

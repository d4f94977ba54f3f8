export type RagErrorCode =
  | "RAG_CONFIG_ERROR"
  | "RAG_NAMESPACE_REQUIRED"
  | "RAG_EMBED_ERROR"
  | "RAG_STORE_ERROR";

export class RagError extends Error {
  readonly code: RagErrorCode;

  constructor(code: RagErrorCode, message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "RagError";
    this.code = code;
  }
}

export * from "./events.js";
export * from "./prompts.js";
export * from "./services.js";
export * from "./workflow.js";
export * from "./config.js";
export { SUPPORTED_DOCUMENT_EXTENSIONS, createCompletionDocumentParser, isSupportedDocument } from "./documentParser.js";
export type { CompletionDocumentParserOptions } from "./documentParser.js";
export { createCompletionFieldExtractor, parseFieldList, stripCodeFence } from "./fieldExtractor.js";
export type { CompletionFieldExtractorOptions } from "./fieldExtractor.js";
export { createJobApplicationFromConfig, createJobApplicationServices } from "./bootstrap.js";

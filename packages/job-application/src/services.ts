import type { Logger, TextCompletion } from "@formpilot/core";
import type { DocumentIndexer } from "@formpilot/rag";

export type { DocumentIndexer, DocumentIndexHandle } from "@formpilot/rag";
export type { TextCompletion } from "@formpilot/core";

/** Turns a file on disk into text, shaped by a parsing instruction. */
export interface DocumentParser {
  /** Digest of the raw file, stable across runs for the same bytes. */
  fingerprint(path: string): Promise<string>;
  parse(path: string, instruction: string, options?: { signal?: AbortSignal }): Promise<string>;
}

/** Lists the fields an applicant has to fill in on a parsed form. */
export interface FieldExtractor {
  extractFields(formText: string, options?: { signal?: AbortSignal }): Promise<string[]>;
}

export interface JobApplicationServices {
  parser: DocumentParser;
  fieldExtractor: FieldExtractor;
  indexer: DocumentIndexer;
  completion: TextCompletion;
}

export class JobApplicationError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "JobApplicationError";
  }
}

export interface ServiceLoggerOption {
  logger?: Logger;
}

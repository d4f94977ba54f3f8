import { RagError } from "./errors.js";

export interface TextChunk {
  /** Zero-based position of the chunk in the result. */
  index: number;
  /** Offset (inclusive) of the first character in the source text. */
  start: number;
  /** Offset (exclusive) of the last character in the source text. */
  end: number;
  content: string;
}

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap?: number;
  separators?: readonly string[];
  trimChunks?: boolean;
}

export const DEFAULT_SEPARATORS: readonly string[] = ["\n\n", "\n", " ", ""];

/**
 * Recursive character splitter: tries the coarsest separator first and only
 * falls back to finer ones for pieces still longer than `chunkSize`.
 */
export function splitText(text: string, options: ChunkOptions): TextChunk[] {
  const {
    chunkSize,
    chunkOverlap = 0,
    separators = DEFAULT_SEPARATORS,
    trimChunks = true,
  } = options;

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RagError("RAG_CONFIG_ERROR", "chunkSize must be a positive integer");
  }

  if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new RagError("RAG_CONFIG_ERROR", "chunkOverlap must be between 0 and chunkSize");
  }

  if (text.length === 0) {
    return [];
  }

  const pieces = recursiveSplit(text, separators.length > 0 ? separators : DEFAULT_SEPARATORS, chunkSize);
  const merged = mergePieces(pieces, chunkSize, chunkOverlap);
  return locateChunks(text, merged, trimChunks);
}

function recursiveSplit(text: string, separators: readonly string[], chunkSize: number): string[] {
  const separatorIndex = separators.findIndex((separator) => separator === "" || text.includes(separator));
  const index = separatorIndex === -1 ? separators.length - 1 : separatorIndex;
  const separator = separators[index] ?? "";
  const finer = separators.slice(index + 1);
  const results: string[] = [];

  for (const piece of splitKeepingSeparator(text, separator)) {
    if (!piece) {
      continue;
    }

    if (piece.length <= chunkSize) {
      results.push(piece);
    } else if (finer.length > 0) {
      results.push(...recursiveSplit(piece, finer, chunkSize));
    } else {
      results.push(...forceSplit(piece, chunkSize));
    }
  }

  return results;
}

function splitKeepingSeparator(text: string, separator: string): string[] {
  if (separator === "") {
    return Array.from(text);
  }

  const pieces = text.split(separator);
  return pieces.map((piece, index) => (index < pieces.length - 1 ? `${piece}${separator}` : piece));
}

function forceSplit(text: string, chunkSize: number): string[] {
  const forced: string[] = [];
  for (let index = 0; index < text.length; index += chunkSize) {
    forced.push(text.slice(index, index + chunkSize));
  }
  return forced;
}

function mergePieces(pieces: string[], chunkSize: number, chunkOverlap: number): string[] {
  const chunks: string[] = [];
  const window: string[] = [];
  let windowLength = 0;

  for (const piece of pieces) {
    if (windowLength + piece.length > chunkSize && windowLength > 0) {
      chunks.push(window.join(""));

      while (windowLength > chunkOverlap || (windowLength > 0 && windowLength + piece.length > chunkSize)) {
        const removed = window.shift();
        windowLength -= removed?.length ?? windowLength;
      }
    }

    window.push(piece);
    windowLength += piece.length;
  }

  if (windowLength > 0) {
    chunks.push(window.join(""));
  }

  return chunks;
}

function locateChunks(text: string, rawChunks: string[], trimChunks: boolean): TextChunk[] {
  const result: TextChunk[] = [];
  let searchFrom = 0;

  for (const rawChunk of rawChunks) {
    const content = trimChunks ? rawChunk.trim() : rawChunk;
    if (content.length === 0) {
      continue;
    }

    const found = text.indexOf(content, searchFrom);
    const start = found === -1 ? searchFrom : found;
    const end = start + content.length;
    searchFrom = Math.max(searchFrom, start + 1);

    result.push({ index: result.length, start, end, content });
  }

  return result;
}

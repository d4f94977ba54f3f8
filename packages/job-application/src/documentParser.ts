import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";

import { createSilentLogger, type TextCompletion } from "@formpilot/core";
import { extractText, getDocumentProxy } from "unpdf";

import { documentParsePrompt } from "./prompts.js";
import { JobApplicationError, type DocumentParser, type ServiceLoggerOption } from "./services.js";

export const SUPPORTED_DOCUMENT_EXTENSIONS = [".pdf", ".txt", ".md", ".markdown", ".json"] as const;

export const isSupportedDocument = (path: string) => {
  const extension = extname(path).toLowerCase();
  return SUPPORTED_DOCUMENT_EXTENSIONS.some((supported) => supported === extension);
};

export interface CompletionDocumentParserOptions extends ServiceLoggerOption {
  completion: TextCompletion;
}

const readDocument = async (path: string) => {
  if (!isSupportedDocument(path)) {
    throw new JobApplicationError(
      `Unsupported document type for ${basename(path)}: expected one of ${SUPPORTED_DOCUMENT_EXTENSIONS.join(", ")}`,
    );
  }

  try {
    return await readFile(path);
  } catch (error) {
    throw new JobApplicationError(`Unable to read ${path}`, error);
  }
};

const pdfText = async (path: string, bytes: Uint8Array) => {
  try {
    // pdf.js takes ownership of the buffer it is given.
    const pdf = await getDocumentProxy(new Uint8Array(bytes));
    const { text } = await extractText(pdf, { mergePages: true });
    return text;
  } catch (error) {
    throw new JobApplicationError(`Unable to extract text from ${basename(path)}`, error);
  }
};

const readText = async (path: string) => {
  const bytes = await readDocument(path);
  return extname(path).toLowerCase() === ".pdf" ? pdfText(path, bytes) : bytes.toString("utf8");
};

/**
 * Reads a PDF or text document and has the completion service restructure it
 * according to the instruction.
 */
export const createCompletionDocumentParser = ({
  completion,
  logger = createSilentLogger(),
}: CompletionDocumentParserOptions): DocumentParser => ({
  async fingerprint(path) {
    const bytes = await readDocument(path);
    return createHash("sha256").update(bytes).digest("hex").slice(0, 16);
  },

  async parse(path, instruction, options = {}) {
    const text = await readText(path);
    if (text.trim() === "") {
      throw new JobApplicationError(`Document ${basename(path)} is empty`);
    }

    logger.debug("Parsing document", { path, characters: text.length });
    return completion.complete(documentParsePrompt(instruction, text.trim()), { signal: options.signal });
  },
});

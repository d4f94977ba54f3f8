import { createHash } from "node:crypto";

export interface RagDocumentInput {
  id?: string;
  text: string;
  source?: string;
}

export interface RagDocument {
  id: string;
  text: string;
  source?: string;
}

const contentId = (text: string) => createHash("sha256").update(text).digest("hex").slice(0, 16);

/** Same text, same id, unless the caller names the document. */
export const toRagDocument = ({ id, text, source }: RagDocumentInput): RagDocument => ({
  id: id ?? contentId(text),
  text,
  source,
});

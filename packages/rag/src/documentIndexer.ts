import type { RagDocumentInput } from "./document.js";
import type { RetrievalEngine } from "./rag.js";
import type { RagNamespace } from "./stores/types.js";

export interface DocumentIndexHandle {
  readonly namespace: RagNamespace;
  /** True when the namespace was already stored and nothing was loaded or embedded. */
  readonly reused: boolean;
}

export interface DocumentIndexer {
  /**
   * Returns the index stored under `namespace`. `load` runs only when the
   * namespace holds nothing yet.
   */
  index(namespace: RagNamespace, load: () => Promise<RagDocumentInput[]>): Promise<DocumentIndexHandle>;
  query(handle: DocumentIndexHandle, question: string, options?: { signal?: AbortSignal }): Promise<string>;
}

export interface DocumentIndexerOptions {
  engine: RetrievalEngine;
  topK?: number;
}

/**
 * Index-once, query-many facade over a {@link RetrievalEngine}. Concurrent
 * requests for the same namespace share one load.
 */
export const createDocumentIndexer = ({ engine, topK }: DocumentIndexerOptions): DocumentIndexer => {
  const building = new Map<RagNamespace, Promise<DocumentIndexHandle>>();

  const build = async (namespace: RagNamespace, load: () => Promise<RagDocumentInput[]>) => {
    if (await engine.hasNamespace(namespace)) {
      return { namespace, reused: true };
    }
    await engine.ingest(namespace, await load());
    return { namespace, reused: false };
  };

  return {
    index(namespace, load) {
      const pending = building.get(namespace);
      if (pending) {
        return pending;
      }

      const next = build(namespace, load).finally(() => building.delete(namespace));
      building.set(namespace, next);
      return next;
    },

    async query(handle, question, options = {}) {
      const { text } = await engine.answer(handle.namespace, question, { topK, signal: options.signal });
      return text;
    },
  };
};

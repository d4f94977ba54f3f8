import { describe, expect, test, vi } from "vitest";

import { createDocumentIndexer } from "./documentIndexer.js";
import { createRetrievalEngine, formatChunks } from "./rag.js";
import { MemoryVectorStore } from "./stores/memory.js";
import { createKeywordEmbedder } from "./testing.js";

const createIndexer = () => {
  const store = new MemoryVectorStore();
  const complete = vi.fn(async (prompt: string) => `answered: ${prompt.split("\n")[0] ?? ""}`);
  const engine = createRetrievalEngine({
    embedder: createKeywordEmbedder(["rust", "typescript", "degree"]),
    store,
    completion: { complete },
    template: (question, results) => `${question}\n${formatChunks(results)}`,
  });

  return { store, complete, indexer: createDocumentIndexer({ engine, topK: 2 }) };
};

describe("createDocumentIndexer", () => {
  test("loads and ingests once, then reuses the stored namespace", async () => {
    const { indexer, store } = createIndexer();
    const load = vi.fn(async () => [{ text: "Senior TypeScript engineer", source: "resume.txt" }]);

    const first = await indexer.index("resume-1", load);
    const second = await indexer.index("resume-1", load);

    expect(first).toEqual({ namespace: "resume-1", reused: false });
    expect(second).toEqual({ namespace: "resume-1", reused: true });
    expect(load).toHaveBeenCalledTimes(1);
    expect(store.records("resume-1")).toHaveLength(1);
  });

  test("shares one load between concurrent requests for a namespace", async () => {
    const { indexer } = createIndexer();
    const load = vi.fn(async () => [{ text: "Rust and TypeScript" }]);

    const handles = await Promise.all([indexer.index("resume-2", load), indexer.index("resume-2", load)]);

    expect(load).toHaveBeenCalledTimes(1);
    expect(handles).toEqual([
      { namespace: "resume-2", reused: false },
      { namespace: "resume-2", reused: false },
    ]);
  });

  test("answers questions against the indexed namespace", async () => {
    const { indexer, complete } = createIndexer();
    const handle = await indexer.index("candidate", async () => [{ text: "Degree in physics" }]);

    await expect(indexer.query(handle, "What degree?")).resolves.toBe("answered: What degree?");
    expect(complete.mock.calls[0]?.[0]).toBe("What degree?\nChunk 1 (score 1.000):\nDegree in physics");
  });
});

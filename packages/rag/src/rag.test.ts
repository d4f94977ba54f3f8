import { describe, expect, test, vi } from "vitest";

import { createRetrievalEngine, groundedAnswerTemplate } from "./rag.js";
import { MemoryVectorStore } from "./stores/memory.js";
import { createKeywordEmbedder } from "./testing.js";

const embedder = createKeywordEmbedder(["paris", "france", "node", "javascript"]);

const createEngine = (complete = vi.fn(async (_prompt: string) => "Paris is in France.")) => {
  const store = new MemoryVectorStore();
  const engine = createRetrievalEngine({
    embedder,
    store,
    completion: { complete },
    chunking: { size: 1024, overlap: 0 },
  });
  return { engine, store, complete };
};

describe("retrieval engine", () => {
  test("ingests one record per chunk with content-derived ids", async () => {
    const { engine, store } = createEngine();

    await expect(
      engine.ingest("kb", [{ text: "Paris is in France", source: "atlas" }, { id: "manual", text: "Node uses JavaScript" }]),
    ).resolves.toBe(2);

    const records = store.records("kb");
    expect(records.map((record) => record.id)).toEqual([`${records[0]?.documentId}::0`, "manual::0"]);
    expect(records[0]?.documentId).toMatch(/^[0-9a-f]{16}$/);
    expect(records[0]?.source).toBe("atlas");
    await expect(engine.hasNamespace("kb")).resolves.toBe(true);
    await expect(engine.hasNamespace("other")).resolves.toBe(false);
  });

  test("stores nothing for blank documents", async () => {
    const { engine } = createEngine();

    await expect(engine.ingest("kb", [{ text: "   " }])).resolves.toBe(0);
    await expect(engine.hasNamespace("kb")).resolves.toBe(false);
  });

  test("answers from the closest chunks with the grounded template", async () => {
    const { engine, complete } = createEngine();
    await engine.ingest("kb", [{ text: "Node uses JavaScript" }, { text: "Paris is in France" }]);

    const answer = await engine.answer("kb", "Where is Paris?", { topK: 1 });

    expect(answer.text).toBe("Paris is in France.");
    expect(answer.sources.map((source) => source.chunk.text)).toEqual(["Paris is in France"]);
    expect(answer.sources[0]?.score).toBeCloseTo(Math.SQRT1_2);
    expect(complete).toHaveBeenCalledWith(groundedAnswerTemplate("Where is Paris?", answer.sources), {
      signal: undefined,
    });
  });

  test("requires a namespace and a question", async () => {
    const { engine } = createEngine();

    await expect(engine.ingest("  ", [])).rejects.toMatchObject({ code: "RAG_NAMESPACE_REQUIRED" });
    await expect(engine.answer("kb", " ")).rejects.toMatchObject({ code: "RAG_CONFIG_ERROR" });
  });

  test("rejects an embedder that drops vectors", async () => {
    const engine = createRetrievalEngine({
      embedder: async () => [],
      store: new MemoryVectorStore(),
      completion: { complete: async () => "unused" },
    });

    await expect(engine.ingest("kb", [{ text: "Paris" }])).rejects.toMatchObject({ code: "RAG_EMBED_ERROR" });
  });
});

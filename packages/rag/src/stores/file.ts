import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { z } from "zod";

import { RagError } from "../errors.js";
import { MemoryVectorStore } from "./memory.js";
import type { RagNamespace, VectorQuery, VectorRecord, VectorSearchResult, VectorStore } from "./types.js";

const vectorRecordSchema = z.object({
  id: z.string(),
  vector: z.array(z.number()),
  text: z.string(),
  namespace: z.string(),
  documentId: z.string(),
  chunkIndex: z.number().int(),
  source: z.string().optional(),
});

const namespaceFileSchema = z.object({
  version: z.literal(1),
  namespace: z.string(),
  vectors: z.array(vectorRecordSchema),
});

export interface FileVectorStoreOptions {
  /** Directory holding one JSON file per namespace. Created on first write. */
  directory: string;
}

const isMissingFile = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Vector store persisted as JSON files, so an index built by one process can
 * be reused by the next. Namespaces are loaded lazily and kept in memory.
 */
export class FileVectorStore implements VectorStore {
  private readonly directory: string;
  private readonly memory = new MemoryVectorStore();
  private readonly loaded = new Map<RagNamespace, Promise<void>>();

  constructor(options: FileVectorStoreOptions) {
    if (!options.directory) {
      throw new RagError("RAG_CONFIG_ERROR", "FileVectorStore requires a directory");
    }
    this.directory = options.directory;
  }

  async upsert(input: { namespace: RagNamespace; vectors: VectorRecord[] }): Promise<void> {
    await this.load(input.namespace);
    await this.memory.upsert(input);
    await this.persist(input.namespace);
  }

  async query(input: VectorQuery): Promise<VectorSearchResult[]> {
    await this.load(input.namespace);
    return this.memory.query(input);
  }

  async hasNamespace(namespace: RagNamespace): Promise<boolean> {
    await this.load(namespace);
    return this.memory.hasNamespace(namespace);
  }

  private load(namespace: RagNamespace): Promise<void> {
    let pending = this.loaded.get(namespace);
    if (!pending) {
      pending = this.readNamespace(namespace);
      this.loaded.set(namespace, pending);
    }
    return pending;
  }

  private async readNamespace(namespace: RagNamespace): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.fileFor(namespace), "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw new RagError("RAG_STORE_ERROR", `Failed to read namespace ${namespace}`, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new RagError("RAG_STORE_ERROR", `Stored namespace ${namespace} is not valid JSON`, error);
    }

    const parsed = namespaceFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new RagError("RAG_STORE_ERROR", `Stored namespace ${namespace} is corrupt`, parsed.error);
    }

    await this.memory.upsert({ namespace, vectors: parsed.data.vectors });
  }

  private async persist(namespace: RagNamespace): Promise<void> {
    try {
      await mkdir(this.directory, { recursive: true });
      const body = { version: 1, namespace, vectors: this.memory.records(namespace) };
      await writeFile(this.fileFor(namespace), JSON.stringify(body), "utf8");
    } catch (error) {
      throw new RagError("RAG_STORE_ERROR", `Failed to persist namespace ${namespace}`, error);
    }
  }

  private fileFor(namespace: RagNamespace) {
    return join(this.directory, `${encodeURIComponent(namespace)}.json`);
  }
}

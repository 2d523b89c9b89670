// JSON file store for one physical collection
// - embeddings are serialized as base64-encoded little-endian float32

import { promises as fs } from "node:fs";
import path from "node:path";

import { z } from "zod";

import type { DocumentMetadata } from "../document.js";
import { VectorStoreConfigError } from "../errors.js";

export type LocalRow = {
  id: string;
  content: string;
  metadata: DocumentMetadata;
  embedding: Float32Array;
};

const storeFileSchema = z.object({
  version: z.literal(1),
  meta: z.object({
    embeddingModel: z.string(),
    embeddingDim: z.number().int().positive(),
    embEncoding: z.literal("f32-base64"),
  }),
  rows: z.array(
    z.object({
      id: z.string(),
      content: z.string(),
      metadata: z.record(z.unknown()),
      emb: z.string(),
    }),
  ),
});

export function encodeEmbedding(embedding: Float32Array): string {
  return Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength).toString(
    "base64",
  );
}

export function decodeEmbedding(encoded: string): Float32Array {
  const buf = Buffer.from(encoded, "base64");
  if (buf.byteLength % 4 !== 0) {
    throw new Error(`Invalid embedding payload length: ${buf.byteLength}`);
  }
  // copy out of the pooled Buffer
  return new Float32Array(new Float32Array(buf.buffer, buf.byteOffset, buf.byteLength / 4));
}

export type LocalCollectionStoreOptions = {
  persistDirectory: string;
  collectionName: string;
  embeddingModel: string;
  embeddingDim: number;
};

export class LocalCollectionStore {
  readonly filePath: string;
  private rows: LocalRow[] = [];

  private constructor(private readonly options: LocalCollectionStoreOptions) {
    this.filePath = path.join(options.persistDirectory, `${options.collectionName}.json`);
  }

  static async open(options: LocalCollectionStoreOptions): Promise<LocalCollectionStore> {
    if (!/^[A-Za-z0-9_.-]+$/.test(options.collectionName)) {
      throw new VectorStoreConfigError(
        `Invalid collection name for the local store: ${options.collectionName}`,
      );
    }
    const store = new LocalCollectionStore(options);
    await store.load();
    return store;
  }

  get embeddingDim(): number {
    return this.options.embeddingDim;
  }

  all(): readonly LocalRow[] {
    return this.rows;
  }

  async append(rows: LocalRow[]): Promise<void> {
    this.rows.push(...rows);
    await this.save();
  }

  async update(id: string, metadata: DocumentMetadata): Promise<boolean> {
    const row = this.rows.find((r) => r.id === id);
    if (!row) return false;
    row.metadata = metadata;
    await this.save();
    return true;
  }

  async removeWhere(predicate: (row: LocalRow) => boolean): Promise<number> {
    const before = this.rows.length;
    this.rows = this.rows.filter((row) => !predicate(row));
    const removed = before - this.rows.length;
    if (removed > 0) await this.save();
    return removed;
  }

  async drop(): Promise<void> {
    this.rows = [];
    await fs.rm(this.filePath, { force: true });
  }

  private async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) return;
      throw error;
    }

    const parsed = storeFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new VectorStoreConfigError(
        `Local vector store file is not readable: ${this.filePath} (${parsed.error.message})`,
      );
    }

    const { meta } = parsed.data;
    if (
      meta.embeddingModel !== this.options.embeddingModel ||
      meta.embeddingDim !== this.options.embeddingDim
    ) {
      throw new VectorStoreConfigError(
        [
          "Embedding config mismatch for the local vector store.",
          `Store path: ${this.filePath}`,
          `Store expects: model=${meta.embeddingModel}, dim=${meta.embeddingDim}`,
          `Current run: model=${this.options.embeddingModel}, dim=${this.options.embeddingDim}`,
        ].join(" "),
      );
    }

    this.rows = parsed.data.rows.map((row) => ({
      id: row.id,
      content: row.content,
      metadata: row.metadata,
      embedding: decodeEmbedding(row.emb),
    }));
  }

  private async save(): Promise<void> {
    const out = {
      version: 1,
      meta: {
        embeddingModel: this.options.embeddingModel,
        embeddingDim: this.options.embeddingDim,
        embEncoding: "f32-base64",
        savedAt: new Date().toISOString(),
      },
      rows: this.rows.map((row) => ({
        id: row.id,
        content: row.content,
        metadata: row.metadata,
        emb: encodeEmbedding(row.embedding),
      })),
    };

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(out));
    await fs.rename(tmpPath, this.filePath);
  }
}

function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT"
  );
}

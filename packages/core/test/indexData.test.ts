import { describe, expect, it, vi } from "vitest";

import path from "node:path";

import type { PipelineDocument } from "../src/document.js";
import { fileDedupStrategy, recordDedupStrategy } from "../src/indexing/dedupStrategies.js";
import { indexData } from "../src/indexing/indexData.js";
import type {
  DedupStrategy,
  IndexDataOptions,
  IndexDataResult,
  IndexedEntryBase,
  Loader,
} from "../src/indexing/types.js";
import { searchIndex } from "../src/search/searchIndex.js";
import { createVectorStoreAdapter } from "../src/vectorstore/registry.js";
import type { VectorStoreAdapter } from "../src/vectorstore/types.js";

import {
  captureLogger,
  createFakeEmbedder,
  doc,
  keywordEmbedding,
  TEST_EMBEDDING_DIM,
  TEST_EMBEDDING_MODEL,
  withTempDir,
  type FakeEmbedder,
} from "./testUtils.js";

async function openAdapter(type: string, dir: string): Promise<VectorStoreAdapter> {
  return await createVectorStoreAdapter(type, {
    collectionName: "docs",
    embeddingModel: TEST_EMBEDDING_MODEL,
    embeddingDim: TEST_EMBEDDING_DIM,
    connection: type === "sqlite" ? path.join(dir, "store.sqlite") : dir,
  });
}

type RunExtras = Partial<
  Pick<
    IndexDataOptions<IndexedEntryBase>,
    "cleanIndex" | "embedTexts" | "maxDocsPerAdd" | "metaUpdateInterval" | "now"
  >
>;

type Harness = {
  adapter: VectorStoreAdapter;
  embedder: FakeEmbedder;
  run: <E extends IndexedEntryBase>(
    loader: Loader,
    collectionSuffix: string,
    strategy: DedupStrategy<E>,
    extra?: RunExtras,
  ) => Promise<IndexDataResult>;
};

async function withHarness(type: string, fn: (h: Harness) => Promise<void>): Promise<void> {
  await withTempDir(`vecsync-index-${type}-`, async (dir) => {
    const adapter = await openAdapter(type, dir);
    const embedder = createFakeEmbedder();
    try {
      await fn({
        adapter,
        embedder,
        run: (loader, collectionSuffix, strategy, extra) =>
          indexData({
            adapter,
            loader,
            strategy,
            embedTexts: embedder.embedTexts,
            collectionSuffix,
            ...extra,
          }),
      });
    } finally {
      await adapter.close();
    }
  });
}

function staticLoader(docs: () => PipelineDocument[], dependents: Record<string, PipelineDocument[]> = {}): Loader {
  return {
    baseLoader: () => docs(),
    processDocument: (parent) => dependents[String(parent.metadata.id)] ?? [],
  };
}

// Document rows only; the collection's index_meta row is left out
async function storedMetadata(adapter: VectorStoreAdapter): Promise<Array<Record<string, unknown>>> {
  const rows = await adapter.similaritySearchWithScore(keywordEmbedding("alpha"), undefined, 100);
  return rows.map((row) => row.document.metadata).filter((metadata) => metadata.type !== "index_meta");
}

async function storedContents(adapter: VectorStoreAdapter, id: string): Promise<string[]> {
  const rows = await adapter.similaritySearchWithScore(keywordEmbedding("alpha"), { id }, 100);
  return rows.map((row) => row.document.content).sort();
}

async function indexMetaOf(adapter: VectorStoreAdapter, collectionSuffix: string): Promise<Record<string, unknown>> {
  const meta = await adapter.getIndexMeta(collectionSuffix);
  if (!meta) throw new Error(`no index_meta row for '${collectionSuffix}'`);
  return meta.metadata;
}

function historyOf(metadata: Record<string, unknown>): Array<Record<string, unknown>> {
  const raw = metadata.history;
  if (typeof raw !== "string") throw new Error("history is not a JSON string");
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) throw new Error("history is not a list");
  return parsed;
}

describe.each(["sqlite", "local"])("indexData() on the %s backend", (type) => {
  it("replaces exactly the changed record and keeps the others", async () => {
    await withHarness(type, async ({ adapter, embedder, run }) => {
      let updatedOn2 = "t1";
      const loader = staticLoader(() => [
        doc("first alpha", { id: 1, updated_on: "t1" }),
        doc("second beta", { id: 2, updated_on: updatedOn2 }),
        doc("third gamma", { id: 3, updated_on: "t1" }),
      ]);

      const first = await run(loader, "x", recordDedupStrategy);
      expect(first).toMatchObject({ status: "ok", count: 3, message: "successfully indexed 3 documents" });
      expect(await adapter.getIndexedIds("x")).toHaveLength(3);

      const deleteSpy = vi.spyOn(adapter, "deleteByIds");
      updatedOn2 = "t2";
      const second = await run(loader, "x", recordDedupStrategy);

      expect(second.count).toBe(1);
      expect(deleteSpy).toHaveBeenCalledTimes(1);
      expect(deleteSpy).toHaveBeenCalledWith([first.ids[1]]);
      expect(embedder.calls.at(-1)).toEqual(["second beta"]);

      const stored = await adapter.getIndexedIds("x");
      expect(stored).toHaveLength(3);
      expect(stored).toContain(first.ids[0]);
      expect(stored).toContain(first.ids[2]);
      expect(stored).toContain(second.ids[0]);
      expect(stored).not.toContain(first.ids[1]);
    });
  });

  it("writes and deletes nothing when the source is unchanged", async () => {
    await withHarness(type, async ({ adapter, embedder, run }) => {
      const loader = staticLoader(() => [
        doc("one alpha", { id: "a", updated_on: "t1" }),
        doc("two beta", { id: "b", updated_on: "t1" }),
      ]);

      await run(loader, "x", recordDedupStrategy);
      const embeddedAfterFirst = embedder.embeddedCount();
      const deleteSpy = vi.spyOn(adapter, "deleteByIds");
      const addSpy = vi.spyOn(adapter, "addDocuments");

      const second = await run(loader, "x", recordDedupStrategy);

      expect(second).toEqual({ status: "ok", message: "no new documents to index", count: 0, ids: [] });
      expect(embedder.embeddedCount()).toBe(embeddedAfterFirst);
      expect(deleteSpy).not.toHaveBeenCalled();
      expect(addSpy).not.toHaveBeenCalled();
    });
  });

  it("deletes a changed parent together with its dependents", async () => {
    await withHarness(type, async ({ adapter, run }) => {
      let version = "v1";
      const loader = staticLoader(
        () => [doc(`parent ${version} alpha`, { id: "P", updated_on: version })],
        { P: [doc("attachment beta", { id: "P-att" })] },
      );

      const first = await run(loader, "x", recordDedupStrategy);
      expect(first.count).toBe(2);
      const metadata = await storedMetadata(adapter);
      expect(metadata.find((m) => m.id === "P-att")?.parent_id).toBe("P");

      const deleteSpy = vi.spyOn(adapter, "deleteByIds");
      version = "v2";
      const second = await run(loader, "x", recordDedupStrategy);

      expect(second.count).toBe(2);
      expect(deleteSpy).toHaveBeenCalledTimes(1);
      expect([...(deleteSpy.mock.calls[0]?.[0] ?? [])].sort()).toEqual([...first.ids].sort());
      expect((await adapter.getIndexedIds("x")).sort()).toEqual([...second.ids].sort());
    });
  });

  it("re-indexes a file only when its commit hash is new", async () => {
    await withHarness(type, async ({ adapter, embedder, run }) => {
      let hash = "h1";
      let body = "# One\nalpha\n# Two\nbeta";
      const loader = staticLoader(() => [
        {
          content: "",
          metadata: { id: "notes/a.md", filename: "notes/a.md", commit_hash: hash },
          transient: { contentBytes: new TextEncoder().encode(body), contentType: ".md" },
        },
      ]);

      const first = await run(loader, "code", fileDedupStrategy);
      expect(first.count).toBe(2);

      const unchanged = await run(loader, "code", fileDedupStrategy);
      expect(unchanged.count).toBe(0);

      hash = "h2";
      body = "# One\nalpha gamma";
      const deleteSpy = vi.spyOn(adapter, "deleteByIds");
      const changed = await run(loader, "code", fileDedupStrategy);

      expect(changed.count).toBe(1);
      expect([...(deleteSpy.mock.calls[0]?.[0] ?? [])].sort()).toEqual([...first.ids].sort());
      expect(embedder.calls.at(-1)).toEqual(["# One\nalpha gamma"]);

      const code = await adapter.getCodeIndexedData("code");
      expect(code.get("notes/a.md")).toMatchObject({ ids: changed.ids, commitHashes: ["h2"] });
    });
  });

  it("keeps collections apart and lists both", async () => {
    await withHarness(type, async ({ adapter, run }) => {
      const loader = staticLoader(() => [doc("shared alpha", { id: "s", updated_on: "t1" })]);

      expect((await run(loader, "a", recordDedupStrategy)).count).toBe(1);
      // same logical id, other collection: indexed again
      expect((await run(loader, "b", recordDedupStrategy)).count).toBe(1);

      expect(await adapter.listCollections()).toEqual(["a", "b"]);
      expect(await adapter.getIndexedIds("a")).toHaveLength(1);
      expect(await adapter.getIndexedIds("b")).toHaveLength(1);
    });
  });

  it("never persists byte payloads or content-type hints", async () => {
    await withHarness(type, async ({ adapter, run }) => {
      const loader = staticLoader(
        () => [
          {
            content: "fallback",
            metadata: { id: "legacy", updated_on: "t1", loader_content: "alpha text", loader_content_type: ".txt" },
          },
          {
            content: "",
            metadata: { id: "modern", updated_on: "t1" },
            transient: { contentBytes: new TextEncoder().encode("beta text"), contentType: ".txt" },
          },
        ],
        { modern: [doc("child gamma", { id: "child", loader_content: "gamma", loader_content_type: ".txt" })] },
      );

      expect((await run(loader, "x", recordDedupStrategy)).count).toBe(3);

      const metadata = await storedMetadata(adapter);
      expect(metadata).toHaveLength(3);
      for (const m of metadata) {
        expect(Object.keys(m)).not.toContain("loader_content");
        expect(Object.keys(m)).not.toContain("loader_content_type");
        expect(Object.keys(m)).not.toContain("transient");
        expect(m.collection).toBe("x");
      }
    });
  });

  it("re-embeds everything after cleaning the collection", async () => {
    await withHarness(type, async ({ run }) => {
      const loader = staticLoader(() => [
        doc("one alpha", { id: "a", updated_on: "t1" }),
        doc("two beta", { id: "b", updated_on: "t1" }),
      ]);

      await run(loader, "x", recordDedupStrategy);
      const again = await run(loader, "x", recordDedupStrategy, { cleanIndex: true });
      expect(again.count).toBe(2);
    });
  });

  it("parses byte payloads that extendData adds as legacy metadata", async () => {
    await withHarness(type, async ({ adapter, run }) => {
      const loader: Loader = {
        baseLoader: () => [doc("", { id: "f1", updated_on: "t1" })],
        extendData: async function* (documents) {
          for await (const d of documents) {
            yield {
              ...d,
              metadata: {
                ...d.metadata,
                loader_content: Buffer.from("alpha body text"),
                loader_content_type: ".txt",
              },
            };
          }
        },
      };

      expect((await run(loader, "x", recordDedupStrategy)).count).toBe(1);
      expect(await storedContents(adapter, "f1")).toEqual(["alpha body text"]);
      expect(await storedMetadata(adapter)).toEqual([{ id: "f1", updated_on: "t1", chunk_id: 1, collection: "x" }]);
    });
  });

  it("hands extendData only the documents that need indexing", async () => {
    await withHarness(type, async ({ run }) => {
      const seen: unknown[] = [];
      let updatedOn2 = "t1";
      const loader: Loader = {
        baseLoader: () => [
          doc("one alpha", { id: "1", updated_on: "t1" }),
          doc("two beta", { id: "2", updated_on: updatedOn2 }),
        ],
        extendData: async function* (documents) {
          for await (const d of documents) {
            seen.push(d.metadata.id);
            yield d;
          }
        },
      };

      await run(loader, "x", recordDedupStrategy);
      expect(seen).toEqual(["1", "2"]);

      seen.length = 0;
      await run(loader, "x", recordDedupStrategy);
      expect(seen).toEqual([]);

      updatedOn2 = "t2";
      await run(loader, "x", recordDedupStrategy);
      expect(seen).toEqual(["2"]);
    });
  });

  it("collects dependents of and chunks what extendData yields", async () => {
    await withHarness(type, async ({ adapter, embedder, run }) => {
      const loader: Loader = {
        baseLoader: () => [doc("", { id: "P", updated_on: "t1" })],
        extendData: async function* (documents) {
          for await (const d of documents) {
            yield {
              ...d,
              transient: { contentBytes: new TextEncoder().encode("# One\nalpha\n# Two\nbeta"), contentType: ".md" },
            };
          }
        },
        processDocument: (parent) => [doc("attachment gamma", { id: `${String(parent.metadata.id)}-att` })],
      };

      expect((await run(loader, "x", recordDedupStrategy)).count).toBe(3);
      expect(embedder.calls.at(-1)).toEqual(["# One\nalpha", "# Two\nbeta", "attachment gamma"]);
      const metadata = await storedMetadata(adapter);
      expect(metadata.find((m) => m.id === "P-att")?.parent_id).toBe("P");
    });
  });

  it("searches and skips rows that joined a second collection", async () => {
    await withHarness(type, async ({ adapter, embedder, run }) => {
      const loader = staticLoader(() => [doc("shared alpha", { id: "s", updated_on: "t1" })]);
      const first = await run(loader, "a", recordDedupStrategy);
      const [rowId = ""] = first.ids;

      await adapter.addToCollection(rowId, "b");
      expect(await adapter.listCollections()).toEqual(["a", "b"]);

      const hits = await searchIndex({ adapter, embedTexts: embedder.embedTexts }, { query: "alpha", collectionSuffix: "b" });
      if (typeof hits === "string") throw new Error(hits);
      expect(hits.map((hit) => hit.content)).toEqual(["shared alpha"]);

      expect((await run(loader, "a", recordDedupStrategy)).count).toBe(0);
      expect((await run(loader, "b", recordDedupStrategy)).count).toBe(0);
      expect(await adapter.getIndexedIds("")).toEqual([rowId]);
    });
  });

  it("tracks each run in the collection's index_meta row", async () => {
    await withHarness(type, async ({ adapter, run }) => {
      let clock = 100;
      const now = () => clock;
      const loader = staticLoader(() => [
        doc("one alpha", { id: "1", updated_on: "t1" }),
        doc("two beta", { id: "2", updated_on: "t1" }),
      ]);

      await run(loader, "x", recordDedupStrategy, { now });
      const first = await indexMetaOf(adapter, "x");
      expect(first).toMatchObject({
        collection: "x",
        type: "index_meta",
        state: "completed",
        indexed: 2,
        updated: 2,
        created_on: 100,
        updated_on: 100,
        index_configuration: { collection_suffix: "x", clean_index: false },
      });
      expect(historyOf(first)).toHaveLength(1);
      expect(historyOf(first)[0]).toMatchObject({ state: "completed", updated: 2 });

      clock = 200;
      await run(loader, "x", recordDedupStrategy, { now });
      const second = await indexMetaOf(adapter, "x");
      expect(second).toMatchObject({ state: "completed", indexed: 2, updated: 0, created_on: 100, updated_on: 200 });
      expect(historyOf(second).map((h) => [h.state, h.updated, h.updated_on])).toEqual([
        ["completed", 2, 100],
        ["completed", 0, 200],
      ]);

      expect(await adapter.getIndexedIds("x")).toHaveLength(2);
    });
  });

  it("marks the index_meta row failed and rethrows when saving fails", async () => {
    await withHarness(type, async ({ adapter, embedder, run }) => {
      let calls = 0;
      const flakyEmbed = async (inputs: string[]): Promise<number[][]> => {
        calls += 1;
        if (calls > 1) throw new Error("embedding service down");
        return await embedder.embedTexts(inputs);
      };
      const loader = staticLoader(() => [
        doc("one alpha", { id: "1", updated_on: "t1" }),
        doc("two beta", { id: "2", updated_on: "t1" }),
      ]);

      await expect(
        run(loader, "x", recordDedupStrategy, { embedTexts: flakyEmbed, maxDocsPerAdd: 1, now: () => 100 }),
      ).rejects.toThrow("embedding service down");

      expect(await indexMetaOf(adapter, "x")).toMatchObject({ state: "failed", indexed: 1, updated: 1 });
    });
  });

  it("throttles progress writes to the index_meta row", async () => {
    await withHarness(type, async ({ adapter, run }) => {
      const loader = staticLoader(() => [
        doc("one alpha", { id: "1", updated_on: "t1" }),
        doc("two beta", { id: "2", updated_on: "t1" }),
        doc("three gamma", { id: "3", updated_on: "t1" }),
      ]);
      const updateSpy = vi.spyOn(adapter, "updateMetadata");

      await run(loader, "x", recordDedupStrategy, { maxDocsPerAdd: 1, metaUpdateInterval: 0, now: () => 100 });
      expect(updateSpy.mock.calls.map(([, metadata]) => [metadata.state, metadata.updated])).toEqual([
        ["in_progress", 1],
        ["in_progress", 2],
        ["in_progress", 3],
        ["completed", 3],
      ]);

      updateSpy.mockClear();
      await run(loader, "y", recordDedupStrategy, { maxDocsPerAdd: 1, now: () => 100 });
      expect(updateSpy.mock.calls.map(([, metadata]) => metadata.state)).toEqual(["completed"]);
    });
  });

  it("keeps index_meta rows out of search results", async () => {
    await withHarness(type, async ({ adapter, embedder, run }) => {
      await run(
        staticLoader(() => [
          doc("one alpha", { id: "1", updated_on: "t1" }),
          doc("two beta", { id: "2", updated_on: "t1" }),
        ]),
        "x",
        recordDedupStrategy,
      );

      for (const collectionSuffix of ["", "x"]) {
        const hits = await searchIndex(
          { adapter, embedTexts: embedder.embedTexts },
          { query: "alpha", collectionSuffix, cutOff: 0 },
        );
        if (typeof hits === "string") throw new Error(hits);
        expect(hits.map((hit) => hit.content)).toEqual(["one alpha", "two beta"]);
      }
    });
  });
});

describe("indexData()", () => {
  it("logs each phase of a run", async () => {
    await withTempDir("vecsync-index-", async (dir) => {
      const adapter = await openAdapter("local", dir);
      const logger = captureLogger();

      await indexData({
        adapter,
        loader: staticLoader(() => [doc("alpha", { id: "1", updated_on: "t1" })]),
        strategy: recordDedupStrategy,
        embedTexts: createFakeEmbedder().embedTexts,
        collectionSuffix: "x",
        logger,
      });

      expect(logger.lines).toEqual([
        "There is no existing index_meta for collection 'x'. Initializing it.",
        "Indexing data into collection with suffix 'x'. It can take some time...",
        "Loading the documents to index...",
        "Verification of documents to index started",
        "Vectorstore is empty, indexing all incoming documents",
        "Documents were prepared for indexing. Total documents: 1",
        "Indexing progress: 100%. Processed 1 of 1 documents.",
        "successfully indexed 1 documents",
      ]);
      expect(logger.warnings).toEqual([]);
    });
  });

  it("rejects an invalid collection suffix before loading anything", async () => {
    const baseLoader = vi.fn(() => []);
    const embedder = createFakeEmbedder();
    await withTempDir("vecsync-index-", async (dir) => {
      const adapter = await openAdapter("local", dir);
      const options = {
        adapter,
        loader: { baseLoader },
        strategy: recordDedupStrategy,
        embedTexts: embedder.embedTexts,
      };

      await expect(indexData({ ...options, collectionSuffix: "toolong8" })).rejects.toThrow(
        "collection_suffix must be 1 to 7 characters long, got 'toolong8'",
      );
      await expect(indexData({ ...options, collectionSuffix: "a;b" })).rejects.toThrow(
        "collection_suffix must not contain ';', got 'a;b'",
      );
      expect(baseLoader).not.toHaveBeenCalled();
    });
  });
});

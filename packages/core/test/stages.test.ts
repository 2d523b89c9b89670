import { describe, expect, it } from "vitest";

import type { PipelineDocument } from "../src/document.js";
import { recordDedupStrategy } from "../src/indexing/dedupStrategies.js";
import { applyChunkersStage } from "../src/indexing/stages/applyChunkers.js";
import { cleanMetadataStage } from "../src/indexing/stages/cleanMetadata.js";
import { collectDependenciesStage } from "../src/indexing/stages/collectDependencies.js";
import { reduceDuplicatesStage } from "../src/indexing/stages/reduceDuplicates.js";
import { normalizeProgressStep, saveDocumentsStage } from "../src/indexing/stages/saveDocuments.js";
import type { Loader } from "../src/indexing/types.js";
import { buildIndexedData } from "../src/vectorstore/indexedData.js";
import type { IndexedEntry, NewVectorRow } from "../src/vectorstore/types.js";

import { captureLogger, collect, createFakeEmbedder, doc, fromArray } from "./testUtils.js";

const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);

describe("reduceDuplicatesStage()", () => {
  it("passes everything through when nothing is indexed", async () => {
    const logger = captureLogger();
    const deletes: string[][] = [];

    const out = await collect(
      reduceDuplicatesStage(fromArray([doc("a", { id: "A" }), doc("b", { id: "B" })]), {
        strategy: recordDedupStrategy,
        loadIndexedData: async () => new Map<string, IndexedEntry>(),
        deleteByIds: async (ids) => {
          deletes.push(ids);
        },
        collectionSuffix: "c1",
        logger,
      }),
    );

    expect(out.map((d) => d.metadata.id)).toEqual(["A", "B"]);
    expect(deletes).toEqual([]);
    expect(logger.lines).toEqual([
      "Verification of documents to index started",
      "Vectorstore is empty, indexing all incoming documents",
    ]);
  });

  it("skips current documents and deletes stale rows once at the end", async () => {
    const logger = captureLogger();
    const deletes: string[][] = [];
    const indexed = buildIndexedData([
      { id: "r1", metadata: { id: "A", updated_on: "1", collection: "c1" } },
      { id: "r2", metadata: { id: "B", updated_on: "1", collection: "c1" } },
      { id: "r3", metadata: { id: "B", updated_on: "1", collection: "c1" } },
      { id: "r4", metadata: { id: "X", updated_on: "1", collection: "other" } },
    ]);

    const stream = reduceDuplicatesStage(
      fromArray([
        doc("a", { id: "A", updated_on: "1" }),
        doc("b", { id: "B", updated_on: "2" }),
        doc("n", { id: "N", updated_on: "1" }),
        doc("x", { id: "X", updated_on: "1" }),
      ]),
      {
        strategy: recordDedupStrategy,
        loadIndexedData: async () => indexed,
        deleteByIds: async (ids) => {
          deletes.push(ids);
        },
        collectionSuffix: "c1",
        logger,
      },
    );

    const seen: unknown[] = [];
    for await (const d of stream) {
      seen.push(d.metadata.id);
      // deletion waits for the stream to finish
      expect(deletes).toEqual([]);
    }

    expect(seen).toEqual(["B", "N", "X"]);
    expect(deletes).toEqual([["r2", "r3"]]);
    expect(logger.lines).toEqual([
      "Verification of documents to index started",
      "Skipped 1 unchanged documents",
      "Removing 2 stale documents from the vectorstore",
    ]);
  });

  it("matches stored rows by collection tag membership", async () => {
    const deletes: string[][] = [];
    const indexed = buildIndexedData([
      { id: "r1", metadata: { id: "A", updated_on: "1", collection: "c0;c1" } },
      { id: "r2", metadata: { id: "B", updated_on: "1", collection: "c1;c2" } },
      { id: "r3", metadata: { id: "C", updated_on: "1", collection: "c10" } },
    ]);

    const out = await collect(
      reduceDuplicatesStage(
        fromArray([
          doc("a", { id: "A", updated_on: "1" }),
          doc("b", { id: "B", updated_on: "2" }),
          doc("c", { id: "C", updated_on: "1" }),
        ]),
        {
          strategy: recordDedupStrategy,
          loadIndexedData: async () => indexed,
          deleteByIds: async (ids) => {
            deletes.push(ids);
          },
          collectionSuffix: "c1",
        },
      ),
    );

    // "c10" is another collection, not a tag list holding "c1"
    expect(out.map((d) => d.metadata.id)).toEqual(["B", "C"]);
    expect(deletes).toEqual([["r2"]]);
  });

  it("treats a failing read as an empty store", async () => {
    const logger = captureLogger();
    const out = await collect(
      reduceDuplicatesStage(fromArray([doc("a", { id: "A" })]), {
        strategy: recordDedupStrategy,
        loadIndexedData: async () => {
          throw new Error("boom");
        },
        deleteByIds: async () => {},
        collectionSuffix: "c1",
        logger,
      }),
    );

    expect(out).toHaveLength(1);
    expect(logger.warnings).toEqual(["Failed to load indexed data: boom"]);
  });
});

describe("collectDependenciesStage()", () => {
  it("emits dependents after their parent with parent_id and lifted payloads", async () => {
    const logger = captureLogger();
    const loader: Loader = {
      baseLoader: () => [],
      processDocument: (parent) => {
        if (parent.metadata.id === "Q") throw new Error("nope");
        return [
          doc("comment", { id: "C1", loader_content: "raw", loader_content_type: ".txt" }),
        ];
      },
    };

    const out = await collect(
      collectDependenciesStage(fromArray([doc("p", { id: "P" }), doc("q", { id: "Q" })]), loader, logger),
    );

    expect(out.map((d) => d.metadata.id)).toEqual(["P", "C1", "Q"]);
    expect(out[1]?.metadata).toEqual({ id: "C1", parent_id: "P" });
    expect(out[1]?.transient?.contentType).toBe(".txt");
    expect(new TextDecoder().decode(out[1]?.transient?.contentBytes)).toBe("raw");
    expect(logger.warnings).toEqual(["Failed to collect dependencies of 'Q': nope"]);
  });

  it("is a pass-through for loaders without dependents", async () => {
    const out = await collect(
      collectDependenciesStage(fromArray([doc("p", { id: "P" })]), { baseLoader: () => [] }),
    );
    expect(out).toEqual([doc("p", { id: "P" })]);
  });
});

describe("applyChunkersStage()", () => {
  async function run(input: PipelineDocument, chunkingTool?: string, logger = captureLogger()) {
    return await collect(applyChunkersStage(fromArray([input]), { chunkingTool, logger }));
  }

  it("parses the byte payload by content type and drops the side channel", async () => {
    const out = await run({
      content: "",
      metadata: { id: "d1" },
      transient: { contentBytes: bytes("# Title\nalpha body"), contentType: ".md" },
    });

    expect(out).toEqual([
      {
        content: "# Title\nalpha body",
        metadata: { heading: "Title", heading_path: ["Title"], id: "d1", chunk_id: 1 },
      },
    ]);
  });

  it("chunks the text when a content type comes without bytes", async () => {
    const logger = captureLogger();
    const out = await run(
      { content: "plain words", metadata: { id: "d2" }, transient: { contentType: ".txt" } },
      undefined,
      logger,
    );

    expect(out).toEqual([{ content: "plain words", metadata: { id: "d2", chunk_id: 1 } }]);
    expect(logger.warnings).toEqual([
      "Document 'd2' has content type .txt but no byte payload; chunking its text",
    ]);
  });

  it("parses bytes as the chunking tool's format", async () => {
    const out = await run(
      { content: "", metadata: { id: "d3" }, transient: { contentBytes: bytes("name,age\nann,3\nbob,4") } },
      "csv",
    );

    expect(out).toEqual([
      {
        content: "name: ann, age: 3\nname: bob, age: 4",
        metadata: { row_start: 1, row_end: 2, id: "d3", chunk_id: 1 },
      },
    ]);
  });

  it("keeps a document with an empty payload unchanged", async () => {
    const out = await run(
      { content: "kept", metadata: { id: "d4" }, transient: { contentBytes: new Uint8Array() } },
      "csv",
    );
    expect(out).toEqual([{ content: "kept", metadata: { id: "d4" } }]);
  });

  it("chunks text content with a chunking tool alone", async () => {
    const out = await run(doc('{"a":1,"b":{"c":2}}', { id: "d5" }), "json");
    expect(out).toEqual([{ content: '{"a":1,"b":{"c":2}}', metadata: { id: "d5", chunk_id: 1 } }]);
  });

  it("keeps the document whole for an unknown chunking tool", async () => {
    const logger = captureLogger();
    const out = await run(doc("body", { id: "d6" }), "yaml", logger);
    expect(out).toEqual([doc("body", { id: "d6" })]);
    expect(logger.warnings).toEqual(["Unknown chunking tool 'yaml', document 'd6' is kept whole"]);
  });

  it("passes documents through without hints or tools", async () => {
    const input = doc("as is", { id: "d7" });
    const out = await run(input);
    expect(out[0]).toBe(input);
  });

  it("falls back to the whole document when the parser fails", async () => {
    const logger = captureLogger();
    const out = await run(
      {
        content: "fallback text",
        metadata: { id: "d8" },
        transient: { contentBytes: bytes("not json"), contentType: ".json" },
      },
      undefined,
      logger,
    );

    expect(out).toEqual([{ content: "fallback text", metadata: { id: "d8", chunk_id: 1 } }]);
    expect(logger.warnings).toHaveLength(1);
    expect(logger.warnings[0]?.startsWith("Failed to chunk document 'd8' as .json: ")).toBe(true);
  });

  it("applies per-extension chunking config", async () => {
    const out = await collect(
      applyChunkersStage(
        fromArray([
          {
            content: "",
            metadata: { id: "d9" },
            transient: { contentBytes: bytes("k\n1\n2"), contentType: "csv" },
          },
        ]),
        { chunkingConfig: { ".csv": { rows_per_chunk: 1, delimiter: 5 } } },
      ),
    );

    expect(out.map((d) => [d.content, d.metadata.chunk_id, d.metadata.row_start])).toEqual([
      ["k: 1", 1, 1],
      ["k: 2", 2, 2],
    ]);
  });
});

describe("cleanMetadataStage()", () => {
  it("strips transient and legacy payload keys and tags the collection", async () => {
    const out = await cleanMetadataStage(
      fromArray([
        {
          content: "one",
          metadata: { id: "1", loader_content: "raw", loader_content_type: ".txt" },
          transient: { contentType: ".txt" },
        },
        doc("two", { id: "2", collection: "x" }),
      ]),
      "c1",
    );

    expect(out).toEqual([
      { content: "one", metadata: { id: "1", collection: "c1" } },
      { content: "two", metadata: { id: "2", collection: "x;c1" } },
    ]);
  });
});

describe("saveDocumentsStage()", () => {
  function fakeAdapter() {
    const saved: NewVectorRow[] = [];
    return {
      saved,
      addDocuments: async (rows: NewVectorRow[]) => {
        const start = saved.length;
        saved.push(...rows);
        return rows.map((_, i) => `row-${start + i}`);
      },
    };
  }

  it("embeds in batches, skips empty content and logs progress steps", async () => {
    const logger = captureLogger();
    const adapter = fakeAdapter();
    const embedder = createFakeEmbedder();

    const ids = await saveDocumentsStage(
      [
        doc("alpha", { id: "1", updated_on: "u" }),
        doc("  ", { id: "2", updated_on: "u" }),
        doc("beta", { id: "3", commit_hash: "h" }),
        doc("gamma", { id: "4" }),
        doc("alpha beta", { id: "5", updated_on: "u" }),
      ],
      { adapter, embedTexts: embedder.embedTexts, maxDocsPerAdd: 2, progressStep: 50, logger },
    );

    expect(ids).toEqual(["row-0", "row-1", "row-2", "row-3"]);
    expect(embedder.calls).toEqual([
      ["alpha", "beta"],
      ["gamma", "alpha beta"],
    ]);
    expect(adapter.saved[0]?.embedding).toEqual([1.1, 0.1, 0.1]);
    expect(logger.lines).toEqual([
      "Skipping 1 documents with empty content",
      "Indexing progress: 50%. Processed 2 of 4 documents.",
      "Indexing progress: 100%. Processed 4 of 4 documents.",
    ]);
    expect(logger.warnings).toEqual([
      "Document '4' has neither 'updated_on' nor 'commit_hash'; it is re-indexed on every run",
    ]);
  });

  it("logs every batch with a zero step", async () => {
    const logger = captureLogger();
    await saveDocumentsStage(
      [doc("a", { id: "1", updated_on: "u" }), doc("b", { id: "2", updated_on: "u" }), doc("c", { id: "3", updated_on: "u" })],
      { adapter: fakeAdapter(), embedTexts: createFakeEmbedder().embedTexts, maxDocsPerAdd: 1, progressStep: 0, logger },
    );
    expect(logger.lines).toEqual([
      "Indexing progress: 33%. Processed 1 of 3 documents.",
      "Indexing progress: 66%. Processed 2 of 3 documents.",
      "Indexing progress: 100%. Processed 3 of 3 documents.",
    ]);
  });

  it("reports progress after every written batch", async () => {
    const reports: Array<[number, number]> = [];
    await saveDocumentsStage(
      [doc("a", { id: "1", updated_on: "u" }), doc("b", { id: "2", updated_on: "u" }), doc("c", { id: "3", updated_on: "u" })],
      {
        adapter: fakeAdapter(),
        embedTexts: createFakeEmbedder().embedTexts,
        maxDocsPerAdd: 2,
        onProgress: async (processed, total) => {
          reports.push([processed, total]);
        },
      },
    );
    expect(reports).toEqual([
      [2, 3],
      [3, 3],
    ]);
  });

  it("fails when the embedder returns too few vectors", async () => {
    await expect(
      saveDocumentsStage([doc("a", { id: "1" }), doc("b", { id: "2" })], {
        adapter: fakeAdapter(),
        embedTexts: async () => [[1, 2, 3]],
      }),
    ).rejects.toThrow("Embedding response returned too few embeddings. batchSize=2, got=1");
  });

  it("normalizes the progress step", () => {
    expect(normalizeProgressStep(undefined)).toBe(10);
    expect(normalizeProgressStep(0)).toBe(0);
    expect(normalizeProgressStep(25)).toBe(25);
    expect(normalizeProgressStep(100)).toBe(20);
    expect(normalizeProgressStep(-1)).toBe(20);
    expect(normalizeProgressStep(2.5)).toBe(20);
  });
});

import { describe, expect, it } from "vitest";

import { createHash } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

import type { PipelineDocument } from "../src/document.js";
import { fileDedupStrategy } from "../src/indexing/dedupStrategies.js";
import { indexData } from "../src/indexing/indexData.js";
import { createDirectoryLoader, listSourceFiles } from "../src/sources/directory.js";
import { createVectorStoreAdapter } from "../src/vectorstore/registry.js";

import { collect, createFakeEmbedder, TEST_EMBEDDING_DIM, TEST_EMBEDDING_MODEL, withTempDir } from "./testUtils.js";

async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relPath, content] of Object.entries(files)) {
    const abs = path.join(root, relPath);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, content, "utf8");
  }
}

const FILES = {
  README: "plain readme text",
  "data.csv": "k,v\n1,2",
  "notes/a.md": "# A\nalpha",
  "node_modules/pkg/index.js": "ignored",
  ".git/config": "ignored",
};

async function loadAll(root: string, params: Record<string, unknown> = {}): Promise<PipelineDocument[]> {
  return await collect(createDirectoryLoader({ root }).baseLoader(params));
}

describe("listSourceFiles()", () => {
  it("walks the tree, skipping ignored directories", async () => {
    await withTempDir("vecsync-dir-", async (root) => {
      await writeFiles(root, FILES);
      const files = await listSourceFiles(root);
      expect(files.map((f) => path.relative(root, f).split(path.sep).join("/"))).toEqual([
        "README",
        "data.csv",
        "notes/a.md",
      ]);
    });
  });
});

describe("createDirectoryLoader()", () => {
  it("emits one document per file with hash, mtime and byte payload", async () => {
    await withTempDir("vecsync-dir-", async (root) => {
      await writeFiles(root, FILES);
      const docs = await loadAll(root);

      expect(docs.map((d) => d.metadata.id)).toEqual(["README", "data.csv", "notes/a.md"]);

      const note = docs[2];
      const stat = await fs.stat(path.join(root, "notes", "a.md"));
      expect(note?.content).toBe("");
      expect(note?.metadata).toEqual({
        id: "notes/a.md",
        filename: "notes/a.md",
        source: "notes/a.md",
        commit_hash: createHash("sha256").update("# A\nalpha").digest("hex"),
        updated_on: new Date(stat.mtimeMs).toISOString(),
        size_bytes: 9,
      });
      expect(note?.transient?.contentType).toBe(".md");
      expect(new TextDecoder().decode(note?.transient?.contentBytes)).toBe("# A\nalpha");

      expect(docs[0]?.transient?.contentType).toBe(".txt");
    });
  });

  it("filters by included and excluded extensions", async () => {
    await withTempDir("vecsync-dir-", async (root) => {
      await writeFiles(root, FILES);
      expect((await loadAll(root, { include_extensions: ["md"] })).map((d) => d.metadata.id)).toEqual([
        "notes/a.md",
      ]);
      expect((await loadAll(root, { exclude_extensions: [".CSV"] })).map((d) => d.metadata.id)).toEqual([
        "README",
        "notes/a.md",
      ]);
    });
  });

  it("declares its index_data parameters", () => {
    const shape = createDirectoryLoader({ root: "." }).indexToolParams?.() ?? {};
    expect(Object.keys(shape)).toEqual(["include_extensions", "exclude_extensions"]);
  });

  it("re-indexes only files whose content changed", async () => {
    await withTempDir("vecsync-dir-", async (dir) => {
      const root = path.join(dir, "src");
      await writeFiles(root, FILES);
      const adapter = await createVectorStoreAdapter("local", {
        collectionName: "docs",
        embeddingModel: TEST_EMBEDDING_MODEL,
        embeddingDim: TEST_EMBEDDING_DIM,
        connection: path.join(dir, "store"),
      });
      const embedder = createFakeEmbedder();
      const run = () =>
        indexData({
          adapter,
          loader: createDirectoryLoader({ root }),
          strategy: fileDedupStrategy,
          embedTexts: embedder.embedTexts,
          collectionSuffix: "files",
        });

      expect((await run()).count).toBe(3);
      expect((await run()).count).toBe(0);

      await fs.writeFile(path.join(root, "notes", "a.md"), "# A\nalpha gamma", "utf8");
      expect((await run()).count).toBe(1);
      expect(embedder.calls.at(-1)).toEqual(["# A\nalpha gamma"]);
    });
  });
});

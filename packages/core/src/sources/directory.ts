// Local directory source
// - one document per file; bytes travel in the transient side channel
// - `commit_hash` is the file's sha256, so unchanged files are never re-embedded

import { createHash } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

import { z } from "zod";

import { normalizeExtension } from "../chunking/registry.js";
import type { PipelineDocument } from "../document.js";
import type { Loader, LoaderParams } from "../indexing/types.js";

export const DEFAULT_IGNORE_DIRS: ReadonlySet<string> = new Set([
  ".git",
  ".hg",
  ".svn",
  ".vecsync",
  "indexer_db",
  "node_modules",
  "dist",
]);

export type SourceFile = {
  absPath: string;
  relPath: string;
  mtimeMs: number;
  size: number;
  sha256: string;
  bytes: Uint8Array;
};

const directoryParamsShape = {
  include_extensions: z
    .array(z.string())
    .default([])
    .describe('Only index files with these extensions, e.g. [".md", ".pdf"]; empty means all'),
  exclude_extensions: z
    .array(z.string())
    .default([])
    .describe("Skip files with these extensions"),
};

const directoryParamsSchema = z.object(directoryParamsShape);

export function toPosixRelPath(root: string, absPath: string): string {
  return path.relative(root, absPath).split(path.sep).join(path.posix.sep);
}

export async function listSourceFiles(
  root: string,
  ignoreDirs: ReadonlySet<string> = DEFAULT_IGNORE_DIRS,
): Promise<string[]> {
  const results: string[] = [];

  async function walk(currentDirAbsPath: string) {
    const entries = await fs.readdir(currentDirAbsPath, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isDirectory()) {
        if (ignoreDirs.has(entry.name)) continue;
        await walk(path.join(currentDirAbsPath, entry.name));
        continue;
      }

      if (!entry.isFile()) continue;
      results.push(path.join(currentDirAbsPath, entry.name));
    }
  }

  await walk(root);
  results.sort();
  return results;
}

export async function readSourceFile(root: string, absPath: string): Promise<SourceFile> {
  const stat = await fs.stat(absPath);
  const bytes = await fs.readFile(absPath);
  return {
    absPath,
    relPath: toPosixRelPath(root, absPath),
    mtimeMs: stat.mtimeMs,
    size: stat.size,
    sha256: createHash("sha256").update(bytes).digest("hex"),
    bytes,
  };
}

function extensionMatcher(include: string[], exclude: string[]): (relPath: string) => boolean {
  const included = new Set(include.map(normalizeExtension).filter(Boolean));
  const excluded = new Set(exclude.map(normalizeExtension).filter(Boolean));
  return (relPath) => {
    const extension = normalizeExtension(path.posix.extname(relPath));
    if (excluded.has(extension)) return false;
    return included.size === 0 || included.has(extension);
  };
}

export type DirectoryLoaderOptions = {
  root: string;
  ignoreDirs?: ReadonlySet<string>;
};

export function createDirectoryLoader(options: DirectoryLoaderOptions): Loader {
  const root = path.resolve(options.root);

  return {
    async *baseLoader(params: LoaderParams): AsyncGenerator<PipelineDocument> {
      const { include_extensions, exclude_extensions } = directoryParamsSchema.parse(params);
      const matches = extensionMatcher(include_extensions, exclude_extensions);

      for (const absPath of await listSourceFiles(root, options.ignoreDirs)) {
        const relPath = toPosixRelPath(root, absPath);
        if (!matches(relPath)) continue;

        const file = await readSourceFile(root, absPath);
        const extension = normalizeExtension(path.posix.extname(relPath));
        yield {
          content: "",
          metadata: {
            id: file.relPath,
            filename: file.relPath,
            source: file.relPath,
            commit_hash: file.sha256,
            updated_on: new Date(file.mtimeMs).toISOString(),
            size_bytes: file.size,
          },
          transient: { contentBytes: file.bytes, contentType: extension || ".txt" },
        };
      }
    },

    indexToolParams: () => directoryParamsShape,
  };
}

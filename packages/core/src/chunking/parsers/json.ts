// Recursive JSON splitting
// - leaves are packed into nested objects until a chunk reaches `max_chars`

import { isPlainObject } from "../../vectorstore/filter.js";
import { decodeUtf8, numberOption } from "../options.js";
import type { ChunkOptions, ContentParser, ParsedChunk } from "../types.js";

type JsonLeaf = { path: string[]; value: unknown };

function* jsonLeaves(value: unknown, path: string[]): Generator<JsonLeaf> {
  if (isPlainObject(value)) {
    const entries = Object.entries(value);
    if (entries.length === 0 && path.length > 0) {
      yield { path, value: {} };
      return;
    }
    for (const [key, child] of entries) {
      yield* jsonLeaves(child, [...path, key]);
    }
    return;
  }
  yield { path, value };
}

function setAtPath(target: Record<string, unknown>, path: string[], value: unknown): void {
  let current = target;
  for (const [i, key] of path.entries()) {
    if (i === path.length - 1) {
      current[key] = value;
      return;
    }
    const next = current[key];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }
}

function leafSize(leaf: JsonLeaf): number {
  return JSON.stringify(leaf.path).length + JSON.stringify(leaf.value ?? null).length;
}

export function splitJsonValue(value: unknown, maxChars: number): string[] {
  // Scalars and top-level arrays are one chunk
  if (!isPlainObject(value)) return [JSON.stringify(value)];

  const chunks: string[] = [];
  let current: JsonLeaf[] = [];
  let currentSize = 2;

  const flush = (): void => {
    if (current.length === 0) return;
    const out: Record<string, unknown> = {};
    for (const leaf of current) setAtPath(out, leaf.path, leaf.value);
    chunks.push(JSON.stringify(out));
    current = [];
    currentSize = 2;
  };

  for (const leaf of jsonLeaves(value, [])) {
    const size = leafSize(leaf);
    if (current.length > 0 && currentSize + size > maxChars) flush();
    current.push(leaf);
    currentSize += size;
  }

  flush();
  return chunks;
}

async function* parseJsonText(text: string, options: ChunkOptions): AsyncGenerator<ParsedChunk> {
  const maxChars = Math.max(1, numberOption(options, "max_chars", 2000));
  for (const chunk of splitJsonValue(JSON.parse(text), maxChars)) {
    yield { content: chunk };
  }
}

async function* parseJsonLines(text: string, options: ChunkOptions): AsyncGenerator<ParsedChunk> {
  const maxChars = Math.max(1, numberOption(options, "max_chars", 2000));
  for (const [index, line] of text.split(/\r?\n/).entries()) {
    if (!line.trim()) continue;
    for (const chunk of splitJsonValue(JSON.parse(line), maxChars)) {
      yield { content: chunk, metadata: { line: index + 1 } };
    }
  }
}

export const jsonParser: ContentParser = {
  extensions: [".json"],
  defaults: { max_chars: 2000 },
  parse: (bytes, options) => parseJsonText(decodeUtf8(bytes), options),
  parseText: parseJsonText,
};

export const jsonLinesParser: ContentParser = {
  extensions: [".jsonl"],
  defaults: { max_chars: 2000 },
  parse: (bytes, options) => parseJsonLines(decodeUtf8(bytes), options),
  parseText: parseJsonLines,
};

import { csvParser } from "./parsers/csv.js";
import { docxParser } from "./parsers/docx.js";
import { jsonLinesParser, jsonParser } from "./parsers/json.js";
import { markdownParser } from "./parsers/markdown.js";
import { markupParser } from "./parsers/markup.js";
import { pdfParser } from "./parsers/pdf.js";
import { textParser } from "./parsers/text.js";
import type { ContentParser } from "./types.js";

export const DEFAULT_EXTENSION = ".txt";

const parserByExtension = new Map<string, ContentParser>();

export function registerContentParser(parser: ContentParser): void {
  for (const extension of parser.extensions) {
    parserByExtension.set(normalizeExtension(extension), parser);
  }
}

for (const parser of [
  textParser,
  markdownParser,
  jsonParser,
  jsonLinesParser,
  csvParser,
  markupParser,
  pdfParser,
  docxParser,
]) {
  registerContentParser(parser);
}

// "md", ".MD" and "notes/a.md" all normalize to ".md"
export function normalizeExtension(value: string): string {
  const trimmed = value.trim().toLowerCase();
  if (!trimmed) return "";
  const dot = trimmed.lastIndexOf(".");
  return dot === -1 ? `.${trimmed}` : trimmed.slice(dot);
}

export function listSupportedExtensions(): string[] {
  return [...parserByExtension.keys()].sort();
}

export function isSupportedExtension(extension: string): boolean {
  return parserByExtension.has(normalizeExtension(extension));
}

// Unknown extensions are parsed as plain text
export function resolveContentParser(extension: string): { extension: string; parser: ContentParser } {
  const normalized = normalizeExtension(extension);
  const parser = parserByExtension.get(normalized);
  if (parser) return { extension: normalized, parser };
  return { extension: DEFAULT_EXTENSION, parser: textParser };
}

const EXTENSION_BY_CHUNKER: Record<string, string> = {
  markdown: ".md",
  json: ".json",
  text: ".txt",
  txt: ".txt",
  html: ".html",
  xml: ".xml",
  csv: ".csv",
};

export function listChunkerNames(): string[] {
  return Object.keys(EXTENSION_BY_CHUNKER);
}

export function fileExtensionByChunker(chunkerName: string): string | undefined {
  return EXTENSION_BY_CHUNKER[chunkerName.trim().toLowerCase()];
}

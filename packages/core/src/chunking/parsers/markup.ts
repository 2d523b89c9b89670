// HTML/XML: tags stripped to text, then split like plain text

import { decodeUtf8 } from "../options.js";
import type { ChunkOptions, ContentParser, ParsedChunk } from "../types.js";

import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE, splitPlainText } from "./text.js";

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith("#x") || entity.startsWith("#X")) {
      return String.fromCodePoint(Number.parseInt(entity.slice(2), 16));
    }
    if (entity.startsWith("#")) return String.fromCodePoint(Number.parseInt(entity.slice(1), 10));
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

function escapeMarkup(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function stripMarkup(markup: string): string {
  const text = markup
    .replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, (_match, text: string) => escapeMarkup(text))
    .replace(/<!--[\s\S]*?-->/g, " ")
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1>/gi, " ")
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/(p|div|li|tr|h[1-6]|section|article|header|footer)>/gi, "\n")
    .replace(/<[^>]+>/g, " ");

  return decodeEntities(text)
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter(Boolean)
    .join("\n");
}

function parseMarkupText(text: string, options: ChunkOptions): AsyncGenerator<ParsedChunk> {
  return splitPlainText(stripMarkup(text), options);
}

export const markupParser: ContentParser = {
  extensions: [".html", ".htm", ".xml"],
  defaults: { chunk_size: DEFAULT_CHUNK_SIZE, chunk_overlap: DEFAULT_CHUNK_OVERLAP },
  parse: (bytes, options) => parseMarkupText(decodeUtf8(bytes), options),
  parseText: parseMarkupText,
};

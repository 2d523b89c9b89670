import type { DocumentMetadata } from "../document.js";

export type ChunkOptionValue = string | number | boolean;
export type ChunkOptions = Record<string, ChunkOptionValue>;

// Per-extension overrides, e.g. { ".md": { max_chars: 2000 } }
export type ChunkingConfig = Record<string, Record<string, unknown>>;

export type ParsedChunk = {
  content: string;
  metadata?: DocumentMetadata;
};

export interface ContentParser {
  readonly extensions: readonly string[];
  // Defaults also list the option keys a caller may override
  readonly defaults: ChunkOptions;
  parse(bytes: Uint8Array, options: ChunkOptions): AsyncIterable<ParsedChunk>;
  // Text-based formats can chunk already-decoded content
  parseText?(text: string, options: ChunkOptions): AsyncIterable<ParsedChunk>;
}

// Turns one source document into chunk documents
// - every chunk keeps the document metadata and gets a 1-based `chunk_id`
// - a parser failure before the first chunk keeps the document as a single chunk

import { MetadataKeys, metadataString, type SourceDocument } from "../document.js";
import { errorMessage } from "../errors.js";
import { warnLine, type IndexLogger } from "../logging.js";

import { resolveChunkOptions } from "./options.js";
import { fileExtensionByChunker, resolveContentParser } from "./registry.js";
import type { ChunkingConfig, ParsedChunk } from "./types.js";

export type ChunkingContext = {
  chunkingConfig?: ChunkingConfig;
  logger?: IndexLogger;
};

export function sanitizeChunkText(text: string): string {
  return text.replaceAll("\u0000", "");
}

async function* emitChunks(
  doc: SourceDocument,
  chunks: AsyncIterable<ParsedChunk>,
  label: string,
  context: ChunkingContext,
): AsyncGenerator<SourceDocument> {
  let chunkId = 0;
  try {
    for await (const chunk of chunks) {
      chunkId += 1;
      yield {
        content: sanitizeChunkText(chunk.content),
        metadata: { ...chunk.metadata, ...doc.metadata, [MetadataKeys.chunkId]: chunkId },
      };
    }
  } catch (error) {
    const docId = metadataString(doc.metadata, MetadataKeys.id) ?? "<unknown>";
    warnLine(context.logger, `Failed to chunk document '${docId}' as ${label}: ${errorMessage(error)}`);
    if (chunkId === 0) {
      yield {
        content: sanitizeChunkText(doc.content),
        metadata: { ...doc.metadata, [MetadataKeys.chunkId]: 1 },
      };
    }
  }
}

export function processDocumentByType(
  doc: SourceDocument,
  bytes: Uint8Array,
  extension: string,
  context: ChunkingContext = {},
): AsyncGenerator<SourceDocument> {
  const resolved = resolveContentParser(extension);
  const options = resolveChunkOptions(resolved.parser, resolved.extension, context.chunkingConfig);
  return emitChunks(doc, resolved.parser.parse(bytes, options), resolved.extension, context);
}

// Returns null when the chunker name is unknown or its format needs raw bytes
export function chunkTextDocument(
  doc: SourceDocument,
  chunkerName: string,
  context: ChunkingContext = {},
): AsyncGenerator<SourceDocument> | null {
  const extension = fileExtensionByChunker(chunkerName);
  if (!extension) return null;

  const resolved = resolveContentParser(extension);
  if (!resolved.parser.parseText) return null;

  const options = resolveChunkOptions(resolved.parser, resolved.extension, context.chunkingConfig);
  return emitChunks(doc, resolved.parser.parseText(doc.content, options), chunkerName, context);
}

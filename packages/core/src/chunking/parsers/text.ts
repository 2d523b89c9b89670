import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";

import { decodeUtf8, numberOption } from "../options.js";
import type { ChunkOptions, ContentParser, ParsedChunk } from "../types.js";

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 100;

export async function* splitPlainText(
  text: string,
  options: ChunkOptions,
): AsyncGenerator<ParsedChunk> {
  const chunkSize = Math.max(1, numberOption(options, "chunk_size", DEFAULT_CHUNK_SIZE));
  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize,
    chunkOverlap: Math.min(numberOption(options, "chunk_overlap", DEFAULT_CHUNK_OVERLAP), chunkSize - 1),
  });

  for (const piece of await splitter.splitText(text)) {
    if (!piece.trim()) continue;
    yield { content: piece };
  }
}

export const textParser: ContentParser = {
  extensions: [".txt"],
  defaults: { chunk_size: DEFAULT_CHUNK_SIZE, chunk_overlap: DEFAULT_CHUNK_OVERLAP },
  parse: (bytes, options) => splitPlainText(decodeUtf8(bytes), options),
  parseText: splitPlainText,
};

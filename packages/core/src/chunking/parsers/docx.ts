import mammoth from "mammoth";

import type { ChunkOptions, ContentParser, ParsedChunk } from "../types.js";

import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE, splitPlainText } from "./text.js";

async function* parseDocx(bytes: Uint8Array, options: ChunkOptions): AsyncGenerator<ParsedChunk> {
  const result = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
  yield* splitPlainText(result.value, options);
}

export const docxParser: ContentParser = {
  extensions: [".docx"],
  defaults: { chunk_size: DEFAULT_CHUNK_SIZE, chunk_overlap: DEFAULT_CHUNK_OVERLAP },
  parse: parseDocx,
};

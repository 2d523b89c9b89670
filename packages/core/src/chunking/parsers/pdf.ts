import { PDFParse } from "pdf-parse";

import type { ChunkOptions, ContentParser, ParsedChunk } from "../types.js";

import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE, splitPlainText } from "./text.js";

type PdfPage = { num: number; text: string };

async function extractPdfPages(bytes: Uint8Array): Promise<PdfPage[]> {
  // pdf.js may detach the buffer it is given
  const parser = new PDFParse({ data: new Uint8Array(bytes) });
  try {
    const result = await parser.getText();
    return result.pages.map((page) => ({ num: page.num, text: page.text }));
  } finally {
    await parser.destroy();
  }
}

async function* parsePdf(bytes: Uint8Array, options: ChunkOptions): AsyncGenerator<ParsedChunk> {
  for (const page of await extractPdfPages(bytes)) {
    for await (const chunk of splitPlainText(page.text, options)) {
      yield { content: chunk.content, metadata: { page: page.num } };
    }
  }
}

export const pdfParser: ContentParser = {
  extensions: [".pdf"],
  defaults: { chunk_size: DEFAULT_CHUNK_SIZE, chunk_overlap: DEFAULT_CHUNK_OVERLAP },
  parse: parsePdf,
};

import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";
import matter from "gray-matter";

import type { DocumentMetadata } from "../../document.js";
import { booleanOption, decodeUtf8, numberOption } from "../options.js";
import type { ChunkOptions, ContentParser, ParsedChunk } from "../types.js";

export type MarkdownSection = {
  heading: string | null;
  headingPath: string[];
  content: string;
};

export type ParsedMarkdown = {
  frontmatter: DocumentMetadata;
  body: string;
};

function normalizeNewlines(input: string): string {
  return input.replace(/\r\n/g, "\n");
}

export function parseMarkdownFrontmatter(markdown: string): ParsedMarkdown {
  const input = normalizeNewlines(markdown).replace(/^\uFEFF/, "");
  if (!input.startsWith("---\n")) return { frontmatter: {}, body: input };

  try {
    const parsed = matter(input);
    return { frontmatter: toMetadata(parsed.data), body: parsed.content };
  } catch {
    // Tolerant fallback: drop the frontmatter block but keep the body
    const end = input.indexOf("\n---", 4);
    return { frontmatter: {}, body: end === -1 ? input : input.slice(end + 4) };
  }
}

// YAML dates become ISO strings so metadata stays JSON-serializable
function toMetadata(data: Record<string, unknown>): DocumentMetadata {
  const out: DocumentMetadata = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = value instanceof Date ? value.toISOString() : value;
  }
  return out;
}

// Heading-based sections; `#` lines inside code fences are not headings
export function splitMarkdownSections(bodyMarkdown: string): MarkdownSection[] {
  const body = normalizeNewlines(bodyMarkdown).trim();
  if (!body) return [];

  const sections: MarkdownSection[] = [];
  let heading: string | null = null;
  let headingPath: string[] = [];
  let buffer: string[] = [];
  let inFence = false;

  const flush = (): void => {
    const content = buffer.join("\n").trim();
    if (content) sections.push({ heading, headingPath, content });
  };

  for (const line of body.split("\n")) {
    if (/^(```|~~~)/.test(line)) inFence = !inFence;

    const headingMatch = inFence ? null : line.match(/^(#{1,6})\s+(.*)$/);
    const hashes = headingMatch?.[1] ?? "";
    const headingText = (headingMatch?.[2] ?? "").trim();
    if (!hashes || !headingText) {
      buffer.push(line);
      continue;
    }

    flush();
    // depth=2 (##) keeps one parent heading
    headingPath = [...headingPath.slice(0, hashes.length - 1), headingText];
    heading = headingText;
    buffer = [line];
  }

  flush();
  return sections;
}

async function* parseMarkdownText(
  text: string,
  options: ChunkOptions,
): AsyncGenerator<ParsedChunk> {
  const { frontmatter, body } = parseMarkdownFrontmatter(text);
  const includeFrontmatter = booleanOption(options, "include_frontmatter", true);
  const maxChars = Math.max(1, numberOption(options, "max_chars", 4000));
  const splitter = RecursiveCharacterTextSplitter.fromLanguage("markdown", {
    chunkSize: maxChars,
    chunkOverlap: Math.min(numberOption(options, "chunk_overlap", 0), maxChars - 1),
  });

  for (const section of splitMarkdownSections(body)) {
    const pieces =
      section.content.length <= maxChars
        ? [section.content]
        : await splitter.splitText(section.content);

    for (const piece of pieces) {
      if (!piece.trim()) continue;
      yield {
        content: piece,
        metadata: {
          ...(includeFrontmatter ? frontmatter : {}),
          ...(section.heading ? { heading: section.heading } : {}),
          heading_path: section.headingPath,
        },
      };
    }
  }
}

export const markdownParser: ContentParser = {
  extensions: [".md", ".markdown"],
  defaults: { max_chars: 4000, chunk_overlap: 0, include_frontmatter: true },
  parse: (bytes, options) => parseMarkdownText(decodeUtf8(bytes), options),
  parseText: parseMarkdownText,
};

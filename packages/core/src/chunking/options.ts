import type { ChunkingConfig, ChunkOptions, ContentParser } from "./types.js";

export function numberOption(options: ChunkOptions, key: string, fallback: number): number {
  const value = options[key];
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

export function booleanOption(options: ChunkOptions, key: string, fallback: boolean): boolean {
  const value = options[key];
  return typeof value === "boolean" ? value : fallback;
}

// Only keys present in the parser defaults, with a matching value type, are taken.
export function resolveChunkOptions(
  parser: ContentParser,
  extension: string,
  config: ChunkingConfig | undefined,
): ChunkOptions {
  const options: ChunkOptions = { ...parser.defaults };
  const overrides = config?.[extension];
  if (!overrides) return options;

  for (const [key, value] of Object.entries(overrides)) {
    const fallback = parser.defaults[key];
    if (fallback === undefined) continue;
    if (
      (typeof value === "string" || typeof value === "number" || typeof value === "boolean") &&
      typeof value === typeof fallback
    ) {
      options[key] = value;
    }
  }

  return options;
}

export function decodeUtf8(bytes: Uint8Array): string {
  return new TextDecoder("utf-8").decode(bytes);
}

export function safeParseJsonObject(input: string): Record<string, unknown> {
  try {
    const value: unknown = JSON.parse(input);
    if (value && typeof value === "object" && !Array.isArray(value)) {
      return { ...value };
    }
    return {};
  } catch {
    return {};
  }
}

export function normalizeIds(ids: string[]): string[] {
  return [...new Set(ids.map((id) => id.trim()).filter(Boolean))];
}

// JSON path for a single top-level metadata key
export function metadataJsonPath(key: string): string {
  return `$."${key.replaceAll('"', '\\"')}"`;
}

// Avoid SQLite parameter limits by batching
export const SQL_BATCH_SIZE = 200;

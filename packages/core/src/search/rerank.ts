import type { RerankingConfig, SearchHit } from "./types.js";

const DEFAULT_WEIGHT = 1.0;

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const left = String(a ?? "");
  const right = String(b ?? "");
  return left < right ? -1 : left > right ? 1 : 0;
}

// Boosts matching hits, then orders by a field's sort rule or by score.
export function applyReranking(hits: SearchHit[], config: RerankingConfig): SearchHit[] {
  if (hits.length === 0) return hits;
  const reranked = hits.map((hit) => ({ ...hit }));

  for (const [field, fieldConfig] of Object.entries(config)) {
    const weight = fieldConfig.weight ?? DEFAULT_WEIGHT;
    const rules = fieldConfig.rules ?? {};

    for (const hit of reranked) {
      const value = hit.metadata[field];
      if (value === undefined || value === null) continue;

      if (
        typeof rules.contains === "string" &&
        typeof value === "string" &&
        value.toLowerCase().includes(rules.contains.toLowerCase())
      ) {
        hit.score *= 1 + weight;
      }

      if (
        rules.priority !== undefined &&
        String(value).toLowerCase() === String(rules.priority).toLowerCase()
      ) {
        hit.score *= 1 + weight;
      }
    }
  }

  let sorted = false;
  for (const [field, fieldConfig] of Object.entries(config)) {
    const direction = fieldConfig.rules?.sort;
    if (!direction) continue;
    sorted = true;

    // present values first, then field value, then score; "desc" reverses the whole key
    const sign = direction === "desc" ? -1 : 1;
    reranked.sort((a, b) => {
      const aValue = a.metadata[field];
      const bValue = b.metadata[field];
      const aPresent = aValue !== undefined && aValue !== null ? 1 : 0;
      const bPresent = bValue !== undefined && bValue !== null ? 1 : 0;
      const byPresence = aPresent - bPresent;
      if (byPresence !== 0) return sign * byPresence;
      const byValue = compareValues(aValue, bValue);
      if (byValue !== 0) return sign * byValue;
      return sign * (a.score - b.score);
    });
  }

  if (!sorted) reranked.sort((a, b) => b.score - a.score);
  return reranked;
}

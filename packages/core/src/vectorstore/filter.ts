// Metadata filter language shared by every backend
// - { key: value } is equality
// - { key: { $eq | $ne | $gt | $gte | $lt | $lte | $in | $nin | $exists | $tag } }
// - $tag matches one entry of a ';'-separated string, e.g. { collection: { $tag: "a" } } matches "a;b"
// - { $and: [...] }, { $or: [...] }

import type { DocumentMetadata } from "../document.js";
import { VectorStoreFilterError } from "../errors.js";

export type MetadataFilter = Record<string, unknown>;

export type FilterScalar = string | number | boolean | null;

export type ComparisonOperator = "$eq" | "$ne" | "$gt" | "$gte" | "$lt" | "$lte";

export type FilterNode =
  | { kind: "and"; nodes: FilterNode[] }
  | { kind: "or"; nodes: FilterNode[] }
  | { kind: "compare"; field: string; op: ComparisonOperator; value: FilterScalar }
  | { kind: "in"; field: string; negate: boolean; values: FilterScalar[] }
  | { kind: "exists"; field: string; exists: boolean }
  | { kind: "tag"; field: string; tag: string };

export const TAG_SEPARATOR = ";";

export function splitTags(value: string): string[] {
  return value
    .split(TAG_SEPARATOR)
    .map((tag) => tag.trim())
    .filter(Boolean);
}

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set(["$eq", "$ne", "$gt", "$gte", "$lt", "$lte"]);

function isComparisonOperator(op: string): op is ComparisonOperator {
  return COMPARISON_OPERATORS.has(op);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is FilterScalar {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  );
}

function combine(nodes: FilterNode[]): FilterNode {
  const [first] = nodes;
  if (nodes.length === 1 && first) return first;
  return { kind: "and", nodes };
}

function parseFieldCondition(field: string, condition: unknown): FilterNode[] {
  if (isScalar(condition)) return [{ kind: "compare", field, op: "$eq", value: condition }];
  if (!isPlainObject(condition)) {
    throw new VectorStoreFilterError(`Invalid filter value for '${field}'`);
  }

  const entries = Object.entries(condition);
  if (entries.length === 0) {
    throw new VectorStoreFilterError(`Empty filter condition for '${field}'`);
  }

  return entries.map(([op, operand]): FilterNode => {
    if (isComparisonOperator(op)) {
      if (!isScalar(operand)) {
        throw new VectorStoreFilterError(`${op} on '${field}' expects a scalar value`);
      }
      if (op !== "$eq" && op !== "$ne" && typeof operand !== "number" && typeof operand !== "string") {
        throw new VectorStoreFilterError(`${op} on '${field}' expects a number or a string`);
      }
      return { kind: "compare", field, op, value: operand };
    }

    if (op === "$in" || op === "$nin") {
      if (!Array.isArray(operand) || !operand.every(isScalar)) {
        throw new VectorStoreFilterError(`${op} on '${field}' expects a list of scalar values`);
      }
      return { kind: "in", field, negate: op === "$nin", values: operand };
    }

    if (op === "$exists") {
      if (typeof operand !== "boolean") {
        throw new VectorStoreFilterError(`$exists on '${field}' expects a boolean`);
      }
      return { kind: "exists", field, exists: operand };
    }

    if (op === "$tag") {
      if (typeof operand !== "string" || !operand.trim() || operand.includes(TAG_SEPARATOR)) {
        throw new VectorStoreFilterError(`$tag on '${field}' expects a single non-empty tag`);
      }
      return { kind: "tag", field, tag: operand.trim() };
    }

    throw new VectorStoreFilterError(`Unsupported filter operator: ${op}`);
  });
}

function parseClauses(filter: Record<string, unknown>): FilterNode[] {
  const nodes: FilterNode[] = [];

  for (const [key, value] of Object.entries(filter)) {
    if (key === "$and" || key === "$or") {
      if (!Array.isArray(value)) {
        throw new VectorStoreFilterError(`${key} expects a list of filters`);
      }
      const children = value.map((child) => {
        if (!isPlainObject(child)) {
          throw new VectorStoreFilterError(`${key} expects a list of filters`);
        }
        return combine(parseClauses(child));
      });
      nodes.push({ kind: key === "$and" ? "and" : "or", nodes: children });
      continue;
    }

    if (key.startsWith("$")) {
      throw new VectorStoreFilterError(`Unsupported filter operator: ${key}`);
    }

    nodes.push(...parseFieldCondition(key, value));
  }

  return nodes;
}

// Returns null for an empty filter (matches everything).
export function parseMetadataFilter(filter: MetadataFilter | undefined): FilterNode | null {
  if (!filter) return null;
  const nodes = parseClauses(filter);
  if (nodes.length === 0) return null;
  return combine(nodes);
}

function scalarEquals(actual: unknown, expected: FilterScalar): boolean {
  if (expected === null) return actual === undefined || actual === null;
  return actual === expected;
}

function isSet(value: unknown): boolean {
  return value !== undefined && value !== null;
}

function orderedCompare<T extends number | string>(a: T, b: T, op: ComparisonOperator): boolean {
  switch (op) {
    case "$gt":
      return a > b;
    case "$gte":
      return a >= b;
    case "$lt":
      return a < b;
    case "$lte":
      return a <= b;
    default:
      return false;
  }
}

function compareOrdered(actual: unknown, op: ComparisonOperator, expected: FilterScalar): boolean {
  if (typeof actual === "number" && typeof expected === "number") {
    return orderedCompare(actual, expected, op);
  }
  if (typeof actual === "string" && typeof expected === "string") {
    return orderedCompare(actual, expected, op);
  }
  return false;
}

export function matchesFilter(node: FilterNode | null, metadata: DocumentMetadata): boolean {
  if (!node) return true;

  switch (node.kind) {
    case "and":
      return node.nodes.every((child) => matchesFilter(child, metadata));
    case "or":
      return node.nodes.some((child) => matchesFilter(child, metadata));
    case "exists":
      return (metadata[node.field] !== undefined) === node.exists;
    case "tag": {
      const actual = metadata[node.field];
      return typeof actual === "string" && splitTags(actual).includes(node.tag);
    }
    case "in": {
      const actual = metadata[node.field];
      if (!isSet(actual)) return false;
      const found = node.values.some((value) => value !== null && actual === value);
      return node.negate ? !found : found;
    }
    case "compare": {
      const actual = metadata[node.field];
      if (node.op === "$eq") return scalarEquals(actual, node.value);
      if (node.op === "$ne") {
        return node.value === null ? isSet(actual) : isSet(actual) && actual !== node.value;
      }
      return compareOrdered(actual, node.op, node.value);
    }
  }
}

// Compiles a parsed metadata filter to a SQL predicate over a JSON column

import type { ComparisonOperator, FilterNode, FilterScalar } from "../../vectorstore/filter.js";

import { metadataJsonPath } from "./shared.js";

export type SqlFragment = {
  sql: string;
  params: Array<string | number>;
};

const SQL_OPERATORS: Record<Exclude<ComparisonOperator, "$eq" | "$ne">, string> = {
  $gt: ">",
  $gte: ">=",
  $lt: "<",
  $lte: "<=",
};

function typeOf(column: string): string {
  return `json_type(${column}, ?)`;
}

function valueOf(column: string): string {
  return `json_extract(${column}, ?)`;
}

// Equality on JSON type and value, so `1` never matches `true`
function equals(column: string, field: string, value: FilterScalar): SqlFragment {
  const path = metadataJsonPath(field);
  if (value === null) {
    return { sql: `(${typeOf(column)} IS NULL OR ${typeOf(column)} = 'null')`, params: [path, path] };
  }
  if (typeof value === "boolean") {
    return { sql: `${typeOf(column)} = '${value ? "true" : "false"}'`, params: [path] };
  }
  if (typeof value === "number") {
    return {
      sql: `(${typeOf(column)} IN ('integer', 'real') AND ${valueOf(column)} = ?)`,
      params: [path, path, value],
    };
  }
  return {
    sql: `(${typeOf(column)} = 'text' AND ${valueOf(column)} = ?)`,
    params: [path, path, value],
  };
}

function isSet(column: string, field: string): SqlFragment {
  return {
    sql: `(${typeOf(column)} IS NOT NULL AND ${typeOf(column)} != 'null')`,
    params: [metadataJsonPath(field), metadataJsonPath(field)],
  };
}

function joinFragments(fragments: SqlFragment[], operator: "AND" | "OR", empty: string): SqlFragment {
  if (fragments.length === 0) return { sql: empty, params: [] };
  return {
    sql: `(${fragments.map((f) => f.sql).join(` ${operator} `)})`,
    params: fragments.flatMap((f) => f.params),
  };
}

export function compileMetadataFilter(node: FilterNode, column: string): SqlFragment {
  switch (node.kind) {
    case "and":
      return joinFragments(
        node.nodes.map((child) => compileMetadataFilter(child, column)),
        "AND",
        "1",
      );
    case "or":
      return joinFragments(
        node.nodes.map((child) => compileMetadataFilter(child, column)),
        "OR",
        "0",
      );
    case "exists":
      return {
        sql: `${typeOf(column)} IS ${node.exists ? "NOT NULL" : "NULL"}`,
        params: [metadataJsonPath(node.field)],
      };
    case "tag": {
      // stored tags are joined without padding, see appendCollectionTag
      const path = metadataJsonPath(node.field);
      return {
        sql: `(${typeOf(column)} = 'text' AND instr(';' || ${valueOf(column)} || ';', ?) > 0)`,
        params: [path, path, `;${node.tag};`],
      };
    }
    case "in": {
      const anyOf = joinFragments(
        node.values
          .filter((value) => value !== null)
          .map((value) => equals(column, node.field, value)),
        "OR",
        "0",
      );
      if (!node.negate) return anyOf;
      const set = isSet(column, node.field);
      return { sql: `(${set.sql} AND NOT ${anyOf.sql})`, params: [...set.params, ...anyOf.params] };
    }
    case "compare": {
      if (node.op === "$eq") return equals(column, node.field, node.value);
      if (node.op === "$ne") {
        const set = isSet(column, node.field);
        if (node.value === null) return set;
        const eq = equals(column, node.field, node.value);
        return { sql: `(${set.sql} AND NOT ${eq.sql})`, params: [...set.params, ...eq.params] };
      }

      const value = node.value;
      if (typeof value !== "number" && typeof value !== "string") return { sql: "0", params: [] };
      const path = metadataJsonPath(node.field);
      const jsonType = typeof value === "number" ? "('integer', 'real')" : "('text')";
      return {
        sql: `(${typeOf(column)} IN ${jsonType} AND ${valueOf(column)} ${SQL_OPERATORS[node.op]} ?)`,
        params: [path, path, value],
      };
    }
  }
}

/**
 * Tagged value model shared by filtering, transforming, sorting and rendering
 */

import type { Value } from "../types/index.js";

export const NULL: Value = { kind: "null" };

export function str(value: string): Value {
  return { kind: "string", value };
}

export function num(value: number): Value {
  return { kind: "number", value };
}

export function bool(value: boolean): Value {
  return { kind: "bool", value };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Convert a parsed JSON value into the tagged form
 */
export function fromJson(input: unknown): Value {
  if (input === null || input === undefined) return NULL;

  switch (typeof input) {
    case "string":
      return str(input);
    case "number":
      return Number.isFinite(input) ? num(input) : NULL;
    case "boolean":
      return bool(input);
    case "bigint":
      return num(Number(input));
  }

  if (Array.isArray(input)) {
    return { kind: "list", items: input.map(fromJson) };
  }

  if (isPlainObject(input)) {
    const entries = new Map<string, Value>();
    for (const [key, child] of Object.entries(input)) {
      entries.set(key, fromJson(child));
    }
    return { kind: "map", entries };
  }

  return NULL;
}

/**
 * Convert back to a plain JSON value, keeping map key order
 */
export function toJson(value: Value): unknown {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
    case "number":
    case "string":
      return value.value;
    case "list":
      return value.items.map(toJson);
    case "map": {
      const out: Record<string, unknown> = {};
      for (const [key, child] of value.entries) {
        out[key] = toJson(child);
      }
      return out;
    }
  }
}

/**
 * String form used for regex matching, list membership and string ordering
 */
export function toText(value: Value): string {
  switch (value.kind) {
    case "null":
      return "";
    case "bool":
      return value.value ? "true" : "false";
    case "number":
      return String(value.value);
    case "string":
      return value.value;
    case "list":
    case "map":
      return JSON.stringify(toJson(value));
  }
}

export function asNumber(value: Value): number | undefined {
  return value.kind === "number" ? value.value : undefined;
}

const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Number kind, or a string holding a plain decimal literal
 */
export function decodeNumber(value: Value): number | undefined {
  if (value.kind === "number") return value.value;
  if (value.kind === "string") {
    const trimmed = value.value.trim();
    if (DECIMAL_LITERAL.test(trimmed)) {
      const parsed = Number(trimmed);
      return Number.isFinite(parsed) ? parsed : undefined;
    }
  }
  return undefined;
}

export function isNull(value: Value): boolean {
  return value.kind === "null";
}

/**
 * Plain object for a row, fields in insertion order
 */
export function rowToJson(row: Map<string, Value>, keys?: readonly string[]): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const key of keys ?? row.keys()) {
    out[key] = toJson(row.get(key) ?? NULL);
  }
  return out;
}

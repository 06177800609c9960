/**
 * Attribute listings for --schema
 *
 * Each record type has a declared table of the attribute names the --attrs
 * flag can address. For state files the declared table is extended with the
 * attribute paths found in the document itself.
 */

import * as fs from "node:fs";
import type { FieldSchema, FieldType } from "../../types/index.js";
import { ConfigError } from "../../errors.js";

export type RecordFieldTable = Record<string, string[]>;

const RECORD_FIELDS_URL = new URL("../../../schemas/record-fields.json", import.meta.url);

// Nested maps are reported this many levels below the top
const MAX_DEPTH = 1;

const SAMPLE_SIZE = 1000;

export const SCHEMA_HINT =
  "Resource level attributes that are directly available to the --attrs flag.\n" +
  "For the complete document, including relationships, use --output=raw.";

let cachedTable: RecordFieldTable | undefined;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Read and validate the declared field table
 */
export function loadRecordFields(url: URL = RECORD_FIELDS_URL): RecordFieldTable {
  if (url === RECORD_FIELDS_URL && cachedTable) {
    return cachedTable;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(url, "utf-8"));
  } catch (err) {
    throw new ConfigError(url.pathname, { cause: err });
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(url.pathname, { cause: new Error("expected an object of field lists") });
  }

  const table: RecordFieldTable = {};
  for (const [recordType, fields] of Object.entries(parsed)) {
    if (!isStringArray(fields)) {
      throw new ConfigError(url.pathname, { cause: new Error(`fields of ${recordType} must be strings`) });
    }
    table[recordType] = fields;
  }

  if (url === RECORD_FIELDS_URL) {
    cachedTable = table;
  }
  return table;
}

/**
 * Declared attribute names of a record type, sorted
 */
export function recordFields(recordType: string, table: RecordFieldTable = loadRecordFields()): string[] {
  return [...(table[recordType] ?? [])].sort();
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:?\d{2})?)?$/;

function kindOf(value: unknown): FieldType {
  if (value === null || value === undefined) return "null";
  if (Array.isArray(value)) return "list";
  switch (typeof value) {
    case "string":
      return ISO_DATE.test(value) && !Number.isNaN(Date.parse(value)) ? "date" : "string";
    case "number":
      return "number";
    case "boolean":
      return "boolean";
    default:
      return "map";
  }
}

/**
 * Type of a path over all sampled values. Null never widens; any other
 * disagreement reads as string.
 */
function pathSchema(name: string, values: readonly unknown[], missing: number): FieldSchema {
  let type: FieldType = "null";
  let nullable = missing > 0;

  for (const value of values) {
    const kind = kindOf(value);
    if (kind === "null") {
      nullable = true;
    } else if (type === "null") {
      type = kind;
    } else if (type !== kind) {
      type = "string";
    }
  }

  return { name, type, nullable };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function collectPaths(
  record: Record<string, unknown>,
  prefix: string,
  depth: number,
  out: Map<string, unknown[]>
): void {
  for (const [key, value] of Object.entries(record)) {
    const path = prefix ? `${prefix}.${key}` : key;
    const values = out.get(path) ?? [];
    values.push(value);
    out.set(path, values);

    if (depth < MAX_DEPTH && isRecord(value)) {
      collectPaths(value, path, depth + 1, out);
    }
  }
}

/**
 * Infer every dotted field path of a set of records, sorted by name
 */
export function inferFields(records: readonly unknown[], sampleSize: number = SAMPLE_SIZE): FieldSchema[] {
  const sample = records.slice(0, sampleSize).filter(isRecord);
  if (sample.length === 0) {
    return [];
  }

  const paths = new Map<string, unknown[]>();
  for (const record of sample) {
    collectPaths(record, "", 0, paths);
  }

  const fields = [...paths].map(([name, values]) => pathSchema(name, values, sample.length - values.length));
  fields.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  return fields;
}

/**
 * The listing printed by --schema. Inferred paths carry their type, e.g.
 * `tags: map (nullable)`.
 */
export function formatSchema(names: readonly string[], inferred: readonly FieldSchema[] = []): string {
  const lines = new Map<string, string>();
  for (const name of names) {
    lines.set(name, name);
  }
  for (const field of inferred) {
    lines.set(field.name, `${field.name}: ${field.type}${field.nullable ? " (nullable)" : ""}`);
  }

  const sorted = [...lines.keys()].sort().map((name) => lines.get(name) ?? name);
  return `${sorted.join("\n")}\n\n${SCHEMA_HINT}\n`;
}

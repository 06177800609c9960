/**
 * Filter expressions
 *
 * A filter spec is a delimited list of clauses `[_]key[!]op value`:
 *
 *   name^prod       prefix match
 *   status!=errored negated equality
 *   count>2         numeric when the field holds a number
 *   _tag.env=prod   server side, already applied by the data source
 *
 * Rows pass when every local clause holds. A clause naming an unknown field
 * is reported and ignored; a known field with no value fails the row.
 */

import type { AttributeSpec, FilterClause, FilterOperand, Row, ServerSideHint, Value } from "../types/index.js";
import { logger, notice } from "../observability/logger.js";
import { drill, drillJson } from "./drill.js";
import { isHungarian } from "./hungarian.js";
import { toText } from "./value.js";

const CLAUSE = /^(_)?([^!=^~<>@/]*)(!?[=^~<>@/])?(.*)$/s;

export const DEFAULT_FILTER_DELIMITER = ",";

export interface ParseFilterOptions {
  /** Clause delimiter; falls back to TFQ_FILTER_DELIM, then "," */
  delimiter?: string;
}

function resolveDelimiter(delimiter: string | undefined): string {
  const candidate = delimiter ?? process.env.TFQ_FILTER_DELIM;
  return candidate ? candidate : DEFAULT_FILTER_DELIMITER;
}

function isOperand(value: string): value is FilterOperand {
  return value.length === 1 && "=~^<>@/".includes(value);
}

/**
 * Parse a filter spec into clauses. Entries without a key are logged and
 * dropped.
 */
export function parseFilters(spec: string | undefined, options: ParseFilterOptions = {}): FilterClause[] {
  const clauses: FilterClause[] = [];
  if (!spec) return clauses;

  for (const entry of spec.split(resolveDelimiter(options.delimiter))) {
    const trimmed = entry.trim();
    if (trimmed === "") continue;

    const parts = CLAUSE.exec(trimmed);
    if (!parts) {
      logger.error(`invalid filter: ${trimmed}`);
      continue;
    }

    const key = (parts[2] ?? "").trim();
    if (key === "") {
      logger.error(`invalid filter: empty key in ${trimmed}`);
      continue;
    }

    const rawOperand = parts[3] ?? "";
    const negate = rawOperand.startsWith("!");
    const operand = negate ? rawOperand.slice(1) : rawOperand;

    clauses.push({
      key,
      serverSide: parts[1] === "_",
      negate,
      operand: isOperand(operand) ? operand : "",
      value: parts[4] ?? "",
    });
  }

  return clauses;
}

/**
 * Namespaced server-side clauses (`_tag.env=prod`) as structured hints for
 * the component that queries the data source.
 */
export function serverSideHints(clauses: readonly FilterClause[]): ServerSideHint[] {
  const hints: ServerSideHint[] = [];
  for (const clause of clauses) {
    if (!clause.serverSide) continue;
    const dot = clause.key.indexOf(".");
    if (dot <= 0 || dot === clause.key.length - 1) continue;
    hints.push({
      namespace: clause.key.slice(0, dot),
      name: clause.key.slice(dot + 1),
      value: clause.value,
      negate: clause.negate,
    });
  }
  return hints;
}

const regexCache = new Map<string, RegExp | null>();

function compileRegex(source: string): RegExp | null {
  if (regexCache.has(source)) {
    return regexCache.get(source) ?? null;
  }
  let compiled: RegExp | null;
  try {
    compiled = new RegExp(source);
  } catch {
    compiled = null;
  }
  regexCache.set(source, compiled);
  return compiled;
}

const NUMERIC_TARGET = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * String semantics. Returns undefined when the clause cannot be evaluated.
 */
function checkString(value: string, clause: FilterClause): boolean | undefined {
  const target = clause.value;

  switch (clause.operand) {
    case "=":
      return value === target;
    case "~":
      return value.toLowerCase() === target.toLowerCase();
    case "^":
      return value.startsWith(target);
    case ">":
      return value > target;
    case "<":
      return value < target;
    case "@":
      return value.includes(target);
    case "/": {
      const regex = compileRegex(target);
      if (!regex) {
        logger.error(`invalid regex: ${target}`);
        return undefined;
      }
      return regex.test(value);
    }
    case "":
      logger.error(`unsupported filtering operand in: ${clause.key}`);
      return undefined;
  }
}

function checkNumber(value: number, clause: FilterClause): boolean | undefined {
  if (clause.operand !== "=" && clause.operand !== "<" && clause.operand !== ">") {
    return checkString(String(value), clause);
  }

  const trimmed = clause.value.trim();
  if (!NUMERIC_TARGET.test(trimmed)) {
    logger.error(`invalid numeric value: ${clause.value}`);
    return undefined;
  }
  const target = Number(trimmed);

  switch (clause.operand) {
    case "=":
      return value === target;
    case ">":
      return value > target;
    case "<":
      return value < target;
  }
}

function checkContains(value: Value, clause: FilterClause): boolean | undefined {
  switch (value.kind) {
    case "list":
      return value.items.some((item) => toText(item) === clause.value);
    case "map":
      return value.entries.has(clause.value);
    default:
      return checkString(toText(value), clause);
  }
}

/**
 * Evaluate one clause against a resolved, non-null value. Clauses that
 * cannot be evaluated fail regardless of negation.
 */
export function evaluateClause(value: Value, clause: FilterClause): boolean {
  let result: boolean | undefined = undefined;

  switch (value.kind) {
    case "string":
      result = checkString(value.value, clause);
      break;
    case "bool":
      result = checkString(value.value ? "true" : "false", clause);
      break;
    case "number":
      result = checkNumber(value.value, clause);
      break;
    case "list":
    case "map":
      result = clause.operand === "@" ? checkContains(value, clause) : checkString(toText(value), clause);
      break;
    case "null":
      return false;
  }

  if (result === undefined) {
    return false;
  }
  return result !== clause.negate;
}

function checkHungarian(candidate: unknown, clause: FilterClause): boolean {
  const type = drillJson(candidate, "type");
  const name = drillJson(candidate, "name");
  if (typeof type !== "string" || typeof name !== "string") {
    return false;
  }

  const wantHungarian = clause.value === "" || clause.value === "true";
  const result = isHungarian(type, name) === wantHungarian;
  return result !== clause.negate;
}

function reportUnknownKey(key: string): void {
  const message = `filter key not found: ${key}`;
  logger.error(message);
  notice(message);
}

/**
 * Drop local clauses naming no attribute, reporting each one once
 */
function resolveClauses(specs: readonly AttributeSpec[], clauses: readonly FilterClause[]): FilterClause[] {
  return clauses.filter((clause) => {
    if (clause.serverSide || clause.key === "hungarian") return true;
    if (specs.some((s) => s.outputKey === clause.key)) return true;
    reportUnknownKey(clause.key);
    return false;
  });
}

/**
 * True when the candidate satisfies every local clause
 */
export function matchesClauses(
  candidate: unknown,
  specs: readonly AttributeSpec[],
  clauses: readonly FilterClause[]
): boolean {
  for (const clause of clauses) {
    if (clause.serverSide) continue;

    if (clause.key === "hungarian") {
      if (!checkHungarian(candidate, clause)) return false;
      continue;
    }

    const spec = specs.find((s) => s.outputKey === clause.key);
    if (!spec) {
      reportUnknownKey(clause.key);
      continue;
    }

    const value = drill(candidate, spec.sourceKey);
    if (value.kind === "null") {
      return false;
    }

    if (!evaluateClause(value, clause)) {
      return false;
    }
  }

  return true;
}

/**
 * Build a row holding every spec's value, keyed by output key
 */
export function extractRow(candidate: unknown, specs: readonly AttributeSpec[]): Row {
  const row: Row = new Map();
  for (const spec of specs) {
    row.set(spec.outputKey, drill(candidate, spec.sourceKey));
  }
  return row;
}

/**
 * Filter candidates and extract the survivors into rows
 */
export function filterDataset(
  candidates: readonly unknown[],
  specs: readonly AttributeSpec[],
  spec: string | FilterClause[] | undefined,
  options: ParseFilterOptions = {}
): Row[] {
  const clauses = resolveClauses(specs, Array.isArray(spec) ? spec : parseFilters(spec, options));
  const rows: Row[] = [];

  for (const candidate of candidates) {
    if (matchesClauses(candidate, specs, clauses)) {
      rows.push(extractRow(candidate, specs));
    }
  }

  return rows;
}

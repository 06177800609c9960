/**
 * Multi-key row sorting
 *
 * `count,-name` sorts by count, then by name descending. A `!` prefix makes
 * the string comparison case sensitive.
 */

import type { Row, SortKey, Value } from "../types/index.js";
import { NULL, decodeNumber, toText } from "./value.js";

export function parseSortSpec(spec: string | undefined): SortKey[] {
  const keys: SortKey[] = [];
  if (!spec) return keys;

  for (const entry of spec.split(",")) {
    let field = entry.trim();
    let descending = false;
    let caseSensitive = false;

    while (field.startsWith("-") || field.startsWith("!")) {
      if (field.startsWith("-")) descending = true;
      else caseSensitive = true;
      field = field.slice(1);
    }

    field = field.trim();
    if (field === "") continue;

    keys.push({ field, descending, caseSensitive });
  }

  return keys;
}

export function compareValues(a: Value, b: Value, caseSensitive: boolean): number {
  const left = decodeNumber(a);
  const right = decodeNumber(b);
  if (left !== undefined && right !== undefined) {
    return left < right ? -1 : left > right ? 1 : 0;
  }

  let leftText = toText(a);
  let rightText = toText(b);
  if (!caseSensitive) {
    leftText = leftText.toLowerCase();
    rightText = rightText.toLowerCase();
  }
  return leftText < rightText ? -1 : leftText > rightText ? 1 : 0;
}

export function compareRows(a: Row, b: Row, keys: readonly SortKey[]): number {
  for (const key of keys) {
    const result = compareValues(a.get(key.field) ?? NULL, b.get(key.field) ?? NULL, key.caseSensitive);
    if (result !== 0) {
      return key.descending ? -result : result;
    }
  }
  return 0;
}

/**
 * Stable sort into a new array. An empty spec keeps the input order.
 */
export function sortDataset(rows: readonly Row[], spec: string | readonly SortKey[] | undefined): Row[] {
  const keys = typeof spec === "string" || spec === undefined ? parseSortSpec(spec) : spec;
  if (keys.length === 0) {
    return [...rows];
  }
  return [...rows].sort((a, b) => compareRows(a, b, keys));
}

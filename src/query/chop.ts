/**
 * Common-prefix elision for long dotted identifiers
 */

import type { Dataset, PostProcessHook } from "../types/index.js";
import { str } from "./value.js";

const MIN_COMMON_SEGMENTS = 2;

/**
 * Leading dot-separated segments shared by at least half of the values
 */
export function commonSegments(values: readonly string[]): string[] {
  if (values.length === 0) return [];

  const threshold = Math.ceil(values.length / 2);
  const split = values.map((value) => value.split("."));
  const longest = Math.max(...split.map((segments) => segments.length));

  const common: string[] = [];
  for (let position = 0; position < longest; position++) {
    const counts = new Map<string, number>();
    for (const segments of split) {
      if (position < segments.length) {
        const segment = segments[position];
        counts.set(segment, (counts.get(segment) ?? 0) + 1);
      }
    }

    let best = "";
    let bestCount = 0;
    for (const [segment, count] of counts) {
      if (count > bestCount) {
        best = segment;
        bestCount = count;
      }
    }

    if (bestCount < threshold) break;
    common.push(best);
  }

  return common;
}

/**
 * Replace the prefix most values of `field` share with "..". Rows are
 * updated in place; non-string values are left alone.
 */
export function chopPrefix(rows: Dataset, field: string): void {
  const values: string[] = [];
  for (const row of rows) {
    const value = row.get(field);
    if (value?.kind === "string") {
      values.push(value.value);
    }
  }

  const common = commonSegments(values);
  if (common.length < MIN_COMMON_SEGMENTS) return;

  const prefix = common.join(".") + ".";
  for (const row of rows) {
    const value = row.get(field);
    if (value?.kind === "string" && value.value.startsWith(prefix)) {
      row.set(field, str(".." + value.value.slice(prefix.length)));
    }
  }
}

export function chopHook(field: string): PostProcessHook {
  return (rows) => chopPrefix(rows, field);
}

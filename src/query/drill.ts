/**
 * Path resolution into parsed documents
 *
 * Paths are dot separated; any segment may carry `[N]` indices, e.g.
 * `resources[0].instances[1].attributes.id`. An array reached without an
 * index is unwrapped when it has one element and projected over otherwise.
 */

import type { Value } from "../types/index.js";
import { NULL, fromJson } from "./value.js";

type Step = { key: string } | { index: number };

const SEGMENT = /^([^[\]]*)((?:\[\d+\])*)$/;
const INDEX = /\[(\d+)\]/g;

const stepCache = new Map<string, Step[]>();

export function parsePath(path: string): Step[] {
  const cached = stepCache.get(path);
  if (cached) return cached;

  const steps: Step[] = [];
  for (const segment of path.split(".")) {
    if (segment === "") continue;

    const match = SEGMENT.exec(segment);
    if (!match) {
      steps.push({ key: segment });
      continue;
    }

    const [, key, indices] = match;
    if (key) steps.push({ key });
    for (const index of indices.matchAll(INDEX)) {
      steps.push({ index: Number(index[1]) });
    }
  }

  stepCache.set(path, steps);
  return steps;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function walk(node: unknown, steps: Step[], at: number): unknown {
  if (at === steps.length) {
    const last = steps[at - 1];
    if (Array.isArray(node) && node.length === 1 && last !== undefined && "key" in last) {
      return node[0];
    }
    return node;
  }

  const step = steps[at];

  if ("index" in step) {
    if (Array.isArray(node) && step.index < node.length) {
      return walk(node[step.index], steps, at + 1);
    }
    return undefined;
  }

  if (Array.isArray(node)) {
    if (node.length === 1) {
      return walk(node[0], steps, at);
    }
    const collected = node
      .map((element) => walk(element, steps, at))
      .filter((element) => element !== undefined && element !== null);
    return collected.length > 0 ? collected : undefined;
  }

  if (isRecord(node) && Object.hasOwn(node, step.key)) {
    return walk(node[step.key], steps, at + 1);
  }

  return undefined;
}

/**
 * Resolve a path against a parsed JSON node, returning plain JSON
 */
export function drillJson(node: unknown, path: string): unknown {
  if (path === "" || path === "*") return undefined;
  const steps = parsePath(path);
  if (steps.length === 0) return undefined;
  return walk(node, steps, 0);
}

/**
 * Resolve a path against a parsed JSON node
 */
export function drill(node: unknown, path: string): Value {
  const found = drillJson(node, path);
  return found === undefined ? NULL : fromJson(found);
}

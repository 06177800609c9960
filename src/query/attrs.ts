/**
 * Attribute specs
 *
 * An attribute spec selects, renames and formats the fields of each result
 * row. Entries are comma separated, each `key[:outputKey[:transform]]`:
 *
 *   name               attributes.name as "name"
 *   .id                root-level id
 *   !.mode             resolve mode for filtering/sorting but don't show it
 *   created-at:date:t  rename and convert the timestamp to local time
 *   *::u               upper-case every field
 *
 * Re-specifying a key that is already present updates that entry in place,
 * which is how user specs override a command's defaults.
 */

import type { AttributeSpec } from "../types/index.js";
import { logger } from "../observability/logger.js";

export const WILDCARD = "*";

const ATTRIBUTES_NAMESPACE = "attributes.";

function lastSegment(key: string): string {
  const segments = key.split(".");
  return segments[segments.length - 1] ?? key;
}

/**
 * Resolve a user key against the document: `.x` is root relative, anything
 * else lives under `attributes`.
 */
export function qualifyKey(key: string): string {
  if (key === WILDCARD) return key;
  if (key.startsWith(".")) return key.slice(1);
  return ATTRIBUTES_NAMESPACE + key;
}

interface ParsedEntry {
  key: string;
  outputKey: string;
  include: boolean;
  transformChain: string;
}

function parseEntry(entry: string): ParsedEntry | null {
  const fields = entry.split(":");

  let key = (fields[0] ?? "").trim();
  let include = true;
  if (key.startsWith("!")) {
    include = false;
    key = key.slice(1).trim();
  }

  if (key === "") {
    logger.error(`invalid attribute: ${entry}`);
    return null;
  }

  if (key === WILDCARD) {
    include = false;
  }

  const outputField = fields.length > 1 ? (fields[1] ?? "").trim() : "";

  return {
    key,
    outputKey: outputField !== "" ? outputField : lastSegment(key),
    include,
    transformChain: fields.length > 2 ? (fields[2] ?? "").trim() : "",
  };
}

/**
 * Owns an attribute list while it is being compiled. Entries are indexed by
 * source key and output key so upserts don't rescan the list.
 */
export class AttributeListBuilder {
  private entries: AttributeSpec[] = [];
  private bySource = new Map<string, number>();
  private byOutput = new Map<string, number[]>();

  constructor(seed: readonly AttributeSpec[] = []) {
    for (const spec of seed) {
      this.append({ ...spec });
    }
  }

  private append(spec: AttributeSpec): void {
    const index = this.entries.length;
    this.entries.push(spec);
    if (!this.bySource.has(spec.sourceKey)) {
      this.bySource.set(spec.sourceKey, index);
    }
    this.indexOutput(spec.outputKey, index);
  }

  private indexOutput(outputKey: string, index: number): void {
    const positions = this.byOutput.get(outputKey) ?? [];
    positions.push(index);
    positions.sort((a, b) => a - b);
    this.byOutput.set(outputKey, positions);
  }

  private unindexOutput(outputKey: string, index: number): void {
    const positions = this.byOutput.get(outputKey);
    if (!positions) return;
    const remaining = positions.filter((p) => p !== index);
    if (remaining.length > 0) {
      this.byOutput.set(outputKey, remaining);
    } else {
      this.byOutput.delete(outputKey);
    }
  }

  /**
   * Earliest entry whose source key is `key` (raw or qualified) or whose
   * output key is `key`
   */
  private find(key: string): number | undefined {
    const candidates = [
      this.bySource.get(key),
      this.bySource.get(qualifyKey(key)),
      this.byOutput.get(key)?.[0],
    ].filter((index): index is number => index !== undefined);

    return candidates.length > 0 ? Math.min(...candidates) : undefined;
  }

  /**
   * Add every entry of a comma separated spec
   */
  add(spec: string): this {
    if (spec.trim() === "" || spec.trim() === WILDCARD) {
      return this;
    }

    for (const raw of spec.split(",")) {
      if (raw.trim() === "") continue;

      const entry = parseEntry(raw);
      if (!entry) continue;

      const existing = this.find(entry.key);
      if (existing !== undefined) {
        const target = this.entries[existing];
        if (target.outputKey !== entry.outputKey) {
          this.unindexOutput(target.outputKey, existing);
          this.indexOutput(entry.outputKey, existing);
        }
        target.include = entry.include;
        target.outputKey = entry.outputKey;
        target.transformChain = entry.transformChain;
        continue;
      }

      this.append({
        sourceKey: qualifyKey(entry.key),
        outputKey: entry.outputKey,
        include: entry.include,
        transformChain: entry.transformChain,
      });
    }

    return this;
  }

  build(): AttributeSpec[] {
    return this.entries.map((spec) => ({ ...spec }));
  }
}

/**
 * Compile a spec on top of an optional default list
 */
export function compileAttributes(spec: string, defaults: readonly AttributeSpec[] = []): AttributeSpec[] {
  return new AttributeListBuilder(defaults).add(spec).build();
}

/**
 * Prepend the wildcard's chain to every entry's chain. The global settings
 * come first so a field's own case or length token overrides them.
 */
export function mergeGlobal(specs: readonly AttributeSpec[]): AttributeSpec[] {
  const global = specs.find((spec) => spec.sourceKey === WILDCARD)?.transformChain ?? "";
  if (global === "") {
    return specs.map((spec) => ({ ...spec }));
  }

  return specs.map((spec) => ({
    ...spec,
    transformChain: `${global},${spec.transformChain}`,
  }));
}

/**
 * Command defaults, then the user's spec, then the global transform
 */
export function buildAttributes(defaults: readonly string[], extra?: string): AttributeSpec[] {
  const builder = new AttributeListBuilder();
  for (const spec of defaults) {
    builder.add(spec);
  }
  if (extra) {
    builder.add(extra);
  }
  return mergeGlobal(builder.build());
}

/**
 * Render specs back into `key:outputKey:transform` form
 */
export function formatAttributes(specs: readonly AttributeSpec[]): string {
  return specs.map((spec) => `${spec.sourceKey}:${spec.outputKey}:${spec.transformChain}`).join(",");
}

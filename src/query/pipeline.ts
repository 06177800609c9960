/**
 * Query pipeline
 *
 * raw document → flatten → select root → filter/extract → transform →
 * post-process → sort → render
 */

import type {
  AttributeSpec,
  Dataset,
  FilterClause,
  OutputSink,
  QueryOptions,
  Row,
  SelectionOptions,
} from "../types/index.js";
import { DocumentParseError } from "../errors.js";
import { logger } from "../observability/logger.js";
import { drillJson } from "./drill.js";
import { filterDataset, parseFilters } from "./filters.js";
import { flattenResources } from "./flatten.js";
import { renderRows } from "./render.js";
import { sortDataset } from "./sort.js";
import { TransformChain } from "./transform.js";
import type { TransformContext } from "./transform.js";

const BOM = "\uFEFF";

export const CONCRETE_CLAUSE: FilterClause = {
  key: "mode",
  serverSide: false,
  negate: false,
  operand: "=",
  value: "managed",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a raw buffer as JSON. A leading byte order mark is ignored.
 */
export function parseDocument(raw: Buffer | string): unknown {
  let text = typeof raw === "string" ? raw : raw.toString("utf8");
  if (text.startsWith(BOM)) {
    text = text.slice(BOM.length);
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new DocumentParseError(err instanceof Error ? err.message : String(err), { cause: err });
  }
}

/**
 * Candidate records of a parsed document. State documents are flattened to
 * one record per resource instance.
 */
export function selectCandidates(
  document: unknown,
  options: Pick<SelectionOptions, "root" | "short"> = {}
): unknown[] {
  let source = document;

  if (isRecord(source) && Array.isArray(source.resources)) {
    source = { ...source, resources: flattenResources(source.resources, { short: options.short }) };
  }

  const root = options.root ? drillJson(source, options.root) : source;

  if (Array.isArray(root)) {
    return root;
  }
  if (isRecord(root)) {
    return [root];
  }
  return [];
}

/**
 * Apply each spec's transform chain to the row values in place
 */
export function transformRows(
  rows: Dataset,
  specs: readonly AttributeSpec[],
  options: Pick<SelectionOptions, "local">,
  context: TransformContext
): void {
  const chains = specs
    .map((spec) => ({
      key: spec.outputKey,
      chain: new TransformChain(options.local ? `${spec.transformChain},t` : spec.transformChain),
    }))
    .filter(({ chain }) => !chain.isEmpty);

  if (chains.length === 0) return;

  for (const row of rows) {
    for (const { key, chain } of chains) {
      const value = row.get(key);
      if (value !== undefined) {
        row.set(key, chain.apply(value, context));
      }
    }
  }
}

/**
 * Extract, transform and sort rows without rendering them
 */
export function queryRows(document: unknown, specs: readonly AttributeSpec[], options: SelectionOptions): Row[] {
  const candidates = selectCandidates(document, options);

  const clauses = parseFilters(options.filter, { delimiter: options.filterDelimiter });
  if (options.concrete) {
    clauses.push(CONCRETE_CLAUSE);
  }

  let rows = filterDataset(candidates, specs, clauses);
  logger.debug(`${rows.length} of ${candidates.length} records matched`);

  transformRows(rows, specs, options, { timezone: options.timezone });

  if (options.postProcess) {
    const replaced = options.postProcess(rows);
    if (replaced) {
      rows = replaced;
    }
  }

  return sortDataset(rows, options.sort);
}

/**
 * Run one query over a raw document and write the rendered result to the sink
 */
export function runQuery(
  raw: Buffer | string,
  specs: readonly AttributeSpec[],
  options: QueryOptions,
  sink: OutputSink
): void {
  if (options.output === "raw") {
    sink.write(raw);
    return;
  }

  const document = parseDocument(raw);
  const rows = queryRows(document, specs, options);
  renderRows(rows, specs, options, sink);
}

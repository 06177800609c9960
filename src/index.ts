/**
 * tfq - Query infrastructure metadata documents
 *
 * This module exports the query pipeline and its building blocks.
 * The CLI wraps the same pipeline with document loading and configuration.
 */

// Core types
export type {
  Value,
  ValueKind,
  Row,
  Dataset,
  FilterOperand,
  FilterClause,
  ServerSideHint,
  AttributeSpec,
  SortKey,
  OutputMode,
  TableColors,
  RenderOptions,
  SelectionOptions,
  QueryOptions,
  PostProcessHook,
  OutputSink,
  DocumentFormat,
  LoadedDocument,
  FieldType,
  FieldSchema,
} from "./types/index.js";

// Errors
export { TfqError, DocumentParseError, DocumentReadError, RenderError, ConfigError } from "./errors.js";

// Pipeline
export { runQuery, queryRows, parseDocument, selectCandidates, transformRows } from "./query/pipeline.js";
export { flattenResources, resourceAddress, type FlattenOptions } from "./query/flatten.js";
export { parseFilters, filterDataset, matchesClauses, evaluateClause, serverSideHints } from "./query/filters.js";
export { isHungarian } from "./query/hungarian.js";
export { compileAttributes, mergeGlobal, buildAttributes, formatAttributes, AttributeListBuilder } from "./query/attrs.js";
export { TransformChain, transformValue, tokenizeChain, resolveCase, resolveLength } from "./query/transform.js";
export { parseSortSpec, sortDataset, compareValues } from "./query/sort.js";
export { renderRows, renderTable, renderJson, renderYaml, cellText, DEFAULT_COLORS } from "./query/render.js";
export { chopPrefix, chopHook } from "./query/chop.js";
export { drill } from "./query/drill.js";
export { fromJson, toJson, toText } from "./query/value.js";

// Logging
export { logger, Logger, type LogLevel } from "./observability/logger.js";

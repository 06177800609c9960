/**
 * Core type definitions for tfq
 */

// Value model
export type Value =
  | { kind: "null" }
  | { kind: "bool"; value: boolean }
  | { kind: "number"; value: number }
  | { kind: "string"; value: string }
  | { kind: "list"; items: Value[] }
  | { kind: "map"; entries: Map<string, Value> };

export type ValueKind = Value["kind"];

/** One extracted result row, keyed by output key in attribute order. */
export type Row = Map<string, Value>;

export type Dataset = Row[];

// Filter types
export type FilterOperand = "=" | "~" | "^" | "<" | ">" | "@" | "/";

export interface FilterClause {
  readonly key: string;
  /** Already applied by the data source; never evaluated locally. */
  readonly serverSide: boolean;
  readonly negate: boolean;
  /** Empty when the clause names a key without an operand. */
  readonly operand: FilterOperand | "";
  readonly value: string;
}

export interface ServerSideHint {
  namespace: string;
  name: string;
  value: string;
  negate: boolean;
}

// Attribute types
export interface AttributeSpec {
  sourceKey: string;
  outputKey: string;
  include: boolean;
  transformChain: string;
}

// Sort types
export interface SortKey {
  field: string;
  descending: boolean;
  caseSensitive: boolean;
}

// Render types
export type OutputMode = "text" | "json" | "yaml" | "raw";

export interface TableColors {
  title: string;
  even: string;
  odd: string;
}

export interface RenderOptions {
  output: OutputMode;
  /** Show the title row in text output */
  titles: boolean;
  /** Colour text output; null disables colouring */
  colors: TableColors | null;
  /** Extra left padding for every column after the first */
  padding: number;
}

// Pipeline types
export type PostProcessHook = (rows: Dataset) => Dataset | void;

export interface SelectionOptions {
  /** Dot path of the dataset root inside the document */
  root?: string;
  filter?: string;
  filterDelimiter?: string;
  sort?: string;
  /** Restrict flattened state rows to managed resources */
  concrete?: boolean;
  /** Collapse nested module paths in resource identifiers */
  short?: boolean;
  /** Convert timestamps of every field to the configured zone */
  local?: boolean;
  timezone?: string;
  postProcess?: PostProcessHook;
}

export interface QueryOptions extends RenderOptions, SelectionOptions {}

export interface OutputSink {
  write(chunk: string | Uint8Array): unknown;
}

// Document types
export type DocumentFormat = "json" | "ndjson" | "csv";

export interface LoadedDocument {
  /** Bytes exactly as read, for raw output */
  raw: Buffer;
  /** JSON text handed to the pipeline; ndjson and csv are converted to an array */
  text: string;
  format: DocumentFormat;
}

// Schema types
export type FieldType = "string" | "number" | "boolean" | "date" | "null" | "list" | "map";

export interface FieldSchema {
  name: string;
  type: FieldType;
  nullable: boolean;
}

// CLI options
export interface QueryCommandOptions {
  attrs?: string;
  filter?: string;
  sort?: string;
  output?: string;
  color?: boolean;
  titles?: boolean;
  local?: boolean;
  schema?: boolean;
  format?: DocumentFormat;
  chop?: boolean;
  concrete?: boolean;
  short?: boolean;
}

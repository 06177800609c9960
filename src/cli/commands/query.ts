/**
 * Query commands - one per record type, sharing flags and the query action
 */

import * as fs from "node:fs";
import type { Readable } from "node:stream";
import { Command, Option } from "commander";
import type {
  FieldSchema,
  OutputMode,
  OutputSink,
  QueryCommandOptions,
  QueryOptions,
  TableColors,
} from "../../types/index.js";
import { buildAttributes } from "../../query/attrs.js";
import { chopHook } from "../../query/chop.js";
import { flattenResources } from "../../query/flatten.js";
import { parseDocument, runQuery } from "../../query/pipeline.js";
import { DEFAULT_COLORS } from "../../query/render.js";
import { logger } from "../../observability/logger.js";
import { DocumentReadError } from "../../errors.js";
import { CliError } from "../utils/errors.js";
import type { Config } from "../utils/config.js";
import { STDIN, loadDocument } from "../utils/parsers.js";
import { formatSchema, inferFields, recordFields } from "../utils/schema.js";

export const OUTPUT_MODES: readonly OutputMode[] = ["text", "json", "yaml", "raw"];

export interface QueryCommandSpec {
  name: string;
  description: string;
  /** Key into the declared field table */
  recordType: string;
  defaultAttrs: string[];
  /** Dataset root inside the document */
  root: string;
  /** Source read when no file argument is given */
  defaultSource: string;
  /** State documents get --chop, --concrete and --short */
  state?: boolean;
}

export const QUERY_COMMANDS: readonly QueryCommandSpec[] = [
  {
    name: "sq",
    description: "Query resources of a state file",
    recordType: "state",
    defaultAttrs: ["!.mode", "!.type", ".resource", "id", "name"],
    root: "resources",
    defaultSource: "terraform.tfstate",
    state: true,
  },
  {
    name: "oq",
    description: "Query organizations",
    recordType: "organizations",
    defaultAttrs: ["external-id:id", ".id:name"],
    root: "data",
    defaultSource: STDIN,
  },
  {
    name: "wq",
    description: "Query workspaces",
    recordType: "workspaces",
    defaultAttrs: [".id", "name"],
    root: "data",
    defaultSource: STDIN,
  },
  {
    name: "pq",
    description: "Query projects",
    recordType: "projects",
    defaultAttrs: [".id", "name"],
    root: "data",
    defaultSource: STDIN,
  },
  {
    name: "mq",
    description: "Query registry modules",
    recordType: "modules",
    defaultAttrs: [".id", "name"],
    root: "data",
    defaultSource: STDIN,
  },
  {
    name: "rq",
    description: "Query runs",
    recordType: "runs",
    defaultAttrs: [".id", "created-at", "status"],
    root: "data",
    defaultSource: STDIN,
  },
  {
    name: "svq",
    description: "Query state versions",
    recordType: "state-versions",
    defaultAttrs: [".id", "serial", "created-at"],
    root: "data",
    defaultSource: STDIN,
  },
];

export interface QueryIo {
  stdout: OutputSink;
  config: Config;
  env?: NodeJS.ProcessEnv;
  stdin?: Readable;
}

function isOutputMode(value: string): value is OutputMode {
  return OUTPUT_MODES.some((mode) => mode === value);
}

export function parseOutputMode(value: string): OutputMode {
  if (isOutputMode(value)) {
    return value;
  }
  throw new CliError(`Invalid output mode: ${value}. Use ${OUTPUT_MODES.join(", ")}`);
}

function resolveColors(config: Config, namespace: string): TableColors {
  return {
    title: config.getString("colors.title", namespace) ?? DEFAULT_COLORS.title,
    even: config.getString("colors.even", namespace) ?? DEFAULT_COLORS.even,
    odd: config.getString("colors.odd", namespace) ?? DEFAULT_COLORS.odd,
  };
}

/**
 * Merge flags over config values for one command
 */
export function resolveQueryOptions(
  spec: QueryCommandSpec,
  options: QueryCommandOptions,
  config: Config,
  env: NodeJS.ProcessEnv = process.env
): QueryOptions {
  const ns = spec.name;

  const output = parseOutputMode(options.output ?? config.getString("output", ns) ?? "text");
  const color = options.color ?? config.getBoolean("color", ns) ?? false;
  const chop = spec.state ? (options.chop ?? config.getBoolean("chop", ns) ?? false) : false;

  const resolved: QueryOptions = {
    output,
    titles: options.titles ?? config.getBoolean("titles", ns) ?? false,
    colors: color ? resolveColors(config, ns) : null,
    padding: Math.max(0, config.getNumber("padding", ns) ?? 0),
    root: spec.root,
    filter: options.filter,
    sort: options.sort ?? config.getString("sort", ns),
    local: options.local ?? false,
    timezone: config.getString("timezone", ns) ?? (env.TZ || undefined),
  };

  if (spec.state) {
    resolved.concrete = options.concrete ?? config.getBoolean("concrete", ns) ?? false;
    resolved.short = options.short ?? config.getBoolean("short", ns) ?? false;
    if (chop) {
      resolved.postProcess = chopHook("resource");
    }
  }

  return resolved;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Attribute paths present under `attributes` of the instances in a state file
 */
async function stateAttributeFields(source: string, io: QueryIo): Promise<FieldSchema[]> {
  if (source !== STDIN && !fs.existsSync(source)) {
    logger.debug(`no state file at ${source}; listing declared fields only`);
    return [];
  }

  const document = parseDocument((await loadDocument(source, { stdin: io.stdin })).text);
  if (!isRecord(document) || !Array.isArray(document.resources)) {
    return [];
  }

  const attributes = flattenResources(document.resources)
    .map((row) => row.attributes)
    .filter(isRecord);
  return inferFields(attributes);
}

/**
 * Print the attribute names a record type exposes, with inferred types for
 * state attributes
 */
export async function printSchema(spec: QueryCommandSpec, source: string, io: QueryIo): Promise<void> {
  const inferred = spec.state ? await stateAttributeFields(source, io) : [];
  io.stdout.write(formatSchema(recordFields(spec.recordType), inferred));
}

/**
 * Shared action of every query command
 */
export async function runQueryCommand(
  spec: QueryCommandSpec,
  source: string | undefined,
  options: QueryCommandOptions,
  io: QueryIo
): Promise<void> {
  const input = source ?? spec.defaultSource;

  if (options.schema) {
    await printSchema(spec, input, io);
    return;
  }

  const queryOptions = resolveQueryOptions(spec, options, io.config, io.env);
  const specs = buildAttributes(spec.defaultAttrs, options.attrs);
  logger.debug(`${spec.name} attrs: ${specs.map((s) => s.sourceKey).join(",")}`);

  const document = await loadDocument(input, { format: options.format, stdin: io.stdin }).catch((err: unknown) => {
    if (err instanceof DocumentReadError && source === undefined && input !== STDIN) {
      throw new CliError(`${err.message} (pass a file path or - for stdin)`, { exitCode: 2, cause: err });
    }
    throw err;
  });

  runQuery(queryOptions.output === "raw" ? document.raw : document.text, specs, queryOptions, io.stdout);
}

/**
 * Build the commander command for one record type
 */
export function createQueryCommand(spec: QueryCommandSpec, io: () => QueryIo): Command {
  const command = new Command(spec.name)
    .description(spec.description)
    .argument("[file]", `document to query, - for stdin (default: ${spec.defaultSource === STDIN ? "stdin" : spec.defaultSource})`)
    .option("-a, --attrs <spec>", "attributes to show, e.g. .id,name:label:u")
    .option("-f, --filter <spec>", "filter rows, e.g. name^prod,status!=errored")
    .option("-s, --sort <spec>", "sort rows, e.g. -created-at,!name")
    .addOption(new Option("-o, --output <mode>", "output format").choices(OUTPUT_MODES))
    .addOption(new Option("--format <format>", "input format").choices(["json", "ndjson", "csv"]))
    .option("-c, --color", "enable colored text output")
    .option("--no-color", "disable colored text output")
    .option("-t, --titles", "show titles with text output")
    .option("--no-titles", "hide titles with text output")
    .option("--local", "convert timestamps to the local time zone")
    .option("--schema", "list the attributes available to --attrs");

  if (spec.state) {
    command
      .option("--chop", "chop common resource prefix from names")
      .option("-k, --concrete", "only include managed resources")
      .option("--short", "collapse nested module paths in resource names");
  }

  return command.action(async (file: string | undefined, options: QueryCommandOptions) => {
    await runQueryCommand(spec, file, options, io());
  });
}

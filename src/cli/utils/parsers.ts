/**
 * Document loading for JSON, NDJSON, and CSV inputs
 * Reads a file or stdin into memory and normalizes it to JSON text
 */

import * as fs from "node:fs";
import type { Readable } from "node:stream";
import Papa from "papaparse";
import type { DocumentFormat, LoadedDocument } from "../../types/index.js";
import { DocumentParseError, DocumentReadError } from "../../errors.js";
import { logger } from "../../observability/logger.js";

/** Source name that reads from stdin */
export const STDIN = "-";

// Cap for documents read from stdin (64MB)
export const STDIN_LIMIT = 64 * 1024 * 1024;

export interface LoadOptions {
  /** Skip detection and treat the input as this format */
  format?: DocumentFormat;
  /** Stream read for "-" (defaults to process.stdin) */
  stdin?: Readable;
  /** Byte cap for stdin */
  limit?: number;
}

/**
 * Detect format from the file extension, else from content
 */
export function detectFormat(source: string, content: string): DocumentFormat {
  const ext = source.toLowerCase().split(".").pop();

  if (ext === "csv") return "csv";
  if (ext === "ndjson" || ext === "jsonl") return "ndjson";

  // Several top-level values on separate lines read as NDJSON
  const trimmed = content.trim();
  if (trimmed.startsWith("{") && !isJson(trimmed)) {
    const firstLine = trimmed.split(/\r?\n/, 1)[0] ?? "";
    if (isJson(firstLine)) return "ndjson";
  }

  return "json";
}

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Convert NDJSON text to a JSON array text
 */
export function ndjsonToJson(content: string): string {
  const records: unknown[] = [];
  let line = 0;

  for (const raw of content.split(/\r?\n/)) {
    line++;
    const trimmed = raw.trim();
    if (!trimmed) continue;

    try {
      records.push(JSON.parse(trimmed));
    } catch (err) {
      throw new DocumentParseError(`invalid JSON at line ${line}: ${trimmed.slice(0, 50)}`, { cause: err });
    }
  }

  return JSON.stringify(records);
}

/**
 * Convert CSV text with a header row to a JSON array text
 * Uses papaparse for quoting and number/boolean typing
 */
export function csvToJson(content: string): string {
  const result = Papa.parse<Record<string, unknown>>(content, {
    header: true,
    dynamicTyping: true,
    skipEmptyLines: true,
  });

  const [first] = result.errors;
  if (first) {
    const row = first.row !== undefined ? ` (row ${first.row + 1})` : "";
    throw new DocumentParseError(`CSV parse error${row}: ${first.message}`);
  }

  return JSON.stringify(result.data);
}

/**
 * Read a stream fully, failing once more than `limit` bytes arrive
 */
export async function readStream(stream: Readable, limit: number = STDIN_LIMIT): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of stream) {
    const buffer: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > limit) {
      stream.destroy();
      throw new DocumentReadError(`stdin exceeds ${Math.floor(limit / (1024 * 1024))}MB`);
    }
    chunks.push(buffer);
  }

  return Buffer.concat(chunks);
}

async function readSource(source: string, options: LoadOptions): Promise<Buffer> {
  if (source === STDIN) {
    return readStream(options.stdin ?? process.stdin, options.limit ?? STDIN_LIMIT);
  }

  try {
    return await fs.promises.readFile(source);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DocumentReadError(`${source}: ${reason}`, { cause: err });
  }
}

/**
 * Load a document from a file path or "-" for stdin
 */
export async function loadDocument(source: string, options: LoadOptions = {}): Promise<LoadedDocument> {
  const raw = await readSource(source, options);
  const content = raw.toString("utf-8");
  const format = options.format ?? detectFormat(source, content);

  logger.debug(`loaded ${raw.length} bytes from ${source === STDIN ? "stdin" : source} as ${format}`);

  switch (format) {
    case "json":
      return { raw, text: content, format };
    case "ndjson":
      return { raw, text: ndjsonToJson(content), format };
    case "csv":
      return { raw, text: csvToJson(content), format };
  }
}


/**
 * Output rendering: aligned text table, JSON or YAML
 */

import YAML from "yaml";
import type { AttributeSpec, OutputSink, RenderOptions, Row, TableColors, Value } from "../types/index.js";
import { RenderError } from "../errors.js";
import { NULL, rowToJson, toJson } from "./value.js";

export const DEFAULT_COLORS: TableColors = {
  title: "#f6be00",
  even: "#ffffff",
  odd: "#00c8f0",
};

const EMPTY_CELL = "-";

/**
 * Round to the nearest integer, ties to even
 */
function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff === 0.5) {
    return floor % 2 === 0 ? floor : floor + 1;
  }
  return Math.round(value);
}

/**
 * Text for one table cell
 */
export function cellText(value: Value): string {
  switch (value.kind) {
    case "null":
      return EMPTY_CELL;
    case "string":
      return value.value === "" ? EMPTY_CELL : value.value;
    case "bool":
      return value.value ? "true" : "false";
    case "number": {
      const rounded = roundHalfEven(value.value);
      return Math.abs(rounded) < 1e21 ? rounded.toFixed(0) : String(rounded);
    }
    case "list":
    case "map":
      return JSON.stringify(toJson(value));
  }
}

function foregroundCode(color: string): string | null {
  const trimmed = color.trim();

  const short = /^#([0-9a-f])([0-9a-f])([0-9a-f])$/i.exec(trimmed);
  const long = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(trimmed);
  if (long || short) {
    const [r, g, b] = long
      ? [long[1], long[2], long[3]]
      : short
        ? [short[1] + short[1], short[2] + short[2], short[3] + short[3]]
        : ["0", "0", "0"];
    return `38;2;${Number.parseInt(r, 16)};${Number.parseInt(g, 16)};${Number.parseInt(b, 16)}`;
  }

  if (/^\d{1,3}$/.test(trimmed) && Number(trimmed) <= 255) {
    return `38;5;${trimmed}`;
  }

  return null;
}

/**
 * Wrap text in ANSI foreground (and optionally bold) escapes
 */
export function colorize(text: string, color: string, bold = false): string {
  const codes = [bold ? "1" : null, foregroundCode(color)].filter((code): code is string => code !== null);
  if (codes.length === 0) {
    return text;
  }
  return `\x1b[${codes.join(";")}m${text}\x1b[0m`;
}

function visibleLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Aligned columns of the included fields, in spec order
 */
export function renderTable(rows: readonly Row[], specs: readonly AttributeSpec[], options: RenderOptions): string {
  if (rows.length === 0) {
    return "";
  }

  const columns = specs.filter((spec) => spec.include).map((spec) => spec.outputKey);
  if (columns.length === 0) {
    return "";
  }

  const body = rows.map((row) => columns.map((column) => cellText(row.get(column) ?? NULL)));
  const header = options.titles ? columns : null;

  const widths = columns.map((_, col) => {
    let width = header ? visibleLength(header[col]) : 0;
    for (const cells of body) {
      width = Math.max(width, visibleLength(cells[col]));
    }
    return width;
  });

  const separator = " ".repeat(1 + Math.max(0, options.padding));

  const line = (cells: string[], color: string | null, bold: boolean): string =>
    cells
      .map((cell, col) => {
        const padded = col === cells.length - 1 ? cell : cell + " ".repeat(widths[col] - visibleLength(cell));
        return color ? colorize(padded, color, bold) : padded;
      })
      .join(separator);

  const lines: string[] = [];
  if (header) {
    lines.push(line(header, options.colors?.title ?? null, options.colors !== null));
  }
  body.forEach((cells, index) => {
    const color = options.colors ? (index % 2 === 0 ? options.colors.even : options.colors.odd) : null;
    lines.push(line(cells, color, false));
  });

  return lines.join("\n") + "\n";
}

function includedKeys(specs: readonly AttributeSpec[]): string[] {
  return specs.filter((spec) => spec.include).map((spec) => spec.outputKey);
}

export function renderJson(rows: readonly Row[], specs: readonly AttributeSpec[]): string {
  const keys = includedKeys(specs);
  try {
    return JSON.stringify(rows.map((row) => rowToJson(row, keys)), null, 2) + "\n";
  } catch (err) {
    throw new RenderError("json", { cause: err });
  }
}

export function renderYaml(rows: readonly Row[], specs: readonly AttributeSpec[]): string {
  const keys = includedKeys(specs);
  try {
    return YAML.stringify(rows.map((row) => rowToJson(row, keys)));
  } catch (err) {
    throw new RenderError("yaml", { cause: err });
  }
}

/**
 * Render rows in the selected mode and write them to the sink
 */
export function renderRows(
  rows: readonly Row[],
  specs: readonly AttributeSpec[],
  options: RenderOptions,
  sink: OutputSink
): void {
  switch (options.output) {
    case "json":
      sink.write(renderJson(rows, specs));
      return;
    case "yaml":
      sink.write(renderYaml(rows, specs));
      return;
    case "raw":
      throw new RenderError("raw", { cause: new Error("raw output bypasses row rendering") });
    case "text": {
      const table = renderTable(rows, specs, options);
      if (table !== "") {
        sink.write(table);
      }
      return;
    }
  }
}

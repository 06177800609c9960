/**
 * Per-field value transforms
 *
 * A transform chain is a short token list such as `u,20` or `t,-16`:
 *
 *   t / T   convert an RFC 3339 timestamp to the configured time zone
 *   l / L   lower case
 *   u / U   upper case
 *   N       keep the first N characters
 *   -N      abbreviate to N characters with ".." in the middle
 *
 * Tokens are not applied left to right. The last case token and the last
 * length token win, which lets a field's own chain override a global one
 * that was prepended to it.
 */

import type { Value } from "../types/index.js";
import { logger } from "../observability/logger.js";
import { str } from "./value.js";

export type TransformToken =
  | { type: "letter"; letter: string }
  | { type: "length"; length: number };

export type CaseTransform = "lower" | "upper";

export interface TransformContext {
  /** IANA zone name for `t` tokens; no conversion when absent */
  timezone?: string;
}

const TOKEN = /-?\d+|[A-Za-z]/g;

export function tokenizeChain(chain: string): TransformToken[] {
  const tokens: TransformToken[] = [];
  for (const match of chain.matchAll(TOKEN)) {
    const text = match[0];
    if (/^[A-Za-z]$/.test(text)) {
      tokens.push({ type: "letter", letter: text });
    } else {
      tokens.push({ type: "length", length: Number.parseInt(text, 10) });
    }
  }
  return tokens;
}

function lastLetterIndex(tokens: readonly TransformToken[], letters: string): number {
  for (let i = tokens.length - 1; i >= 0; i--) {
    const token = tokens[i];
    if (token.type === "letter" && letters.includes(token.letter)) {
      return i;
    }
  }
  return -1;
}

export function resolveCase(tokens: readonly TransformToken[]): CaseTransform | null {
  const lower = lastLetterIndex(tokens, "lL");
  const upper = lastLetterIndex(tokens, "uU");
  if (lower > upper) return "lower";
  if (upper > lower) return "upper";
  return null;
}

export function resolveLength(tokens: readonly TransformToken[]): number | null {
  for (let i = tokens.length - 1; i >= 0; i--) {
    const token = tokens[i];
    if (token.type === "length") {
      return token.length;
    }
  }
  return null;
}

export function hasTimezone(tokens: readonly TransformToken[]): boolean {
  return lastLetterIndex(tokens, "tT") >= 0;
}

/**
 * Apply a length directive. Positive keeps a prefix, negative keeps both
 * ends around "..".
 */
export function applyLength(value: string, length: number): string {
  const chars = Array.from(value);
  const limit = Math.abs(length);
  if (chars.length <= limit) {
    return value;
  }

  if (length >= 0) {
    return chars.slice(0, length).join("");
  }

  const half = Math.max(Math.floor(limit / 2) - 1, 0);
  const left = chars.slice(0, half).join("");
  const right = half > 0 ? chars.slice(chars.length - half).join("") : "";
  return `${left}..${right}`;
}

const RFC3339 =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;

export function parseRfc3339(value: string): Date | null {
  if (!RFC3339.test(value)) {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

const formatterCache = new Map<string, Intl.DateTimeFormat | null>();

function zoneFormatter(timezone: string): Intl.DateTimeFormat | null {
  if (formatterCache.has(timezone)) {
    return formatterCache.get(timezone) ?? null;
  }

  let formatter: Intl.DateTimeFormat | null;
  try {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
      timeZoneName: "short",
    });
  } catch (err) {
    logger.debug(`unknown time zone ${timezone}: ${err instanceof Error ? err.message : String(err)}`);
    formatter = null;
  }

  formatterCache.set(timezone, formatter);
  return formatter;
}

/**
 * Format a date as `2024-01-15T05:30:00EST` in the given zone. Null when the
 * zone is not known.
 */
export function formatInZone(date: Date, timezone: string): string | null {
  const formatter = zoneFormatter(timezone);
  if (!formatter) {
    return null;
  }

  const parts: Record<string, string> = {};
  for (const part of formatter.formatToParts(date)) {
    parts[part.type] = part.value;
  }

  return (
    `${parts.year}-${parts.month}-${parts.day}T` +
    `${parts.hour}:${parts.minute}:${parts.second}${parts.timeZoneName ?? ""}`
  );
}

/**
 * A compiled chain. Timestamp conversion is switched off for the rest of the
 * run once a value of this field fails to parse.
 */
export class TransformChain {
  readonly source: string;
  private tokens: TransformToken[];
  private readonly caseTransform: CaseTransform | null;
  private readonly length: number | null;

  constructor(source: string) {
    this.source = source;
    this.tokens = tokenizeChain(source);
    this.caseTransform = resolveCase(this.tokens);
    this.length = resolveLength(this.tokens);
  }

  get isEmpty(): boolean {
    return this.tokens.length === 0;
  }

  get convertsTimezone(): boolean {
    return hasTimezone(this.tokens);
  }

  private dropTimezone(): void {
    this.tokens = this.tokens.filter((token) => !(token.type === "letter" && "tT".includes(token.letter)));
  }

  apply(value: Value, context: TransformContext = {}): Value {
    if (value.kind !== "string") {
      return value;
    }

    let result = value.value;

    if (context.timezone && this.convertsTimezone) {
      const date = parseRfc3339(result);
      if (date) {
        result = formatInZone(date, context.timezone) ?? result;
      } else {
        logger.error(`failed to parse time: ${result}`);
        this.dropTimezone();
      }
    }

    if (this.caseTransform === "lower") {
      result = result.toLowerCase();
    } else if (this.caseTransform === "upper") {
      result = result.toUpperCase();
    }

    if (this.length !== null) {
      result = applyLength(result, this.length);
    }

    return result === value.value ? value : str(result);
  }
}

/**
 * One-off transform of a single value
 */
export function transformValue(value: Value, chain: string, context: TransformContext = {}): Value {
  return new TransformChain(chain).apply(value, context);
}

/**
 * Configuration file resolution
 *
 * Settings live in `tfq.yaml`. Keys are dotted paths; a command looks up
 * `<command>.<key>` first and falls back to the bare `<key>`:
 *
 *   output: json
 *   colors:
 *     title: "#ff8800"
 *   sq:
 *     chop: true
 */

import * as fs from "node:fs";
import * as path from "node:path";
import YAML from "yaml";
import { ConfigError } from "../../errors.js";
import { logger } from "../../observability/logger.js";

export const CONFIG_FILE_NAME = "tfq.yaml";

type ConfigData = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigData {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Loaded configuration with namespaced lookup
 */
export class Config {
  readonly source: string | null;
  private readonly data: ConfigData;

  constructor(data: ConfigData = {}, source: string | null = null) {
    this.data = data;
    this.source = source;
  }

  private lookup(key: string): unknown {
    let current: unknown = this.data;
    for (const segment of key.split(".")) {
      if (!isRecord(current) || !Object.hasOwn(current, segment)) {
        return undefined;
      }
      current = current[segment];
    }
    return current;
  }

  /**
   * Value at `namespace.key`, else at `key`
   */
  get(key: string, namespace?: string): unknown {
    if (namespace) {
      const scoped = this.lookup(`${namespace}.${key}`);
      if (scoped !== undefined && scoped !== null) {
        return scoped;
      }
    }
    const value = this.lookup(key);
    return value === null ? undefined : value;
  }

  getString(key: string, namespace?: string): string | undefined {
    const value = this.get(key, namespace);
    if (value === undefined) return undefined;
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") return String(value);
    logger.warn(`config ${key}: expected a string`);
    return undefined;
  }

  getNumber(key: string, namespace?: string): number | undefined {
    const value = this.get(key, namespace);
    if (value === undefined) return undefined;
    if (typeof value === "number" && Number.isFinite(value)) return Math.trunc(value);
    if (typeof value === "string" && /^-?\d+$/.test(value.trim())) return Number.parseInt(value, 10);
    logger.warn(`config ${key}: expected an integer`);
    return undefined;
  }

  getBoolean(key: string, namespace?: string): boolean | undefined {
    const value = this.get(key, namespace);
    if (value === undefined) return undefined;
    if (typeof value === "boolean") return value;
    if (value === "true") return true;
    if (value === "false") return false;
    logger.warn(`config ${key}: expected true or false`);
    return undefined;
  }
}

/**
 * First config file that exists: TFQ_CONFIG, then tfq.yaml under
 * XDG_CONFIG_HOME, APPDATA or HOME
 */
export function findConfigPath(env: NodeJS.ProcessEnv = process.env): string | null {
  if (env.TFQ_CONFIG) {
    return env.TFQ_CONFIG;
  }

  for (const dir of [env.XDG_CONFIG_HOME, env.APPDATA, env.HOME]) {
    if (!dir) continue;
    const file = path.join(dir, CONFIG_FILE_NAME);
    if (fs.existsSync(file) && fs.statSync(file).isFile()) {
      logger.debug(`using config file: ${file}`);
      return file;
    }
  }

  return null;
}

/**
 * Parse config text. Throws ConfigError for YAML errors or a non-map root.
 */
export function parseConfig(text: string, source: string): Config {
  let data: unknown;
  try {
    data = YAML.parse(text);
  } catch (err) {
    throw new ConfigError(source, { cause: err });
  }

  if (data === null || data === undefined) {
    return new Config({}, source);
  }
  if (!isRecord(data)) {
    throw new ConfigError(source, { cause: new Error("top level must be a map") });
  }
  return new Config(data, source);
}

/**
 * Load the config file. A missing file yields an empty config; an invalid
 * one is logged and ignored.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const file = findConfigPath(env);
  if (!file) {
    return new Config();
  }

  try {
    return parseConfig(fs.readFileSync(file, "utf-8"), file);
  } catch (err) {
    const error = err instanceof ConfigError ? err : new ConfigError(file, { cause: err });
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
    logger.error(`${error.message}${cause}`);
    return new Config();
  }
}

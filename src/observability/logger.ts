/**
 * Leveled logging to stderr
 *
 * Level comes from TFQ_LOG (debug, info, warn, error, off). Default is error,
 * so only failures the query recovered from are shown.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "off";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "off"];

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + "\n");
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? "").trim().toLowerCase();
  const match = LEVELS.find((level) => level === normalized);
  return match ?? "error";
}

function timestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export class Logger {
  #level: LogLevel;
  #sink: LogSink;

  constructor(level: LogLevel = "error", sink: LogSink = stderrSink) {
    this.#level = level;
    this.#sink = sink;
  }

  get level(): LogLevel {
    return this.#level;
  }

  setLevel(level: LogLevel): void {
    this.#level = level;
  }

  setSink(sink: LogSink): void {
    this.#sink = sink;
  }

  isEnabled(level: Exclude<LogLevel, "off">): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.#level);
  }

  private log(level: Exclude<LogLevel, "off">, message: string): void {
    if (!this.isEnabled(level)) {
      return;
    }
    // One-letter level, e.g. "2025-01-15 10:30:00 E invalid filter: =x"
    this.#sink(`${timestamp(new Date())} ${level.charAt(0).toUpperCase()} ${message}`);
  }

  debug(message: string): void {
    this.log("debug", message);
  }

  info(message: string): void {
    this.log("info", message);
  }

  warn(message: string): void {
    this.log("warn", message);
  }

  error(message: string): void {
    this.log("error", message);
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger(parseLogLevel(process.env.TFQ_LOG));

let noticeSink: LogSink = stderrSink;

/**
 * User-visible warning, printed regardless of log level
 */
export function notice(message: string): void {
  noticeSink(`warning: ${message}`);
}

export function setNoticeSink(sink: LogSink): void {
  noticeSink = sink;
}

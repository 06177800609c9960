/**
 * Error types for query operations
 *
 * Every error carries a stable `code` and supports `cause` for wrapping the
 * underlying failure.
 */

/**
 * Base class for all tfq errors
 */
export abstract class TfqError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when the root document cannot be parsed at all
 */
export class DocumentParseError extends TfqError {
  readonly code = "PARSE_ERROR";

  constructor(source: string, options?: ErrorOptions) {
    super(`Failed to parse document: ${source}`, options);
  }
}

/**
 * Thrown when a document cannot be read from its source
 */
export class DocumentReadError extends TfqError {
  readonly code = "READ_ERROR";

  constructor(source: string, options?: ErrorOptions) {
    super(`Failed to read document: ${source}`, options);
  }
}

/**
 * Thrown when rows cannot be serialized for json or yaml output
 */
export class RenderError extends TfqError {
  readonly code = "RENDER_ERROR";

  constructor(output: string, options?: ErrorOptions) {
    super(`Failed to render ${output} output`, options);
  }
}

/**
 * Thrown when the configuration file is unreadable or malformed
 */
export class ConfigError extends TfqError {
  readonly code = "CONFIG_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Invalid configuration file: ${filePath}`, options);
  }
}

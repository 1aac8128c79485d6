/**
 * Error taxonomy for the harvesting pipeline
 *
 * FetchError and CheckpointWriteError are recovered where they happen
 * (logged, run continues). InputFormatError and ConfigurationError are
 * raised at startup and abort the run before any request is made.
 */

/**
 * A single detail page could not be fetched or parsed
 */
export class FetchError extends Error {
  url: string;
  cause?: Error;

  constructor(url: string, message: string, cause?: Error) {
    super(message);
    this.name = 'FetchError';
    this.url = url;
    this.cause = cause;
  }
}

/**
 * A page did not have the expected shape
 */
export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * A checkpoint snapshot could not be written
 */
export class CheckpointWriteError extends Error {
  path: string;
  cause?: Error;

  constructor(path: string, message: string, cause?: Error) {
    super(message);
    this.name = 'CheckpointWriteError';
    this.path = path;
    this.cause = cause;
  }
}

/**
 * The input dataset file is missing, not JSON, or not year → events
 */
export class InputFormatError extends Error {
  path: string;
  cause?: Error;

  constructor(path: string, message: string, cause?: Error) {
    super(message);
    this.name = 'InputFormatError';
    this.path = path;
    this.cause = cause;
  }
}

/**
 * An option has an invalid value
 */
export class ConfigurationError extends Error {
  option: string;

  constructor(option: string, message: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.option = option;
  }
}

/**
 * Coerce anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Message of anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

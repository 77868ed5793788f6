/**
 * Error types raised inside the CLI.
 * Lookup failures never surface as these; the client folds them into outcomes.
 */

/** Connection failure or timeout while talking to the entitlement API. */
export class TransportError extends Error {
  readonly timedOut: boolean;

  constructor(message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'TransportError';
    this.timedOut = options.timedOut ?? false;
  }
}

/** The code list could not be read. */
export class InputFileError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(message);
    this.name = 'InputFileError';
    this.path = path;
  }
}

/** A config file or environment variable holds an invalid value. */
export class ConfigError extends Error {
  /** Config file path or environment variable name */
  readonly source: string;

  constructor(source: string, message: string) {
    super(`Invalid config in ${source}: ${message}`);
    this.name = 'ConfigError';
    this.source = source;
  }
}

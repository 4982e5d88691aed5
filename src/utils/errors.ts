/**
 * Error types thrown by the encoder and the analog front-end.
 * The decoder never throws for bad input, it returns sentinels instead.
 */

/**
 * Invalid samples-per-bit setting. Fatal: every encode would fail the same way.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Caller supplied a malformed bitstream or analog parameter.
 */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export class UnsupportedSchemeError extends Error {
  readonly scheme: string;

  constructor(scheme: string) {
    super(`Unknown encoding scheme: ${scheme}`);
    this.name = 'UnsupportedSchemeError';
    this.scheme = scheme;
  }
}

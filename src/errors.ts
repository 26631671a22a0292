/**
 * Structured errors for Weasel evolution
 *
 * Every failure aborts the run, so the taxonomy only separates bad input
 * caught before the loop starts from sampling failures inside it.
 */

export type WeaselErrorCode =
  | 'CONFIGURATION_ERROR' // Invalid phrase, mutation rate, iterations or option
  | 'SAMPLING_ERROR'; // No character available to draw from

export interface WeaselError {
  code: WeaselErrorCode;
  message: string;
  field?: string; // Offending configuration field or CLI option
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping WeaselError for throw/catch patterns
 */
export class WeaselException extends Error {
  public readonly error: WeaselError;

  constructor(error: WeaselError) {
    super(error.message);
    this.name = 'WeaselException';
    this.error = error;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get code(): WeaselErrorCode {
    return this.error.code;
  }

  toJSON(): WeaselError {
    return this.error;
  }
}

export class ConfigurationError extends WeaselException {
  constructor(message: string, field?: string, details?: Record<string, unknown>) {
    super({ code: 'CONFIGURATION_ERROR', message, field, details });
    this.name = 'ConfigurationError';
  }
}

export class EmptyCharsetError extends WeaselException {
  constructor(message = 'Cannot pick a character from an empty character set') {
    super({ code: 'SAMPLING_ERROR', message });
    this.name = 'EmptyCharsetError';
  }
}

/**
 * Message for any thrown value, as printed on standard error
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

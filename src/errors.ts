/**
 * Application error hierarchy.
 * Every AppError carries a stable code and the HTTP status the error handler
 * middleware responds with.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed input: empty text, non-positive limit, degenerate vector. */
export class InvalidInputError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, 400, details);
  }
}

/** Embedding or store backend could not be reached or answered with an error. */
export class ProviderUnavailableError extends AppError {
  constructor(
    readonly provider: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('PROVIDER_UNAVAILABLE', message, 503, { provider }, options);
  }
}

/** A backing collection does not exist and cannot be used. */
export class SchemaMissingError extends AppError {
  constructor(readonly collection: string, options?: { cause?: unknown }) {
    super(
      'SCHEMA_MISSING',
      `Collection "${collection}" does not exist`,
      503,
      { collection },
      options
    );
  }
}

export class SynthesisFailedError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SYNTHESIS_FAILED', message, 502, undefined, options);
  }
}

/** A stored record is missing a required field or has the wrong type. */
export class MalformedRecordError extends AppError {
  constructor(collection: string, message: string) {
    super('MALFORMED_RECORD', `${collection}: ${message}`, 500, { collection });
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

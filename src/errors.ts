/**
 * Error types
 * Layer: core
 *
 * Runtime query failures are values (CommitResult), not exceptions.
 * Only the cases below are thrown.
 */

/**
 * Missing or invalid configuration. Raised before any network call.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The host aborted the session. No terminal ChangeSet is produced.
 */
export class SessionCancelledError extends Error {
  constructor(message = 'Polling session was cancelled') {
    super(message);
    this.name = 'SessionCancelledError';
  }
}

/**
 * A serialized CommitResult is missing a field or has the wrong type.
 */
export class ResultShapeError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ResultShapeError';
    this.field = field;
  }
}

/**
 * Extracts a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

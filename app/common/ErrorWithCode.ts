export type ErrorCode = 'MISSING_COLUMNS' | 'UNREADABLE_FILE' | 'MALFORMED_DATASET' | 'INVALID_SETTING';

interface ErrorDetails {
  file?: string;              // File label, e.g. "File A".
  path?: string;
  missingColumns?: string[];
}

/**
 *
 * An error with a human-readable message and a machine-readable code.
 * Makes it easier to change the human-readable message without breaking
 * error handlers.
 *
 */
export class ErrorWithCode extends Error {
  constructor(public code: ErrorCode, message: string, public details: ErrorDetails = {}) {
    super(message);
    this.name = 'ErrorWithCode';
  }
  public get missingColumns() { return this.details.missingColumns || []; }
}

export function isErrorWithCode(err: unknown, code?: ErrorCode): err is ErrorWithCode {
  return err instanceof ErrorWithCode && (code === undefined || err.code === code);
}

export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

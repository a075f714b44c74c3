/**
 * FILE PURPOSE: Error types that cross the engine boundary
 *
 * WHY: Input errors are rejected before any processing and map to HTTP 400.
 *      Snapshot errors halt startup. Everything else inside a check is a
 *      typed result or a logged soft failure, never an exception.
 */

export type InputErrorCode =
  | 'EMPTY_TEXT'
  | 'TEXT_TOO_LARGE'
  | 'UNSUPPORTED_FORMAT'
  | 'EXTRACTION_FAILED'
  | 'EMPTY_LABEL'
  | 'INVALID_URL';

export class PlagiarismInputError extends Error {
  readonly code: InputErrorCode;

  constructor(code: InputErrorCode, message: string) {
    super(message);
    this.name = 'PlagiarismInputError';
    this.code = code;
  }
}

/** Corrupt, truncated or incompatible index snapshot. Fatal at startup. */
export class IndexSnapshotError extends Error {
  constructor(message: string) {
    super(`Index snapshot unusable: ${message}`);
    this.name = 'IndexSnapshotError';
  }
}

export function isInputError(err: unknown): err is PlagiarismInputError {
  return err instanceof PlagiarismInputError;
}

/**
 * Errors raised while reading a benchmark export
 *
 * @module data/load-error
 */

/**
 * Reasons a dataset could not be loaded
 */
export enum LoadErrorCode {
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  FILE_EMPTY = 'FILE_EMPTY',
  /** Malformed CSV or JSON text */
  PARSE_FAILED = 'PARSE_FAILED',
  /** Well-formed JSON that is not a BenchmarkDotNet report */
  INVALID_FORMAT = 'INVALID_FORMAT',
}

export class LoadError extends Error {
  constructor(
    message: string,
    public readonly code: LoadErrorCode,
    public readonly filePath?: string
  ) {
    super(message);
    this.name = 'LoadError';
  }
}

/**
 * Type guard for LoadError
 */
export function isLoadError(error: unknown): error is LoadError {
  return error instanceof LoadError;
}

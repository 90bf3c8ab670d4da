/**
 * projmap error types
 */

/**
 * The index could not be built at all (e.g. the project root is unreadable).
 * Per-file failures never raise this; they downgrade the file instead.
 */
export class IndexBuildError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'IndexBuildError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Node system error with the given code (ENOENT, EACCES, ...)
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Error narrowing that does not rely on `instanceof Error`.
 *
 * Errors raised by Node built-ins can come from another realm (Jest runs each
 * test file in its own vm context), where `instanceof Error` is false.
 */

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

/**
 * True when the error carries the given errno code, e.g. 'ENOENT'
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return isErrnoException(error) && error.code === code;
}

/**
 * Message of an error-like value, or its string form
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

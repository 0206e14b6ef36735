/**
 * UpstreamError
 *
 * Thrown when a call to one of the external HTTP services fails:
 * - Non-2xx responses from the photo service or the push service
 * - Network errors and per-call timeouts
 * - Response bodies that do not match the expected shape
 *
 * Retryable. Callers wrap the operation in a RetryPolicy; once attempts are
 * exhausted the error surfaces to the user's dispatch step.
 */
export class UpstreamError extends Error {
  public constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'UpstreamError';

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamError);
    }
  }
}

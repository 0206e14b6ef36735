/**
 * StateIOError
 *
 * Thrown when the state file cannot be read, locked or written.
 * A load failure aborts the run; a save failure aborts the save step only.
 */
export class StateIOError extends Error {
  public constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message);
    this.name = 'StateIOError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StateIOError);
    }
  }
}

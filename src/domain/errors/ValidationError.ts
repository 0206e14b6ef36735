import { DomainError } from './DomainError';

/**
 * Thrown when a single value is malformed: a clock time, a notification
 * window, a slot number. Carries the offending input.
 */
export class ValidationError extends DomainError {
  public constructor(
    message: string,
    public readonly value?: unknown
  ) {
    super(message);
  }
}

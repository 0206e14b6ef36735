import { DomainError } from './DomainError';

/**
 * Thrown when an enabled user has no photo service API key.
 * Not retryable; marks that user as failed for the run.
 */
export class CredentialMissingError extends DomainError {
  public constructor(public readonly userName: string) {
    super(`No API key configured for user '${userName}'`);
  }
}

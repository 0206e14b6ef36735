import { DomainError } from './DomainError';

/**
 * Thrown when the configuration file is missing, unreadable or invalid.
 * `details` lists the validation issues as `path: message` lines.
 *
 * Fatal: the slot run aborts before any user is processed.
 */
export class ConfigError extends DomainError {
  public readonly details?: string[];

  public constructor(message: string, details?: string[], options?: ErrorOptions) {
    super(message, options);
    this.details = details;
  }
}

/**
 * Base class for errors raised by this service's own rules
 * (configuration, validation, credentials), as opposed to failures of the
 * services it talks to. The optional cause keeps the library error that
 * triggered it.
 */
export class DomainError extends Error {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

import { logger } from '../../../../shared/logger';
import { sleepSeconds, type Sleep } from '../../../../shared/sleep';
import type { RetrySettings } from '../types';

export interface RetryOptions {
  /** Short description of the operation, used in the attempt warnings */
  label?: string;
  /** Extra structured fields for the attempt warnings (user, slot, ...) */
  context?: Record<string, unknown>;
  sleep?: Sleep;
}

/**
 * Runs `operation` up to `maxAttempts` times with a fixed delay between
 * attempts. No backoff, no jitter, no sleep after the last attempt.
 *
 * @throws the error from the last attempt once all attempts failed
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  maxAttempts: number,
  delaySeconds: number,
  options: RetryOptions = {}
): Promise<T> {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be an integer >= 1, got ${maxAttempts}`);
  }
  const sleep = options.sleep ?? sleepSeconds;

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      logger.warn({
        msg: `Attempt ${attempt}/${maxAttempts} failed`,
        operation: options.label,
        ...options.context,
        attempt,
        maxAttempts,
        error: error instanceof Error ? error.message : String(error),
      });
      if (attempt < maxAttempts) {
        await sleep(delaySeconds);
      }
    }
  }

  throw lastError;
}

/**
 * RetryPolicy - the configured retry settings bound to a sleeper
 *
 * One instance per run; every network call in the selector, ranker and
 * dispatcher goes through `run`.
 */
export class RetryPolicy {
  public constructor(
    private readonly settings: RetrySettings,
    private readonly sleep: Sleep = sleepSeconds
  ) {}

  public run<T>(
    operation: () => Promise<T>,
    label: string,
    context: Record<string, unknown> = {}
  ): Promise<T> {
    return withRetry(operation, this.settings.maxAttempts, this.settings.delaySeconds, {
      label,
      context,
      sleep: this.sleep,
    });
  }
}

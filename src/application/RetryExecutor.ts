import type { RequestOperation } from '../domain/events/DomainEvents.js';
import type { EventContext } from './RunContext.js';
import { publish } from './RunContext.js';

/** Outcome of a retried operation. */
export type RetryResult<T> =
  | { readonly success: true; readonly value: T; readonly attempts: number }
  | {
      readonly success: false;
      readonly attempts: number;
      /** Message chosen by the caller; the underlying cause is only reported through events. */
      readonly error: string;
      readonly cause: string;
    };

/**
 * Runs a fallible remote call up to `maxRetries` times.
 *
 * Attempts follow each other immediately: pacing belongs to the batch scheduler.
 */
export class RetryExecutor {
  constructor(
    private readonly ctx: EventContext,
    readonly maxRetries: number,
  ) {
    if (!Number.isInteger(maxRetries) || maxRetries < 1) {
      throw new Error('Retry count must be at least 1');
    }
  }

  async execute<T>(
    operation: () => Promise<T>,
    errorMessage: string,
    label: RequestOperation,
  ): Promise<RetryResult<T>> {
    let lastError = '';

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const value = await operation();
        return { success: true, value, attempts: attempt };
      } catch (error) {
        lastError = error instanceof Error ? error.message : String(error);

        if (attempt < this.maxRetries) {
          publish(this.ctx, {
            type: 'request:retried',
            operation: label,
            attempt,
            maxRetries: this.maxRetries,
            error: lastError,
          });
        }
      }
    }

    publish(this.ctx, {
      type: 'request:failed',
      operation: label,
      attempts: this.maxRetries,
      error: errorMessage,
      cause: lastError,
    });

    return { success: false, attempts: this.maxRetries, error: errorMessage, cause: lastError };
  }
}

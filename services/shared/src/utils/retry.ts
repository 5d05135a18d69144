import { RetryExhaustedError, TransientStoreError } from './errors';
import { logger as rootLogger, Logger } from './logger';

export interface RetryPolicy {
     maxAttempts: number;
     baseDelayMs: number;
     backoffMultiplier: number;
}

export interface RetryContext {
     /** Name used in logs and in the exhaustion error */
     operation: string;
     logger?: Logger;
     sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
     maxAttempts: 3,
     baseDelayMs: 1000,
     backoffMultiplier: 2,
};

function readPositive(value: string | undefined, fallback: number): number {
     if (value === undefined || value === '') return fallback;
     const parsed = Number(value);
     return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function loadRetryPolicy(env: NodeJS.ProcessEnv = process.env): RetryPolicy {
     return {
          maxAttempts: Math.max(
               1,
               Math.floor(readPositive(env.RETRY_MAX_ATTEMPTS, DEFAULT_RETRY_POLICY.maxAttempts))
          ),
          baseDelayMs: readPositive(env.RETRY_BASE_DELAY_MS, DEFAULT_RETRY_POLICY.baseDelayMs),
          backoffMultiplier: readPositive(
               env.RETRY_BACKOFF_MULTIPLIER,
               DEFAULT_RETRY_POLICY.backoffMultiplier
          ),
     };
}

/**
 * Only store-layer failures are retried. Business rejections are terminal.
 */
export function isRetriable(error: unknown): boolean {
     return error instanceof TransientStoreError;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
     return policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
}

function defaultSleep(ms: number): Promise<void> {
     return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run a store operation with bounded exponential-backoff retry.
 *
 * Non-retriable errors are rethrown untouched on the attempt that raised them. When the
 * budget runs out a {@link RetryExhaustedError} wraps the last failure.
 */
export async function withRetry<T>(
     operation: () => Promise<T>,
     policy: RetryPolicy,
     context: RetryContext
): Promise<T> {
     const log = context.logger ?? rootLogger;
     const sleep = context.sleep ?? defaultSleep;
     let lastError: unknown;

     for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
          try {
               return await operation();
          } catch (error) {
               if (!isRetriable(error)) {
                    throw error;
               }

               lastError = error;

               if (attempt < policy.maxAttempts) {
                    const delayMs = backoffDelay(policy, attempt);
                    log.warn(
                         { err: error, operation: context.operation, attempt, delayMs },
                         'Transient store failure, retrying'
                    );
                    await sleep(delayMs);
               }
          }
     }

     log.error(
          { err: lastError, operation: context.operation, attempts: policy.maxAttempts },
          'All retries failed'
     );
     throw new RetryExhaustedError(context.operation, policy.maxAttempts, lastError);
}

export type StoreCall = <T>(operation: string, fn: () => Promise<T>) => Promise<T>;

/**
 * Bind a policy once for a service's point reads and writes. Transactions go through
 * {@link withRetry} directly.
 */
export function retryingStoreCall(
     policy: RetryPolicy,
     sleep?: (ms: number) => Promise<void>
): StoreCall {
     return <T>(operation: string, fn: () => Promise<T>): Promise<T> =>
          withRetry(fn, policy, { operation, sleep });
}

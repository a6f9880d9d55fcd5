/**
 * Retry and timeout helpers for transient network failures
 */

import logger from './logger.js';
import { systemClock, type Clock } from './clock.js';
import { SubscriptionError, TimeoutError, UPnPError } from '../errors/household-errors.js';

export interface BackoffOptions {
  /** Initial delay between retries in milliseconds */
  initialDelay: number;
  /** Maximum delay between retries in milliseconds */
  maxDelay: number;
  /** Exponential backoff factor (e.g., 2 = double the delay each time) */
  backoffFactor: number;
}

export interface RetryOptions extends Partial<BackoffOptions> {
  /** Maximum number of retry attempts (not including the initial attempt) */
  maxAttempts?: number;
  /** Optional timeout for each attempt in milliseconds */
  timeout?: number;
  /** Function to determine if an error is retryable */
  isRetryable?: (error: unknown) => boolean;
  /** Called before each retry attempt */
  onRetry?: (error: unknown, attempt: number) => void;
  clock?: Clock;
}

const DEFAULT_OPTIONS = {
  maxAttempts: 3,
  initialDelay: 100,
  maxDelay: 5000,
  backoffFactor: 2,
  isRetryable: isDefaultRetryable
};

/**
 * Delay before retry number `attempt` (1-based), capped at maxDelay
 */
export function computeBackoffDelay(attempt: number, options: BackoffOptions): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(options.initialDelay * Math.pow(options.backoffFactor, exponent), options.maxDelay);
}

export function isDefaultRetryable(error: unknown): boolean {
  if (error instanceof TimeoutError) {
    return true;
  }

  if (error instanceof SubscriptionError) {
    return error.reason === 'TIMEOUT' || error.reason === 'DEVICE_OFFLINE';
  }

  if (error instanceof UPnPError) {
    const retryableCodes: string[] = [
      UPnPError.ErrorCodes.ACTION_FAILED,
      UPnPError.ErrorCodes.OUT_OF_MEMORY,
      UPnPError.ErrorCodes.CONTENT_BUSY,
      UPnPError.ErrorCodes.TRANSPORT_IS_LOCKED
    ];
    return retryableCodes.includes(error.errorCode);
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('econnrefused') ||
      message.includes('econnreset') ||
      message.includes('etimedout') ||
      message.includes('enetunreach') ||
      message.includes('ehostunreach') ||
      message.includes('socket hang up')
    );
  }

  return false;
}

export function sleep(ms: number, clock: Clock = systemClock): Promise<void> {
  return new Promise(resolve => {
    clock.setTimeout(resolve, ms);
  });
}

/**
 * Race a promise against a timer. The timer is cancelled once the promise settles.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  clock: Clock = systemClock
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = clock.setTimeout(() => {
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);

    promise.then(
      (value) => {
        timer.cancel();
        resolve(value);
      },
      (error: unknown) => {
        timer.cancel();
        reject(error);
      }
    );
  });
}

/**
 * Execute an async function with retry logic
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions,
  operation = 'operation'
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const clock = opts.clock ?? systemClock;

  for (let attempt = 0; ; attempt++) {
    try {
      if (opts.timeout) {
        return await withTimeout(fn(), opts.timeout, operation, clock);
      }
      return await fn();
    } catch (error) {
      if (attempt >= opts.maxAttempts || !opts.isRetryable(error)) {
        throw error;
      }

      logger.debug(
        `Retry attempt ${attempt + 1}/${opts.maxAttempts} for ${operation} after error:`,
        error instanceof Error ? error.message : error
      );

      opts.onRetry?.(error, attempt + 1);

      await sleep(computeBackoffDelay(attempt + 1, opts), clock);
    }
  }
}

/**
 * Retry options for read-only SOAP requests
 */
export const SOAP_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 2,
  initialDelay: 200,
  maxDelay: 2000,
  backoffFactor: 2,
  timeout: 10000
};

/**
 * Retry Utility with Exponential Backoff
 *
 * A small retry policy shared by the portal client and the email service:
 * a total attempt budget, an exponential backoff schedule and a predicate
 * that decides which errors are worth another attempt.
 */

import { logger } from './logger.js';

/**
 * Retry behaviour for one operation
 */
export interface RetryPolicy {
  /** Total number of attempts, the first one included */
  maxAttempts: number;
  /** Delay before the second attempt, in milliseconds */
  initialDelay: number;
  /** Upper bound for any single delay, in milliseconds */
  maxDelay: number;
  /** Exponential backoff multiplier */
  multiplier: number;
  isRetryable: (error: unknown) => boolean;
  /** Server-mandated delay in milliseconds (e.g. Retry-After), or null */
  getRetryAfter?: (error: unknown) => number | null;
}

export interface RetryOptions {
  /** Label used in log lines */
  context?: string;
  /** Replaced in tests to avoid real waits */
  sleep?: (ms: number) => Promise<void>;
  /** Renders errors for log lines; lets callers redact secrets */
  formatError?: (error: unknown) => string;
}

/**
 * Thrown when an operation gives up, either because the error was not
 * retryable or because the attempt budget ran out.
 */
export class RetryError extends Error {
  constructor(
    public readonly lastError: unknown,
    public readonly attempts: number,
    public readonly exhausted: boolean
  ) {
    super(lastError instanceof Error ? lastError.message : String(lastError));
    this.name = 'RetryError';
  }
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const defaultFormatError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Calculate exponential backoff delay
 *
 * @param attempt - Number of attempts already failed (1 for the first retry)
 */
export function calculateBackoff(policy: RetryPolicy, attempt: number): number {
  const delay = policy.initialDelay * Math.pow(policy.multiplier, attempt - 1);
  return Math.min(delay, policy.maxDelay);
}

/**
 * Parse a Retry-After header value (delta seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | null {
  const raw = Array.isArray(value) ? value[0] : value;
  if (typeof raw === 'number') {
    return raw > 0 ? raw * 1000 : null;
  }
  if (typeof raw !== 'string' || raw.trim() === '') {
    return null;
  }

  const trimmed = raw.trim();
  if (/^\d+$/.test(trimmed)) {
    const seconds = parseInt(trimmed, 10);
    return seconds > 0 ? seconds * 1000 : null;
  }

  const date = Date.parse(trimmed);
  if (isNaN(date)) {
    return null;
  }
  return Math.max(0, date - now);
}

/**
 * Run an operation under a retry policy
 *
 * @returns Result of the first successful attempt
 * @throws RetryError wrapping the last error
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const { context, sleep = defaultSleep, formatError = defaultFormatError } = options;
  const contextStr = context ? ` (${context})` : '';
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await operation(attempt);
      if (attempt > 1) {
        logger.info({ attempt, maxAttempts, context }, `Operation succeeded after ${attempt - 1} retries${contextStr}`);
      }
      return result;
    } catch (error) {
      const message = formatError(error);

      if (!policy.isRetryable(error)) {
        logger.debug({ attempt, maxAttempts, error: message, context }, `Non-retryable error encountered${contextStr}`);
        throw new RetryError(error, attempt, false);
      }

      if (attempt >= maxAttempts) {
        logger.error({ attempt, maxAttempts, error: message, context }, `Operation failed after ${attempt} attempts${contextStr}`);
        throw new RetryError(error, attempt, true);
      }

      let delay = calculateBackoff(policy, attempt);
      const retryAfter = policy.getRetryAfter?.(error) ?? null;
      if (retryAfter !== null) {
        delay = Math.min(retryAfter, policy.maxDelay);
        logger.warn({ attempt, maxAttempts, delay, retryAfter, context }, `Rate limit detected, honoring Retry-After${contextStr}`);
      }

      logger.warn(
        { attempt, maxAttempts, delay, error: message, context },
        `Retrying operation${contextStr} (attempt ${attempt + 1}/${maxAttempts})`
      );
      await sleep(delay);
    }
  }
}

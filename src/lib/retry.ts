/**
 * Bounded exponential backoff for network calls
 */

import { isTransientError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('retry');

export interface RetryPolicy {
  attempts: number;
  /** Delay of the first retry before clamping; doubles per attempt. */
  multiplierMs: number;
  minDelayMs: number;
  maxDelayMs: number;
}

export const ARXIV_API_RETRY: RetryPolicy = { attempts: 5, multiplierMs: 2000, minDelayMs: 5000, maxDelayMs: 30000 };
export const PDF_RETRY: RetryPolicy = { attempts: 3, multiplierMs: 2000, minDelayMs: 5000, maxDelayMs: 60000 };
export const SCRAPER_RETRY: RetryPolicy = { attempts: 3, multiplierMs: 1000, minDelayMs: 2000, maxDelayMs: 10000 };
export const LLM_RETRY: RetryPolicy = { attempts: 3, multiplierMs: 1000, minDelayMs: 2000, maxDelayMs: 10000 };

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const raw = policy.multiplierMs * Math.pow(2, attempt - 1);
  return Math.min(policy.maxDelayMs, Math.max(policy.minDelayMs, raw));
}

export interface RetryOptions {
  /** Defaults to transient network/HTTP failures only. */
  retryIf?: (error: unknown) => boolean;
  label?: string;
  sleep?: (ms: number) => Promise<void>;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const retryIf = options.retryIf ?? isTransientError;
  const sleep = options.sleep ?? delay;
  const attempts = Math.max(1, policy.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= attempts || !retryIf(error)) {
        throw error;
      }
      const wait = backoffDelay(attempt, policy);
      log.warn(`${options.label ?? 'call'} failed, retrying in ${wait}ms`, {
        attempt,
        of: attempts,
        error: error instanceof Error ? error.message : String(error),
      });
      await sleep(wait);
    }
  }
}

/** Policy with every delay zeroed, for callers that must not wait. */
export function immediate(attempts: number): RetryPolicy {
  return { attempts, multiplierMs: 0, minDelayMs: 0, maxDelayMs: 0 };
}

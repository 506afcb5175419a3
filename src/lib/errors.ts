import axios from 'axios';

/** Malformed input or a document missing a required element. Never retried. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Invalid configuration, or no API key for the configured provider. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** A browser navigation answered with an HTTP error status. */
export class PageLoadError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string) {
    super(`HTTP ${status}: ${url}`);
    this.name = 'PageLoadError';
    this.status = status;
    this.url = url;
  }
}

export type SourceKind = 'api' | 'browser';

export interface SourceAttempt {
  source: SourceKind;
  /** Failure reason, or why the source was skipped. */
  reason: string;
  skipped: boolean;
}

/** Every source of a fallback chain failed or was disabled. */
export class ConnectivityError extends Error {
  readonly target: string;
  readonly attempts: SourceAttempt[];

  constructor(target: string, attempts: SourceAttempt[]) {
    super(ConnectivityError.describe(target, attempts));
    this.name = 'ConnectivityError';
    this.target = target;
    this.attempts = attempts;
  }

  get attemptedSources(): SourceKind[] {
    return this.attempts.filter((a) => !a.skipped).map((a) => a.source);
  }

  private static describe(target: string, attempts: SourceAttempt[]): string {
    const tried = attempts.filter((a) => !a.skipped);
    const parts = attempts.map((a) =>
      a.skipped ? `${a.source} skipped (${a.reason})` : `${a.source} error: ${a.reason}`
    );
    const head = tried.length === 0
      ? `No source available for ${target}`
      : `All sources failed for ${target} (tried: ${tried.map((a) => a.source).join(', ')})`;
    return `${head}. ${parts.join('; ')}`;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const TRANSIENT_CODES = new Set([
  'ECONNABORTED',
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EPIPE',
  'ERR_NETWORK',
]);

/**
 * Network failures, timeouts, failed page loads and retryable HTTP statuses
 * (408, 429, 5xx). Parse and validation errors are not transient.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof PageLoadError) {
    return true;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined) {
      return true;
    }
    return status === 408 || status === 429 || status >= 500;
  }

  if (error instanceof Error) {
    if (error.name === 'TimeoutError') return true;
    return 'code' in error && typeof error.code === 'string' && TRANSIENT_CODES.has(error.code);
  }

  return false;
}

/** Heuristic used by the CLI to suggest a retry. */
export function looksLikeNetworkError(message: string): boolean {
  const lower = message.toLowerCase();
  return (
    lower.includes('connectivity') ||
    lower.includes('all sources failed') ||
    lower.includes('timeout') ||
    lower.includes('timed out') ||
    lower.includes('econnreset') ||
    lower.includes('network') ||
    lower.includes('502') ||
    lower.includes('ssl')
  );
}

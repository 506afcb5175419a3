import type { FetchOrder } from '../config/index.js';
import { ConnectivityError, type SourceAttempt, type SourceKind, errorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('fallback');

export interface SourceStep<T> {
  source: SourceKind;
  /** Why this source may not run; null when it may. */
  disabled: string | null;
  run: () => Promise<T>;
  /** Failure reason for an answer that cannot be used, else null. */
  reject?: (result: T) => string | null;
}

/** Try each source in turn and return the first usable answer. */
export async function firstAvailable<T>(target: string, steps: SourceStep<T>[]): Promise<T> {
  const attempts: SourceAttempt[] = [];

  for (const step of steps) {
    if (step.disabled !== null) {
      log.debug(`Skipping ${step.source} for ${target}: ${step.disabled}`);
      attempts.push({ source: step.source, reason: step.disabled, skipped: true });
      continue;
    }

    try {
      const result = await step.run();
      const rejection = step.reject?.(result) ?? null;
      if (rejection === null) {
        return result;
      }
      log.warn(`${step.source} returned an unusable result for ${target}: ${rejection}`);
      attempts.push({ source: step.source, reason: rejection, skipped: false });
    } catch (error) {
      log.warn(`${step.source} failed for ${target}, trying next source`, { error: errorMessage(error) });
      attempts.push({ source: step.source, reason: errorMessage(error), skipped: false });
    }
  }

  throw new ConnectivityError(target, attempts);
}

export interface OrderedSources<T> {
  order: FetchOrder;
  api: () => Promise<T>;
  browser: () => Promise<T>;
  /** null when the browser may be used */
  browserDisabled: string | null;
  /** Whether `browser_first` may still fall back to the API. */
  apiFallbackAllowed: boolean;
  rejectBrowser?: (result: T) => string | null;
}

/**
 * `api_first`: API, then the browser when enabled.
 * `browser_first`: browser when enabled, then the API only when flex mode allows it.
 */
export function orderSources<T>(sources: OrderedSources<T>): SourceStep<T>[] {
  const browser: SourceStep<T> = {
    source: 'browser',
    disabled: sources.browserDisabled,
    run: sources.browser,
    reject: sources.rejectBrowser,
  };

  if (sources.order === 'api_first') {
    return [{ source: 'api', disabled: null, run: sources.api }, browser];
  }

  return [
    browser,
    {
      source: 'api',
      disabled: sources.apiFallbackAllowed ? null : 'API fallback not enabled in flex_mode',
      run: sources.api,
    },
  ];
}

import type { Logger } from '../obs/logger';
import { errorMessage } from '../utils/errors';
import { sleep as defaultSleep, isAbortError, type Sleep } from '../utils/async';

export interface PageContent {
  body: string;
  finalUrl: string;
  status: number;
}

export type FetchFailureKind = 'network' | 'timeout' | 'http' | 'rate-limited' | 'aborted';

export interface FetchFailure {
  kind: FetchFailureKind;
  message: string;
  status?: number;
  attempts: number;
}

export type FetchOutcome =
  | { ok: true; page: PageContent; attempts: number }
  | { ok: false; failure: FetchFailure };

export interface FetchPageOptions {
  timeoutMs: number;
  /** Retries granted to HTTP 403 responses. Other failures are never retried. */
  maxRetries: number;
  backoffStepMs: number;
  userAgent: string;
  referer: string;
  logger?: Logger;
  signal?: AbortSignal;
  sleep?: Sleep;
  fetchImpl?: typeof fetch;
}

const RATE_LIMITED_STATUS = 403;

type RetryState =
  | { phase: 'attempting'; attempt: number }
  | { phase: 'backing-off'; attempt: number; delayMs: number }
  | { phase: 'succeeded'; attempt: number; page: PageContent }
  | { phase: 'exhausted'; attempt: number }
  | { phase: 'failed'; failure: FetchFailure };

type AttemptResult =
  | { kind: 'page'; page: PageContent }
  | { kind: 'status'; status: number; statusText: string }
  | { kind: 'error'; failureKind: 'network' | 'timeout' | 'aborted'; message: string };

export const buildRequestHeaders = (options: Pick<FetchPageOptions, 'userAgent' | 'referer'>): Record<string, string> => ({
  'User-Agent': options.userAgent,
  Accept:
    'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8,application/signed-exchange;v=b3;q=0.7',
  'Accept-Language': 'en-US,en;q=0.9',
  Referer: options.referer,
  Connection: 'keep-alive',
});

/** Delay before retry number `retry` (1-based): one backoff step per retry already spent. */
export const backoffDelayMs = (retry: number, backoffStepMs: number): number => backoffStepMs * retry;

const attemptFetch = async (url: string, options: FetchPageOptions): Promise<AttemptResult> => {
  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const onAbort = () => controller.abort();
  options.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const response = await fetchImpl(url, {
      method: 'GET',
      headers: buildRequestHeaders(options),
      redirect: 'follow',
      signal: controller.signal,
    });
    if (!response.ok) {
      await response.body?.cancel();
      return { kind: 'status', status: response.status, statusText: response.statusText };
    }
    const body = await response.text();
    return {
      kind: 'page',
      page: { body, finalUrl: response.url || url, status: response.status },
    };
  } catch (error) {
    if (options.signal?.aborted) {
      return { kind: 'error', failureKind: 'aborted', message: 'Aborted' };
    }
    if (timedOut || isAbortError(error)) {
      return { kind: 'error', failureKind: 'timeout', message: `Timed out after ${options.timeoutMs}ms` };
    }
    return { kind: 'error', failureKind: 'network', message: errorMessage(error) };
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onAbort);
  }
};

const nextStateAfterAttempt = (attempt: number, result: AttemptResult, options: FetchPageOptions): RetryState => {
  if (result.kind === 'page') {
    return { phase: 'succeeded', attempt, page: result.page };
  }
  if (result.kind === 'error') {
    return {
      phase: 'failed',
      failure: { kind: result.failureKind, message: result.message, attempts: attempt },
    };
  }
  if (result.status !== RATE_LIMITED_STATUS) {
    return {
      phase: 'failed',
      failure: {
        kind: 'http',
        message: `HTTP ${result.status}${result.statusText ? ` ${result.statusText}` : ''}`,
        status: result.status,
        attempts: attempt,
      },
    };
  }
  if (attempt > options.maxRetries) {
    return { phase: 'exhausted', attempt };
  }
  return { phase: 'backing-off', attempt, delayMs: backoffDelayMs(attempt, options.backoffStepMs) };
};

/**
 * GETs a page. HTTP 403 is retried with a linearly growing delay; every other
 * failure is reported on the first occurrence.
 */
export const fetchPage = async (url: string, options: FetchPageOptions): Promise<FetchOutcome> => {
  const wait = options.sleep ?? defaultSleep;
  let state: RetryState = { phase: 'attempting', attempt: 1 };

  for (;;) {
    switch (state.phase) {
      case 'attempting': {
        const result = await attemptFetch(url, options);
        state = nextStateAfterAttempt(state.attempt, result, options);
        break;
      }
      case 'backing-off': {
        options.logger?.warn('Fetch rate limited, backing off', {
          url,
          attempt: state.attempt,
          delayMs: state.delayMs,
        });
        try {
          await wait(state.delayMs, options.signal);
        } catch (error) {
          if (!isAbortError(error)) throw error;
          state = { phase: 'failed', failure: { kind: 'aborted', message: 'Aborted', attempts: state.attempt } };
          break;
        }
        state = { phase: 'attempting', attempt: state.attempt + 1 };
        break;
      }
      case 'succeeded':
        return { ok: true, page: state.page, attempts: state.attempt };
      case 'exhausted':
        return {
          ok: false,
          failure: {
            kind: 'rate-limited',
            message: `HTTP ${RATE_LIMITED_STATUS} after ${options.maxRetries} retries`,
            status: RATE_LIMITED_STATUS,
            attempts: state.attempt,
          },
        };
      case 'failed':
        options.logger?.warn('Fetch failed', { url, ...state.failure });
        return { ok: false, failure: state.failure };
    }
  }
};

/**
 * Provider Retry Runner
 *
 * Bounded retry with exponential backoff for provider API calls. Rate limits,
 * throttling, 5xx responses and network failures are retried; validation
 * errors (4xx) are not. A `Retry-After` wait from the provider replaces the
 * backoff step. When retries run out on a transient failure the last error is
 * wrapped in a TransientProviderError.
 */

import { ProviderRequestError, TransientProviderError, formatErrorMessage } from './errors.js';

export type RetryConfig = {
  attempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitter?: number;
};

export type RetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  err: unknown;
  label?: string;
};

export type RetryOptions = RetryConfig & {
  label?: string;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  retryAfterMs?: (err: unknown) => number | undefined;
  onRetry?: (info: RetryInfo) => void;
};

export const RETRY_DEFAULTS: Required<RetryConfig> = {
  attempts: 3,
  minDelayMs: 200,
  maxDelayMs: 30_000,
  jitter: 0.2,
};

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

/** Error names/codes the AWS SDK and Node use for transient failures */
const RETRYABLE_CODES = new Set([
  'Throttling',
  'ThrottlingException',
  'TooManyRequestsException',
  'PriorRequestNotComplete',
  'RequestLimitExceeded',
  'ServiceUnavailable',
  'ServiceUnavailableException',
  'InternalError',
  'InternalFailure',
  'RequestTimeout',
  'TimeoutError',
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EAI_AGAIN',
]);

const RETRYABLE_MESSAGE = /throttl|rate exceeded|too many requests|timed? ?out|ECONNRESET|ETIMEDOUT|fetch failed|socket hang up/i;

function statusOf(err: object): number | undefined {
  if (err instanceof ProviderRequestError) return err.status;
  if (!('$metadata' in err) || typeof err.$metadata !== 'object' || err.$metadata === null) {
    return undefined;
  }
  const metadata = err.$metadata;
  return 'httpStatusCode' in metadata && typeof metadata.httpStatusCode === 'number'
    ? metadata.httpStatusCode
    : undefined;
}

function codeOf(err: object): string | undefined {
  if ('code' in err && typeof err.code === 'string') return err.code;
  return 'name' in err && typeof err.name === 'string' ? err.name : undefined;
}

/**
 * Whether a provider error is worth retrying
 */
export function isTransientError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;

  const code = codeOf(err);
  if (code && RETRYABLE_CODES.has(code)) return true;

  const cause = 'cause' in err ? err.cause : undefined;
  if (cause && cause !== err && isTransientError(cause)) return true;

  const status = statusOf(err);
  if (status !== undefined) {
    return status === 429 || status >= 500;
  }

  return RETRYABLE_MESSAGE.test(formatErrorMessage(err));
}

/**
 * Parse a `Retry-After` header (delay-seconds or an HTTP date) into milliseconds
 */
export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

function providerRetryAfter(err: unknown): number | undefined {
  return err instanceof ProviderRequestError ? err.retryAfterMs : undefined;
}

function resolveRetryConfig(overrides?: RetryConfig): Required<RetryConfig> {
  const attempts = Math.max(1, Math.round(overrides?.attempts ?? RETRY_DEFAULTS.attempts));
  const minDelayMs = Math.max(0, Math.round(overrides?.minDelayMs ?? RETRY_DEFAULTS.minDelayMs));
  const maxDelayMs = Math.max(minDelayMs, Math.round(overrides?.maxDelayMs ?? RETRY_DEFAULTS.maxDelayMs));
  const jitter = Math.min(1, Math.max(0, overrides?.jitter ?? RETRY_DEFAULTS.jitter));
  return { attempts, minDelayMs, maxDelayMs, jitter };
}

function applyJitter(delayMs: number, jitter: number): number {
  if (jitter <= 0) return delayMs;
  const offset = (Math.random() * 2 - 1) * jitter;
  return Math.max(0, Math.round(delayMs * (1 + offset)));
}

/**
 * Run `fn`, retrying transient failures with exponential backoff.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { attempts, minDelayMs, maxDelayMs, jitter } = resolveRetryConfig(options);
  const shouldRetry = options.shouldRetry ?? ((err: unknown) => isTransientError(err));
  const retryAfter = options.retryAfterMs ?? providerRetryAfter;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      if (!shouldRetry(err, attempt)) throw err;
      if (attempt >= attempts) {
        const label = options.label ? `${options.label}: ` : '';
        throw new TransientProviderError(
          `${label}gave up after ${attempts} attempts: ${formatErrorMessage(err)}`,
          attempts,
          { cause: err }
        );
      }

      const retryAfterMs = retryAfter(err);
      const hasRetryAfter = typeof retryAfterMs === 'number' && Number.isFinite(retryAfterMs);
      const baseDelay = hasRetryAfter
        ? Math.max(retryAfterMs, minDelayMs)
        : minDelayMs * 2 ** (attempt - 1);
      let delay = Math.min(baseDelay, maxDelayMs);
      delay = applyJitter(delay, jitter);
      delay = Math.min(Math.max(delay, minDelayMs), maxDelayMs);

      options.onRetry?.({
        attempt,
        maxAttempts: attempts,
        delayMs: delay,
        err,
        label: options.label,
      });
      await sleep(delay);
    }
  }
}

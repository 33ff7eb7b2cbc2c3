import { OperationTimeoutError, ProviderError } from '@stratum/contracts';

import { DEFAULT_JITTER_FACTOR, DEFAULT_MAX_ATTEMPTS, DEFAULT_MAX_DELAY_MS, DEFAULT_MIN_DELAY_MS } from './constants';

export interface RetryConfig {
  maxAttempts: number;
  minDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number;
}

export const RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: DEFAULT_MAX_ATTEMPTS,
  minDelayMs: DEFAULT_MIN_DELAY_MS,
  maxDelayMs: DEFAULT_MAX_DELAY_MS,
  jitterFactor: DEFAULT_JITTER_FACTOR,
};

/**
 * Transient network and throttling codes that are safe to retry.
 */
export const RETRYABLE_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EPIPE',
  'EAI_AGAIN',
  'ERR_SOCKET_CONNECTION_TIMEOUT',
  'Throttling',
  'ThrottlingException',
  'RequestLimitExceeded',
  'ServiceUnavailable',
]);

/**
 * Whether a failed provider call may be attempted again.
 * Provider errors carry their own classification; anything else is judged by its code.
 */
export function shouldRetry(error: unknown): boolean {
  if (error instanceof ProviderError) return error.retryable || (error.code !== undefined && RETRYABLE_CODES.has(error.code));
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') return RETRYABLE_CODES.has(error.code);
  return false;
}

/**
 * Exponential backoff with jitter: `minDelayMs * 2^(attempt - 1)`, capped at
 * `maxDelayMs`, moved by up to `jitterFactor` either way.
 */
export function backoffDelay(attempt: number, config: RetryConfig, random: () => number = Math.random): number {
  const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
  const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
  const jitter = cappedDelay * config.jitterFactor * (random() * 2 - 1);
  return Math.round(Math.min(config.maxDelayMs, Math.max(config.minDelayMs, cappedDelay + jitter)));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Rejects with a retryable OperationTimeoutError when `task` takes longer than `timeoutMs` */
export async function withTimeout<T>(task: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new OperationTimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([task, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Retry with exponential backoff for VaultWarden requests
 *
 * A failure is one of:
 * - `rate-limited`: 429; waits for Retry-After when the server sends one
 * - `server`: a 5xx status from the retryable list
 * - `transport`: timeout, reset or refused connection; the request may or
 *   may not have reached the server
 * - `permanent`: anything else, returned at once
 *
 * Transport failures are only retried for idempotent requests. Repeating an
 * invite POST that may already have been applied would turn a success into
 * an "already invited" error.
 */

import type { RetryConfig, RetryResult } from './types.js';
import { logger, type Logger } from '../utils/logger.js';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
  retryableStatuses: [429, 500, 502, 503, 504],
};

const RATE_LIMIT_STATUS = 429;

/** Substrings of Node socket errors that mean the connection failed */
const TRANSPORT_ERROR_CODES = ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'socket hang up'];

// =============================================================================
// Types
// =============================================================================

export type FailureKind = 'rate-limited' | 'server' | 'transport' | 'permanent';

export interface RetryOptions extends RetryConfig {
  /** False for requests that must not be repeated after a transport failure */
  idempotent?: boolean;
  logger?: Logger;
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Replacement delay function, used by tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Non-2xx answer from VaultWarden
 */
export class ApiRequestError extends Error {
  public readonly status: number;
  /** Parsed JSON error body, when there was one */
  public readonly details?: Record<string, unknown>;
  /** Seconds from the Retry-After header */
  public readonly retryAfter?: number;

  constructor(
    message: string,
    status: number,
    options?: { details?: Record<string, unknown>; retryAfter?: number; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'ApiRequestError';
    this.status = status;
    this.details = options?.details;
    this.retryAfter = options?.retryAfter;
  }

  isRateLimited(): boolean {
    return this.status === RATE_LIMIT_STATUS;
  }

  /** The server rejected the credentials or the token */
  isAuthError(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

// =============================================================================
// Classification
// =============================================================================

export function classifyFailure(
  error: Error,
  retryableStatuses: readonly number[] = DEFAULT_RETRY_CONFIG.retryableStatuses
): FailureKind {
  if (error instanceof ApiRequestError) {
    if (!retryableStatuses.includes(error.status)) {
      return 'permanent';
    }
    return error.isRateLimited() ? 'rate-limited' : 'server';
  }

  // undici reports connection failures as TypeError('fetch failed'); an
  // expired request timer aborts with AbortError
  if (error.name === 'TypeError' && error.message.includes('fetch')) {
    return 'transport';
  }
  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return 'transport';
  }

  const message = error.message.toLowerCase();
  return TRANSPORT_ERROR_CODES.some((code) => message.includes(code.toLowerCase())) ? 'transport' : 'permanent';
}

export function shouldRetry(kind: FailureKind, idempotent: boolean): boolean {
  switch (kind) {
    case 'rate-limited':
    case 'server':
      return true;
    case 'transport':
      return idempotent;
    case 'permanent':
      return false;
  }
}

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Backoff for the given 1-based attempt: `baseDelay * 2^(attempt-1)` with
 * +/- jitter, or the server's Retry-After (in seconds) when it sent one
 */
export function calculateDelay(attempt: number, config: Required<RetryConfig>, retryAfter?: number): number {
  if (retryAfter !== undefined && retryAfter > 0) {
    const jitter = Math.random() * config.baseDelayMs * config.jitterFactor;
    return Math.min(retryAfter * 1000 + jitter, config.maxDelayMs);
  }

  const exponential = config.baseDelayMs * 2 ** (attempt - 1);
  const spread = exponential * config.jitterFactor;
  const jitter = Math.random() * spread * 2 - spread;

  return Math.min(Math.max(exponential + jitter, 0), config.maxDelayMs);
}

/**
 * Parse a Retry-After header (seconds or an HTTP date) into seconds
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;

  const seconds = Number.parseInt(value, 10);
  if (!Number.isNaN(seconds) && seconds > 0) {
    return seconds;
  }

  const delayMs = new Date(value).getTime() - Date.now();
  return !Number.isNaN(delayMs) && delayMs > 0 ? Math.ceil(delayMs / 1000) : undefined;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Retry Loop
// =============================================================================

/**
 * Run `fn` until it succeeds, fails with something not worth retrying, or
 * runs out of attempts. Never throws; the last error is in the result.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<RetryResult<T>> {
  const config: Required<RetryConfig> = {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor: options.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
    retryableStatuses: options.retryableStatuses ?? DEFAULT_RETRY_CONFIG.retryableStatuses,
  };
  const idempotent = options.idempotent ?? true;
  const log = options.logger ?? logger;
  const wait = options.sleep ?? sleep;
  const startTime = Date.now();

  for (let attempt = 1; ; attempt++) {
    try {
      const data = await fn();
      if (attempt > 1) {
        log.info(`Request succeeded after ${attempt} attempts`);
      }
      return { success: true, data, attempts: attempt, totalTimeMs: Date.now() - startTime };
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      const kind = classifyFailure(error, config.retryableStatuses);
      const failed: RetryResult<T> = { success: false, error, attempts: attempt, totalTimeMs: Date.now() - startTime };

      if (!shouldRetry(kind, idempotent)) {
        if (kind === 'transport') {
          log.warn('Not repeating a request that may already have been applied', { error: error.message });
        }
        return failed;
      }
      if (attempt > config.maxRetries) {
        if (config.maxRetries > 0) {
          log.warn(`All ${config.maxRetries} retry attempts exhausted`, { error: error.message, kind });
        }
        return failed;
      }

      const retryAfter = error instanceof ApiRequestError ? error.retryAfter : undefined;
      const delayMs = calculateDelay(attempt, config, retryAfter);
      log.info(`Retry attempt ${attempt}/${config.maxRetries} in ${Math.round(delayMs)}ms`, {
        error: error.message,
        kind,
      });
      options.onRetry?.(attempt, error, delayMs);

      await wait(delayMs);
    }
  }
}

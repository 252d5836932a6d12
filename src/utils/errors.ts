/**
 * Error Handling Utilities
 *
 * Typed application errors and retry logic for transient platform failures.
 * Nothing here is fatal to the process: callers log and degrade to
 * "state unchanged" or "fresh start".
 */

import { logger } from './logger.js';

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, isOperational: boolean = true) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Discord API error that is not a permission problem
 */
export class DiscordAPIError extends AppError {
  public readonly discordCode: number | undefined;
  public readonly httpStatus: number | undefined;

  constructor(message: string, discordCode?: number, httpStatus?: number) {
    super(message, 'DISCORD_API_ERROR');
    this.discordCode = discordCode;
    this.httpStatus = httpStatus;
  }
}

/**
 * The platform refused a role or message mutation
 */
export class PermissionDeniedError extends AppError {
  public readonly action: string;

  constructor(action: string, message: string = `Missing permission to ${action}`) {
    super(message, 'PERMISSION_DENIED');
    this.action = action;
  }
}

/**
 * Channel history could not be fetched
 */
export class HistoryUnavailableError extends AppError {
  public readonly channelId: string;

  constructor(channelId: string, cause?: unknown) {
    super(
      `Could not fetch history for channel ${channelId}: ${describeError(cause)}`,
      'HISTORY_UNAVAILABLE'
    );
    this.channelId = channelId;
  }
}

/**
 * The persisted state payload failed to parse
 */
export class PayloadCorruptError extends AppError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'PAYLOAD_CORRUPT');
    this.issues = issues;
  }
}

/**
 * Invalid configuration value
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID', false);
  }
}

/**
 * Configuration for retry logic
 */
export interface RetryConfig {
  /** Maximum number of attempts */
  maxAttempts: number;
  /** Initial delay in milliseconds */
  initialDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
  shouldRetry?: (error: unknown) => boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Render any thrown value as a log-safe message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Check if an error is retryable (transient)
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof PermissionDeniedError) {
    return false;
  }

  if (error instanceof DiscordAPIError) {
    const status = error.httpStatus ?? 0;
    return status === 429 || status >= 500;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('rate limit') ||
      message.includes('econnreset') ||
      message.includes('etimedout') ||
      message.includes('socket hang up') ||
      message.includes('network')
    );
  }

  return false;
}

/**
 * Execute a function with retry logic for transient failures
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {},
  context?: string
): Promise<T> {
  const cfg = { ...DEFAULT_RETRY_CONFIG, ...config };
  const shouldRetry = cfg.shouldRetry ?? isRetryableError;

  let lastError: unknown;
  let delay = cfg.initialDelayMs;

  for (let attempt = 1; attempt <= cfg.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === cfg.maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      logger.warn(
        {
          attempt,
          maxAttempts: cfg.maxAttempts,
          delay,
          context,
          error: describeError(error),
        },
        'Retrying after transient error'
      );

      await sleep(delay);
      delay = Math.min(delay * cfg.backoffMultiplier, cfg.maxDelayMs);
    }
  }

  throw lastError;
}

/**
 * Run a platform side effect whose failure must not abort the caller.
 * Returns false when the effect did not take place.
 */
export async function safeExecute(
  fn: () => Promise<void>,
  context: Record<string, unknown>
): Promise<boolean> {
  try {
    await fn();
    return true;
  } catch (error) {
    if (error instanceof PermissionDeniedError) {
      logger.warn({ ...context, action: error.action }, 'Permission denied by platform');
      return false;
    }

    logger.error({ ...context, error: describeError(error) }, 'Platform side effect failed');
    return false;
  }
}

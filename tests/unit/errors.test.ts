/**
 * Error Utility Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  },
}));

import {
  DiscordAPIError,
  HistoryUnavailableError,
  PermissionDeniedError,
  isRetryableError,
  safeExecute,
  withRetry,
} from '../../src/utils/errors.js';
import { logger } from '../../src/utils/logger.js';

describe('isRetryableError', () => {
  it('retries rate limits and server errors', () => {
    expect(isRetryableError(new DiscordAPIError('slow down', undefined, 429))).toBe(true);
    expect(isRetryableError(new DiscordAPIError('bad gateway', undefined, 502))).toBe(true);
    expect(isRetryableError(new Error('read ECONNRESET'))).toBe(true);
  });

  it('does not retry permission or client errors', () => {
    expect(isRetryableError(new PermissionDeniedError('add title role'))).toBe(false);
    expect(isRetryableError(new DiscordAPIError('unknown message', 10008, 404))).toBe(false);
    expect(isRetryableError('boom')).toBe(false);
  });
});

describe('withRetry', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('retries a transient failure', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new DiscordAPIError('bad gateway', undefined, 502))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, { initialDelayMs: 0 }, 'test')).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('gives up on a permanent failure', async () => {
    const failure = new HistoryUnavailableError('c1', 'Missing Access');
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

    await expect(withRetry(fn, { initialDelayMs: 0 })).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('stops after the last attempt', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('network down'));

    await expect(withRetry(fn, { maxAttempts: 2, initialDelayMs: 0 })).rejects.toThrow('network down');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe('safeExecute', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('reports success', async () => {
    expect(await safeExecute(async () => undefined, { step: 'noop' })).toBe(true);
  });

  it('logs a permission refusal as a warning', async () => {
    const result = await safeExecute(async () => {
      throw new PermissionDeniedError('remove title role');
    }, { playerId: '1' });

    expect(result).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      { playerId: '1', action: 'remove title role' },
      'Permission denied by platform'
    );
  });

  it('logs other failures as errors', async () => {
    const result = await safeExecute(async () => {
      throw new Error('gateway closed');
    }, { playerId: '1' });

    expect(result).toBe(false);
    expect(logger.error).toHaveBeenCalledWith(
      { playerId: '1', error: 'gateway closed' },
      'Platform side effect failed'
    );
  });
});

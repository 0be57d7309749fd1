/**
 * Retry Utility Unit Tests
 */

import {
  backoffDelays,
  isTransientScriptError,
  RetryError,
  type RetryPolicy,
  retryWithBackoff,
  SCRIPT_READ_POLICY,
} from '../../src/utils/retry.js';

describe('Retry Utility', () => {
  let sleep: jest.Mock<Promise<void>, [number]>;

  beforeEach(() => {
    sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
  });

  describe('backoffDelays', () => {
    it('should double from the initial delay', () => {
      expect(backoffDelays(SCRIPT_READ_POLICY)).toEqual([500, 1000]);
    });

    it('should cap delays at maxDelayMs', () => {
      const policy: RetryPolicy = { maxAttempts: 5, initialDelayMs: 1000, maxDelayMs: 3000, multiplier: 2 };

      expect(backoffDelays(policy)).toEqual([1000, 2000, 3000, 3000]);
    });

    it('should have no delays for a single attempt', () => {
      expect(backoffDelays({ ...SCRIPT_READ_POLICY, maxAttempts: 1 })).toEqual([]);
    });
  });

  describe('retryWithBackoff', () => {
    it('should succeed on first attempt if no error', async () => {
      const fn = jest.fn<Promise<string>, []>().mockResolvedValue('success');

      await expect(retryWithBackoff(fn, SCRIPT_READ_POLICY, { sleep })).resolves.toBe('success');
      expect(fn).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should retry on failure and succeed', async () => {
      const fn = jest
        .fn<Promise<string>, []>()
        .mockRejectedValueOnce(new Error('Calendar got an error: AppleEvent timed out'))
        .mockResolvedValueOnce('events');

      await expect(retryWithBackoff(fn, SCRIPT_READ_POLICY, { sleep })).resolves.toBe('events');
      expect(fn).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledWith(500);
    });

    it('should throw RetryError after the last attempt', async () => {
      const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('osascript crashed'));

      const error = await retryWithBackoff(fn, SCRIPT_READ_POLICY, { sleep }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetryError);
      expect(error).toMatchObject({ attempts: 3, message: 'Failed after 3 attempts: osascript crashed' });
      expect(fn).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls).toEqual([[500], [1000]]);
    });

    it('should report each retry with its delay', async () => {
      const onRetry = jest.fn();
      const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('busy'));

      await expect(retryWithBackoff(fn, SCRIPT_READ_POLICY, { sleep, onRetry })).rejects.toThrow(RetryError);

      expect(onRetry).toHaveBeenCalledTimes(2);
      expect(onRetry).toHaveBeenNthCalledWith(1, expect.any(Error), 1, 500);
      expect(onRetry).toHaveBeenNthCalledWith(2, expect.any(Error), 2, 1000);
    });

    it('should rethrow permanent errors immediately', async () => {
      const denied = new Error('Not authorized to send Apple events to Calendar. (-1743)');
      const fn = jest.fn<Promise<string>, []>().mockRejectedValue(denied);

      await expect(retryWithBackoff(fn, SCRIPT_READ_POLICY, { sleep })).rejects.toBe(denied);
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should honour a custom retryable predicate', async () => {
      const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('osascript crashed'));

      await expect(
        retryWithBackoff(fn, SCRIPT_READ_POLICY, { sleep, isRetryable: () => false })
      ).rejects.toThrow('osascript crashed');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should wrap non-Error rejections', async () => {
      const fn = jest.fn<Promise<string>, []>().mockRejectedValue('exit status 1');

      await expect(
        retryWithBackoff(fn, { ...SCRIPT_READ_POLICY, maxAttempts: 1 }, { sleep })
      ).rejects.toThrow('Failed after 1 attempts: exit status 1');
    });
  });

  describe('isTransientScriptError', () => {
    it('should treat unknown script failures as transient', () => {
      expect(isTransientScriptError(new Error('osascript crashed'))).toBe(true);
      expect(isTransientScriptError(new Error('AppleEvent timed out'))).toBe(true);
    });

    it('should treat authorization and lookup failures as permanent', () => {
      expect(isTransientScriptError(new Error('Not authorized to send Apple events'))).toBe(false);
      expect(isTransientScriptError(new Error('execution error (-1743)'))).toBe(false);
      expect(isTransientScriptError(new Error('Calendar not found'))).toBe(false);
      expect(isTransientScriptError(new Error('syntax error: expected end of line'))).toBe(false);
    });
  });

  describe('RetryError', () => {
    it('should contain the last error and attempt count', () => {
      const last = new Error('busy');
      const error = new RetryError(last, 2);

      expect(error.name).toBe('RetryError');
      expect(error.lastError).toBe(last);
      expect(error.attempts).toBe(2);
      expect(error).toBeInstanceOf(Error);
    });
  });
});

/**
 * Backoff for calendar store scripts
 *
 * osascript occasionally fails while Calendar.app is launching or syncing;
 * those failures clear on a later attempt. Authorization and lookup failures
 * never do.
 */

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export const SCRIPT_READ_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 5000,
  multiplier: 2,
};

export interface RetryHooks {
  /** Defaults to isTransientScriptError */
  isRetryable?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /** Replaced in tests to skip real waiting */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Raised once every attempt allowed by the policy has failed
 */
export class RetryError extends Error {
  public readonly lastError: Error;
  public readonly attempts: number;

  constructor(lastError: Error, attempts: number) {
    super(`Failed after ${attempts} attempts: ${lastError.message}`);
    this.name = 'RetryError';
    this.lastError = lastError;
    this.attempts = attempts;

    Object.setPrototypeOf(this, RetryError.prototype);
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Waits between consecutive attempts: one entry fewer than maxAttempts
 */
export function backoffDelays(policy: RetryPolicy): number[] {
  const delays: number[] = [];
  let next = policy.initialDelayMs;
  for (let attempt = 1; attempt < policy.maxAttempts; attempt++) {
    delays.push(Math.min(next, policy.maxDelayMs));
    next *= policy.multiplier;
  }
  return delays;
}

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy = SCRIPT_READ_POLICY,
  hooks: RetryHooks = {}
): Promise<T> {
  const isRetryable = hooks.isRetryable ?? isTransientScriptError;
  const sleep = hooks.sleep ?? defaultSleep;
  const delays = backoffDelays(policy);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      if (!isRetryable(failure)) {
        throw failure;
      }

      if (attempt >= delays.length + 1) {
        throw new RetryError(failure, attempt);
      }

      const delayMs = delays[attempt - 1];
      hooks.onRetry?.(failure, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}

/**
 * -1743 is the Apple Events "not permitted" status raised by osascript.
 */
const PERMANENT_SCRIPT_FAILURES = [
  /permission denied/i,
  /access denied/i,
  /not authorized/i,
  /not allowed/i,
  /-1743/,
  /invalid/i,
  /not found/i,
  /does not exist/i,
  /syntax error/i,
];

/**
 * Anything not recognised as permanent is worth another attempt
 */
export function isTransientScriptError(error: Error): boolean {
  return !PERMANENT_SCRIPT_FAILURES.some((pattern) => pattern.test(error.message));
}

/**
 * Reconnect backoff policies.
 *
 * Attempts are counted from 1: the first restart after a failed session
 * waits computeBackoffDelay(policy, 1).
 */

export interface FixedBackoff {
  kind: 'fixed';
  delayMs: number;
}

export interface ExponentialBackoff {
  kind: 'exponential';
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
}

export type BackoffPolicy = FixedBackoff | ExponentialBackoff;

export const DEFAULT_BACKOFF: ExponentialBackoff = {
  kind: 'exponential',
  initialDelayMs: 3000,
  multiplier: 2,
  maxDelayMs: 30000,
};

/** Exponential: initial * multiplier^(attempt-1), capped at max */
export function computeBackoffDelay(policy: BackoffPolicy, attempt: number): number {
  const n = Math.max(1, Math.floor(attempt));
  switch (policy.kind) {
    case 'fixed':
      return policy.delayMs;
    case 'exponential': {
      const delay = policy.initialDelayMs * Math.pow(policy.multiplier, n - 1);
      return Math.min(delay, policy.maxDelayMs);
    }
    default: {
      const unknown: never = policy;
      throw new Error(`Unknown backoff policy: ${JSON.stringify(unknown)}`);
    }
  }
}

import { SERVICE } from './config.js';
import { ProvisioningError, UnreachableError, describeError } from './errors.js';

export type Backoff = 'fixed' | 'exponential';

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
  backoff: Backoff;
  maxDelayMs: number;
}

export interface WaitOptions {
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Delay before retrying after the given (1-based) failed attempt. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  if (policy.backoff === 'fixed') return Math.min(policy.delayMs, policy.maxDelayMs);
  return Math.min(policy.delayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
}

function abortedError(label: string) {
  return new ProvisioningError('aborted', `gave up waiting for ${label}: aborted`, { resource: label });
}

/**
 * Poll `probe` until it resolves, at most `policy.attempts` times.
 * Exhaustion raises an UnreachableError carrying the last failure.
 */
export async function waitFor<T>(label: string, probe: () => Promise<T>, policy: RetryPolicy, opts: WaitOptions = {}): Promise<T> {
  const pause = opts.sleep ?? sleep;
  let lastError: unknown;
  for (let attempt = 1; attempt <= policy.attempts; attempt++) {
    if (opts.signal?.aborted) throw abortedError(label);
    try {
      return await probe();
    } catch (err) {
      lastError = err;
      if (attempt === policy.attempts) break;
      const delay = backoffDelay(policy, attempt);
      console.warn(`[${SERVICE}] ${label} not ready (attempt ${attempt}/${policy.attempts}): ${describeError(err)}; retrying in ${delay}ms`);
      await pause(delay);
    }
  }
  throw new UnreachableError(
    `${label} did not become ready after ${policy.attempts} attempts: ${describeError(lastError)}`,
    { resource: label, cause: lastError },
  );
}

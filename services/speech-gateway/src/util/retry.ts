import { isServiceError } from "../errors";
import { errMessage, log } from "./log";

export interface RetryPolicy {
  /** Attempts after the first one. */
  retries: number;
  baseDelayMs: number;
  /** 1 gives a fixed delay, 2 doubles it per attempt. */
  factor: number;
  maxDelayMs: number;
}

export interface RetryOptions extends RetryPolicy {
  label: string;
  shouldRetry?: (err: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const backoffDelay = (policy: RetryPolicy, attempt: number): number =>
  Math.min(policy.maxDelayMs, Math.round(policy.baseDelayMs * policy.factor ** attempt));

const defaultShouldRetry = (err: unknown) => isServiceError(err) && err.retryable;

/**
 * Runs `fn` until it succeeds, the predicate rejects the error, or the retry
 * budget is spent. The last error is rethrown unchanged.
 */
export const withRetry = async <T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> => {
  const shouldRetry = opts.shouldRetry ?? defaultShouldRetry;
  const sleep = opts.sleep ?? delay;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= opts.retries || !shouldRetry(err)) throw err;
      const waitMs = backoffDelay(opts, attempt);
      log.warn("attempt failed, retrying", {
        op: opts.label,
        attempt: attempt + 1,
        retriesLeft: opts.retries - attempt,
        waitMs,
        kind: isServiceError(err) ? err.kind : undefined,
        err: errMessage(err),
      });
      await sleep(waitMs);
    }
  }
};

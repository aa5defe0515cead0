import { setTimeout as delay } from "node:timers/promises";
import {
  InterruptedError,
  OperationTimeoutError,
  RateLimitError,
  RateLimitWaitError,
  classifyError,
  type ErrorClass,
} from "../errors.js";
import type { PublishConfig } from "../types/config.js";

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the computed delay added at random, 0..1. */
  jitter: number;
  classify: (e: unknown) => ErrorClass;
  /** Longest advertised rate-limit wait honoured in-process; defaults to DEFAULT_RATE_LIMIT_WAIT_MS. */
  maxRateLimitWaitMs?: number;
};

export const DEFAULT_RATE_LIMIT_WAIT_MS = 5 * 60_000;

/** Waits up to maxDelayMs are always taken, whatever the rate-limit ceiling says. */
export function rateLimitWaitLimit(policy: RetryPolicy): number {
  return Math.max(policy.maxDelayMs, policy.maxRateLimitWaitMs ?? DEFAULT_RATE_LIMIT_WAIT_MS);
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export function policyFromConfig(publish: PublishConfig, maxAttempts = publish.max_attempts): RetryPolicy {
  return {
    maxAttempts,
    baseDelayMs: publish.base_delay_ms,
    maxDelayMs: publish.max_delay_ms,
    jitter: publish.jitter,
    classify: classifyError,
  };
}

/**
 * Delay before the attempt after failed attempt `attempt` (1-based):
 * base·2^(attempt-1), capped at maxDelayMs, plus jitter. A rate limit that
 * names its own wait wins over the computed value; retryWithBackoff refuses
 * to sleep through one longer than rateLimitWaitLimit.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, error: unknown, random: () => number = Math.random): number {
  if (error instanceof RateLimitError && error.retryAfterMs !== null) return error.retryAfterMs;
  const exp = Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
  return Math.round(exp + exp * policy.jitter * random());
}

export type RetryHooks = {
  /** Attempt number to start from; earlier attempts were used by a previous run. */
  firstAttempt?: number;
  signal?: AbortSignal;
  sleep?: Sleep;
  random?: () => number;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
};

/**
 * Run `op` until it succeeds, fails fatally, or runs out of attempts. The last
 * error is rethrown as-is. An abort while waiting throws InterruptedError.
 */
export async function retryWithBackoff<T>(
  op: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const sleep = hooks.sleep ?? defaultSleep;

  for (let attempt = hooks.firstAttempt ?? 1; ; attempt++) {
    try {
      return await op(attempt);
    } catch (e) {
      if (policy.classify(e) === "fatal" || attempt >= policy.maxAttempts) throw e;
      if (hooks.signal?.aborted) throw new InterruptedError();

      const delayMs = backoffDelay(policy, attempt, e, hooks.random);
      const limitMs = rateLimitWaitLimit(policy);
      if (e instanceof RateLimitError && delayMs > limitMs) throw new RateLimitWaitError(delayMs, limitMs, e);
      hooks.onRetry?.({ attempt, delayMs, error: e });
      try {
        await sleep(delayMs, hooks.signal);
      } catch (sleepError) {
        if (hooks.signal?.aborted) throw new InterruptedError();
        throw sleepError;
      }
    }
  }
}

/**
 * Race `run` against a timer. On expiry the operation's signal is aborted
 * and OperationTimeoutError (transient) is thrown.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new OperationTimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

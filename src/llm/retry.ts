import { sleep as defaultSleep } from "../core/utils.js";

import { LlmError, LlmRateLimitError } from "./client.js";

export type RateLimitRetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: LlmRateLimitError;
};

export type RateLimitRetryOptions = {
  maxAttempts: number;
  delayMs: number;
  sleep?: (durationMs: number) => Promise<void>;
  onRetry?: (info: RateLimitRetryInfo) => void;
};

/**
 * Run `fn`, retrying with a fixed delay only while it fails with a rate-limit error.
 * Any other error propagates on the first occurrence.
 */
export async function retryOnRateLimit<T>(
  fn: () => Promise<T>,
  opts: RateLimitRetryOptions,
): Promise<T> {
  const maxAttempts = Math.max(1, opts.maxAttempts);
  const sleep = opts.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof LlmRateLimitError)) {
        throw err;
      }
      if (attempt >= maxAttempts) {
        throw new LlmError(
          `LLM request still rate limited after ${maxAttempts} attempt(s): ${err.message}`,
          err,
        );
      }
      opts.onRetry?.({ attempt, maxAttempts, delayMs: opts.delayMs, error: err });
      await sleep(opts.delayMs);
    }
  }
}

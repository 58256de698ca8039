import type { RetryContext, RetryHooks, RetryPolicy, Sleeper } from "../ports/retry-policy";

/**
 * Runs fn until it resolves, the policy refuses the error, or attempts run
 * out. The last error is rethrown as is.
 */
export async function withRetry<T>(
  fn: (ctx: RetryContext) => Promise<T>,
  policy: RetryPolicy,
  sleep: Sleeper,
  hooks: RetryHooks = {}
): Promise<T> {
  const ctx: RetryContext = { attempt: 0 };

  for (;;) {
    ctx.attempt += 1;
    try {
      return await fn({ ...ctx });
    } catch (err) {
      ctx.lastError = err;
      const willRetry = ctx.attempt < policy.maxAttempts && policy.shouldRetry(err);
      hooks.onAttemptFailed?.(err, { ...ctx }, willRetry);
      if (!willRetry) throw err;
      await sleep(policy.delayMs);
    }
  }
}

import type { RetryPolicy } from "../ports/retry-policy";
import { FileNotStableError, SameFileError } from "./errors";

/**
 * Same delay between every attempt. A file that vanished or never settled,
 * or a destination that is the source itself, is not retried.
 */
export function fixedDelayRetryPolicy(maxAttempts: number, delayMs: number): RetryPolicy {
  return {
    maxAttempts: Math.max(1, maxAttempts),
    delayMs,
    shouldRetry: (err) => !(err instanceof FileNotStableError || err instanceof SameFileError),
  };
}

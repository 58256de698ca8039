export type RetryContext = {
  attempt: number;
  lastError?: unknown;
};

export type RetryPolicy = {
  maxAttempts: number;            // ex: 3
  delayMs: number;                // ex: 2000, same pause before every retry
  shouldRetry: (err: unknown) => boolean;
};

export type RetryHooks = {
  onAttemptFailed?: (err: unknown, ctx: RetryContext, willRetry: boolean) => void;
};

export type Sleeper = (ms: number) => Promise<void>;

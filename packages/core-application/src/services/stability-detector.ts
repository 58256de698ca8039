import fs from "node:fs/promises";
import type { Logger } from "pino";

import type { Sleeper } from "../ports/retry-policy";
import type { NotStableReason } from "../application/errors";

export type StabilityOptions = {
  thresholdMs: number;
  pollIntervalMs: number;
  /** Give up after this much waiting. Unbounded when absent. */
  maxWaitMs?: number;
};

export type StabilityOutcome =
  | { stable: true; sizeBytes: number; waitedMs: number }
  | { stable: false; reason: NotStableReason; waitedMs: number };

/**
 * Decides a file is safe to read once its size has stayed the same for
 * `thresholdMs`. The unchanged duration is counted in whole poll intervals.
 */
export class StabilityDetector {
  private readonly log: Logger;

  constructor(
    private readonly options: StabilityOptions,
    private readonly sleep: Sleeper,
    logger: Logger
  ) {
    this.log = logger.child({ component: "stability-detector" });
  }

  async waitUntilStable(filePath: string): Promise<StabilityOutcome> {
    const { thresholdMs, pollIntervalMs, maxWaitMs } = this.options;

    let lastSize = -1;
    let unchangedMs = 0;
    let waitedMs = 0;

    for (;;) {
      let size: number;
      try {
        size = (await fs.stat(filePath)).size;
      } catch (err) {
        this.log.warn({ path: filePath, waitedMs, err }, "file vanished while waiting for it to settle");
        return { stable: false, reason: "vanished", waitedMs };
      }

      if (size === lastSize) {
        unchangedMs += pollIntervalMs;
      } else {
        lastSize = size;
        unchangedMs = 0;
      }

      if (unchangedMs >= thresholdMs) {
        this.log.debug({ path: filePath, sizeBytes: size, waitedMs }, "file is stable");
        return { stable: true, sizeBytes: size, waitedMs };
      }

      if (maxWaitMs !== undefined && waitedMs + pollIntervalMs > maxWaitMs) {
        this.log.warn({ path: filePath, sizeBytes: size, waitedMs, maxWaitMs }, "file did not settle in time");
        return { stable: false, reason: "timed_out", waitedMs };
      }

      await this.sleep(pollIntervalMs);
      waitedMs += pollIntervalMs;
    }
  }

  async isStable(filePath: string): Promise<boolean> {
    return (await this.waitUntilStable(filePath)).stable;
  }
}

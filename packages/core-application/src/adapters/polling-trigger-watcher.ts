import fs from "node:fs/promises";

import type { TriggerWatcher } from "../ports/trigger-watcher";
import type { Sleeper } from "../ports/retry-policy";

async function isRegularFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}

/** Checks for the marker once per poll interval. */
export class PollingTriggerWatcher implements TriggerWatcher {
  constructor(
    private readonly pollIntervalMs: number,
    private readonly sleep: Sleeper
  ) {}

  async waitForMarker(markerPath: string, signal?: AbortSignal): Promise<boolean> {
    for (;;) {
      if (signal?.aborted) return false;
      if (await isRegularFile(markerPath)) return true;
      await this.sleep(this.pollIntervalMs);
    }
  }
}

import chokidar from "chokidar";
import type { FSWatcher } from "chokidar";
import path from "path";

import type { TriggerWatcher } from "../ports/trigger-watcher";

export type ChokidarTriggerWatcherOptions = {
  /** Fall back to stat polling (network mounts, containers without inotify). */
  usePolling?: boolean;
  /** Stat interval while polling; native events ignore it. */
  pollIntervalMs?: number;
};

/**
 * Wakes as soon as the marker shows up instead of waiting for the next poll.
 * A marker already present when the wait starts is reported by the initial
 * scan.
 */
export class ChokidarTriggerWatcher implements TriggerWatcher {
  constructor(private readonly options: ChokidarTriggerWatcherOptions = {}) {}

  async waitForMarker(markerPath: string, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return false;

    const markerAbs = path.resolve(markerPath);
    const watcher: FSWatcher = chokidar.watch(path.dirname(markerAbs), {
      persistent: true,
      ignoreInitial: false,
      depth: 0,
      usePolling: this.options.usePolling ?? false,
      interval: this.options.pollIntervalMs,
    });

    let settle: (present: boolean) => void = () => {};
    const found = new Promise<boolean>((resolve, reject) => {
      settle = resolve;
      watcher
        .on("add", (p: string) => {
          if (path.resolve(p) === markerAbs) resolve(true);
        })
        .on("error", (err: unknown) => reject(err));
    });

    const onAbort = () => settle(false);
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      return await found;
    } finally {
      signal?.removeEventListener("abort", onAbort);
      await watcher.close();
    }
  }
}

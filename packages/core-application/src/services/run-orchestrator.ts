import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";

import type { Clock } from "../ports/clock";
import type { ManifestStore } from "../ports/manifest-store";
import type { Sleeper } from "../ports/retry-policy";
import type { TriggerWatcher } from "../ports/trigger-watcher";
import { ManifestWriteError } from "../application/errors";
import type { ManifestBuilder } from "./manifest-builder";
import type { CopyPassResult, HashedCopyEngine } from "./hashed-copy-engine";
import type { StabilityDetector } from "./stability-detector";

export type LoopState = "waiting" | "processing";

export type PassSummary = {
  manifestPath: string | null;
  manifest: { succeeded: number; failed: number };
  copy: CopyPassResult;
};

export class RunOrchestrator {
  private readonly log: Logger;
  private loopState: LoopState = "waiting";

  constructor(
    private readonly deps: {
      sourceDir: string;
      triggerFileName: string;
      pollIntervalMs: number;
      builder: ManifestBuilder;
      manifestStore: ManifestStore;
      copier: HashedCopyEngine;
      detector: StabilityDetector;
      triggers: TriggerWatcher;
      clock: Clock;
      sleep: Sleeper;
    },
    logger: Logger
  ) {
    this.log = logger.child({ component: "orchestrator" });
  }

  get state(): LoopState {
    return this.loopState;
  }

  get triggerPath(): string {
    return path.join(path.resolve(this.deps.sourceDir), this.deps.triggerFileName);
  }

  /**
   * One pass: manifest first, then the copy engine over a fresh listing.
   * An empty source directory is a no-op: no manifest, no copy pass.
   */
  async processOnce(checkStable = true): Promise<PassSummary> {
    const { builder, manifestStore, copier, clock } = this.deps;

    const built = await builder.build(checkStable);
    const manifestCounts = { succeeded: built.succeeded, failed: built.failed };

    if (built.succeeded === 0 && built.failed === 0) {
      this.log.info({ sourceDir: this.deps.sourceDir }, "no files in source directory, nothing to do");
      return { manifestPath: null, manifest: manifestCounts, copy: { found: 0, succeeded: 0, failed: 0 } };
    }

    let manifestPath: string;
    try {
      manifestPath = await manifestStore.write({
        generatedAtSec: Math.floor(clock.now() / 1000),
        sourceDir: this.deps.sourceDir,
        files: built.entries,
      });
    } catch (err) {
      throw new ManifestWriteError(`Could not write manifest into ${this.deps.sourceDir}`, err);
    }

    const copy = await copier.copyAll(checkStable);

    this.log.info(
      {
        found: copy.found,
        succeeded: copy.succeeded,
        failed: copy.failed,
        manifestPath,
        manifestSucceeded: built.succeeded,
        manifestFailed: built.failed,
      },
      "pass summary"
    );

    return { manifestPath, manifest: manifestCounts, copy };
  }

  private setState(next: LoopState): void {
    if (this.loopState === next) return;
    this.log.debug({ from: this.loopState, to: next }, "loop state");
    this.loopState = next;
  }

  /**
   * waiting -> processing -> waiting, until the signal aborts. Without a
   * signal it only ends with the process.
   */
  async runTriggerLoop(signal?: AbortSignal): Promise<void> {
    const { triggers, detector, sleep, pollIntervalMs } = this.deps;
    const marker = this.triggerPath;

    this.log.info({ trigger: marker }, "waiting for trigger");

    while (!signal?.aborted) {
      this.setState("waiting");
      const present = await triggers.waitForMarker(marker, signal);
      if (!present) break;

      if (await detector.isStable(marker)) {
        this.setState("processing");
        this.log.info({ trigger: marker }, "trigger detected");

        try {
          await this.processOnce(true);
        } catch (err) {
          this.log.error({ err }, "pass aborted");
        }

        try {
          await fs.unlink(marker);
          this.log.info({ trigger: marker }, "trigger removed");
        } catch (err) {
          this.log.error({ trigger: marker, err }, "could not remove trigger");
        }

        this.setState("waiting");
      }

      if (signal?.aborted) break;
      await sleep(pollIntervalMs);
    }

    this.setState("waiting");
    this.log.info("trigger loop stopped");
  }
}

import fs from "node:fs/promises";
import type { Logger } from "pino";
import type { CandidateFile, ManifestEntry } from "@drop-relay/core-domain";

import type { FileHasher } from "../ports/file-hasher";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import type { SourceDirectory } from "../ports/source-directory";
import { withRetry } from "../application/with-retry";
import { FileNotStableError } from "../application/errors";
import type { StabilityDetector } from "./stability-detector";

export type ManifestBuildResult = {
  succeeded: number;
  failed: number;
  entries: ManifestEntry[];
};

/**
 * Read-only pass over the source directory: waits for each file to settle,
 * then records size, mtime and digest. One file failing never stops the
 * others.
 */
export class ManifestBuilder {
  private readonly log: Logger;

  constructor(
    private readonly deps: {
      source: SourceDirectory;
      detector: StabilityDetector;
      hasher: FileHasher;
      retryPolicy: RetryPolicy;
      sleep: Sleeper;
    },
    logger: Logger
  ) {
    this.log = logger.child({ component: "manifest-builder" });
  }

  async build(checkStable = true): Promise<ManifestBuildResult> {
    const result: ManifestBuildResult = { succeeded: 0, failed: 0, entries: [] };

    for (const file of await this.deps.source.listCandidates()) {
      const entry = await this.entryFor(file, checkStable);
      if (entry) {
        result.succeeded += 1;
        result.entries.push(entry);
      } else {
        result.failed += 1;
      }
    }

    return result;
  }

  private async entryFor(file: CandidateFile, checkStable: boolean): Promise<ManifestEntry | null> {
    const { detector, hasher, retryPolicy, sleep } = this.deps;

    try {
      return await withRetry(
        async () => {
          if (checkStable) {
            const outcome = await detector.waitUntilStable(file.absolutePath);
            if (!outcome.stable) throw new FileNotStableError(file.absolutePath, outcome.reason);
          }

          const stat = await fs.stat(file.absolutePath);
          const digest = await hasher.hashFile(file.absolutePath);

          return {
            name: file.name,
            size: stat.size,
            mtime: Math.floor(stat.mtimeMs / 1000),
            sha256: digest.value,
          };
        },
        retryPolicy,
        sleep,
        {
          onAttemptFailed: (err, ctx) => {
            if (err instanceof FileNotStableError) return;
            this.log.error({ path: file.absolutePath, attempt: ctx.attempt, err }, "could not read file for manifest");
          },
        }
      );
    } catch (err) {
      if (err instanceof FileNotStableError) {
        this.log.warn({ path: file.absolutePath, reason: err.reason }, "file left out of manifest");
      } else {
        this.log.error({ path: file.absolutePath, err }, "giving up on manifest entry");
      }
      return null;
    }
  }
}

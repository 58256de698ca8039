import fs from "node:fs/promises";
import type { Logger } from "pino";
import type { CandidateFile } from "@drop-relay/core-domain";

import type { DestinationWriter } from "../ports/destination-writer";
import type { FileHasher } from "../ports/file-hasher";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import type { SourceDirectory } from "../ports/source-directory";
import { withRetry } from "../application/with-retry";
import { FileNotStableError, IntegrityError } from "../application/errors";
import type { StabilityDetector } from "./stability-detector";

export type CopyPassResult = {
  found: number;
  succeeded: number;
  failed: number;
};

export type FileTransfer =
  | { status: "moved"; name: string; location: string; sha256: string; attempts: number }
  | { status: "failed"; name: string; error: unknown };

/**
 * Moves files one by one: settle, hash, write, (verify), delete source.
 * The source is only removed after the destination write returned cleanly,
 * so a failed file stays where it is for the next pass.
 */
export class HashedCopyEngine {
  private readonly log: Logger;

  constructor(
    private readonly deps: {
      source: SourceDirectory;
      detector: StabilityDetector;
      hasher: FileHasher;
      writer: DestinationWriter;
      retryPolicy: RetryPolicy;
      sleep: Sleeper;
      verifyAfterWrite?: boolean;
    },
    logger: Logger
  ) {
    this.log = logger.child({ component: "copy-engine" });
  }

  async copyAll(checkStable = true): Promise<CopyPassResult> {
    const result: CopyPassResult = { found: 0, succeeded: 0, failed: 0 };

    for (const file of await this.deps.source.listCandidates()) {
      result.found += 1;
      const transfer = await this.transfer(file, checkStable);
      if (transfer.status === "moved") result.succeeded += 1;
      else result.failed += 1;
    }

    return result;
  }

  async transfer(file: CandidateFile, checkStable = true): Promise<FileTransfer> {
    const { detector, hasher, writer, retryPolicy, sleep } = this.deps;

    try {
      return await withRetry(
        async ({ attempt }) => {
          if (checkStable) {
            const outcome = await detector.waitUntilStable(file.absolutePath);
            if (!outcome.stable) throw new FileNotStableError(file.absolutePath, outcome.reason);
          }

          const digest = await hasher.hashFile(file.absolutePath);
          const receipt = await writer.write(file.absolutePath, file.name);

          if (this.deps.verifyAfterWrite) {
            const written = await hasher.hashStream(await writer.openReadBack(file.name));
            if (written.value !== digest.value) {
              throw new IntegrityError(
                `Destination copy of ${file.name} does not match the source`,
                digest.value,
                written.value
              );
            }
          }

          await fs.unlink(file.absolutePath);

          this.log.info(
            { src: file.absolutePath, dst: receipt.location, attempt, sha256: digest.value },
            "file transferred"
          );

          return {
            status: "moved" as const,
            name: file.name,
            location: receipt.location,
            sha256: digest.value,
            attempts: attempt,
          };
        },
        retryPolicy,
        sleep,
        {
          onAttemptFailed: (err, ctx, willRetry) => {
            if (err instanceof FileNotStableError) return;
            this.log.error(
              { src: file.absolutePath, dst: writer.describe(), attempt: ctx.attempt, willRetry, err },
              "copy attempt failed"
            );
          },
        }
      );
    } catch (err) {
      if (err instanceof FileNotStableError) {
        this.log.warn({ src: file.absolutePath, reason: err.reason }, "file vanished before copy");
      } else {
        this.log.error({ src: file.absolutePath, err }, "copy failed, file left in place");
      }
      return { status: "failed", name: file.name, error: err };
    }
  }
}

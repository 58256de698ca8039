import { createReadStream } from "node:fs";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Logger } from "pino";

import type { DestinationWriter, WriteReceipt } from "../ports/destination-writer";
import type { RemoteShareClient } from "../ports/remote-share-client";
import {
  formatShareLocation,
  joinSharePath,
  type ShareDestination,
} from "../value-objects/destination-address";

function isAlreadyExists(err: unknown): boolean {
  const code = typeof err === "object" && err !== null && "code" in err ? String(err.code) : "";
  if (code === "EEXIST" || code === "STATUS_OBJECT_NAME_COLLISION") return true;
  const message = err instanceof Error ? err.message : String(err);
  return /exist|collision/i.test(message);
}

export class ShareDestinationWriter implements DestinationWriter {
  readonly kind = "share" as const;
  private readonly log: Logger;

  constructor(
    private readonly dest: ShareDestination,
    private readonly client: RemoteShareClient,
    logger: Logger
  ) {
    this.log = logger.child({ component: "share-writer" });
  }

  describe(): string {
    return formatShareLocation(this.dest, this.dest.pathOnShare);
  }

  /**
   * Creates every directory level of `dir`. Existing directories are fine;
   * anything else is logged and the write goes ahead, so a real problem
   * surfaces when the file is opened.
   */
  private async ensureDirectories(dir: string): Promise<void> {
    const segments = dir.split("/").filter((s) => s.length > 0);
    let current = "";

    for (const segment of segments) {
      current = joinSharePath(current, segment);
      try {
        await this.client.mkdir(current);
      } catch (err) {
        if (isAlreadyExists(err)) continue;
        this.log.warn({ dir: formatShareLocation(this.dest, current), err }, "could not create share directory");
      }
    }
  }

  async write(sourceAbs: string, fileName: string): Promise<WriteReceipt> {
    const target = joinSharePath(this.dest.pathOnShare, fileName);
    await this.ensureDirectories(this.dest.pathOnShare);

    const out = await this.client.openWrite(target);
    await pipeline(createReadStream(sourceAbs), out);

    return { location: formatShareLocation(this.dest, target) };
  }

  async openReadBack(fileName: string): Promise<Readable> {
    return this.client.openRead(joinSharePath(this.dest.pathOnShare, fileName));
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

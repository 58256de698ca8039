import fs from "node:fs/promises";
import { createReadStream } from "node:fs";
import type { Readable } from "node:stream";
import path from "node:path";

import type { DestinationWriter, WriteReceipt } from "../ports/destination-writer";
import type { LocalDestination } from "../value-objects/destination-address";
import { SameFileError } from "../application/errors";

async function statIfExists(p: string) {
  try {
    return await fs.stat(p);
  } catch (err) {
    if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

export class LocalDestinationWriter implements DestinationWriter {
  readonly kind = "local" as const;

  constructor(private readonly dest: LocalDestination) {}

  describe(): string {
    return this.dest.root;
  }

  private targetPath(fileName: string): string {
    return path.join(this.dest.root, fileName);
  }

  /**
   * Copies content, then permission bits and timestamps, overwriting any
   * previous copy. A target that resolves to the source itself (same
   * directory, symlink, bind mount) is refused.
   */
  async write(sourceAbs: string, fileName: string): Promise<WriteReceipt> {
    const target = this.targetPath(fileName);
    await fs.mkdir(path.dirname(target), { recursive: true });

    const stat = await fs.stat(sourceAbs);
    const existing = await statIfExists(target);
    if (existing && existing.dev === stat.dev && existing.ino === stat.ino) {
      throw new SameFileError(sourceAbs, target);
    }

    await fs.copyFile(sourceAbs, target);
    await fs.chmod(target, stat.mode & 0o7777);
    await fs.utimes(target, stat.atime, stat.mtime);

    return { location: target };
  }

  async openReadBack(fileName: string): Promise<Readable> {
    return createReadStream(this.targetPath(fileName));
  }

  async close(): Promise<void> {}
}

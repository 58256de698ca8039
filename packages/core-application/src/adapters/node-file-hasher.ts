import { createHash } from "crypto";
import { createReadStream } from "fs";
import type { Readable } from "stream";
import type { FileHasher, FileHash } from "../ports/file-hasher";
import { DEFAULT_HASH_CHUNK_BYTES } from "../application/config";

export class NodeFileHasher implements FileHasher {
  constructor(private readonly chunkBytes: number = DEFAULT_HASH_CHUNK_BYTES) {}

  async hashFile(absolutePath: string): Promise<FileHash> {
    return this.hashStream(createReadStream(absolutePath, { highWaterMark: this.chunkBytes }));
  }

  async hashStream(stream: Readable): Promise<FileHash> {
    const algo: FileHash["algorithm"] = "sha256";

    return new Promise((resolve, reject) => {
      const hash = createHash(algo);

      stream.on("data", (chunk: Buffer | string) => hash.update(chunk));
      stream.on("error", reject);
      stream.on("end", () => {
        resolve({ algorithm: algo, value: hash.digest("hex") });
      });
    });
  }
}

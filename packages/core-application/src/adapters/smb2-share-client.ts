import SMB2 from "@marsaud/smb2";
import type { Readable, Writable } from "node:stream";

import type { RemoteShareClient } from "../ports/remote-share-client";
import type { ShareCredentials } from "../application/config";
import type { ShareDestination } from "../value-objects/destination-address";

function toSmbPath(pathOnShare: string): string {
  return pathOnShare.split("/").filter((s) => s.length > 0).join("\\");
}

/**
 * RemoteShareClient over @marsaud/smb2. The connection opens lazily on the
 * first request and is reused until close().
 */
export class Smb2ShareClient implements RemoteShareClient {
  private client: SMB2 | null = null;

  constructor(
    private readonly dest: ShareDestination,
    private readonly credentials: ShareCredentials
  ) {}

  private connection(): SMB2 {
    if (this.client) return this.client;

    this.client = new SMB2({
      share: `\\\\${this.dest.host}\\${this.dest.share}`,
      domain: this.credentials.domain ?? "",
      username: this.credentials.username ?? "",
      password: this.credentials.password ?? "",
      port: this.dest.port,
    });
    return this.client;
  }

  async mkdir(pathOnShare: string): Promise<void> {
    await this.connection().mkdir(toSmbPath(pathOnShare));
  }

  async openWrite(pathOnShare: string): Promise<Writable> {
    return this.connection().createWriteStream(toSmbPath(pathOnShare), { flags: "w" });
  }

  async openRead(pathOnShare: string): Promise<Readable> {
    return this.connection().createReadStream(toSmbPath(pathOnShare));
  }

  async close(): Promise<void> {
    if (!this.client) return;
    this.client.disconnect();
    this.client = null;
  }
}

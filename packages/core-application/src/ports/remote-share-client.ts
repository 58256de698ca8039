import type { Readable, Writable } from "node:stream";

/**
 * Minimal contract the share writer needs from an SMB client.
 * Paths are relative to the share root and use "/" as separator.
 */
export interface RemoteShareClient {
  mkdir(pathOnShare: string): Promise<void>;
  openWrite(pathOnShare: string): Promise<Writable>;
  openRead(pathOnShare: string): Promise<Readable>;
  close(): Promise<void>;
}

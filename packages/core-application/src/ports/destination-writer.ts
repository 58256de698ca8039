import type { Readable } from "node:stream";

export type WriteReceipt = {
  /** Human readable location of the written file (path or smb:// address). */
  location: string;
};

export interface DestinationWriter {
  readonly kind: "local" | "share";
  describe(): string;
  write(sourceAbs: string, fileName: string): Promise<WriteReceipt>;
  openReadBack(fileName: string): Promise<Readable>;
  close(): Promise<void>;
}

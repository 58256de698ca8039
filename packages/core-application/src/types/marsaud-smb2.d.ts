// @marsaud/smb2 ships no type declarations; this covers the calls the share client makes.
declare module "@marsaud/smb2" {
  import type { Readable, Writable } from "node:stream";

  namespace SMB2 {
    interface Options {
      share: string;
      domain: string;
      username: string;
      password: string;
      port?: number;
      autoCloseTimeout?: number;
    }

    interface WriteStreamOptions {
      flags?: "r+" | "w" | "wx";
      start?: number;
    }

    interface ReadStreamOptions {
      start?: number;
      end?: number;
    }
  }

  class SMB2 {
    constructor(options: SMB2.Options);
    mkdir(path: string, mode?: number): Promise<void>;
    createWriteStream(path: string, options?: SMB2.WriteStreamOptions): Promise<Writable>;
    createReadStream(path: string, options?: SMB2.ReadStreamOptions): Promise<Readable>;
    disconnect(): void;
  }

  export = SMB2;
}

import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import type { CandidateFile } from "@drop-relay/core-domain";

import type { SourceDirectory } from "../ports/source-directory";
import { createSourceFilter } from "./source-filter";

export class NodeSourceDirectory implements SourceDirectory {
  readonly rootDir: string;
  private readonly ignore: (name: string) => boolean;
  private readonly log: Logger;

  constructor(
    options: { rootDir: string; triggerFileName: string; manifestPrefix: string },
    logger: Logger
  ) {
    this.rootDir = path.resolve(options.rootDir);
    this.ignore = createSourceFilter(options);
    this.log = logger.child({ component: "source-directory" });
  }

  private async isRegularFile(entry: Dirent, abs: string): Promise<boolean> {
    if (entry.isFile()) return true;
    if (!entry.isSymbolicLink()) return false;

    // links count when they point at a regular file
    try {
      return (await fs.stat(abs)).isFile();
    } catch {
      return false;
    }
  }

  async listCandidates(): Promise<CandidateFile[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.rootDir, { withFileTypes: true });
    } catch (err) {
      this.log.error({ dir: this.rootDir, err }, "source directory is not accessible");
      return [];
    }

    const files: CandidateFile[] = [];
    for (const entry of entries) {
      if (this.ignore(entry.name)) continue;

      const abs = path.join(this.rootDir, entry.name);
      if (await this.isRegularFile(entry, abs)) {
        files.push({ name: entry.name, absolutePath: abs });
      }
    }

    return files.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }
}

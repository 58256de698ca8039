import fs from "fs/promises";
import path from "path";

import type { Manifest } from "@drop-relay/core-domain";
import { toManifestDocument } from "@drop-relay/core-domain";
import type { ManifestStore } from "../ports/manifest-store";

const MAX_NAME_ATTEMPTS = 1000;

function isAlreadyExists(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "EEXIST";
}

/**
 * Writes manifest artifacts next to the files they describe. Names are
 * `<prefix>-<generated_at>.json`; a counter is appended when two passes land
 * in the same second, so an artifact is never overwritten.
 */
export class NodeManifestStore implements ManifestStore {
  constructor(
    private readonly sourceDir: string,
    private readonly prefix: string
  ) {}

  artifactName(generatedAtSec: number, counter = 0): string {
    const suffix = counter === 0 ? "" : `-${counter}`;
    return `${this.prefix}-${generatedAtSec}${suffix}.json`;
  }

  async write(manifest: Manifest): Promise<string> {
    const dir = path.resolve(this.sourceDir);
    await fs.mkdir(dir, { recursive: true });

    const body = JSON.stringify(toManifestDocument(manifest), null, 2);

    for (let counter = 0; counter < MAX_NAME_ATTEMPTS; counter++) {
      const file = path.join(dir, this.artifactName(manifest.generatedAtSec, counter));
      try {
        await fs.writeFile(file, body, { encoding: "utf-8", flag: "wx" });
        return file;
      } catch (err) {
        if (isAlreadyExists(err)) continue;
        throw err;
      }
    }

    throw new Error(`No free manifest name for ${this.prefix}-${manifest.generatedAtSec} in ${dir}`);
  }
}

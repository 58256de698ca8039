import type { Manifest } from "@drop-relay/core-domain";

export interface ManifestStore {
  /** Persists the manifest and returns the absolute path of the artifact. */
  write(manifest: Manifest): Promise<string>;
}

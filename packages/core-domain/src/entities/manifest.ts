import type { ManifestEntry } from './manifest-entry';

export interface Manifest {
  generatedAtSec: number;
  sourceDir: string;
  files: ManifestEntry[];
}

/**
 * On-disk shape of a manifest artifact. Field names are part of the
 * external format and stay snake_case.
 */
export interface ManifestDocument {
  generated_at: number;
  source_dir: string;
  files: ManifestEntry[];
}

export function toManifestDocument(manifest: Manifest): ManifestDocument {
  return {
    generated_at: manifest.generatedAtSec,
    source_dir: manifest.sourceDir,
    files: manifest.files.map((f) => ({ ...f })),
  };
}

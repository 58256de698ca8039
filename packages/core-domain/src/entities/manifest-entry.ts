export type ContentFingerprint = string;

export interface ManifestEntry {
  /** Base name of the file inside the source directory */
  name: string;
  /** Size in bytes at the time the entry was built */
  size: number;
  /** Modification time, whole seconds since the epoch (truncated) */
  mtime: number;
  /** Lowercase hex SHA-256 of the content */
  sha256: ContentFingerprint;
}

import type { CandidateFile } from "@drop-relay/core-domain";

export interface SourceDirectory {
  readonly rootDir: string;
  /** Fresh listing on every call, sorted by name. Empty if the directory can't be read. */
  listCandidates(): Promise<CandidateFile[]>;
}

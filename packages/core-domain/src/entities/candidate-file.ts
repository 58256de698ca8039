/**
 * A regular file found in the source directory during one listing.
 * Never cached between passes.
 */
export interface CandidateFile {
  name: string;
  absolutePath: string;
}

export type { CandidateFile } from './entities/candidate-file';
export type { ContentFingerprint, ManifestEntry } from './entities/manifest-entry';
export type { Manifest, ManifestDocument } from './entities/manifest';
export { toManifestDocument } from './entities/manifest';

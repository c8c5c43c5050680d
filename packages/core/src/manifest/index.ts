export { Digest, DIGEST_LENGTHS } from './digest.js';
export type { DigestAlgorithm } from './digest.js';
export {
  parseManifest,
  parseManifestJson,
  describeManifest,
  ManifestDocumentSchema,
  FileEntrySchema,
  FileHashesSchema,
  EnvironmentSchema,
  RequirementSchema,
} from './schema.js';
export type { ManifestDocument, FileEntryDocument } from './schema.js';
export { parseDependencyId, formatDependencyId, dependencyTag } from './dependency-id.js';
export type {
  Requirement,
  Environment,
  FileHashes,
  FileEntry,
  KnownDependencyKind,
  DependencyId,
  DependencyEntry,
  PackManifest,
  OverrideSet,
} from './types.js';

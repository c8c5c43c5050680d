// Manifest model
export {
  Digest,
  DIGEST_LENGTHS,
  parseManifest,
  parseManifestJson,
  describeManifest,
  ManifestDocumentSchema,
  FileEntrySchema,
  FileHashesSchema,
  EnvironmentSchema,
  RequirementSchema,
  parseDependencyId,
  formatDependencyId,
  dependencyTag,
} from './manifest/index.js';

export type {
  DigestAlgorithm,
  ManifestDocument,
  FileEntryDocument,
  Requirement,
  Environment,
  FileHashes,
  FileEntry,
  KnownDependencyKind,
  DependencyId,
  DependencyEntry,
  PackManifest,
  OverrideSet,
} from './manifest/index.js';

// Content verifier
export { isValid, verifyFile, computeHashes } from './verify/index.js';
export type { ComputedHashes } from './verify/index.js';

// Mirror fetcher
export { HttpMirrorFetcher } from './fetch/index.js';
export type {
  MirrorFetcher,
  FetchOutcome,
  FetchProgressCallback,
  FetchImpl,
  HttpMirrorFetcherOptions,
} from './fetch/index.js';

// Environment filter
export { filterForRole, requirementFor, SYNC_ROLES } from './environment/index.js';
export type { SyncRole } from './environment/index.js';

// Reconciliation engine
export {
  ReconciliationEngine,
  buildSyncConfig,
  validateSyncConfig,
  pruneUntracked,
  listFiles,
  DEFAULT_SYNC_CONFIG,
  DEFAULT_USER_AGENT,
  PACKSYNC_VERSION,
} from './reconcile/index.js';

export type {
  TypedSyncEngineEmitter,
  ManagedDir,
  ManagedDirKind,
  PruneOptions,
  PruneResult,
  SyncConfig,
  FailurePolicy,
  OptionalFailurePolicy,
  EntryOutcome,
  EntryResult,
  SyncReport,
  DeleteReason,
  SyncEngineEvents,
} from './reconcile/index.js';

// Pack archives (.mrpack)
export {
  readPackArchive,
  loadPackArchive,
  mergeOverrideSources,
  MANIFEST_FILE_NAME,
  GENERIC_OVERRIDES_PREFIX,
  ROLE_OVERRIDES_PREFIX,
} from './archive/index.js';
export type { PackArchive } from './archive/index.js';

// Errors, paths and logging
export {
  SyncError,
  SyncAggregateError,
  FetchError,
  ManifestValidationError,
  ArchiveError,
  ConfigError,
  errorCode,
  errorMessage,
} from './errors.js';
export type { SyncErrorKind, SyncPhase, FetchFailureReason, SyncErrorOptions } from './errors.js';
export { relativePathProblem, resolveInRoot, toRelativePath } from './paths.js';
export { createLogger } from './logger.js';
export type { CreateLoggerOptions } from './logger.js';

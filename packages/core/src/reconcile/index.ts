export { ReconciliationEngine } from './reconciliation-engine.js';
export type { TypedSyncEngineEmitter } from './reconciliation-engine.js';
export { buildSyncConfig, validateSyncConfig } from './config.js';
export { pruneUntracked, listFiles } from './prune.js';
export type { ManagedDir, ManagedDirKind, PruneOptions, PruneResult } from './prune.js';
export type {
  SyncConfig,
  FailurePolicy,
  OptionalFailurePolicy,
  EntryOutcome,
  EntryResult,
  SyncReport,
  DeleteReason,
  SyncEngineEvents,
} from './types.js';
export { DEFAULT_SYNC_CONFIG, DEFAULT_USER_AGENT, PACKSYNC_VERSION } from './types.js';

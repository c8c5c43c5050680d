/**
 * Types for the reconciliation engine.
 *
 * The engine brings a sync root into line with a pack manifest: it checks
 * each declared file, re-fetches what is missing or corrupt, writes the
 * overrides, and optionally prunes untracked files from managed directories.
 */

import type { FetchError, SyncError } from '../errors.js';
import type { FileEntry } from '../manifest/types.js';
import type { SyncRole } from '../environment/environment-filter.js';

/** What happens to the rest of the run when a declared file fails */
export type FailurePolicy = 'fail-fast' | 'continue';

/** How failures of files that are only optional for the role are treated */
export type OptionalFailurePolicy = 'fatal' | 'skip';

/** Configuration for a sync run */
export interface SyncConfig {
  /** Absolute path to the directory being reconciled */
  rootDir: string;

  /** Side being synced; files unsupported on this side are ignored */
  role: SyncRole;

  /** Delete untracked files from the managed directories after syncing */
  prune: boolean;

  /** Stop at the first failed file, or collect failures and keep going */
  failurePolicy: FailurePolicy;

  /** Whether optional files may fail without failing the run */
  optionalFailurePolicy: OptionalFailurePolicy;

  /** Number of declared files processed at once (1 = sequential) */
  concurrency: number;

  /** Per-request timeout for mirror downloads (0 disables) */
  fetchTimeoutMs: number;

  /** User-Agent header sent to mirrors */
  userAgent: string;

  /** Re-check the digests of every downloaded file before accepting it */
  verifyDownloads: boolean;

  /** Directories (relative to rootDir) whose files must be declared in the manifest */
  indexManagedDirs: string[];

  /** Directories (relative to rootDir) whose files must come from the overrides */
  overrideManagedDirs: string[];
}

export const PACKSYNC_VERSION = '0.1.0';

export const DEFAULT_USER_AGENT = `packsync/${PACKSYNC_VERSION}`;

/** Default configuration values */
export const DEFAULT_SYNC_CONFIG: Omit<SyncConfig, 'rootDir'> = {
  role: 'server',
  prune: false,
  failurePolicy: 'fail-fast',
  optionalFailurePolicy: 'fatal',
  concurrency: 1,
  fetchTimeoutMs: 60_000,
  userAgent: DEFAULT_USER_AGENT,
  verifyDownloads: false,
  indexManagedDirs: ['mods', 'resourcepacks', 'shaderpacks'],
  overrideManagedDirs: ['config', 'defaultconfigs', 'kubejs'],
};

/** Terminal outcome for one declared file */
export type EntryOutcome =
  /** Already present with matching digests; nothing touched */
  | 'valid'
  /** Was missing and has been fetched */
  | 'downloaded'
  /** Was present but invalid; deleted and fetched again */
  | 'repaired'
  /** Optional file that failed under the 'skip' policy */
  | 'skipped'
  /** Failed under the 'continue' policy */
  | 'failed';

/** Result of reconciling a single declared file */
export interface EntryResult {
  relativePath: string;
  outcome: EntryOutcome;

  /** Mirror the file was fetched from, when it was fetched */
  mirrorUrl: string | null;

  bytesDownloaded: number;
  durationMs: number;

  /** Failure behind a 'skipped' or 'failed' outcome */
  error?: SyncError;
}

/** Summary of a finished sync run */
export interface SyncReport {
  /** Per declared file, in manifest order */
  entries: EntryResult[];

  filesValid: number;
  filesDownloaded: number;
  filesRepaired: number;
  filesSkipped: number;
  filesFailed: number;

  /** Declared files dropped by the environment filter */
  excludedByEnvironment: number;

  overridesWritten: number;

  /** Relative paths removed by the prune pass */
  prunedFiles: string[];

  /** Whether the prune pass ran */
  pruned: boolean;

  durationMs: number;
}

/** Why a local file was deleted */
export type DeleteReason = 'invalid' | 'prune';

/** Events emitted by the ReconciliationEngine; observational only */
export interface SyncEngineEvents {
  /** A declared file is about to be checked */
  entryStart: (entry: FileEntry) => void;

  /** Bytes arrived for a declared file */
  entryProgress: (progress: {
    relativePath: string;
    bytesReceived: number;
    totalBytes: number | null;
  }) => void;

  /** A mirror failed; the next one will be tried if any remain */
  mirrorFailed: (failure: { relativePath: string; error: FetchError; remaining: number }) => void;

  /** A declared file reached its terminal outcome */
  entryDone: (result: EntryResult) => void;

  /** An override was written */
  overrideWritten: (override: { relativePath: string; bytes: number }) => void;

  /** A local file was deleted */
  fileDeleted: (deletion: { relativePath: string; reason: DeleteReason }) => void;

  /** The run finished without a fatal error */
  syncComplete: (report: SyncReport) => void;
}

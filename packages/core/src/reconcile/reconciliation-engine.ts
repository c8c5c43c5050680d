/**
 * ReconciliationEngine - makes a sync root match a pack manifest.
 *
 * Runs three phases in strict order:
 * 1. Declared files: check, validate, and repair each entry from its mirrors
 * 2. Overrides: write every override verbatim
 * 3. Prune (optional): delete untracked files in the managed directories
 *
 * Prune only runs once every declared file and override is in place, so a
 * file about to be fetched again is never mistaken for a stale one.
 */

import { EventEmitter } from 'node:events';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import {
  ConfigError,
  FetchError,
  ManifestValidationError,
  SyncAggregateError,
  SyncError,
  errorCode,
  errorMessage,
} from '../errors.js';
import type { SyncPhase } from '../errors.js';
import { filterForRole, requirementFor } from '../environment/environment-filter.js';
import { HttpMirrorFetcher } from '../fetch/mirror-fetcher.js';
import type { MirrorFetcher } from '../fetch/mirror-fetcher.js';
import type { FileEntry, OverrideSet, PackManifest } from '../manifest/types.js';
import { relativePathProblem, resolveInRoot } from '../paths.js';
import { verifyFile } from '../verify/content-verifier.js';
import { validateSyncConfig } from './config.js';
import { pruneUntracked } from './prune.js';
import type { ManagedDir } from './prune.js';
import type {
  EntryResult,
  SyncConfig,
  SyncEngineEvents,
  SyncReport,
} from './types.js';

/**
 * Typed event emitter interface for the reconciliation engine.
 */
export interface TypedSyncEngineEmitter {
  on<K extends keyof SyncEngineEvents>(event: K, listener: SyncEngineEvents[K]): this;
  off<K extends keyof SyncEngineEvents>(event: K, listener: SyncEngineEvents[K]): this;
  emit<K extends keyof SyncEngineEvents>(
    event: K,
    ...args: Parameters<SyncEngineEvents[K]>
  ): boolean;
}

/** Per-entry state after CHECK_EXISTS / VALIDATE */
type LocalState = 'missing' | 'valid' | 'invalid';

export class ReconciliationEngine extends EventEmitter implements TypedSyncEngineEmitter {
  private readonly config: SyncConfig;
  private readonly logger: Logger;
  private readonly fetcher: MirrorFetcher;
  private readonly overrides: OverrideSet;

  /** Declared files that apply to the configured role, fixed at construction */
  private readonly files: FileEntry[];
  private readonly excludedCount: number;
  private readonly declaredPaths: ReadonlySet<string>;

  private _isRunning = false;

  constructor(
    manifest: PackManifest,
    overrides: OverrideSet,
    config: SyncConfig,
    logger: Logger,
    fetcher?: MirrorFetcher
  ) {
    super();

    const errors = validateSyncConfig(config);
    if (errors.length > 0) {
      throw new ConfigError(errors);
    }

    const pathProblems: string[] = [];
    const seen = new Set<string>();
    for (const entry of manifest.declaredFiles) {
      const problem = relativePathProblem(entry.relativePath);
      if (problem) {
        pathProblems.push(`file "${entry.relativePath}": ${problem}`);
      } else if (seen.has(entry.relativePath)) {
        pathProblems.push(`file "${entry.relativePath}": duplicate path`);
      }
      seen.add(entry.relativePath);
    }
    for (const relativePath of overrides.keys()) {
      const problem = relativePathProblem(relativePath);
      if (problem) {
        pathProblems.push(`override "${relativePath}": ${problem}`);
      }
    }
    if (pathProblems.length > 0) {
      throw new ManifestValidationError(pathProblems);
    }

    this.config = config;
    this.logger = logger.child({ component: 'reconciliation-engine' });
    this.overrides = overrides;

    this.fetcher =
      fetcher ??
      new HttpMirrorFetcher({
        timeoutMs: config.fetchTimeoutMs,
        userAgent: config.userAgent,
        logger,
      });

    this.files = filterForRole(manifest.declaredFiles, config.role);
    this.excludedCount = manifest.declaredFiles.length - this.files.length;
    this.declaredPaths = new Set(this.files.map((file) => file.relativePath));
  }

  /** Declared files this engine will reconcile */
  get trackedFiles(): readonly FileEntry[] {
    return this.files;
  }

  /** Number of declared files dropped by the environment filter */
  get excludedByEnvironment(): number {
    return this.excludedCount;
  }

  get isRunning(): boolean {
    return this._isRunning;
  }

  /**
   * Run a full sync.
   *
   * @param signal - Checked between entries; aborting stops the run with a
   *   Cancelled SyncError
   * @throws SyncError on the first fatal failure (fail-fast policy)
   * @throws SyncAggregateError listing every failure (continue policy)
   */
  async sync(signal?: AbortSignal): Promise<SyncReport> {
    if (this._isRunning) {
      throw new Error('Sync already in progress');
    }

    this._isRunning = true;
    const startTime = Date.now();

    try {
      this.logger.info(
        {
          rootDir: this.config.rootDir,
          role: this.config.role,
          files: this.files.length,
          excluded: this.excludedCount,
          overrides: this.overrides.size,
        },
        'Starting sync'
      );

      const { results, failures } = await this.reconcileDeclaredFiles(signal);

      this.checkCancelled(signal, 'override');
      const overridesWritten = await this.materializeOverrides();

      let prunedFiles: string[] = [];
      let pruned = false;

      if (this.config.prune && failures.length === 0) {
        this.checkCancelled(signal, 'prune');
        const pruneResult = await pruneUntracked({
          rootDir: this.config.rootDir,
          managedDirs: this.managedDirs(),
          declaredPaths: this.declaredPaths,
          overridePaths: new Set(this.overrides.keys()),
          failurePolicy: this.config.failurePolicy,
          logger: this.logger,
          signal,
          onDeleted: (relativePath) => this.emit('fileDeleted', { relativePath, reason: 'prune' }),
        });
        prunedFiles = pruneResult.deleted;
        failures.push(...pruneResult.failures);
        pruned = true;
      } else if (this.config.prune) {
        this.logger.warn(
          { failures: failures.length },
          'Skipping prune because some declared files failed'
        );
      }

      const report = this.buildReport(results, overridesWritten, prunedFiles, pruned, startTime);

      if (failures.length > 0) {
        this.logger.error(
          { failures: failures.length, durationMs: report.durationMs },
          'Sync finished with failures'
        );
        throw new SyncAggregateError(failures, report);
      }

      this.logger.info(
        {
          valid: report.filesValid,
          downloaded: report.filesDownloaded,
          repaired: report.filesRepaired,
          skipped: report.filesSkipped,
          overridesWritten,
          pruned: prunedFiles.length,
          durationMs: report.durationMs,
        },
        'Sync complete'
      );

      this.emit('syncComplete', report);
      return report;
    } catch (err) {
      if (err instanceof SyncError) {
        this.logger.error(
          { kind: err.kind, relativePath: err.relativePath, phase: err.phase, error: err.message },
          'Sync failed'
        );
      }
      throw err;
    } finally {
      this._isRunning = false;
    }
  }

  // ─── Phase 1: declared files ─────────────────────────────────────

  /**
   * Reconcile declared files in bounded batches. Under fail-fast, the
   * first failure in a batch is thrown once the batch has settled, and no
   * further batch starts.
   */
  private async reconcileDeclaredFiles(
    signal?: AbortSignal
  ): Promise<{ results: EntryResult[]; failures: SyncError[] }> {
    const results: EntryResult[] = [];
    const failures: SyncError[] = [];
    const batchSize = this.config.concurrency;

    for (let i = 0; i < this.files.length; i += batchSize) {
      this.checkCancelled(signal, 'validate');

      const batch = this.files.slice(i, i + batchSize);
      const settled = await Promise.allSettled(batch.map((entry) => this.reconcileEntry(entry)));

      let firstFatal: SyncError | null = null;

      for (const [index, outcome] of settled.entries()) {
        const entry = batch[index];
        if (!entry) continue;

        if (outcome.status === 'fulfilled') {
          results.push(outcome.value);
          this.emit('entryDone', outcome.value);
          continue;
        }

        const error = this.toSyncError(outcome.reason, entry);
        const result = this.handleEntryFailure(entry, error);
        results.push(result);
        this.emit('entryDone', result);

        if (result.outcome === 'failed') {
          failures.push(error);
          if (this.config.failurePolicy === 'fail-fast' && !firstFatal) {
            firstFatal = error;
          }
        }
      }

      if (firstFatal) {
        throw firstFatal;
      }
    }

    return { results, failures };
  }

  /** Decide whether a failed entry is skipped or counts as a failure */
  private handleEntryFailure(entry: FileEntry, error: SyncError): EntryResult {
    const optional = requirementFor(entry, this.config.role) === 'optional';
    const skip = optional && this.config.optionalFailurePolicy === 'skip';

    if (skip) {
      this.logger.warn(
        { relativePath: entry.relativePath, kind: error.kind, error: error.message },
        'Skipping optional file that failed to sync'
      );
    } else {
      this.logger.error(
        { relativePath: entry.relativePath, kind: error.kind, error: error.message },
        'Failed to sync file'
      );
    }

    return {
      relativePath: entry.relativePath,
      outcome: skip ? 'skipped' : 'failed',
      mirrorUrl: null,
      bytesDownloaded: 0,
      durationMs: 0,
      error,
    };
  }

  /**
   * Per-entry protocol: CHECK_EXISTS -> VALIDATE -> (delete) -> FETCH.
   * Throws SyncError when the entry cannot be brought into line.
   */
  private async reconcileEntry(entry: FileEntry): Promise<EntryResult> {
    const startTime = Date.now();
    const localPath = resolveInRoot(this.config.rootDir, entry.relativePath);

    this.emit('entryStart', entry);

    const state = await this.checkLocal(entry, localPath);

    if (state === 'valid') {
      this.logger.debug({ relativePath: entry.relativePath }, 'File already valid');
      return {
        relativePath: entry.relativePath,
        outcome: 'valid',
        mirrorUrl: null,
        bytesDownloaded: 0,
        durationMs: Date.now() - startTime,
      };
    }

    if (state === 'invalid') {
      await this.deleteInvalid(entry, localPath);
    }

    const { url, bytesWritten } = await this.fetchFromMirrors(entry, localPath);

    return {
      relativePath: entry.relativePath,
      outcome: state === 'invalid' ? 'repaired' : 'downloaded',
      mirrorUrl: url,
      bytesDownloaded: bytesWritten,
      durationMs: Date.now() - startTime,
    };
  }

  private async checkLocal(entry: FileEntry, localPath: string): Promise<LocalState> {
    try {
      await fs.stat(localPath);
    } catch (err) {
      const code = errorCode(err);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return 'missing';
      }
      throw new SyncError('IOError', `Cannot stat ${entry.relativePath}: ${errorMessage(err)}`, {
        relativePath: entry.relativePath,
        phase: 'validate',
        cause: err,
      });
    }

    let valid: boolean;
    try {
      valid = await verifyFile(localPath, entry.expectedHashes);
    } catch (err) {
      throw new SyncError('IOError', `Cannot read ${entry.relativePath}: ${errorMessage(err)}`, {
        relativePath: entry.relativePath,
        phase: 'validate',
        cause: err,
      });
    }

    return valid ? 'valid' : 'invalid';
  }

  private async deleteInvalid(entry: FileEntry, localPath: string): Promise<void> {
    try {
      await fs.unlink(localPath);
    } catch (err) {
      throw new SyncError(
        'DeleteFailed',
        `Cannot delete invalid ${entry.relativePath}: ${errorMessage(err)}`,
        { relativePath: entry.relativePath, phase: 'validate', cause: err }
      );
    }

    this.logger.debug({ relativePath: entry.relativePath }, 'Deleted invalid file');
    this.emit('fileDeleted', { relativePath: entry.relativePath, reason: 'invalid' });
  }

  /**
   * Try each mirror in declared order; return on the first success.
   * Partial output of a failed attempt is removed before the next one, so
   * exhaustion leaves nothing at the target path.
   */
  private async fetchFromMirrors(
    entry: FileEntry,
    localPath: string
  ): Promise<{ url: string; bytesWritten: number }> {
    try {
      await fs.mkdir(path.dirname(localPath), { recursive: true });
    } catch (err) {
      throw new SyncError(
        'IOError',
        `Cannot create directory for ${entry.relativePath}: ${errorMessage(err)}`,
        { relativePath: entry.relativePath, phase: 'fetch', cause: err }
      );
    }

    const attempts: FetchError[] = [];
    const urls = entry.downloadUrls;

    for (const [index, url] of urls.entries()) {
      const outcome = await this.fetcher.fetch(url, localPath, (bytesReceived, totalBytes) => {
        this.emit('entryProgress', {
          relativePath: entry.relativePath,
          bytesReceived,
          totalBytes: totalBytes ?? entry.declaredSize,
        });
      });

      let failure: FetchError;
      if (!outcome.ok) {
        failure = outcome.error;
      } else if (this.config.verifyDownloads && !(await this.verifyDownloaded(entry, localPath))) {
        failure = new FetchError(url, 'integrity', 'Downloaded content does not match the manifest digests');
      } else {
        this.logger.debug(
          { relativePath: entry.relativePath, url, bytes: outcome.bytesWritten },
          'File downloaded'
        );
        return { url, bytesWritten: outcome.bytesWritten };
      }

      attempts.push(failure);
      await this.discardPartial(entry, localPath);

      const remaining = urls.length - index - 1;
      this.logger.warn(
        { relativePath: entry.relativePath, url, reason: failure.reason, remaining },
        'Mirror failed'
      );
      this.emit('mirrorFailed', { relativePath: entry.relativePath, error: failure, remaining });
    }

    throw new SyncError(
      'AllDownloadsFailed',
      `All ${urls.length} download URL(s) failed for ${entry.relativePath}`,
      { relativePath: entry.relativePath, phase: 'fetch', attempts }
    );
  }

  private async verifyDownloaded(entry: FileEntry, localPath: string): Promise<boolean> {
    try {
      return await verifyFile(localPath, entry.expectedHashes);
    } catch (err) {
      throw new SyncError(
        'IOError',
        `Cannot read downloaded ${entry.relativePath}: ${errorMessage(err)}`,
        { relativePath: entry.relativePath, phase: 'fetch', cause: err }
      );
    }
  }

  private async discardPartial(entry: FileEntry, localPath: string): Promise<void> {
    try {
      await fs.rm(localPath, { force: true });
    } catch (err) {
      throw new SyncError(
        'DeleteFailed',
        `Cannot discard partial download of ${entry.relativePath}: ${errorMessage(err)}`,
        { relativePath: entry.relativePath, phase: 'fetch', cause: err }
      );
    }
  }

  // ─── Phase 2: overrides ──────────────────────────────────────────

  /** Write every override verbatim. Any failure is fatal. */
  private async materializeOverrides(): Promise<number> {
    let written = 0;

    for (const [relativePath, content] of this.overrides) {
      const localPath = resolveInRoot(this.config.rootDir, relativePath);

      try {
        await fs.mkdir(path.dirname(localPath), { recursive: true });
        await fs.writeFile(localPath, content);
      } catch (err) {
        throw new SyncError('IOError', `Cannot write override ${relativePath}: ${errorMessage(err)}`, {
          relativePath,
          phase: 'override',
          cause: err,
        });
      }

      written++;
      this.logger.debug({ relativePath, bytes: content.length }, 'Override written');
      this.emit('overrideWritten', { relativePath, bytes: content.length });
    }

    this.logger.info({ overridesWritten: written }, 'Overrides applied');
    return written;
  }

  // ─── Helpers ─────────────────────────────────────────────────────

  private managedDirs(): ManagedDir[] {
    return [
      ...this.config.indexManagedDirs.map((dir): ManagedDir => ({ dir, kind: 'index' })),
      ...this.config.overrideManagedDirs.map((dir): ManagedDir => ({ dir, kind: 'override' })),
    ];
  }

  private checkCancelled(signal: AbortSignal | undefined, phase: SyncPhase): void {
    if (signal?.aborted) {
      throw new SyncError('Cancelled', 'Sync cancelled', { phase });
    }
  }

  /** Anything other than a SyncError escaping an entry is treated as an IO failure */
  private toSyncError(reason: unknown, entry: FileEntry): SyncError {
    if (reason instanceof SyncError) {
      return reason;
    }
    return new SyncError('IOError', `Unexpected failure for ${entry.relativePath}: ${errorMessage(reason)}`, {
      relativePath: entry.relativePath,
      cause: reason,
    });
  }

  private buildReport(
    entries: EntryResult[],
    overridesWritten: number,
    prunedFiles: string[],
    pruned: boolean,
    startTime: number
  ): SyncReport {
    const count = (outcome: EntryResult['outcome']): number =>
      entries.filter((entry) => entry.outcome === outcome).length;

    return {
      entries,
      filesValid: count('valid'),
      filesDownloaded: count('downloaded'),
      filesRepaired: count('repaired'),
      filesSkipped: count('skipped'),
      filesFailed: count('failed'),
      excludedByEnvironment: this.excludedCount,
      overridesWritten,
      prunedFiles,
      pruned,
      durationMs: Date.now() - startTime,
    };
  }
}

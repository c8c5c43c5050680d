/**
 * Error types shared across the core package.
 */

import type { SyncReport } from './reconcile/types.js';

/** Kinds of fatal sync failure reported to the caller */
export type SyncErrorKind =
  | 'IOError'
  | 'AllDownloadsFailed'
  | 'DownloadFailed'
  | 'DeleteFailed'
  | 'Cancelled';

/** Where in the run a sync error happened */
export type SyncPhase = 'validate' | 'fetch' | 'override' | 'prune';

/** Why a single mirror attempt failed */
export type FetchFailureReason = 'transport' | 'status' | 'write' | 'integrity';

/**
 * A single mirror attempt failed. Never thrown to callers of the engine;
 * collected into the attempts of an AllDownloadsFailed error instead.
 */
export class FetchError extends Error {
  public readonly kind = 'DownloadFailed' as const;
  public readonly url: string;
  public readonly reason: FetchFailureReason;
  public readonly status: number | null;

  constructor(
    url: string,
    reason: FetchFailureReason,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'FetchError';
    this.url = url;
    this.reason = reason;
    this.status = options?.status ?? null;
  }
}

export interface SyncErrorOptions {
  relativePath?: string;
  phase?: SyncPhase;
  cause?: unknown;
  attempts?: FetchError[];
}

export class SyncError extends Error {
  public readonly kind: SyncErrorKind;
  public readonly relativePath: string | null;
  public readonly phase: SyncPhase | null;
  /** Per-mirror failures, populated for AllDownloadsFailed */
  public readonly attempts: FetchError[];

  constructor(kind: SyncErrorKind, message: string, options: SyncErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'SyncError';
    this.kind = kind;
    this.relativePath = options.relativePath ?? null;
    this.phase = options.phase ?? null;
    this.attempts = options.attempts ?? [];
  }
}

/** Thrown at the end of a run under the 'continue' failure policy */
export class SyncAggregateError extends Error {
  public readonly errors: SyncError[];
  /** Report of everything that did happen during the run */
  public readonly report: SyncReport;

  constructor(errors: SyncError[], report: SyncReport) {
    super(`${errors.length} file(s) failed to sync`);
    this.name = 'SyncAggregateError';
    this.errors = errors;
    this.report = report;
  }

  /** Kind of the first failure, for single-line reporting */
  get kind(): SyncErrorKind | null {
    return this.errors[0]?.kind ?? null;
  }
}

/** The manifest document does not match the expected shape */
export class ManifestValidationError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid manifest: ${issues.join('; ')}`);
    this.name = 'ManifestValidationError';
    this.issues = issues;
  }
}

/** The pack archive is unreadable or incomplete */
export class ArchiveError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'ArchiveError';
  }
}

/** The sync configuration failed validation */
export class ConfigError extends Error {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid sync config: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

/** Node system errors carry a string code such as ENOENT */
export function errorCode(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

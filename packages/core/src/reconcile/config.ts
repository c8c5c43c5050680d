/**
 * Sync configuration builder.
 *
 * Reads from environment variables with sensible defaults.
 * All values can be overridden programmatically.
 */

import * as path from 'node:path';
import { SYNC_ROLES } from '../environment/environment-filter.js';
import type { SyncRole } from '../environment/environment-filter.js';
import { relativePathProblem } from '../paths.js';
import type { FailurePolicy, OptionalFailurePolicy, SyncConfig } from './types.js';
import { DEFAULT_SYNC_CONFIG } from './types.js';

function getEnv(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function getEnvNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

function getEnvBoolean(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  return raw === 'true' || raw === '1';
}

function getEnvList(key: string, fallback: string[]): string[] {
  const raw = process.env[key];
  if (raw === undefined) return [...fallback];
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

const VALID_FAILURE_POLICIES: FailurePolicy[] = ['fail-fast', 'continue'];
const VALID_OPTIONAL_POLICIES: OptionalFailurePolicy[] = ['fatal', 'skip'];

function pickRole(raw: string): SyncRole {
  return SYNC_ROLES.find((role) => role === raw) ?? DEFAULT_SYNC_CONFIG.role;
}

function pickFailurePolicy(raw: string): FailurePolicy {
  return VALID_FAILURE_POLICIES.find((policy) => policy === raw) ?? DEFAULT_SYNC_CONFIG.failurePolicy;
}

function pickOptionalPolicy(raw: string): OptionalFailurePolicy {
  return (
    VALID_OPTIONAL_POLICIES.find((policy) => policy === raw) ??
    DEFAULT_SYNC_CONFIG.optionalFailurePolicy
  );
}

/**
 * Build sync config from environment variables and optional overrides.
 *
 * Environment variables:
 * - PACKSYNC_DIR: Directory to reconcile (default: current working directory)
 * - PACKSYNC_ROLE: server|client (default: server)
 * - PACKSYNC_PRUNE: Delete untracked files in managed directories (default: false)
 * - PACKSYNC_FAILURE_POLICY: fail-fast|continue (default: fail-fast)
 * - PACKSYNC_OPTIONAL_POLICY: fatal|skip (default: fatal)
 * - PACKSYNC_CONCURRENCY: Files processed at once (default: 1)
 * - PACKSYNC_FETCH_TIMEOUT_MS: Per-request timeout (default: 60000)
 * - PACKSYNC_USER_AGENT: User-Agent sent to mirrors
 * - PACKSYNC_VERIFY_DOWNLOADS: Check digests after each download (default: false)
 * - PACKSYNC_INDEX_DIRS: Comma-separated manifest-managed directories
 * - PACKSYNC_OVERRIDE_DIRS: Comma-separated override-managed directories
 */
export function buildSyncConfig(overrides?: Partial<SyncConfig>): SyncConfig {
  const rootDir = path.resolve(overrides?.rootDir ?? getEnv('PACKSYNC_DIR', process.cwd()));

  return {
    rootDir,
    role: overrides?.role ?? pickRole(getEnv('PACKSYNC_ROLE', DEFAULT_SYNC_CONFIG.role)),
    prune: overrides?.prune ?? getEnvBoolean('PACKSYNC_PRUNE', DEFAULT_SYNC_CONFIG.prune),
    failurePolicy:
      overrides?.failurePolicy ??
      pickFailurePolicy(getEnv('PACKSYNC_FAILURE_POLICY', DEFAULT_SYNC_CONFIG.failurePolicy)),
    optionalFailurePolicy:
      overrides?.optionalFailurePolicy ??
      pickOptionalPolicy(getEnv('PACKSYNC_OPTIONAL_POLICY', DEFAULT_SYNC_CONFIG.optionalFailurePolicy)),
    concurrency:
      overrides?.concurrency ??
      getEnvNumber('PACKSYNC_CONCURRENCY', DEFAULT_SYNC_CONFIG.concurrency),
    fetchTimeoutMs:
      overrides?.fetchTimeoutMs ??
      getEnvNumber('PACKSYNC_FETCH_TIMEOUT_MS', DEFAULT_SYNC_CONFIG.fetchTimeoutMs),
    userAgent: overrides?.userAgent ?? getEnv('PACKSYNC_USER_AGENT', DEFAULT_SYNC_CONFIG.userAgent),
    verifyDownloads:
      overrides?.verifyDownloads ??
      getEnvBoolean('PACKSYNC_VERIFY_DOWNLOADS', DEFAULT_SYNC_CONFIG.verifyDownloads),
    indexManagedDirs:
      overrides?.indexManagedDirs ??
      getEnvList('PACKSYNC_INDEX_DIRS', DEFAULT_SYNC_CONFIG.indexManagedDirs),
    overrideManagedDirs:
      overrides?.overrideManagedDirs ??
      getEnvList('PACKSYNC_OVERRIDE_DIRS', DEFAULT_SYNC_CONFIG.overrideManagedDirs),
  };
}

/**
 * Validate a sync configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateSyncConfig(config: SyncConfig): string[] {
  const errors: string[] = [];

  if (!config.rootDir) {
    errors.push('rootDir is required');
  } else if (!path.isAbsolute(config.rootDir)) {
    errors.push('rootDir must be an absolute path');
  }

  if (!SYNC_ROLES.includes(config.role)) {
    errors.push(`role must be one of: ${SYNC_ROLES.join(', ')}`);
  }

  if (!VALID_FAILURE_POLICIES.includes(config.failurePolicy)) {
    errors.push(`failurePolicy must be one of: ${VALID_FAILURE_POLICIES.join(', ')}`);
  }

  if (!VALID_OPTIONAL_POLICIES.includes(config.optionalFailurePolicy)) {
    errors.push(`optionalFailurePolicy must be one of: ${VALID_OPTIONAL_POLICIES.join(', ')}`);
  }

  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    errors.push('concurrency must be an integer of at least 1');
  }

  if (config.concurrency > 32) {
    errors.push('concurrency must not exceed 32');
  }

  if (config.fetchTimeoutMs < 0) {
    errors.push('fetchTimeoutMs must not be negative');
  }

  for (const [field, dirs] of [
    ['indexManagedDirs', config.indexManagedDirs],
    ['overrideManagedDirs', config.overrideManagedDirs],
  ] as const) {
    for (const dir of dirs) {
      const problem = relativePathProblem(dir);
      if (problem) {
        errors.push(`${field} entry "${dir}": ${problem}`);
      }
    }
  }

  return errors;
}

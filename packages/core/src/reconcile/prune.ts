/**
 * Prune pass: removes files from managed directories that neither the
 * manifest nor the overrides account for.
 *
 * Membership is decided on the relative path alone. A file that is known
 * is never deleted here, whatever its content.
 */

import * as fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { SyncError, errorCode, errorMessage } from '../errors.js';
import { resolveInRoot, toRelativePath } from '../paths.js';
import type { FailurePolicy } from './types.js';

/** Which known set a managed directory is checked against first */
export type ManagedDirKind = 'index' | 'override';

export interface ManagedDir {
  /** Directory relative to the sync root */
  dir: string;
  kind: ManagedDirKind;
}

export interface PruneOptions {
  rootDir: string;
  managedDirs: ManagedDir[];

  /** Relative paths of the declared files left after environment filtering */
  declaredPaths: ReadonlySet<string>;

  /** Relative paths of the overrides */
  overridePaths: ReadonlySet<string>;

  failurePolicy: FailurePolicy;
  logger: Logger;

  /** Called after each successful deletion */
  onDeleted?: (relativePath: string) => void;

  signal?: AbortSignal;
}

export interface PruneResult {
  /** Relative paths deleted, in walk order */
  deleted: string[];

  /** Deletion failures collected under the 'continue' policy */
  failures: SyncError[];
}

/**
 * Recursively list regular files under dir, as paths relative to rootDir.
 * A missing directory yields nothing. Symlinks and other special entries
 * are skipped.
 */
export async function listFiles(rootDir: string, dir: string): Promise<string[]> {
  const absDir = resolveInRoot(rootDir, dir);
  const results: string[] = [];

  let entries: Dirent[];
  try {
    entries = await fs.readdir(absDir, { withFileTypes: true });
  } catch (err) {
    const code = errorCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return results;
    }
    throw new SyncError('IOError', `Cannot list ${dir}: ${errorMessage(err)}`, {
      relativePath: dir,
      phase: 'prune',
      cause: err,
    });
  }

  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const relativePath = toRelativePath(rootDir, path.join(absDir, entry.name));

    if (entry.isDirectory()) {
      results.push(...(await listFiles(rootDir, relativePath)));
    } else if (entry.isFile()) {
      results.push(relativePath);
    }
  }

  return results;
}

function isKnown(relativePath: string, kind: ManagedDirKind, options: PruneOptions): boolean {
  const [primary, secondary] =
    kind === 'index'
      ? [options.declaredPaths, options.overridePaths]
      : [options.overridePaths, options.declaredPaths];

  // The other set is consulted too, so nothing still expected is ever removed
  return primary.has(relativePath) || secondary.has(relativePath);
}

/**
 * Delete every untracked file under the managed directories.
 *
 * Under 'fail-fast' the first failed deletion is thrown as a DeleteFailed
 * SyncError; under 'continue' failures are returned and the walk goes on.
 */
export async function pruneUntracked(options: PruneOptions): Promise<PruneResult> {
  const logger = options.logger.child({ component: 'prune' });
  const deleted: string[] = [];
  const failures: SyncError[] = [];
  const visited = new Set<string>();

  for (const managed of options.managedDirs) {
    if (options.signal?.aborted) {
      throw new SyncError('Cancelled', 'Sync cancelled during prune', { phase: 'prune' });
    }

    const files = await listFiles(options.rootDir, managed.dir);

    for (const relativePath of files) {
      // Nested or repeated managed dirs would otherwise list a file twice
      if (visited.has(relativePath)) continue;
      visited.add(relativePath);

      if (isKnown(relativePath, managed.kind, options)) continue;

      try {
        await fs.unlink(resolveInRoot(options.rootDir, relativePath));
      } catch (err) {
        if (errorCode(err) === 'ENOENT') continue;

        const failure = new SyncError(
          'DeleteFailed',
          `Cannot prune ${relativePath}: ${errorMessage(err)}`,
          { relativePath, phase: 'prune', cause: err }
        );
        logger.error({ relativePath, error: errorMessage(err) }, 'Failed to prune file');

        if (options.failurePolicy === 'fail-fast') {
          throw failure;
        }
        failures.push(failure);
        continue;
      }

      deleted.push(relativePath);
      logger.debug({ relativePath, managedDir: managed.dir }, 'Pruned untracked file');
      options.onDeleted?.(relativePath);
    }
  }

  logger.info({ deleted: deleted.length, failures: failures.length }, 'Prune complete');
  return { deleted, failures };
}

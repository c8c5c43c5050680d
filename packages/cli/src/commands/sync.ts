/**
 * packsync sync command
 */

import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import type { Logger } from 'pino';
import {
  ConfigError,
  ReconciliationEngine,
  SYNC_ROLES,
  buildSyncConfig,
  createLogger,
  describeManifest,
  loadPackArchive,
} from '@packsync/core';
import type { MirrorFetcher, SyncConfig, SyncReport, SyncRole } from '@packsync/core';
import { consoleOutput, describeFailure, entryTone, formatEntry } from '../output.js';
import type { OutputFn } from '../output.js';

export interface SyncCommandOptions {
  dir?: string;
  role?: string;
  prune?: boolean;
  continueOnError?: boolean;
  skipOptional?: boolean;
  verifyDownloads?: boolean;
  concurrency?: string;
  logLevel?: string;
  pretty?: boolean;
}

export interface SyncRunContext {
  logger: Logger;
  out: OutputFn;
  /** Replaces the HTTP fetcher, for tests */
  fetcher?: MirrorFetcher;
  signal?: AbortSignal;
}

export function parseRole(raw: string | undefined): SyncRole | undefined {
  if (raw === undefined) return undefined;
  const role = SYNC_ROLES.find((candidate) => candidate === raw);
  if (!role) {
    throw new ConfigError([`role must be one of: ${SYNC_ROLES.join(', ')}`]);
  }
  return role;
}

/**
 * Map command-line flags onto config overrides. Flags that were not given
 * stay undefined so the PACKSYNC_* environment still applies.
 */
export function toConfigOverrides(options: SyncCommandOptions): Partial<SyncConfig> {
  return {
    rootDir: options.dir === undefined ? undefined : path.resolve(options.dir),
    role: parseRole(options.role),
    prune: options.prune ? true : undefined,
    failurePolicy: options.continueOnError ? 'continue' : undefined,
    optionalFailurePolicy: options.skipOptional ? 'skip' : undefined,
    verifyDownloads: options.verifyDownloads ? true : undefined,
    // Non-numeric input becomes NaN and is reported by config validation
    concurrency: options.concurrency === undefined ? undefined : Number(options.concurrency),
  };
}

/**
 * Load the pack and reconcile the target directory against it.
 *
 * Setup problems (unreadable archive, invalid manifest or config) are
 * thrown. A sync that starts and then fails is reported through `out` and
 * resolves to null.
 */
export async function runSync(
  packPath: string,
  options: SyncCommandOptions,
  context: SyncRunContext
): Promise<SyncReport | null> {
  const { logger, out } = context;
  const config = buildSyncConfig(toConfigOverrides(options));
  const archive = await loadPackArchive(path.resolve(packPath), config.role);

  const engine = new ReconciliationEngine(
    archive.manifest,
    archive.overrides,
    config,
    logger,
    context.fetcher
  );

  out(describeManifest(archive.manifest));
  out(`Total files: ${engine.trackedFiles.length}`);
  if (engine.excludedByEnvironment > 0) {
    out(`Excluded for ${config.role}: ${engine.excludedByEnvironment}`, 'dim');
  }

  engine.on('mirrorFailed', ({ relativePath, error, remaining }) => {
    out(`  ! ${relativePath}: ${error.message} (${remaining} mirror(s) left)`, 'warning');
  });
  engine.on('entryDone', (result) => {
    out(formatEntry(result), entryTone(result.outcome));
  });
  engine.on('fileDeleted', ({ relativePath, reason }) => {
    if (reason === 'prune') {
      out(`  - ${relativePath} (pruned)`, 'dim');
    }
  });

  let report: SyncReport;
  try {
    report = await engine.sync(context.signal);
  } catch (err) {
    out(`Sync failed: ${describeFailure(err)}`, 'error');
    return null;
  }

  out(
    `Downloaded ${report.filesDownloaded}, repaired ${report.filesRepaired}, ` +
      `up to date ${report.filesValid}, skipped ${report.filesSkipped}, ` +
      `overrides ${report.overridesWritten}, pruned ${report.prunedFiles.length} ` +
      `in ${report.durationMs}ms`
  );
  out('Sync completed successfully', 'success');
  return report;
}

export function registerSyncCommand(program: Command): void {
  program
    .command('sync')
    .description('Verify, download and prune files so a directory matches a pack')
    .argument('<pack>', 'Path to the .mrpack archive')
    .option('-d, --dir <path>', 'Directory to sync (default: PACKSYNC_DIR or the current directory)')
    .option('--role <role>', `Side to sync for (${SYNC_ROLES.join('|')})`)
    .option('--prune', 'Delete untracked files in managed directories')
    .option('--continue-on-error', 'Keep going after a file fails and report every failure at the end')
    .option('--skip-optional', 'Skip optional files that cannot be downloaded')
    .option('--verify-downloads', 'Check digests of each download before accepting it')
    .option('-j, --concurrency <n>', 'Number of files processed at once')
    .option('--log-level <level>', 'Log level (default: PACKSYNC_LOG_LEVEL or info)')
    .option('--pretty', 'Human-readable log output')
    .action(async (packPath: string, options: SyncCommandOptions) => {
      const logger = createLogger({ level: options.logLevel, pretty: options.pretty });
      const controller = new AbortController();
      const onInterrupt = (): void => {
        logger.warn('Interrupted, stopping after the current files');
        controller.abort();
      };
      process.once('SIGINT', onInterrupt);

      try {
        const report = await runSync(packPath, options, {
          logger,
          out: consoleOutput,
          signal: controller.signal,
        });
        if (!report) {
          process.exitCode = 1;
        }
      } catch (error) {
        console.error(chalk.red('Error:'), describeFailure(error));
        process.exitCode = 1;
      } finally {
        process.off('SIGINT', onInterrupt);
      }
    });
}

/**
 * packsync inspect command
 */

import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import {
  SYNC_ROLES,
  describeManifest,
  filterForRole,
  formatDependencyId,
  loadPackArchive,
} from '@packsync/core';
import { consoleOutput, describeFailure } from '../output.js';
import type { OutputFn } from '../output.js';
import { parseRole } from './sync.js';

/** Print what a pack declares without touching any directory */
export async function runInspect(
  packPath: string,
  options: { role?: string },
  out: OutputFn
): Promise<void> {
  const role = parseRole(options.role) ?? 'server';
  const { manifest, overrides } = await loadPackArchive(path.resolve(packPath), role);

  out(describeManifest(manifest));
  out(`Game: ${manifest.game}`);

  out('Dependencies:');
  if (manifest.dependencies.size === 0) {
    out('  (none)');
  }
  for (const { id, version } of manifest.dependencies.values()) {
    out(`  ${formatDependencyId(id)} ${version}`);
  }

  const perRole = SYNC_ROLES.map(
    (candidate) => `${candidate}: ${filterForRole(manifest.declaredFiles, candidate).length}`
  );
  out(`Files: ${manifest.declaredFiles.length} (${perRole.join(', ')})`);
  out(`Overrides (${role}): ${overrides.size}`);
}

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('Show the manifest, dependencies and file counts of a pack')
    .argument('<pack>', 'Path to the .mrpack archive')
    .option('--role <role>', `Side whose overrides are counted (${SYNC_ROLES.join('|')})`)
    .action(async (packPath: string, options: { role?: string }) => {
      try {
        await runInspect(packPath, options, consoleOutput);
      } catch (error) {
        console.error(chalk.red('Error:'), describeFailure(error));
        process.exitCode = 1;
      }
    });
}

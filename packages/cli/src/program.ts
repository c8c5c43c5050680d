import { Command } from 'commander';
import { PACKSYNC_VERSION } from '@packsync/core';
import { registerSyncCommand } from './commands/sync.js';
import { registerInspectCommand } from './commands/inspect.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('packsync')
    .description('Sync a game directory against a modpack: verify, download, apply overrides, prune')
    .version(PACKSYNC_VERSION);

  registerSyncCommand(program);
  registerInspectCommand(program);

  return program;
}

/**
 * Line formatting shared by the commands.
 */

import chalk from 'chalk';
import { SyncAggregateError, SyncError, errorMessage } from '@packsync/core';
import type { EntryOutcome, EntryResult } from '@packsync/core';

/** How a line is highlighted on a terminal */
export type Tone = 'plain' | 'success' | 'warning' | 'error' | 'dim';

/** Where command output goes; the console outside of tests */
export type OutputFn = (line: string, tone?: Tone) => void;

const TONES: Record<Tone, (text: string) => string> = {
  plain: (text) => text,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  dim: chalk.dim,
};

/** OutputFn that colours lines and writes them to stdout */
export function consoleOutput(line: string, tone: Tone = 'plain'): void {
  console.log(TONES[tone](line));
}

export function entryTone(outcome: EntryOutcome): Tone {
  switch (outcome) {
    case 'valid':
      return 'dim';
    case 'downloaded':
    case 'repaired':
      return 'success';
    case 'skipped':
      return 'warning';
    case 'failed':
      return 'error';
  }
}

export function formatEntry(result: EntryResult): string {
  switch (result.outcome) {
    case 'valid':
      return `  ✓ ${result.relativePath} (up to date)`;
    case 'downloaded':
      return `  ✓ ${result.relativePath} (downloaded, ${result.bytesDownloaded} bytes)`;
    case 'repaired':
      return `  ✓ ${result.relativePath} (repaired, ${result.bytesDownloaded} bytes)`;
    case 'skipped':
      return `  - ${result.relativePath} (skipped: ${result.error?.message ?? 'optional'})`;
    case 'failed':
      return `  ✗ ${result.relativePath} (${result.error?.kind ?? 'failed'}: ${result.error?.message ?? 'unknown error'})`;
  }
}

/** `<kind>: <message>` for sync errors, `<name>: <message>` for anything else */
export function describeFailure(err: unknown): string {
  if (err instanceof SyncError) {
    return `${err.kind}: ${err.message}`;
  }
  if (err instanceof SyncAggregateError) {
    return `${err.kind ?? 'SyncAggregateError'}: ${err.message}`;
  }
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return errorMessage(err);
}

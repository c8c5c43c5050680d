/**
 * Environment filter: which declared files apply to the side being synced.
 */

import type { FileEntry, Requirement } from '../manifest/types.js';

/** Which side of the game the sync targets */
export type SyncRole = 'server' | 'client';

export const SYNC_ROLES: readonly SyncRole[] = ['server', 'client'] as const;

/** Requirement of an entry for a role; entries without env apply everywhere */
export function requirementFor(entry: FileEntry, role: SyncRole): Requirement {
  return entry.environment ? entry.environment[role] : 'required';
}

/**
 * Keep the entries that apply to the role. Entries marked unsupported for
 * the role are dropped; required and optional ones are kept alike.
 */
export function filterForRole(files: readonly FileEntry[], role: SyncRole): FileEntry[] {
  return files.filter((entry) => requirementFor(entry, role) !== 'unsupported');
}

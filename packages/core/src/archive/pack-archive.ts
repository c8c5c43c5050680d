/**
 * Pack archive reader (.mrpack).
 *
 * A pack is a zip holding the manifest document (modrinth.index.json) and
 * override trees. Generic overrides/ are applied first and the role's own
 * tree (server-overrides/ or client-overrides/) second, so the role-specific
 * copy wins when both carry the same path.
 */

import * as fs from 'node:fs/promises';
import { unzipSync } from 'fflate';
import type { Unzipped } from 'fflate';
import { ArchiveError, errorMessage } from '../errors.js';
import type { SyncRole } from '../environment/environment-filter.js';
import { parseManifestJson } from '../manifest/schema.js';
import type { OverrideSet, PackManifest } from '../manifest/types.js';
import { relativePathProblem } from '../paths.js';

export const MANIFEST_FILE_NAME = 'modrinth.index.json';

export const GENERIC_OVERRIDES_PREFIX = 'overrides/';

export const ROLE_OVERRIDES_PREFIX: Record<SyncRole, string> = {
  server: 'server-overrides/',
  client: 'client-overrides/',
};

/** Contents of a pack archive, ready for the engine */
export interface PackArchive {
  manifest: PackManifest;
  overrides: OverrideSet;
}

/** Later sources replace earlier ones on the same relative path */
export function mergeOverrideSources(...sources: OverrideSet[]): OverrideSet {
  const merged: OverrideSet = new Map();
  for (const source of sources) {
    for (const [relativePath, content] of source) {
      merged.set(relativePath, content);
    }
  }
  return merged;
}

/** Collect the files under one prefix, keyed by the path below it */
function collectOverrides(files: Unzipped, prefix: string): OverrideSet {
  const overrides: OverrideSet = new Map();

  for (const name of Object.keys(files).sort()) {
    if (!name.startsWith(prefix)) continue;

    const relativePath = name.slice(prefix.length);
    // Directory entries end with a slash and carry no content
    if (relativePath === '' || relativePath.endsWith('/')) continue;

    const problem = relativePathProblem(relativePath);
    if (problem) {
      throw new ArchiveError(`Override entry "${name}" rejected: ${problem}`);
    }

    const content = files[name];
    if (content) {
      overrides.set(relativePath, content);
    }
  }

  return overrides;
}

/**
 * Read a pack archive from memory.
 *
 * @throws ArchiveError if the zip is unreadable or has no manifest
 * @throws ManifestValidationError if the manifest document is invalid
 */
export function readPackArchive(bytes: Uint8Array, role: SyncRole = 'server'): PackArchive {
  let files: Unzipped;
  try {
    files = unzipSync(bytes);
  } catch (err) {
    throw new ArchiveError(`Not a readable pack archive: ${errorMessage(err)}`, { cause: err });
  }

  const index = files[MANIFEST_FILE_NAME];
  if (!index) {
    throw new ArchiveError(`${MANIFEST_FILE_NAME} not found in pack archive`);
  }

  const manifest = parseManifestJson(new TextDecoder().decode(index));
  const overrides = mergeOverrideSources(
    collectOverrides(files, GENERIC_OVERRIDES_PREFIX),
    collectOverrides(files, ROLE_OVERRIDES_PREFIX[role])
  );

  return { manifest, overrides };
}

/** Read a pack archive from disk */
export async function loadPackArchive(filePath: string, role: SyncRole = 'server'): Promise<PackArchive> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (err) {
    throw new ArchiveError(`Cannot read ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
  return readPackArchive(bytes, role);
}

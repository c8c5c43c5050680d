/**
 * Types for the pack manifest model.
 *
 * A manifest is parsed once per run and treated as read-only afterwards.
 * The engine never mutates it; all mutation happens on the filesystem.
 */

import type { Digest } from './digest.js';

/** How strongly a side (client or server) needs a declared file */
export type Requirement = 'required' | 'optional' | 'unsupported';

/** Per-side applicability of a declared file */
export interface Environment {
  client: Requirement;
  server: Requirement;
}

/** Expected digests for a declared file */
export interface FileHashes {
  /** SHA-1 digest (20 bytes) */
  sha1: Digest;

  /** SHA-512 digest (64 bytes) */
  sha512: Digest;

  /** Other algorithms from the manifest, kept as hex but never verified */
  otherHashes: Record<string, string>;
}

/** One declared file in the manifest */
export interface FileEntry {
  /** Path relative to the sync root, forward-slash separated; unique per manifest */
  relativePath: string;

  expectedHashes: FileHashes;

  /** Null means the file applies to every role */
  environment: Environment | null;

  /** Candidate mirrors, tried in declared order; never empty */
  downloadUrls: string[];

  /** Expected byte length (informational) */
  declaredSize: number;
}

/** Dependency tags the manifest format knows by name */
export type KnownDependencyKind =
  | 'minecraft'
  | 'forge'
  | 'neoforge'
  | 'fabric-loader'
  | 'quilt-loader';

/** A dependency tag: one of the known kinds, or any other string */
export type DependencyId =
  | { kind: KnownDependencyKind }
  | { kind: 'other'; name: string };

/** A declared dependency with its version string */
export interface DependencyEntry {
  id: DependencyId;
  version: string;
}

/** Root manifest entity */
export interface PackManifest {
  /** Game identifier (informational) */
  game: string;

  /** Manifest schema version (informational) */
  formatVersion: number;

  versionId: string;
  name: string;

  declaredFiles: FileEntry[];

  /** Raw dependency tag -> dependency; not consumed by the engine */
  dependencies: Map<string, DependencyEntry>;
}

/** Relative path -> verbatim override content */
export type OverrideSet = Map<string, Uint8Array>;

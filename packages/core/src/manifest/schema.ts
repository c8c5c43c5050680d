/**
 * Manifest document parsing.
 *
 * Validates the JSON document shipped inside a pack (modrinth.index.json)
 * with zod and converts it into the in-memory PackManifest model. Every
 * problem is collected with its JSON path before anything is thrown.
 */

import { z } from 'zod';
import { ManifestValidationError } from '../errors.js';
import { relativePathProblem } from '../paths.js';
import { Digest, DIGEST_LENGTHS } from './digest.js';
import { parseDependencyId } from './dependency-id.js';
import type {
  DependencyEntry,
  Environment,
  FileEntry,
  FileHashes,
  PackManifest,
} from './types.js';

const SEMVER_PATTERN =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?$/;

const HEX_PATTERN = /^[0-9a-fA-F]+$/;

function hexDigest(algorithm: keyof typeof DIGEST_LENGTHS) {
  const chars = DIGEST_LENGTHS[algorithm] * 2;
  return z
    .string()
    .regex(HEX_PATTERN, `${algorithm} must be hex-encoded`)
    .length(chars, `${algorithm} must be exactly ${chars} hex characters`);
}

export const RequirementSchema = z.enum(['required', 'optional', 'unsupported']);

export const EnvironmentSchema = z.object({
  client: RequirementSchema,
  server: RequirementSchema,
});

export const FileHashesSchema = z
  .object({
    sha1: hexDigest('sha1'),
    sha512: hexDigest('sha512'),
  })
  .catchall(z.string());

export const FileEntrySchema = z.object({
  path: z.string().superRefine((value, ctx) => {
    const problem = relativePathProblem(value);
    if (problem) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
    }
  }),
  hashes: FileHashesSchema,
  env: EnvironmentSchema.optional(),
  downloads: z
    .array(
      z
        .string()
        .url()
        .refine((value) => /^https?:\/\//i.test(value), 'download URL must use http or https')
    )
    .nonempty('at least one download URL is required'),
  fileSize: z.number().int().nonnegative(),
});

export const ManifestDocumentSchema = z
  .object({
    game: z.string(),
    formatVersion: z.number().int().nonnegative(),
    versionId: z.string(),
    name: z.string(),
    files: z.array(FileEntrySchema),
    dependencies: z.record(
      z.string(),
      z.string().regex(SEMVER_PATTERN, 'dependency version must be a semantic version')
    ),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    doc.files.forEach((file, index) => {
      if (seen.has(file.path)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['files', index, 'path'],
          message: `duplicate path "${file.path}"`,
        });
      }
      seen.add(file.path);
    });
  });

export type ManifestDocument = z.infer<typeof ManifestDocumentSchema>;
export type FileEntryDocument = z.infer<typeof FileEntrySchema>;

function formatIssue(issue: z.ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${location}: ${issue.message}`;
}

function toFileHashes(hashes: FileEntryDocument['hashes']): FileHashes {
  const { sha1, sha512, ...otherHashes } = hashes;
  return {
    sha1: Digest.fromHex('sha1', sha1),
    sha512: Digest.fromHex('sha512', sha512),
    otherHashes,
  };
}

function toFileEntry(file: FileEntryDocument): FileEntry {
  const environment: Environment | null = file.env
    ? { client: file.env.client, server: file.env.server }
    : null;

  return {
    relativePath: file.path,
    expectedHashes: toFileHashes(file.hashes),
    environment,
    downloadUrls: [...file.downloads],
    declaredSize: file.fileSize,
  };
}

/**
 * Validate a parsed JSON value and build the manifest model.
 *
 * @throws ManifestValidationError listing every problem found
 */
export function parseManifest(document: unknown): PackManifest {
  const result = ManifestDocumentSchema.safeParse(document);
  if (!result.success) {
    throw new ManifestValidationError(result.error.issues.map(formatIssue));
  }

  const doc = result.data;
  const dependencies = new Map<string, DependencyEntry>();
  for (const [tag, version] of Object.entries(doc.dependencies)) {
    dependencies.set(tag, { id: parseDependencyId(tag), version });
  }

  return {
    game: doc.game,
    formatVersion: doc.formatVersion,
    versionId: doc.versionId,
    name: doc.name,
    declaredFiles: doc.files.map(toFileEntry),
    dependencies,
  };
}

/** Parse manifest JSON text; malformed JSON is a validation error too */
export function parseManifestJson(text: string): PackManifest {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ManifestValidationError([`(root): malformed JSON: ${message}`]);
  }
  return parseManifest(document);
}

/** One-line summary used by the CLI */
export function describeManifest(manifest: PackManifest): string {
  return `Name: ${manifest.name}, Format: ${manifest.formatVersion}, Version: ${manifest.versionId}`;
}

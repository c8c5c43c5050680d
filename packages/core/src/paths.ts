/**
 * Relative path helpers.
 *
 * Paths from manifests, archives and config are untrusted and must stay
 * inside the sync root once joined to it.
 */

import * as path from 'node:path';

/**
 * Describe what is wrong with a manifest-style relative path, or return
 * null when it is acceptable.
 */
export function relativePathProblem(relativePath: string): string | null {
  if (relativePath.length === 0) {
    return 'path is empty';
  }
  if (relativePath.includes('\\')) {
    return 'path must use forward slashes';
  }
  if (relativePath.startsWith('/') || /^[a-zA-Z]:/.test(relativePath)) {
    return 'path must be relative';
  }

  const segments = relativePath.split('/');
  if (segments.some((segment) => segment === '..')) {
    return 'path must not leave the sync root';
  }
  if (segments.some((segment) => segment === '' || segment === '.')) {
    return 'path contains an empty or "." segment';
  }

  return null;
}

/** Join a validated relative path onto the sync root */
export function resolveInRoot(rootDir: string, relativePath: string): string {
  return path.join(rootDir, ...relativePath.split('/'));
}

/** Convert a native path under rootDir back to the manifest form */
export function toRelativePath(rootDir: string, absolutePath: string): string {
  return path.relative(rootDir, absolutePath).split(path.sep).join('/');
}

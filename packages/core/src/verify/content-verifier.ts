/**
 * Content verifier for declared files.
 *
 * A file is valid only when both its SHA-1 and SHA-512 digests match the
 * manifest. verifyFile streams the file through both hashes at once so
 * memory stays flat for large jars; isValid works on an in-memory buffer.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import type { FileHashes } from '../manifest/types.js';

/** Hex digests of a buffer, as written in a manifest */
export interface ComputedHashes {
  sha1: string;
  sha512: string;
  sizeBytes: number;
}

function matches(expected: FileHashes, sha1: Buffer, sha512: Buffer): boolean {
  return expected.sha1.equals(sha1) && expected.sha512.equals(sha512);
}

/**
 * Check a buffer against the expected digests.
 * Never throws; anything that does not match is simply invalid.
 */
export function isValid(buffer: Uint8Array, expected: FileHashes): boolean {
  const sha1 = crypto.createHash('sha1').update(buffer).digest();
  const sha512 = crypto.createHash('sha512').update(buffer).digest();
  return matches(expected, sha1, sha512);
}

/**
 * Check a file on disk against the expected digests.
 *
 * @throws If the file cannot be read
 */
export async function verifyFile(filePath: string, expected: FileHashes): Promise<boolean> {
  return new Promise<boolean>((resolve, reject) => {
    const sha1 = crypto.createHash('sha1');
    const sha512 = crypto.createHash('sha512');

    const stream = fs.createReadStream(filePath);

    stream.on('data', (chunk: string | Buffer) => {
      sha1.update(chunk);
      sha512.update(chunk);
    });

    stream.on('end', () => {
      resolve(matches(expected, sha1.digest(), sha512.digest()));
    });

    stream.on('error', (err: Error) => {
      reject(new Error(`Failed to read ${filePath}: ${err.message}`, { cause: err }));
    });
  });
}

/** Compute the manifest digests of a buffer */
export function computeHashes(buffer: Uint8Array): ComputedHashes {
  return {
    sha1: crypto.createHash('sha1').update(buffer).digest('hex'),
    sha512: crypto.createHash('sha512').update(buffer).digest('hex'),
    sizeBytes: buffer.length,
  };
}

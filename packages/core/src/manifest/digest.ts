/**
 * Fixed-size digest values.
 *
 * A Digest can only be built through fromHex/fromBytes, which check the
 * length for its algorithm, so a constructed value is always well formed.
 */

import { ManifestValidationError } from '../errors.js';

/** Algorithms the verifier checks, with their digest length in bytes */
export const DIGEST_LENGTHS = {
  sha1: 20,
  sha512: 64,
} as const;

export type DigestAlgorithm = keyof typeof DIGEST_LENGTHS;

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

export class Digest {
  readonly algorithm: DigestAlgorithm;
  private readonly bytes: Buffer;

  private constructor(algorithm: DigestAlgorithm, bytes: Buffer) {
    this.algorithm = algorithm;
    this.bytes = bytes;
  }

  /**
   * Parse a hex digest. Throws ManifestValidationError on non-hex input or
   * a length that does not match the algorithm.
   */
  static fromHex(algorithm: DigestAlgorithm, hex: string): Digest {
    const expectedChars = DIGEST_LENGTHS[algorithm] * 2;

    if (!HEX_PATTERN.test(hex)) {
      throw new ManifestValidationError([`${algorithm}: not a hex string`]);
    }
    if (hex.length !== expectedChars) {
      throw new ManifestValidationError([
        `${algorithm}: expected ${expectedChars} hex characters, got ${hex.length}`,
      ]);
    }

    return new Digest(algorithm, Buffer.from(hex, 'hex'));
  }

  static fromBytes(algorithm: DigestAlgorithm, bytes: Uint8Array): Digest {
    if (bytes.length !== DIGEST_LENGTHS[algorithm]) {
      throw new ManifestValidationError([
        `${algorithm}: expected ${DIGEST_LENGTHS[algorithm]} bytes, got ${bytes.length}`,
      ]);
    }
    return new Digest(algorithm, Buffer.from(bytes));
  }

  get length(): number {
    return this.bytes.length;
  }

  /** Byte-for-byte comparison against a computed digest */
  equals(other: Uint8Array): boolean {
    return this.bytes.equals(other);
  }

  toHex(): string {
    return this.bytes.toString('hex');
  }

  toString(): string {
    return `${this.algorithm}:${this.toHex()}`;
  }
}

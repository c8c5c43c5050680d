/**
 * Shared fixtures for core tests: manifest entries built from literal
 * content, an in-memory mirror fetcher, and a silent logger.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';
import pino from 'pino';
import type { Logger } from 'pino';
import { FetchError } from '../errors.js';
import type { MirrorFetcher, FetchOutcome, FetchProgressCallback } from '../fetch/mirror-fetcher.js';
import { Digest } from '../manifest/digest.js';
import type { Environment, FileEntry, FileHashes, PackManifest } from '../manifest/types.js';
import type { SyncConfig } from '../reconcile/types.js';
import { DEFAULT_SYNC_CONFIG } from '../reconcile/types.js';

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function hashesOf(content: string | Uint8Array): FileHashes {
  return {
    sha1: Digest.fromHex('sha1', crypto.createHash('sha1').update(content).digest('hex')),
    sha512: Digest.fromHex('sha512', crypto.createHash('sha512').update(content).digest('hex')),
    otherHashes: {},
  };
}

export function makeEntry(
  relativePath: string,
  content: string,
  urls: string[],
  environment: Environment | null = null
): FileEntry {
  return {
    relativePath,
    expectedHashes: hashesOf(content),
    environment,
    downloadUrls: urls,
    declaredSize: Buffer.byteLength(content),
  };
}

export function makeManifest(files: FileEntry[]): PackManifest {
  return {
    game: 'minecraft',
    formatVersion: 1,
    versionId: '1.0.0',
    name: 'Test Pack',
    declaredFiles: files,
    dependencies: new Map(),
  };
}

export function makeConfig(rootDir: string, overrides?: Partial<SyncConfig>): SyncConfig {
  return {
    ...DEFAULT_SYNC_CONFIG,
    indexManagedDirs: [...DEFAULT_SYNC_CONFIG.indexManagedDirs],
    overrideManagedDirs: [...DEFAULT_SYNC_CONFIG.overrideManagedDirs],
    rootDir,
    ...overrides,
  };
}

/** What a fake mirror does when asked for a URL */
export type FakeResponse =
  | { kind: 'body'; content: string }
  | { kind: 'status'; status: number }
  /** Writes some bytes, then fails as if the connection dropped */
  | { kind: 'partial'; content: string };

/**
 * In-memory MirrorFetcher. URLs without a configured response fail with 404.
 */
export class FakeMirrorFetcher implements MirrorFetcher {
  readonly calls: string[] = [];
  maxInFlight = 0;
  private inFlight = 0;

  constructor(
    private readonly responses: Record<string, FakeResponse>,
    private readonly delayMs = 0
  ) {}

  async fetch(
    url: string,
    destinationPath: string,
    onProgress?: FetchProgressCallback
  ): Promise<FetchOutcome> {
    this.calls.push(url);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      if (this.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      }

      const response = this.responses[url];
      if (!response) {
        return { ok: false, error: new FetchError(url, 'status', 'HTTP 404', { status: 404 }) };
      }

      switch (response.kind) {
        case 'status':
          return {
            ok: false,
            error: new FetchError(url, 'status', `HTTP ${response.status}`, { status: response.status }),
          };

        case 'partial':
          await fs.writeFile(destinationPath, response.content);
          return { ok: false, error: new FetchError(url, 'transport', 'Connection reset') };

        case 'body': {
          await fs.writeFile(destinationPath, response.content);
          const bytes = Buffer.byteLength(response.content);
          onProgress?.(bytes, bytes);
          return { ok: true, bytesWritten: bytes };
        }
      }
    } finally {
      this.inFlight--;
    }
  }
}

export function body(content: string): FakeResponse {
  return { kind: 'body', content };
}

export function status(code: number): FakeResponse {
  return { kind: 'status', status: code };
}

export function partial(content: string): FakeResponse {
  return { kind: 'partial', content };
}

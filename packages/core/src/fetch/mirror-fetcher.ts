/**
 * Mirror fetcher: one HTTP GET per call, body written to a local path.
 *
 * The transport is injected so tests (and callers with their own
 * connection pooling) can substitute it. There is no retry here; the
 * reconciliation engine moves on to the next mirror instead.
 */

import * as fs from 'node:fs/promises';
import type { Logger } from 'pino';
import { FetchError, errorMessage } from '../errors.js';

/** Bytes received so far, and the Content-Length when the server sent one */
export type FetchProgressCallback = (bytesReceived: number, totalBytes: number | null) => void;

export type FetchOutcome =
  | { ok: true; bytesWritten: number }
  | { ok: false; error: FetchError };

/** Retrieves a single URL into a destination file */
export interface MirrorFetcher {
  /**
   * Write the resource at url to destinationPath, creating or truncating
   * it. Parent directories must already exist. Never throws.
   */
  fetch(
    url: string,
    destinationPath: string,
    onProgress?: FetchProgressCallback
  ): Promise<FetchOutcome>;
}

export type FetchImpl = typeof fetch;

/** The part of a web stream reader the fetcher uses */
interface BodyReader {
  read(): Promise<{ done: boolean; value?: unknown }>;
  cancel(): Promise<void>;
}

export interface HttpMirrorFetcherOptions {
  /** Transport, defaults to the global fetch */
  fetchImpl?: FetchImpl;

  /** Abort a single request after this many milliseconds (0 disables) */
  timeoutMs?: number;

  userAgent?: string;

  logger?: Logger;
}

export class HttpMirrorFetcher implements MirrorFetcher {
  private readonly fetchImpl: FetchImpl;
  private readonly timeoutMs: number;
  private readonly userAgent: string | null;
  private readonly logger: Logger | null;

  constructor(options: HttpMirrorFetcherOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.userAgent = options.userAgent ?? null;
    this.logger = options.logger?.child({ component: 'mirror-fetcher' }) ?? null;
  }

  async fetch(
    url: string,
    destinationPath: string,
    onProgress?: FetchProgressCallback
  ): Promise<FetchOutcome> {
    const headers: Record<string, string> = {};
    if (this.userAgent) {
      headers['User-Agent'] = this.userAgent;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers,
        redirect: 'follow',
        signal: this.timeoutMs > 0 ? AbortSignal.timeout(this.timeoutMs) : undefined,
      });
    } catch (err) {
      return this.fail(new FetchError(url, 'transport', `Request failed: ${errorMessage(err)}`, { cause: err }));
    }

    if (!response.ok) {
      if (response.body) {
        await this.cancel(response.body.getReader(), url);
      }
      return this.fail(
        new FetchError(url, 'status', `HTTP ${response.status}`, { status: response.status })
      );
    }

    if (!response.body) {
      return this.fail(new FetchError(url, 'transport', 'Response body is empty'));
    }

    const lengthHeader = response.headers.get('content-length');
    const parsedLength = lengthHeader === null ? NaN : parseInt(lengthHeader, 10);
    const totalBytes = isNaN(parsedLength) ? null : parsedLength;

    let handle: fs.FileHandle;
    try {
      handle = await fs.open(destinationPath, 'w');
    } catch (err) {
      return this.fail(
        new FetchError(url, 'write', `Cannot open ${destinationPath}: ${errorMessage(err)}`, { cause: err })
      );
    }

    const reader = response.body.getReader();
    const written = await this.drain(url, destinationPath, reader, handle, totalBytes, onProgress);

    try {
      await handle.close();
    } catch (err) {
      return this.fail(
        new FetchError(url, 'write', `Cannot close ${destinationPath}: ${errorMessage(err)}`, { cause: err })
      );
    }

    if (!written.ok) {
      return written;
    }

    this.logger?.debug({ url, destinationPath, bytesWritten: written.bytesWritten }, 'Mirror fetch complete');
    return written;
  }

  /** Copy the body into the open file, chunk by chunk. Leaves the file open. */
  private async drain(
    url: string,
    destinationPath: string,
    reader: BodyReader,
    handle: fs.FileHandle,
    totalBytes: number | null,
    onProgress?: FetchProgressCallback
  ): Promise<FetchOutcome> {
    let bytesWritten = 0;

    for (;;) {
      let chunk: unknown;
      try {
        const next = await reader.read();
        if (next.done) {
          return { ok: true, bytesWritten };
        }
        chunk = next.value;
      } catch (err) {
        return this.fail(
          new FetchError(url, 'transport', `Body read failed: ${errorMessage(err)}`, { cause: err })
        );
      }

      if (!(chunk instanceof Uint8Array)) {
        await this.cancel(reader, url);
        return this.fail(new FetchError(url, 'transport', 'Response body is not binary'));
      }

      try {
        await handle.write(chunk);
      } catch (err) {
        await this.cancel(reader, url);
        return this.fail(
          new FetchError(url, 'write', `Write to ${destinationPath} failed: ${errorMessage(err)}`, {
            cause: err,
          })
        );
      }

      bytesWritten += chunk.length;
      onProgress?.(bytesWritten, totalBytes);
    }
  }

  private async cancel(reader: BodyReader, url: string): Promise<void> {
    try {
      await reader.cancel();
    } catch (err) {
      this.logger?.debug({ url, error: errorMessage(err) }, 'Failed to cancel response body');
    }
  }

  private fail(error: FetchError): FetchOutcome {
    this.logger?.debug({ url: error.url, reason: error.reason, status: error.status }, error.message);
    return { ok: false, error };
  }
}

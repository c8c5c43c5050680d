import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ReconciliationEngine } from '../reconcile/reconciliation-engine.js';
import { ConfigError, ManifestValidationError, SyncAggregateError, SyncError } from '../errors.js';
import type { FetchError } from '../errors.js';
import type { OverrideSet } from '../manifest/types.js';
import {
  FakeMirrorFetcher,
  body,
  makeConfig,
  makeEntry,
  makeManifest,
  partial,
  silentLogger,
  status,
} from './helpers.js';

function noOverrides(): OverrideSet {
  return new Map();
}

describe('ReconciliationEngine', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'packsync-engine-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeLocal(relativePath: string, content: string): void {
    const absPath = path.join(tmpDir, relativePath);
    fs.mkdirSync(path.dirname(absPath), { recursive: true });
    fs.writeFileSync(absPath, content);
  }

  function readLocal(relativePath: string): string {
    return fs.readFileSync(path.join(tmpDir, relativePath), 'utf-8');
  }

  function existsLocal(relativePath: string): boolean {
    return fs.existsSync(path.join(tmpDir, relativePath));
  }

  async function captureError(promise: Promise<unknown>): Promise<unknown> {
    try {
      await promise;
    } catch (err) {
      return err;
    }
    throw new Error('Expected the promise to reject');
  }

  async function captureSyncError(promise: Promise<unknown>): Promise<SyncError> {
    const err = await captureError(promise);
    if (!(err instanceof SyncError)) {
      throw new Error(`Expected a SyncError, got ${String(err)}`);
    }
    return err;
  }

  async function captureAggregateError(promise: Promise<unknown>): Promise<SyncAggregateError> {
    const err = await captureError(promise);
    if (!(err instanceof SyncAggregateError)) {
      throw new Error(`Expected a SyncAggregateError, got ${String(err)}`);
    }
    return err;
  }

  describe('declared files', () => {
    it('downloads a missing file into an empty directory', async () => {
      const manifest = makeManifest([
        makeEntry('mods/a.jar', 'hello', ['https://cdn.example.test/a.jar']),
      ]);
      const fetcher = new FakeMirrorFetcher({ 'https://cdn.example.test/a.jar': body('hello') });
      const engine = new ReconciliationEngine(manifest, noOverrides(), makeConfig(tmpDir), silentLogger(), fetcher);

      const report = await engine.sync();

      expect(readLocal('mods/a.jar')).toBe('hello');
      expect(fs.statSync(path.join(tmpDir, 'mods/a.jar')).size).toBe(5);
      expect(report.filesDownloaded).toBe(1);
      expect(report.entries).toEqual([
        {
          relativePath: 'mods/a.jar',
          outcome: 'downloaded',
          mirrorUrl: 'https://cdn.example.test/a.jar',
          bytesDownloaded: 5,
          durationMs: expect.any(Number),
        },
      ]);
    });

    it('performs no writes or deletes when run a second time', async () => {
      const manifest = makeManifest([
        makeEntry('mods/a.jar', 'hello', ['https://cdn.example.test/a.jar']),
        makeEntry('resourcepacks/pack.zip', 'world', ['https://cdn.example.test/pack.zip']),
      ]);
      const fetcher = new FakeMirrorFetcher({
        'https://cdn.example.test/a.jar': body('hello'),
        'https://cdn.example.test/pack.zip': body('world'),
      });

      await new ReconciliationEngine(manifest, noOverrides(), makeConfig(tmpDir), silentLogger(), fetcher).sync();
      expect(fetcher.calls).toHaveLength(2);
      const mtimeBefore = fs.statSync(path.join(tmpDir, 'mods/a.jar')).mtimeMs;

      const second = new ReconciliationEngine(manifest, noOverrides(), makeConfig(tmpDir), silentLogger(), fetcher);
      const deletions: string[] = [];
      second.on('fileDeleted', ({ relativePath }) => deletions.push(relativePath));

      const report = await second.sync();

      expect(fetcher.calls).toHaveLength(2);
      expect(deletions).toEqual([]);
      expect(report.filesValid).toBe(2);
      expect(report.filesDownloaded).toBe(0);
      expect(report.filesRepaired).toBe(0);
      expect(fs.statSync(path.join(tmpDir, 'mods/a.jar')).mtimeMs).toBe(mtimeBefore);
    });

    it('deletes a corrupted file and replaces it with fetched content', async () => {
      writeLocal('mods/a.jar', 'corrupted bytes');
      const manifest = makeManifest([
        makeEntry('mods/a.jar', 'hello', ['https://cdn.example.test/a.jar']),
      ]);
      const fetcher = new FakeMirrorFetcher({ 'https://cdn.example.test/a.jar': body('hello') });
      const engine = new ReconciliationEngine(manifest, noOverrides(), makeConfig(tmpDir), silentLogger(), fetcher);

      const deletions: Array<{ relativePath: string; reason: string }> = [];
      engine.on('fileDeleted', (deletion) => deletions.push(deletion));

      const report = await engine.sync();

      expect(readLocal('mods/a.jar')).toBe('hello');
      expect(deletions).toEqual([{ relativePath: 'mods/a.jar', reason: 'invalid' }]);
      expect(report.filesRepaired).toBe(1);
      expect(report.entries[0]?.outcome).toBe('repaired');
    });

    it('falls back across mirrors in declared order', async () => {
      const urls = [
        'https://one.example.test/a.jar',
        'https://two.example.test/a.jar',
        'https://three.example.test/a.jar',
      ];
      const manifest = makeManifest([makeEntry('mods/a.jar', 'hello', urls)]);
      const fetcher = new FakeMirrorFetcher({
        'https://one.example.test/a.jar': status(503),
        'https://two.example.test/a.jar': partial('hel'),
        'https://three.example.test/a.jar': body('hello'),
      });
      const engine = new ReconciliationEngine(manifest, noOverrides(), makeConfig(tmpDir), silentLogger(), fetcher);

      const failures: Array<{ url: string; remaining: number }> = [];
      engine.on('mirrorFailed', ({ error, remaining }) => failures.push({ url: error.url, remaining }));

      const report = await engine.sync();

      expect(fetcher.calls).toEqual(urls);
      expect(failures).toEqual([
        { url: 'https://one.example.test/a.jar', remaining: 2 },
        { url: 'https://two.example.test/a.jar', remaining: 1 },
      ]);
      expect(readLocal('mods/a.jar')).toBe('hello');
      expect(report.entries[0]?.mirrorUrl).toBe('https://three.example.test/a.jar');
    });

    it('fails with AllDownloadsFailed and leaves no partial file when every mirror fails', async () => {
      const manifest = makeManifest([
        makeEntry('mods/a.jar', 'hello', [
          'https://one.example.test/a.jar',
          'https://two.example.test/a.jar',
        ]),
      ]);
      const fetcher = new FakeMirrorFetcher({
        'https://one.example.test/a.jar': status(404),
        'https://two.example.test/a.jar': partial('he'),
      });
      const engine = new ReconciliationEngine(manifest, noOverrides(), makeConfig(tmpDir), silentLogger(), fetcher);

      const syncError = await captureSyncError(engine.sync());

      expect(syncError.kind).toBe('AllDownloadsFailed');
      expect(syncError.relativePath).toBe('mods/a.jar');
      expect(syncError.phase).toBe('fetch');
      expect(syncError.attempts.map((attempt: FetchError) => attempt.reason)).toEqual(['status', 'transport']);
      expect(existsLocal('mods/a.jar')).toBe(false);
    });

    it('reports a local read failure as IOError', async () => {
      fs.mkdirSync(path.join(tmpDir, 'mods', 'a.jar'), { recursive: true });
      const manifest = makeManifest([
        makeEntry('mods/a.jar', 'hello', ['https://cdn.example.test/a.jar']),
      ]);
      const fetcher = new FakeMirrorFetcher({ 'https://cdn.example.test/a.jar': body('hello') });
      const engine = new ReconciliationEngine(manifest, noOverrides(), makeConfig(tmpDir), silentLogger(), fetcher);

      const err = await captureSyncError(engine.sync());

      expect(err.kind).toBe('IOError');
      expect(err.phase).toBe('validate');
      expect(fetcher.calls).toEqual([]);
    });
  });

  describe('failure policies', () => {
    const failing = makeEntry('mods/broken.jar', 'broken', ['https://cdn.example.test/broken.jar']);
    const working = makeEntry('mods/ok.jar', 'ok', ['https://cdn.example.test/ok.jar']);

    it('stops at the first failed file under fail-fast', async () => {
      const fetcher = new FakeMirrorFetcher({ 'https://cdn.example.test/ok.jar': body('ok') });
      const engine = new ReconciliationEngine(
        makeManifest([failing, working]),
        new Map([['config/app.toml', Buffer.from('x = 1')]]),
        makeConfig(tmpDir),
        silentLogger(),
        fetcher
      );

      const err = await captureSyncError(engine.sync());

      expect(err.kind).toBe('AllDownloadsFailed');
      expect(fetcher.calls).toEqual(['https://cdn.example.test/broken.jar']);
      expect(existsLocal('mods/ok.jar')).toBe(false);
      expect(existsLocal('config/app.toml')).toBe(false);
    });

    it('collects failures and keeps going under continue', async () => {
      const fetcher = new FakeMirrorFetcher({ 'https://cdn.example.test/ok.jar': body('ok') });
      const engine = new ReconciliationEngine(
        makeManifest([failing, working]),
        new Map([['config/app.toml', Buffer.from('x = 1')]]),
        makeConfig(tmpDir, { failurePolicy: 'continue', prune: true }),
        silentLogger(),
        fetcher
      );

      const aggregate = await captureAggregateError(engine.sync());

      expect(aggregate.errors.map((e) => e.relativePath)).toEqual(['mods/broken.jar']);
      expect(aggregate.kind).toBe('AllDownloadsFailed');
      expect(aggregate.report.filesDownloaded).toBe(1);
      expect(aggregate.report.filesFailed).toBe(1);
      expect(aggregate.report.overridesWritten).toBe(1);
      expect(aggregate.report.pruned).toBe(false);
      expect(readLocal('mods/ok.jar')).toBe('ok');
      expect(readLocal('config/app.toml')).toBe('x = 1');
    });

    it('skips optional files that fail when the optional policy is skip', async () => {
      const optional = makeEntry('mods/extra.jar', 'extra', ['https://cdn.example.test/extra.jar'], {
        client: 'required',
        server: 'optional',
      });
      const fetcher = new FakeMirrorFetcher({ 'https://cdn.example.test/ok.jar': body('ok') });
      const engine = new ReconciliationEngine(
        makeManifest([optional, working]),
        noOverrides(),
        makeConfig(tmpDir, { optionalFailurePolicy: 'skip' }),
        silentLogger(),
        fetcher
      );

      const report = await engine.sync();

      expect(report.filesSkipped).toBe(1);
      expect(report.filesDownloaded).toBe(1);
      expect(report.entries[0]?.outcome).toBe('skipped');
      expect(report.entries[0]?.error?.kind).toBe('AllDownloadsFailed');
    });

    it('treats failing optional files as fatal by default', async () => {
      const optional = makeEntry('mods/extra.jar', 'extra', ['https://cdn.example.test/extra.jar'], {
        client: 'required',
        server: 'optional',
      });
      const engine = new ReconciliationEngine(
        makeManifest([optional]),
        noOverrides(),
        makeConfig(tmpDir),
        silentLogger(),
        new FakeMirrorFetcher({})
      );

      const err = await captureSyncError(engine.sync());

      expect(err.kind).toBe('AllDownloadsFailed');
    });
  });

  describe('environment filtering', () => {
    it('never checks or fetches files unsupported on the server', async () => {
      writeLocal('client/shaders.zip', 'stale local copy');
      const clientOnly = makeEntry('client/shaders.zip', 'shaders', ['https://cdn.example.test/shaders.zip'], {
        client: 'required',
        server: 'unsupported',
      });
      const fetcher = new FakeMirrorFetcher({ 'https://cdn.example.test/shaders.zip': body('shaders') });
      const engine = new ReconciliationEngine(
        makeManifest([clientOnly]),
        noOverrides(),
        makeConfig(tmpDir),
        silentLogger(),
        fetcher
      );

      const report = await engine.sync();

      expect(engine.trackedFiles).toEqual([]);
      expect(report.excludedByEnvironment).toBe(1);
      expect(report.entries).toEqual([]);
      expect(fetcher.calls).toEqual([]);
      expect(readLocal('client/shaders.zip')).toBe('stale local copy');
    });

    it('syncs client-only files when the role is client', async () => {
      const clientOnly = makeEntry('mods/minimap.jar', 'map', ['https://cdn.example.test/minimap.jar'], {
        client: 'required',
        server: 'unsupported',
      });
      const fetcher = new FakeMirrorFetcher({ 'https://cdn.example.test/minimap.jar': body('map') });
      const engine = new ReconciliationEngine(
        makeManifest([clientOnly]),
        noOverrides(),
        makeConfig(tmpDir, { role: 'client' }),
        silentLogger(),
        fetcher
      );

      await engine.sync();

      expect(readLocal('mods/minimap.jar')).toBe('map');
    });
  });

  describe('overrides', () => {
    it('writes overrides after declared files, overwriting existing content', async () => {
      writeLocal('config/server.properties', 'motd=old');
      const manifest = makeManifest([
        makeEntry('mods/a.jar', 'hello', ['https://cdn.example.test/a.jar']),
      ]);
      const overrides: OverrideSet = new Map([
        ['config/server.properties', Buffer.from('motd=new')],
        ['config/nested/deep/options.json', Buffer.from('{}')],
      ]);
      const engine = new ReconciliationEngine(
        manifest,
        overrides,
        makeConfig(tmpDir),
        silentLogger(),
        new FakeMirrorFetcher({ 'https://cdn.example.test/a.jar': body('hello') })
      );

      const order: string[] = [];
      engine.on('entryDone', (result) => order.push(`entry:${result.relativePath}`));
      engine.on('overrideWritten', ({ relativePath }) => order.push(`override:${relativePath}`));

      const report = await engine.sync();

      expect(readLocal('config/server.properties')).toBe('motd=new');
      expect(readLocal('config/nested/deep/options.json')).toBe('{}');
      expect(report.overridesWritten).toBe(2);
      expect(order).toEqual([
        'entry:mods/a.jar',
        'override:config/server.properties',
        'override:config/nested/deep/options.json',
      ]);
    });

    it('rejects override paths that leave the sync root', () => {
      expect(
        () =>
          new ReconciliationEngine(
            makeManifest([]),
            new Map([['../outside.txt', Buffer.from('x')]]),
            makeConfig(tmpDir),
            silentLogger(),
            new FakeMirrorFetcher({})
          )
      ).toThrow(ManifestValidationError);
    });
  });

  describe('prune', () => {
    it('deletes untracked files in managed directories only', async () => {
      writeLocal('mods/old.jar', 'outdated');
      writeLocal('mods/sub/leftover.jar', 'leftover');
      writeLocal('config/stale.toml', 'stale');
      writeLocal('world/level.dat', 'save data');
      const manifest = makeManifest([
        makeEntry('mods/a.jar', 'hello', ['https://cdn.example.test/a.jar']),
      ]);
      const overrides: OverrideSet = new Map([['config/kept.toml', Buffer.from('kept')]]);
      const engine = new ReconciliationEngine(
        manifest,
        overrides,
        makeConfig(tmpDir, { prune: true }),
        silentLogger(),
        new FakeMirrorFetcher({ 'https://cdn.example.test/a.jar': body('hello') })
      );

      const report = await engine.sync();

      expect([...report.prunedFiles].sort()).toEqual([
        'config/stale.toml',
        'mods/old.jar',
        'mods/sub/leftover.jar',
      ]);
      expect(report.pruned).toBe(true);
      expect(readLocal('mods/a.jar')).toBe('hello');
      expect(readLocal('config/kept.toml')).toBe('kept');
      expect(readLocal('world/level.dat')).toBe('save data');
      // Emptied directories stay in place
      expect(fs.existsSync(path.join(tmpDir, 'mods', 'sub'))).toBe(true);
    });

    it('prunes files the environment filter excluded', async () => {
      writeLocal('mods/minimap.jar', 'map');
      const clientOnly = makeEntry('mods/minimap.jar', 'map', ['https://cdn.example.test/minimap.jar'], {
        client: 'required',
        server: 'unsupported',
      });
      const engine = new ReconciliationEngine(
        makeManifest([clientOnly]),
        noOverrides(),
        makeConfig(tmpDir, { prune: true }),
        silentLogger(),
        new FakeMirrorFetcher({})
      );

      const report = await engine.sync();

      expect(report.prunedFiles).toEqual(['mods/minimap.jar']);
      expect(existsLocal('mods/minimap.jar')).toBe(false);
    });

    it('leaves untracked files alone when prune is off', async () => {
      writeLocal('mods/old.jar', 'outdated');
      const engine = new ReconciliationEngine(
        makeManifest([]),
        noOverrides(),
        makeConfig(tmpDir),
        silentLogger(),
        new FakeMirrorFetcher({})
      );

      const report = await engine.sync();

      expect(report.pruned).toBe(false);
      expect(readLocal('mods/old.jar')).toBe('outdated');
    });
  });

  describe('concurrency and cancellation', () => {
    it('processes at most `concurrency` files at once', async () => {
      const entries = ['a', 'b', 'c', 'd'].map((name) =>
        makeEntry(`mods/${name}.jar`, name, [`https://cdn.example.test/${name}.jar`])
      );
      const fetcher = new FakeMirrorFetcher(
        Object.fromEntries(['a', 'b', 'c', 'd'].map((name) => [`https://cdn.example.test/${name}.jar`, body(name)])),
        10
      );
      const engine = new ReconciliationEngine(
        makeManifest(entries),
        noOverrides(),
        makeConfig(tmpDir, { concurrency: 2 }),
        silentLogger(),
        fetcher
      );

      const report = await engine.sync();

      expect(fetcher.maxInFlight).toBe(2);
      expect(report.filesDownloaded).toBe(4);
      expect(report.entries.map((entry) => entry.relativePath)).toEqual([
        'mods/a.jar',
        'mods/b.jar',
        'mods/c.jar',
        'mods/d.jar',
      ]);
    });

    it('stops before touching anything when the signal is already aborted', async () => {
      const fetcher = new FakeMirrorFetcher({ 'https://cdn.example.test/a.jar': body('hello') });
      const engine = new ReconciliationEngine(
        makeManifest([makeEntry('mods/a.jar', 'hello', ['https://cdn.example.test/a.jar'])]),
        noOverrides(),
        makeConfig(tmpDir),
        silentLogger(),
        fetcher
      );
      const controller = new AbortController();
      controller.abort();

      const err = await captureSyncError(engine.sync(controller.signal));

      expect(err.kind).toBe('Cancelled');
      expect(fetcher.calls).toEqual([]);
      expect(engine.isRunning).toBe(false);
    });

    it('cancels between entries', async () => {
      const fetcher = new FakeMirrorFetcher({
        'https://cdn.example.test/a.jar': body('a'),
        'https://cdn.example.test/b.jar': body('b'),
      });
      const engine = new ReconciliationEngine(
        makeManifest([
          makeEntry('mods/a.jar', 'a', ['https://cdn.example.test/a.jar']),
          makeEntry('mods/b.jar', 'b', ['https://cdn.example.test/b.jar']),
        ]),
        noOverrides(),
        makeConfig(tmpDir),
        silentLogger(),
        fetcher
      );
      const controller = new AbortController();
      engine.on('entryDone', () => controller.abort());

      const err = await captureSyncError(engine.sync(controller.signal));

      expect(err.kind).toBe('Cancelled');
      expect(fetcher.calls).toEqual(['https://cdn.example.test/a.jar']);
      expect(readLocal('mods/a.jar')).toBe('a');
    });
  });

  describe('download verification', () => {
    const urls = ['https://bad.example.test/a.jar', 'https://good.example.test/a.jar'];

    it('accepts the first successful mirror by default', async () => {
      const engine = new ReconciliationEngine(
        makeManifest([makeEntry('mods/a.jar', 'hello', urls)]),
        noOverrides(),
        makeConfig(tmpDir),
        silentLogger(),
        new FakeMirrorFetcher({
          'https://bad.example.test/a.jar': body('tampered'),
          'https://good.example.test/a.jar': body('hello'),
        })
      );

      await engine.sync();

      expect(readLocal('mods/a.jar')).toBe('tampered');
    });

    it('moves to the next mirror when downloaded content does not match', async () => {
      const engine = new ReconciliationEngine(
        makeManifest([makeEntry('mods/a.jar', 'hello', urls)]),
        noOverrides(),
        makeConfig(tmpDir, { verifyDownloads: true }),
        silentLogger(),
        new FakeMirrorFetcher({
          'https://bad.example.test/a.jar': body('tampered'),
          'https://good.example.test/a.jar': body('hello'),
        })
      );
      const reasons: string[] = [];
      engine.on('mirrorFailed', ({ error }) => reasons.push(error.reason));

      await engine.sync();

      expect(reasons).toEqual(['integrity']);
      expect(readLocal('mods/a.jar')).toBe('hello');
    });
  });

  describe('construction', () => {
    it('rejects an invalid configuration', () => {
      expect(
        () =>
          new ReconciliationEngine(
            makeManifest([]),
            noOverrides(),
            makeConfig(tmpDir, { concurrency: 0 }),
            silentLogger(),
            new FakeMirrorFetcher({})
          )
      ).toThrow(ConfigError);
    });

    it('rejects declared paths that leave the sync root', () => {
      const outside = path.join(path.dirname(tmpDir), 'escaped.jar');
      expect(
        () =>
          new ReconciliationEngine(
            makeManifest([makeEntry('../escaped.jar', 'hello', ['https://cdn.example.test/a.jar'])]),
            noOverrides(),
            makeConfig(tmpDir),
            silentLogger(),
            new FakeMirrorFetcher({ 'https://cdn.example.test/a.jar': body('hello') })
          )
      ).toThrow('file "../escaped.jar": path must not leave the sync root');
      expect(fs.existsSync(outside)).toBe(false);
    });

    it('rejects duplicate declared paths', () => {
      const entry = makeEntry('mods/a.jar', 'hello', ['https://cdn.example.test/a.jar']);
      expect(
        () =>
          new ReconciliationEngine(
            makeManifest([entry, entry]),
            noOverrides(),
            makeConfig(tmpDir, { concurrency: 2 }),
            silentLogger(),
            new FakeMirrorFetcher({})
          )
      ).toThrow('file "mods/a.jar": duplicate path');
    });
  });
});

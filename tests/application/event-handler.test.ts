import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { EventHandler, IngestStats } from '../../src/application/index.js';
import { UploadError } from '../../src/domain/index.js';
import { StageWriter } from '../../src/infrastructure/staging/index.js';
import { ArchiveUploader } from '../../src/infrastructure/archive/index.js';
import { FakeArchiveStore, cleanupDir, fakeLogger, makeEvent, makeTmpDir } from '../helpers.js';

const BUCKET = 'earthlab-geolocated-tweets';

const denver = {
  name: 'Denver, CO',
  boundingBox: { west: -105.11, south: 39.61, east: -104.6, north: 39.91 },
};

describe('EventHandler', () => {
  let tmp: string;
  let stagingDir: string;
  let store: FakeArchiveStore;
  let stats: IngestStats;
  let log: ReturnType<typeof fakeLogger>;
  let handler: EventHandler;

  function build(delayMs = 0): EventHandler {
    return new EventHandler({
      stager: new StageWriter(stagingDir),
      uploader: new ArchiveUploader(store, {
        container: BUCKET,
        keyMode: 'local-path',
        keyPrefix: '',
        timeoutMs: 1000,
      }),
      stats,
      log,
      delayMs,
    });
  }

  beforeEach(() => {
    tmp = makeTmpDir();
    stagingDir = join(tmp, 'staging');
    store = new FakeArchiveStore();
    stats = new IngestStats();
    log = fakeLogger();
    handler = build();
  });

  afterEach(() => {
    vi.useRealTimers();
    cleanupDir(tmp);
  });

  // ── handle ─────────────────────────────────────────────

  it('archives a place-only post under its staging path and removes the local copy', async () => {
    const event = makeEvent({
      id: '42',
      place: denver,
      payload: { id_str: '42', text: 'hello' },
    });
    const key = join(stagingDir, '42.json');

    const outcome = await handler.handle(event);

    expect(outcome).toEqual({ status: 'archived', key });
    expect(store.puts).toEqual([
      {
        container: BUCKET,
        key,
        body: '{"id_str":"42","text":"hello"}',
        contentType: 'application/json',
      },
    ]);
    expect(existsSync(key)).toBe(false);
    expect(stats.snapshot().archived).toBe(1);
  });

  it('drops a post without coordinates or place, touching neither disk nor archive', async () => {
    const outcome = await handler.handle(makeEvent({ id: '7' }));

    expect(outcome).toEqual({ status: 'skipped' });
    expect(store.puts).toHaveLength(0);
    expect(existsSync(stagingDir)).toBe(false);
    expect(stats.snapshot().skipped).toBe(1);
  });

  it('archives a coordinates-only post', async () => {
    const outcome = await handler.handle(makeEvent({ id: '55', coordinates: { lat: 40, lon: -105 } }));

    expect(outcome.status).toBe('archived');
    expect(store.puts[0]?.key).toContain('55');
  });

  it('keeps the staged file and does not throw when the upload fails', async () => {
    store.failWith = new Error('bucket unavailable');
    const event = makeEvent({ id: '300', place: denver });

    const outcome = await handler.handle(event);

    expect(outcome).toMatchObject({ status: 'failed', step: 'upload' });
    expect(outcome.status === 'failed' && outcome.error).toBeInstanceOf(UploadError);
    expect(existsSync(join(stagingDir, '300.json'))).toBe(true);
    expect(stats.snapshot().failed).toBe(1);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ event_id: '300', step: 'upload', err: expect.any(UploadError) }),
      'Failed to archive event',
    );
  });

  it('processes the next event normally after a failed upload', async () => {
    store.failWith = new Error('bucket unavailable');
    await handler.handle(makeEvent({ id: '301', place: denver }));

    store.failWith = null;
    const outcome = await handler.handle(makeEvent({ id: '302', place: denver }));

    expect(outcome).toEqual({ status: 'archived', key: join(stagingDir, '302.json') });
    expect(store.puts).toHaveLength(1);
  });

  it('reports a staging failure without uploading', async () => {
    // A regular file where the staging directory should be
    writeFileSync(stagingDir, 'not a directory');

    const outcome = await handler.handle(makeEvent({ id: '400', place: denver }));

    expect(outcome).toMatchObject({ status: 'failed', step: 'stage' });
    expect(store.puts).toHaveLength(0);
  });

  it('archives exactly the matching half of alternating events, each under a distinct key', async () => {
    const events = Array.from({ length: 5 }, (_, i) =>
      makeEvent({ id: `alt-${i}`, coordinates: i % 2 === 0 ? { lat: 10, lon: 20 } : null }),
    );

    for (const event of events) {
      await handler.handle(event);
    }

    expect(store.puts).toHaveLength(3);
    expect(new Set(store.puts.map((p) => p.key)).size).toBe(3);
    expect(readdirSync(stagingDir)).toEqual([]);
  });

  it('waits the configured delay before every event, matching or not', async () => {
    vi.useFakeTimers();
    handler = build(5000);

    let settled = false;
    const pending = handler.handle(makeEvent({ id: '500' })).then((outcome) => {
      settled = true;
      return outcome;
    });

    await vi.advanceTimersByTimeAsync(4999);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(await pending).toEqual({ status: 'skipped' });
  });

  it('cancels an event when aborted during the delay, before staging', async () => {
    vi.useFakeTimers();
    handler = build(5000);
    const ac = new AbortController();

    const pending = handler.handle(makeEvent({ id: '501', place: denver }), ac.signal);
    await vi.advanceTimersByTimeAsync(1000);
    ac.abort();

    expect(await pending).toEqual({ status: 'cancelled' });
    expect(existsSync(stagingDir)).toBe(false);
    expect(store.puts).toHaveLength(0);
    expect(stats.snapshot()).toMatchObject({ skipped: 0, archived: 0, failed: 0 });
  });

  // ── onEvent / onError ──────────────────────────────────

  it('decodes raw feed messages and archives geotagged ones', async () => {
    await handler.onEvent({
      id_str: '600',
      coordinates: { type: 'Point', coordinates: [-104.99, 39.74] },
    });

    expect(store.puts.map((p) => p.key)).toEqual([join(stagingDir, '600.json')]);
    expect(stats.snapshot()).toMatchObject({ received: 1, archived: 1 });
  });

  it('counts and ignores non-post messages', async () => {
    await handler.onEvent({ limit: { track: 12 } });

    expect(store.puts).toHaveLength(0);
    expect(stats.snapshot()).toMatchObject({ received: 0, undecodable: 1 });
  });

  it('logs feed errors without throwing', () => {
    const err = new Error('stall warning');

    handler.onError(err);

    expect(stats.snapshot().feed_errors).toBe(1);
    expect(log.error).toHaveBeenCalledWith({ err }, 'Feed reported an error');
  });

  // ── recoverStaged ──────────────────────────────────────

  it('uploads and removes staged files left from a previous run', async () => {
    mkdirSync(stagingDir, { recursive: true });
    writeFileSync(join(stagingDir, '100.json'), '{"id_str":"100"}');
    writeFileSync(join(stagingDir, '101.json'), '{"id_str":"101"}');
    writeFileSync(join(stagingDir, 'notes.txt'), 'ignore me');

    const recovered = await handler.recoverStaged();

    expect(recovered).toBe(2);
    expect(store.puts.map((p) => p.key)).toEqual([
      join(stagingDir, '100.json'),
      join(stagingDir, '101.json'),
    ]);
    expect(readdirSync(stagingDir)).toEqual(['notes.txt']);
    expect(stats.snapshot().recovered).toBe(2);
  });

  it('leaves staged files in place when recovery uploads fail', async () => {
    mkdirSync(stagingDir, { recursive: true });
    writeFileSync(join(stagingDir, '102.json'), '{}');
    store.failWith = new Error('still down');

    const recovered = await handler.recoverStaged();

    expect(recovered).toBe(0);
    expect(readdirSync(stagingDir)).toEqual(['102.json']);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ event_id: '102' }),
      'Failed to recover staged file',
    );
  });

  it('recovers nothing when the staging directory does not exist yet', async () => {
    expect(await handler.recoverStaged()).toBe(0);
  });
});

import type { Logger } from 'pino';
import { hasGeoSignal } from '../domain/index.js';
import type { GeoEvent } from '../domain/index.js';
import type { StageWriter, StagedFile } from '../infrastructure/staging/index.js';
import type { ArchiveUploader } from '../infrastructure/archive/index.js';
import { decodeEvent } from './event-schema.js';
import type { IngestStats } from './ingest-stats.js';
import type { StreamListener } from './stream-listener.js';

export type HandleStep = 'stage' | 'upload' | 'cleanup';

/** Result of processing one event. `handle()` reports failures here instead of throwing. */
export type HandleOutcome =
  | { status: 'skipped' }
  | { status: 'cancelled' }
  | { status: 'archived'; key: string }
  | { status: 'failed'; step: HandleStep; error: unknown };

/** Dependencies bundled for the handler. */
export interface EventHandlerDeps {
  stager: StageWriter;
  uploader: ArchiveUploader;
  stats: IngestStats;
  log: Logger;
  /** Fixed pause before every decoded event. */
  delayMs: number;
}

/**
 * Per-event pipeline: delay → geo filter → stage → upload → cleanup.
 *
 * Every step after the filter has its own error boundary. A failed event
 * is logged and reported as an outcome; nothing propagates to the stream.
 * When the upload fails the staged file is kept so the startup sweep can
 * retry it. An abort during the delay cancels the event before anything
 * touches disk; once staging has begun the event runs to completion.
 */
export class EventHandler implements StreamListener {
  constructor(private readonly deps: EventHandlerDeps) {}

  async onEvent(raw: unknown, signal?: AbortSignal): Promise<void> {
    const event = decodeEvent(raw);
    if (event === null) {
      this.deps.stats.increment('undecodable');
      this.deps.log.debug('Ignoring non-post feed message');
      return;
    }

    this.deps.stats.increment('received');
    await this.handle(event, signal);
  }

  onError(err: unknown): void {
    this.deps.stats.increment('feed_errors');
    this.deps.log.error({ err }, 'Feed reported an error');
  }

  async handle(event: GeoEvent, signal?: AbortSignal): Promise<HandleOutcome> {
    const { stager, uploader, stats, log, delayMs } = this.deps;

    await sleep(delayMs, signal);
    if (signal?.aborted) {
      log.debug({ event_id: event.id }, 'Shutting down, event not processed');
      return { status: 'cancelled' };
    }

    if (!hasGeoSignal(event)) {
      stats.increment('skipped');
      return { status: 'skipped' };
    }

    let staged: StagedFile;
    try {
      staged = await stager.stage(event);
    } catch (err: unknown) {
      return this.fail(event, 'stage', err);
    }

    let key: string;
    try {
      key = await uploader.upload(staged);
    } catch (err: unknown) {
      // Staged file stays on disk for the startup sweep
      return this.fail(event, 'upload', err);
    }

    try {
      await stager.remove(staged);
    } catch (err: unknown) {
      return this.fail(event, 'cleanup', err);
    }

    stats.increment('archived');
    log.info({ event_id: event.id, key }, 'Event archived');
    return { status: 'archived', key };
  }

  /**
   * Uploads staged files left behind by earlier failures or a crash.
   * Returns how many were archived and removed.
   */
  async recoverStaged(): Promise<number> {
    const { stager, uploader, stats, log } = this.deps;

    const leftovers = await stager.listStaged();
    if (leftovers.length === 0) return 0;

    log.info({ count: leftovers.length }, 'Recovering staged files from a previous run');

    let recovered = 0;
    for (const staged of leftovers) {
      try {
        const key = await uploader.upload(staged);
        await stager.remove(staged);
        recovered++;
        log.debug({ event_id: staged.eventId, key }, 'Recovered staged file');
      } catch (err: unknown) {
        log.error({ err, event_id: staged.eventId, path: staged.path }, 'Failed to recover staged file');
      }
    }

    stats.increment('recovered', recovered);
    log.info({ recovered, remaining: leftovers.length - recovered }, 'Staged file recovery finished');
    return recovered;
  }

  private fail(event: GeoEvent, step: HandleStep, err: unknown): HandleOutcome {
    this.deps.stats.increment('failed');
    this.deps.log.error({ err, event_id: event.id, step }, 'Failed to archive event');
    return { status: 'failed', step, error: err };
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

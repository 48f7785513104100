import { readFile } from 'node:fs/promises';
import { sep } from 'node:path';
import { UploadError } from '../../domain/index.js';
import type { StagedFile } from '../staging/index.js';
import type { ArchiveStore } from './archive-store.js';

export const ARCHIVE_KEY_MODES = ['local-path', 'event-id'] as const;

/**
 * How remote keys are derived.
 *
 * - `local-path`: the staging path verbatim (`<dir>/<id>.json`).
 * - `event-id`: `prefix + <id>.json`, independent of the local layout.
 */
export type ArchiveKeyMode = (typeof ARCHIVE_KEY_MODES)[number];

export interface ArchiveUploaderOptions {
  container: string;
  keyMode: ArchiveKeyMode;
  keyPrefix: string;
  timeoutMs: number;
}

/**
 * Moves one staged file into the archive store.
 *
 * Single attempt, bounded by `timeoutMs`. Every failure, the timeout
 * included, surfaces as UploadError; the caller owns retry and cleanup.
 */
export class ArchiveUploader {
  constructor(
    private readonly store: ArchiveStore,
    private readonly options: ArchiveUploaderOptions,
  ) {}

  get container(): string {
    return this.options.container;
  }

  keyFor(staged: StagedFile): string {
    if (this.options.keyMode === 'event-id') {
      return `${this.options.keyPrefix}${staged.eventId}.json`;
    }
    return staged.path.split(sep).join('/');
  }

  async upload(staged: StagedFile): Promise<string> {
    const key = this.keyFor(staged);

    let body: Buffer;
    try {
      body = await readFile(staged.path);
    } catch (err: unknown) {
      throw new UploadError(`Failed to read staged file ${staged.path}`, key, { cause: err });
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new UploadError(`Upload timed out after ${this.options.timeoutMs}ms`, key));
      }, this.options.timeoutMs);
    });

    try {
      await Promise.race([
        this.store.put(this.options.container, key, body, {
          contentType: 'application/json',
          signal: controller.signal,
        }),
        timeout,
      ]);
    } catch (err: unknown) {
      if (err instanceof UploadError) throw err;
      throw new UploadError(`Failed to upload ${key} to ${this.options.container}`, key, { cause: err });
    } finally {
      clearTimeout(timer);
    }

    return key;
  }
}

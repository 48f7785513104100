import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import type { GeoEvent } from '../src/domain/index.js';
import type { ArchiveStore, PutOptions } from '../src/infrastructure/archive/index.js';

let counter = 0;

/**
 * Factory for creating test events with sensible defaults.
 * Defaults to a post with neither coordinates nor place.
 */
export function makeEvent(overrides: Partial<GeoEvent> = {}): GeoEvent {
  counter++;
  const id = overrides.id ?? `${1000 + counter}`;
  return {
    id,
    coordinates: overrides.coordinates ?? null,
    place: overrides.place ?? null,
    payload: overrides.payload ?? { id_str: id, text: `post ${id}` },
    receivedAt: overrides.receivedAt ?? '2026-03-01T12:00:00.000Z',
  };
}

/** Minimal fake logger. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as import('pino').Logger;
}

/** Fresh directory under the OS temp dir; remove with `cleanupDir`. */
export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), 'geostream-test-'));
}

export function cleanupDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export interface PutCall {
  container: string;
  key: string;
  body: string;
  contentType: string;
}

/** In-memory ArchiveStore that records every put. */
export class FakeArchiveStore implements ArchiveStore {
  readonly puts: PutCall[] = [];
  failWith: Error | null = null;

  async put(container: string, key: string, body: Uint8Array, options: PutOptions): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.puts.push({
      container,
      key,
      body: Buffer.from(body).toString('utf-8'),
      contentType: options.contentType,
    });
  }
}

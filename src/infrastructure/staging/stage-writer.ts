import { mkdir, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import type { GeoEvent } from '../../domain/index.js';
import { IOWriteError } from '../../domain/index.js';

const EXTENSION = '.json';

/** A payload written to the staging directory, waiting for upload. */
export interface StagedFile {
  readonly eventId: string;
  readonly path: string;
}

/**
 * Local staging area: one `<id>.json` file per event.
 *
 * Writes go to a temporary sibling first and are renamed into place, so a
 * redelivered event replaces the earlier file in one step.
 */
export class StageWriter {
  constructor(readonly directory: string) {}

  pathFor(eventId: string): string {
    return join(this.directory, `${eventId}${EXTENSION}`);
  }

  async stage(event: GeoEvent): Promise<StagedFile> {
    const path = this.pathFor(event.id);

    if (!isSafeId(event.id)) {
      throw new IOWriteError(`Refusing to stage event with unsafe id "${event.id}"`, path);
    }

    const tmpPath = `${path}.tmp`;
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(tmpPath, JSON.stringify(event.payload), 'utf-8');
      await rename(tmpPath, path);
    } catch (err: unknown) {
      await rm(tmpPath, { force: true }).catch(() => undefined);
      throw new IOWriteError(`Failed to stage event ${event.id}`, path, { cause: err });
    }

    return { eventId: event.id, path };
  }

  /** Deletes a staged file. Already-missing files are fine. */
  async remove(staged: StagedFile): Promise<void> {
    await rm(staged.path, { force: true });
  }

  /** Staged files currently on disk. A missing directory means none. */
  async listStaged(): Promise<StagedFile[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (err: unknown) {
      if (isNodeError(err) && err.code === 'ENOENT') return [];
      throw err;
    }

    return names
      .filter((name) => extname(name) === EXTENSION)
      .sort()
      .map((name) => ({
        eventId: basename(name, EXTENSION),
        path: join(this.directory, name),
      }));
  }
}

function isSafeId(id: string): boolean {
  return id.length > 0 && !id.includes('/') && !id.includes('\\') && !id.includes('..');
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Error taxonomy for the ingestion worker.
 *
 * Fatal: ConfigError, AuthError.
 * Recoverable at the stream level: SubscriptionError.
 * Absorbed at the per-event boundary: IOWriteError, UploadError.
 */
export class GeoStreamError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends GeoStreamError {}

/** Credentials missing, or rejected by the feed. */
export class AuthError extends GeoStreamError {}

/** The subscription could not be opened, or ended. */
export class SubscriptionError extends GeoStreamError {
  readonly rateLimited: boolean;

  constructor(message: string, options: { cause?: unknown; rateLimited?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.rateLimited = options.rateLimited ?? false;
  }
}

/** Local staging write failed. */
export class IOWriteError extends GeoStreamError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }
}

/** Transfer to the archive store failed or timed out. */
export class UploadError extends GeoStreamError {
  readonly key: string;

  constructor(message: string, key: string, options?: { cause?: unknown }) {
    super(message, options);
    this.key = key;
  }
}

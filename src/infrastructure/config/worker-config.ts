import { z } from 'zod';
import type { BoundingBox } from '../../domain/index.js';
import { ConfigError } from '../../domain/index.js';
import { ARCHIVE_KEY_MODES } from '../archive/index.js';
import type { ArchiveKeyMode } from '../archive/index.js';

/** Contiguous United States. */
const DEFAULT_BBOX = '-125,25,-65,48';

export interface WorkerConfig {
  logLevel: string;
  stagingDir: string;
  interEventDelayMs: number;
  boundingBox: BoundingBox;
  queueCapacity: number;
  archive: {
    bucket: string;
    keyMode: ArchiveKeyMode;
    keyPrefix: string;
    region: string;
    endpoint: string | undefined;
    forcePathStyle: boolean;
    accessKeyId: string | undefined;
    secretAccessKey: string | undefined;
    uploadTimeoutMs: number;
  };
  reconnect: {
    enabled: boolean;
    baseMs: number;
    maxMs: number;
    rateLimitBaseMs: number;
  };
  credentialsFile: string | undefined;
  status: {
    enabled: boolean;
    host: string;
    port: number;
  };
}

/** "true"/"1" → true, "false"/"0" → false; anything else is rejected. */
const envBool = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => (v === undefined ? fallback : v === 'true' || v === '1'));

const envInt = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v));

/**
 * Parses "west,south,east,north" in degrees.
 * Rejects non-finite values, out-of-range values and inverted edges.
 */
export function parseBoundingBox(raw: string): BoundingBox {
  const parts = raw.split(',').map((p) => Number(p.trim()));
  if (parts.length !== 4 || parts.some((n) => !Number.isFinite(n))) {
    throw new ConfigError(`Bounding box must be four numbers "west,south,east,north", got "${raw}"`);
  }

  const [west = 0, south = 0, east = 0, north = 0] = parts;
  if (west < -180 || east > 180 || west >= east) {
    throw new ConfigError(`Bounding box longitudes must satisfy -180 <= west < east <= 180, got "${raw}"`);
  }
  if (south < -90 || north > 90 || south >= north) {
    throw new ConfigError(`Bounding box latitudes must satisfy -90 <= south < north <= 90, got "${raw}"`);
  }
  return { west, south, east, north };
}

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  STAGING_DIR: z.string().min(1).default('staging'),
  INTER_EVENT_DELAY_SECONDS: z.coerce.number().finite().min(0).default(5),
  STREAM_BBOX: z.string().default(DEFAULT_BBOX),
  QUEUE_CAPACITY: envInt(1000, 1),

  ARCHIVE_BUCKET: z.string().min(1).default('earthlab-geolocated-tweets'),
  ARCHIVE_KEY_MODE: z.enum(ARCHIVE_KEY_MODES).default('local-path'),
  ARCHIVE_KEY_PREFIX: z.string().default(''),
  ARCHIVE_REGION: z.string().min(1).default('us-east-1'),
  ARCHIVE_ENDPOINT: optionalString,
  ARCHIVE_FORCE_PATH_STYLE: envBool(false),
  ARCHIVE_ACCESS_KEY: optionalString,
  ARCHIVE_SECRET_KEY: optionalString,
  UPLOAD_TIMEOUT_MS: envInt(30_000, 1),

  RECONNECT_ENABLED: envBool(true),
  RECONNECT_BASE_MS: envInt(1000, 1),
  RECONNECT_MAX_MS: envInt(300_000, 1),
  RATE_LIMIT_BACKOFF_MS: envInt(60_000, 1),

  CREDENTIALS_FILE: optionalString,

  STATUS_ENABLED: envBool(true),
  STATUS_HOST: z.string().min(1).default('0.0.0.0'),
  STATUS_PORT: z.coerce.number().int().min(0).max(65535).default(3000),
});

/**
 * Builds the worker configuration from environment variables.
 *
 * Unset variables take their defaults. Empty strings count as unset.
 * Throws ConfigError listing every invalid variable.
 */
export function loadWorkerConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${fields.join('; ')}`);
  }

  const e = parsed.data;
  if (e.RECONNECT_BASE_MS > e.RECONNECT_MAX_MS) {
    throw new ConfigError('RECONNECT_BASE_MS must not exceed RECONNECT_MAX_MS');
  }

  return {
    logLevel: e.LOG_LEVEL,
    stagingDir: e.STAGING_DIR,
    interEventDelayMs: Math.round(e.INTER_EVENT_DELAY_SECONDS * 1000),
    boundingBox: parseBoundingBox(e.STREAM_BBOX),
    queueCapacity: e.QUEUE_CAPACITY,
    archive: {
      bucket: e.ARCHIVE_BUCKET,
      keyMode: e.ARCHIVE_KEY_MODE,
      keyPrefix: e.ARCHIVE_KEY_PREFIX,
      region: e.ARCHIVE_REGION,
      endpoint: e.ARCHIVE_ENDPOINT,
      forcePathStyle: e.ARCHIVE_FORCE_PATH_STYLE,
      accessKeyId: e.ARCHIVE_ACCESS_KEY,
      secretAccessKey: e.ARCHIVE_SECRET_KEY,
      uploadTimeoutMs: e.UPLOAD_TIMEOUT_MS,
    },
    reconnect: {
      enabled: e.RECONNECT_ENABLED,
      baseMs: e.RECONNECT_BASE_MS,
      maxMs: e.RECONNECT_MAX_MS,
      rateLimitBaseMs: e.RATE_LIMIT_BACKOFF_MS,
    },
    credentialsFile: e.CREDENTIALS_FILE,
    status: {
      enabled: e.STATUS_ENABLED,
      host: e.STATUS_HOST,
      port: e.STATUS_PORT,
    },
  };
}

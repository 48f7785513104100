import Fastify from 'fastify';
import type { FastifyBaseLogger } from 'fastify';
import pino from 'pino';
import { AuthError, ConfigError } from './domain/index.js';
import { EventHandler, IngestStats } from './application/index.js';
import {
  ArchiveUploader,
  EnvCredentialProvider,
  FileCredentialProvider,
  S3ArchiveStore,
  StageWriter,
  StreamSupervisor,
  TwitterFeedSource,
  createS3Client,
  loadWorkerConfig,
} from './infrastructure/index.js';
import type { WorkerConfig } from './infrastructure/index.js';
import { statusRoutes } from './interfaces/http/index.js';

/**
 * Standalone ingestion worker.
 *
 * Subscribes to the geo-filtered feed, keeps posts that carry a point or a
 * place, and archives each one as its own JSON object in the bucket.
 *
 * Order:
 * 1) Config + shared clients
 * 2) Status server (optional)
 * 3) Re-upload staged files left by a previous run
 * 4) Supervisor loop until SIGINT / SIGTERM or a fatal error
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

function loadConfigOrExit(): WorkerConfig {
  try {
    return loadWorkerConfig();
  } catch (err: unknown) {
    log.fatal({ err }, 'Invalid configuration');
    process.exit(1);
  }
}

const config = loadConfigOrExit();
log.level = config.logLevel;

const stats = new IngestStats();
const stager = new StageWriter(config.stagingDir);

// One S3 client for the whole process, injected into the uploader
const s3 = createS3Client({
  region: config.archive.region,
  endpoint: config.archive.endpoint,
  forcePathStyle: config.archive.forcePathStyle,
  accessKeyId: config.archive.accessKeyId,
  secretAccessKey: config.archive.secretAccessKey,
});

const uploader = new ArchiveUploader(new S3ArchiveStore(s3), {
  container: config.archive.bucket,
  keyMode: config.archive.keyMode,
  keyPrefix: config.archive.keyPrefix,
  timeoutMs: config.archive.uploadTimeoutMs,
});

const handler = new EventHandler({
  stager,
  uploader,
  stats,
  log: log.child({ component: 'event-handler' }),
  delayMs: config.interEventDelayMs,
});

const supervisor = new StreamSupervisor({
  feed: new TwitterFeedSource(log.child({ component: 'feed' })),
  credentials: config.credentialsFile
    ? new FileCredentialProvider(config.credentialsFile)
    : new EnvCredentialProvider(),
  stats,
  log: log.child({ component: 'supervisor' }),
  reconnect: config.reconnect,
  queueCapacity: config.queueCapacity,
});

let closeServer: null | (() => Promise<void>) = null;

async function startStatusServer(): Promise<void> {
  if (!config.status.enabled) return;

  const httpLog: FastifyBaseLogger = log.child({ component: 'http' });
  const server = Fastify({ loggerInstance: httpLog });
  await server.register(statusRoutes, { stats, supervisor });
  await server.listen({ host: config.status.host, port: config.status.port });
  closeServer = () => server.close();
}

async function main(): Promise<void> {
  log.info(
    {
      stagingDir: config.stagingDir,
      bucket: config.archive.bucket,
      keyMode: config.archive.keyMode,
      boundingBox: config.boundingBox,
      delayMs: config.interEventDelayMs,
      reconnect: config.reconnect.enabled,
    },
    'Geo stream archiver starting',
  );

  await startStatusServer();
  await handler.recoverStaged();
  await supervisor.start(config.boundingBox, handler);
}

async function closeResources(): Promise<void> {
  if (closeServer) {
    await closeServer();
  }
  s3.destroy();
}

// Graceful shutdown on SIGINT / SIGTERM
const SHUTDOWN_GRACE_MS = 10_000;

let shuttingDown = false;
function shutdown(): void {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info('Shutting down worker...');

  // An in-flight upload can outlive the grace period; its staged file is swept on next start
  setTimeout(() => {
    log.warn({ graceMs: SHUTDOWN_GRACE_MS }, 'Shutdown grace period elapsed, forcing exit');
    process.exit(1);
  }, SHUTDOWN_GRACE_MS).unref();

  supervisor
    .stop()
    .then(closeResources)
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      log.error({ err }, 'Error during shutdown');
      process.exit(1);
    });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main()
  .then(async () => {
    if (!shuttingDown) {
      await closeResources();
    }
  })
  .catch((err: unknown) => {
    const reason =
      err instanceof AuthError ? 'Feed authentication failed'
        : err instanceof ConfigError ? 'Invalid configuration'
          : 'Worker crashed';
    log.fatal({ err }, reason);
    process.exit(1);
  });

export { StageWriter } from './staging/index.js';
export type { StagedFile } from './staging/index.js';
export { ArchiveUploader, S3ArchiveStore, createS3Client, ARCHIVE_KEY_MODES } from './archive/index.js';
export type { ArchiveStore, ArchiveKeyMode, ArchiveUploaderOptions, PutOptions } from './archive/index.js';
export { EnvCredentialProvider, FileCredentialProvider } from './credentials/index.js';
export type { CredentialProvider, FeedCredentials } from './credentials/index.js';
export { TwitterFeedSource } from './feed/index.js';
export type { FeedSource, FeedSubscription, FeedHandlers } from './feed/index.js';
export { loadWorkerConfig, parseBoundingBox } from './config/index.js';
export type { WorkerConfig } from './config/index.js';
export { StreamSupervisor, backoffDelay } from './worker/index.js';
export type { SupervisorState, SupervisorStatus, ReconnectPolicy } from './worker/index.js';

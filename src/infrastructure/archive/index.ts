export type { ArchiveStore, PutOptions } from './archive-store.js';
export { S3ArchiveStore, createS3Client } from './s3-archive-store.js';
export type { S3StoreOptions } from './s3-archive-store.js';
export { ArchiveUploader, ARCHIVE_KEY_MODES } from './archive-uploader.js';
export type { ArchiveKeyMode, ArchiveUploaderOptions } from './archive-uploader.js';

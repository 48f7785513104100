import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { ArchiveStore, PutOptions } from './archive-store.js';

export interface S3StoreOptions {
  region: string;
  /** Custom endpoint for S3-compatible stores such as MinIO. */
  endpoint?: string | undefined;
  forcePathStyle: boolean;
  /** Static credentials; when absent the SDK's default provider chain is used. */
  accessKeyId?: string | undefined;
  secretAccessKey?: string | undefined;
}

/** Builds the single long-lived S3 client shared by every upload. */
export function createS3Client(options: S3StoreOptions): S3Client {
  const { region, endpoint, forcePathStyle, accessKeyId, secretAccessKey } = options;

  return new S3Client({
    region,
    forcePathStyle,
    ...(endpoint ? { endpoint } : {}),
    ...(accessKeyId && secretAccessKey
      ? { credentials: { accessKeyId, secretAccessKey } }
      : {}),
  });
}

/** ArchiveStore backed by an S3 bucket: container = bucket, key = object key. */
export class S3ArchiveStore implements ArchiveStore {
  constructor(private readonly client: S3Client) {}

  async put(container: string, key: string, body: Uint8Array, options: PutOptions): Promise<void> {
    const command = new PutObjectCommand({
      Bucket: container,
      Key: key,
      Body: body,
      ContentType: options.contentType,
    });

    await this.client.send(command, options.signal ? { abortSignal: options.signal } : {});
  }
}

/** Options forwarded with every object write. */
export interface PutOptions {
  contentType: string;
  signal?: AbortSignal;
}

/**
 * Object-storage contract the uploader needs: write one object.
 * No read, list or delete.
 */
export interface ArchiveStore {
  put(container: string, key: string, body: Uint8Array, options: PutOptions): Promise<void>;
}

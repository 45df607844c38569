import type { BlobListEntry, StorageOperationResult } from '../common/interfaces/storage.interface.js'

/**
 * Byte store addressed by generated storage keys. Keys never contain user input.
 */
export interface BlobStorageAdapter {
  saveBlob(
    input: ReadableStream<Uint8Array>,
    key: string,
    mimeType: string
  ): Promise<StorageOperationResult<string>>

  createReadStream(key: string): Promise<StorageOperationResult<ReadableStream<Uint8Array>>>

  getSize(key: string): Promise<StorageOperationResult<number>>

  /** Deleting a key that does not exist succeeds. */
  deleteBlob(key: string): Promise<StorageOperationResult<void>>

  listBlobs(prefix?: string): Promise<BlobListEntry[]>

  isHealthy(): Promise<boolean>
}

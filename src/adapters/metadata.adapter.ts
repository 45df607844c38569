import type {
  StoredTransfer,
  TransferFileRecord,
  TransferRecord,
} from '../common/interfaces/transfer.interface.js'
import type { ExpiredTransferScan } from '../common/interfaces/storage.interface.js'

export interface MetadataAdapter {
  initialize(): Promise<void>

  /** Persists the transfer and all of its files in one atomic write. */
  createTransfer(transfer: TransferRecord, files: TransferFileRecord[]): Promise<void>

  getTransfer(transferId: string): Promise<StoredTransfer | null>

  /**
   * Atomically increments the download counter.
   * Returns the new value, or null when the transfer no longer exists.
   */
  incrementDownloadCount(transferId: string): Promise<number | null>

  /** Ids of transfers whose expiry is strictly before `now`, oldest first. */
  findExpired(now: Date, limit: number): Promise<ExpiredTransferScan>

  /** Removes the file rows and then the transfer row. Returns false when nothing was stored. */
  deleteTransfer(transferId: string): Promise<boolean>

  hasTransfer(transferId: string): Promise<boolean>

  /**
   * Registers an upload whose blobs are being written but whose transfer is not committed yet.
   * Calling it again for the same id refreshes `since`.
   */
  markUploadPending(transferId: string, since: Date): Promise<void>

  clearUploadPending(transferId: string): Promise<void>

  isUploadPending(transferId: string): Promise<boolean>

  /** Drops pending entries last refreshed strictly before `olderThan`. Returns how many were dropped. */
  prunePendingUploads(olderThan: Date): Promise<number>

  isHealthy(): Promise<boolean>
}

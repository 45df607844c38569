import type { MetadataAdapter } from './metadata.adapter.js'
import type {
  StoredTransfer,
  TransferFileRecord,
  TransferRecord,
} from '../common/interfaces/transfer.interface.js'
import type { ExpiredTransferScan } from '../common/interfaces/storage.interface.js'
import { DateUtil } from '../common/utils/date.util.js'

function cloneTransfer(t: TransferRecord): TransferRecord {
  return {
    ...t,
    createdAt: new Date(t.createdAt.getTime()),
    expiresAt: new Date(t.expiresAt.getTime()),
    recipientEmails: [...t.recipientEmails],
  }
}

function cloneFile(f: TransferFileRecord): TransferFileRecord {
  return { ...f, uploadedAt: new Date(f.uploadedAt.getTime()) }
}

/**
 * Process-local metadata store for development and tests.
 * Every mutation completes synchronously, so each call is atomic with respect to other requests.
 * Nothing survives a restart.
 */
export class MemoryMetadataAdapter implements MetadataAdapter {
  private readonly transfers = new Map<string, TransferRecord>()
  private readonly files = new Map<string, TransferFileRecord[]>()
  private readonly pending = new Map<string, Date>()

  async initialize(): Promise<void> {
    // No-op
  }

  async createTransfer(transfer: TransferRecord, files: TransferFileRecord[]): Promise<void> {
    if (this.transfers.has(transfer.id)) {
      throw new Error(`Transfer ${transfer.id} already exists`)
    }
    this.transfers.set(transfer.id, cloneTransfer(transfer))
    this.pending.delete(transfer.id)
    this.files.set(
      transfer.id,
      [...files].sort((a, b) => a.position - b.position).map(cloneFile)
    )
  }

  async getTransfer(transferId: string): Promise<StoredTransfer | null> {
    const transfer = this.transfers.get(transferId)
    if (!transfer) return null
    const files = this.files.get(transferId) ?? []
    return { transfer: cloneTransfer(transfer), files: files.map(cloneFile) }
  }

  async incrementDownloadCount(transferId: string): Promise<number | null> {
    const transfer = this.transfers.get(transferId)
    if (!transfer) return null
    transfer.downloadCount += 1
    return transfer.downloadCount
  }

  async findExpired(now: Date, limit: number): Promise<ExpiredTransferScan> {
    const expired = [...this.transfers.values()]
      .filter((t) => DateUtil.isBefore(t.expiresAt, now))
      .sort((a, b) => a.expiresAt.getTime() - b.expiresAt.getTime())

    return {
      ids: expired.slice(0, limit).map((t) => t.id),
      hasMore: expired.length > limit,
    }
  }

  async deleteTransfer(transferId: string): Promise<boolean> {
    const existed = this.transfers.has(transferId)
    this.files.delete(transferId)
    this.transfers.delete(transferId)
    return existed
  }

  async hasTransfer(transferId: string): Promise<boolean> {
    return this.transfers.has(transferId)
  }

  async markUploadPending(transferId: string, since: Date): Promise<void> {
    this.pending.set(transferId, new Date(since.getTime()))
  }

  async clearUploadPending(transferId: string): Promise<void> {
    this.pending.delete(transferId)
  }

  async isUploadPending(transferId: string): Promise<boolean> {
    return this.pending.has(transferId)
  }

  async prunePendingUploads(olderThan: Date): Promise<number> {
    let pruned = 0
    for (const [id, since] of this.pending) {
      if (DateUtil.isBefore(since, olderThan)) {
        this.pending.delete(id)
        pruned++
      }
    }
    return pruned
  }

  async isHealthy(): Promise<boolean> {
    return true
  }
}

import type { LoggerAdapter } from '../adapters/logger.adapter.js'
import type { BlobStorageAdapter } from '../adapters/blob-storage.adapter.js'
import type { MetadataAdapter } from '../adapters/metadata.adapter.js'
import type { TransfersService } from './transfers.service.js'
import { DateUtil } from '../common/utils/date.util.js'
import { FilenameUtil } from '../common/utils/filename.util.js'
import { toError } from '../common/utils/error.util.js'
import {
  PENDING_UPLOAD_MAX_AGE_MS,
  SWEEP_CONCURRENCY,
  SWEEP_MAX_BATCHES,
} from '../common/constants/app.constants.js'

export interface RetentionServiceDeps {
  transfers: TransfersService
  metadata: MetadataAdapter
  blobs: BlobStorageAdapter
  logger: LoggerAdapter
  batchSize: number
  orphanGraceMins: number
  now?: () => Date
}

export interface SweepSummary {
  expiredFound: number
  deleted: number
  failed: number
  orphanedDeleted: number
  skipped: boolean
}

export class RetentionService {
  private readonly now: () => Date
  private running = false
  private shuttingDown = false

  constructor(private readonly deps: RetentionServiceDeps) {
    this.now = deps.now ?? (() => DateUtil.now().toDate())
  }

  public markAsShuttingDown(): void {
    this.shuttingDown = true
  }

  /**
   * One sweep pass. Never throws: failures are logged and the affected transfers are
   * picked up again by the next pass.
   */
  public async runSweep(): Promise<SweepSummary> {
    if (this.running || this.shuttingDown) {
      this.deps.logger.debug('Sweep skipped', { running: this.running, shuttingDown: this.shuttingDown })
      return { expiredFound: 0, deleted: 0, failed: 0, orphanedDeleted: 0, skipped: true }
    }

    this.running = true
    const startedAt = Date.now()
    const summary: SweepSummary = {
      expiredFound: 0,
      deleted: 0,
      failed: 0,
      orphanedDeleted: 0,
      skipped: false,
    }

    try {
      try {
        await this.sweepExpired(summary)
      } catch (e: unknown) {
        const err = toError(e)
        this.deps.logger.error('Expired transfer sweep failed', { error: err.message, stack: err.stack })
      }

      try {
        summary.orphanedDeleted = await this.sweepOrphans()
      } catch (e: unknown) {
        const err = toError(e)
        this.deps.logger.error('Orphan sweep failed', { error: err.message, stack: err.stack })
      }
    } finally {
      this.running = false
    }

    this.deps.logger.info('Sweep completed', { ...summary, durationMs: Date.now() - startedAt })
    return summary
  }

  private async sweepExpired(summary: SweepSummary): Promise<void> {
    const now = this.now()
    // Ids whose deletion failed stay in the index; skip them so later batches make progress.
    const failedIds = new Set<string>()

    for (let batchNo = 0; batchNo < SWEEP_MAX_BATCHES && !this.shuttingDown; batchNo++) {
      const scan = await this.deps.metadata.findExpired(now, this.deps.batchSize + failedIds.size)
      const ids = scan.ids.filter((id) => !failedIds.has(id))
      if (ids.length === 0) break

      summary.expiredFound += ids.length

      for (let i = 0; i < ids.length; i += SWEEP_CONCURRENCY) {
        const batch = ids.slice(i, i + SWEEP_CONCURRENCY)
        const results = await Promise.all(batch.map((id) => this.deleteOne(id)))
        results.forEach((ok, idx) => {
          if (ok) {
            summary.deleted += 1
          } else {
            summary.failed += 1
            failedIds.add(batch[idx])
          }
        })
      }

      if (!scan.hasMore) break
    }
  }

  private async deleteOne(transferId: string): Promise<boolean> {
    try {
      const res = await this.deps.transfers.deleteTransfer(transferId)
      // A transfer removed concurrently counts as reclaimed.
      return res.blobsFailed === 0
    } catch (e: unknown) {
      const err = toError(e)
      this.deps.logger.warn('Failed to delete expired transfer during sweep', {
        transferId,
        error: err.message,
      })
      return false
    }
  }

  /**
   * Deletes blobs older than the grace period whose transfer has no metadata and no pending upload.
   * Pending entries not refreshed within `PENDING_UPLOAD_MAX_AGE_MS` belong to crashed uploads and are dropped first.
   */
  private async sweepOrphans(): Promise<number> {
    if (this.deps.orphanGraceMins <= 0) return 0

    const now = this.now()
    const cutoff = DateUtil.addMinutes(now, -this.deps.orphanGraceMins)
    const abandoned = await this.deps.metadata.prunePendingUploads(
      DateUtil.addMilliseconds(now, -PENDING_UPLOAD_MAX_AGE_MS)
    )
    if (abandoned > 0) {
      this.deps.logger.warn('Dropped abandoned pending uploads', { count: abandoned })
    }

    const blobs = await this.deps.blobs.listBlobs('transfers/')
    const keep = new Map<string, boolean>()
    let deleted = 0

    for (const blob of blobs) {
      if (this.shuttingDown) break
      if (!DateUtil.isBefore(blob.lastModified, cutoff)) continue

      const transferId = FilenameUtil.transferIdFromKey(blob.key)
      if (!transferId) continue

      let kept = keep.get(transferId)
      if (kept === undefined) {
        // Pending first: an upload clears its marker only after the metadata commit.
        kept =
          (await this.deps.metadata.isUploadPending(transferId)) ||
          (await this.deps.metadata.hasTransfer(transferId))
        keep.set(transferId, kept)
      }
      if (kept) continue

      const res = await this.deps.blobs.deleteBlob(blob.key)
      if (res.success) {
        deleted += 1
      } else {
        this.deps.logger.warn('Failed to delete orphaned blob', { key: blob.key, error: res.error })
      }
    }

    return deleted
  }
}

import type { AppEnv } from '../config/env.js'
import type { TransferConfig } from '../config/transfer.config.js'
import type { LoggerAdapter } from '../adapters/logger.adapter.js'
import type { BlobStorageAdapter } from '../adapters/blob-storage.adapter.js'
import type { MetadataAdapter } from '../adapters/metadata.adapter.js'
import { QuotaPolicy } from './quota.policy.js'
import { TransfersService } from './transfers.service.js'
import { RetentionService } from './retention.service.js'

export interface ServiceFactoryDeps {
  env: AppEnv
  config: TransferConfig
  blobs: BlobStorageAdapter
  metadata: MetadataAdapter
  logger: LoggerAdapter
  now?: () => Date
}

export interface AppServices {
  quota: QuotaPolicy
  transfers: TransfersService
  retention: RetentionService
}

export function createServices(deps: ServiceFactoryDeps): AppServices {
  const quota = new QuotaPolicy(deps.config.planLimits)

  const transfers = new TransfersService({
    config: deps.config,
    quota,
    blobs: deps.blobs,
    metadata: deps.metadata,
    logger: deps.logger,
    now: deps.now,
  })

  const retention = new RetentionService({
    transfers,
    metadata: deps.metadata,
    blobs: deps.blobs,
    logger: deps.logger,
    batchSize: deps.env.SWEEP_BATCH_SIZE,
    orphanGraceMins: deps.env.ORPHAN_GRACE_MINS,
    now: deps.now,
  })

  return { quota, transfers, retention }
}

import type { IncomingMessage } from 'node:http'
import type { AppEnv } from '../config/env.js'
import type { TransferConfig } from '../config/transfer.config.js'
import type { LoggerAdapter } from '../adapters/logger.adapter.js'
import type { BlobStorageAdapter } from '../adapters/blob-storage.adapter.js'
import type { MetadataAdapter } from '../adapters/metadata.adapter.js'
import type { AppServices } from '../services/services.factory.js'

export interface AppBindings {
  env: AppEnv
  config: TransferConfig
  blobs: BlobStorageAdapter
  metadata: MetadataAdapter
  logger: LoggerAdapter
  services: AppServices
}

export interface AppVariables {
  env: AppEnv
  config: TransferConfig
  blobs: BlobStorageAdapter
  metadata: MetadataAdapter
  logger: LoggerAdapter
  services: AppServices
  requestId: string
}

export type HonoEnv = {
  Bindings: {
    incoming?: IncomingMessage
  }
  Variables: AppVariables
}

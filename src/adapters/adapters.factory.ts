import { S3Client } from '@aws-sdk/client-s3'
import { Redis } from 'ioredis'
import type { AppEnv } from '../config/env.js'
import type { LoggerAdapter } from './logger.adapter.js'
import type { BlobStorageAdapter } from './blob-storage.adapter.js'
import type { MetadataAdapter } from './metadata.adapter.js'
import { MemoryMetadataAdapter } from './memory-metadata.adapter.js'
import { LocalBlobStorageAdapter } from './node/local-blob-storage.adapter.js'
import { S3BlobStorageAdapter } from './node/s3-blob-storage.adapter.js'
import { RedisMetadataAdapter } from './node/redis-metadata.adapter.js'

export interface RuntimeAdapters {
  blobs: BlobStorageAdapter
  metadata: MetadataAdapter
  /** Releases connections opened for the adapters. */
  close(): Promise<void>
}

export function createBlobStorage(env: AppEnv): BlobStorageAdapter {
  if (env.STORAGE_DRIVER === 'local') {
    return new LocalBlobStorageAdapter({ rootDir: env.STORAGE_DIR })
  }

  if (!env.S3_ACCESS_KEY_ID || !env.S3_SECRET_ACCESS_KEY) {
    throw new Error(
      'S3 credentials are required when STORAGE_DRIVER=s3 (S3_ACCESS_KEY_ID, S3_SECRET_ACCESS_KEY)'
    )
  }

  const client = new S3Client({
    endpoint: env.S3_ENDPOINT,
    region: env.S3_REGION,
    credentials: {
      accessKeyId: env.S3_ACCESS_KEY_ID,
      secretAccessKey: env.S3_SECRET_ACCESS_KEY,
    },
    forcePathStyle: env.S3_FORCE_PATH_STYLE,
  })
  return new S3BlobStorageAdapter({ client, bucket: env.S3_BUCKET })
}

export function createRuntimeAdapters(env: AppEnv, logger: LoggerAdapter): RuntimeAdapters {
  const blobs = createBlobStorage(env)

  if (env.METADATA_DRIVER === 'memory') {
    logger.warn('Using in-memory metadata store; transfers are lost on restart')
    return { blobs, metadata: new MemoryMetadataAdapter(), close: async () => undefined }
  }

  const redis = new Redis({
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    password: env.REDIS_PASSWORD,
    db: env.REDIS_DB,
  })
  redis.on('error', (err: Error) => {
    logger.error('Redis connection error', { error: err.message })
  })

  return {
    blobs,
    metadata: new RedisMetadataAdapter({ client: redis, keyPrefix: env.REDIS_KEY_PREFIX }),
    close: async () => {
      await redis.quit()
    },
  }
}

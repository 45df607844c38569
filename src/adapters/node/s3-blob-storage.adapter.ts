import {
  type S3Client,
  GetObjectCommand,
  DeleteObjectCommand,
  HeadBucketCommand,
  ListObjectsV2Command,
  HeadObjectCommand,
} from '@aws-sdk/client-s3'
import { Upload } from '@aws-sdk/lib-storage'
import { Readable } from 'node:stream'
import type { BlobStorageAdapter } from '../blob-storage.adapter.js'
import type {
  BlobListEntry,
  StorageOperationResult,
} from '../../common/interfaces/storage.interface.js'
import { toError } from '../../common/utils/error.util.js'

export interface S3BlobStorageAdapterDeps {
  client: S3Client
  bucket: string
}

function isNoSuchKey(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('name' in err)) return false
  return err.name === 'NoSuchKey' || err.name === 'NotFound'
}

export class S3BlobStorageAdapter implements BlobStorageAdapter {
  constructor(private readonly deps: S3BlobStorageAdapterDeps) {}

  public async saveBlob(
    input: ReadableStream<Uint8Array>,
    key: string,
    mimeType: string
  ): Promise<StorageOperationResult<string>> {
    try {
      const upload = new Upload({
        client: this.deps.client,
        params: {
          Bucket: this.deps.bucket,
          Key: key,
          Body: Readable.fromWeb(input),
          ContentType: mimeType,
        },
      })

      await upload.done()
      return { success: true, data: key }
    } catch (e: unknown) {
      return { success: false, error: `S3 upload failed: ${toError(e).message}` }
    }
  }

  public async createReadStream(
    key: string
  ): Promise<StorageOperationResult<ReadableStream<Uint8Array>>> {
    try {
      const cmd = new GetObjectCommand({ Bucket: this.deps.bucket, Key: key })
      const res = await this.deps.client.send(cmd)
      if (!res.Body) return { success: false, error: 'NotFound' }

      return { success: true, data: res.Body.transformToWebStream() }
    } catch (e: unknown) {
      if (isNoSuchKey(e)) return { success: false, error: 'NotFound' }
      return { success: false, error: `S3 stream creation failed: ${toError(e).message}` }
    }
  }

  public async getSize(key: string): Promise<StorageOperationResult<number>> {
    try {
      const cmd = new HeadObjectCommand({ Bucket: this.deps.bucket, Key: key })
      const res = await this.deps.client.send(cmd)
      if (typeof res.ContentLength !== 'number') {
        return { success: false, error: 'S3 object has no content length' }
      }
      return { success: true, data: res.ContentLength }
    } catch (e: unknown) {
      if (isNoSuchKey(e)) return { success: false, error: 'NotFound' }
      return { success: false, error: `S3 head failed: ${toError(e).message}` }
    }
  }

  public async deleteBlob(key: string): Promise<StorageOperationResult<void>> {
    try {
      const cmd = new DeleteObjectCommand({ Bucket: this.deps.bucket, Key: key })
      await this.deps.client.send(cmd)
      return { success: true }
    } catch (e: unknown) {
      return { success: false, error: `S3 deletion failed: ${toError(e).message}` }
    }
  }

  public async listBlobs(prefix?: string): Promise<BlobListEntry[]> {
    const entries: BlobListEntry[] = []
    let continuationToken: string | undefined

    do {
      const cmd = new ListObjectsV2Command({
        Bucket: this.deps.bucket,
        Prefix: prefix,
        ContinuationToken: continuationToken,
      })

      const res = await this.deps.client.send(cmd)
      for (const obj of res.Contents ?? []) {
        if (!obj.Key) continue
        entries.push({
          key: obj.Key,
          size: obj.Size ?? 0,
          lastModified: obj.LastModified ?? new Date(0),
        })
      }

      continuationToken = res.NextContinuationToken
    } while (continuationToken)

    return entries
  }

  public async isHealthy(): Promise<boolean> {
    try {
      await this.deps.client.send(new HeadBucketCommand({ Bucket: this.deps.bucket }))
      return true
    } catch {
      return false
    }
  }
}

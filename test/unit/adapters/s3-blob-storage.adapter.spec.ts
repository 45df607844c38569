import {
  type S3Client,
  DeleteObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
} from '@aws-sdk/client-s3'
import { S3BlobStorageAdapter } from '@/adapters/node/s3-blob-storage.adapter'

function notFound(): Error {
  const err = new Error('Not Found')
  err.name = 'NotFound'
  return err
}

describe('S3BlobStorageAdapter', () => {
  let send: jest.Mock
  let storage: S3BlobStorageAdapter

  beforeEach(() => {
    send = jest.fn()
    storage = new S3BlobStorageAdapter({
      client: { send } as unknown as S3Client,
      bucket: 'test-bucket',
    })
  })

  it('reads the object size from HeadObject', async () => {
    send.mockResolvedValue({ ContentLength: 42 })

    expect(await storage.getSize('transfers/t1/f1')).toEqual({ success: true, data: 42 })
    const cmd: unknown = send.mock.calls[0][0]
    expect(cmd).toBeInstanceOf(HeadObjectCommand)
    expect(cmd).toMatchObject({ input: { Bucket: 'test-bucket', Key: 'transfers/t1/f1' } })
  })

  it('maps a missing object to NotFound', async () => {
    send.mockRejectedValue(notFound())

    expect(await storage.getSize('transfers/t1/f1')).toEqual({ success: false, error: 'NotFound' })
    expect(await storage.createReadStream('transfers/t1/f1')).toEqual({
      success: false,
      error: 'NotFound',
    })
  })

  it('deletes through DeleteObject', async () => {
    send.mockResolvedValue({})

    expect(await storage.deleteBlob('transfers/t1/f1')).toEqual({ success: true })
    expect(send.mock.calls[0][0]).toBeInstanceOf(DeleteObjectCommand)
  })

  it('reports a failed delete', async () => {
    send.mockRejectedValue(new Error('AccessDenied'))

    expect(await storage.deleteBlob('transfers/t1/f1')).toEqual({
      success: false,
      error: 'S3 deletion failed: AccessDenied',
    })
  })

  it('follows list pagination', async () => {
    const modified = new Date('2026-03-01T00:00:00.000Z')
    send
      .mockResolvedValueOnce({
        Contents: [{ Key: 'transfers/t1/f1', Size: 1, LastModified: modified }],
        NextContinuationToken: 'next',
      })
      .mockResolvedValueOnce({
        Contents: [{ Key: 'transfers/t2/f2', Size: 2, LastModified: modified }],
      })

    expect(await storage.listBlobs('transfers/')).toEqual([
      { key: 'transfers/t1/f1', size: 1, lastModified: modified },
      { key: 'transfers/t2/f2', size: 2, lastModified: modified },
    ])
    expect(send.mock.calls[0][0]).toBeInstanceOf(ListObjectsV2Command)
    expect(send.mock.calls[1][0]).toMatchObject({
      input: { Bucket: 'test-bucket', Prefix: 'transfers/', ContinuationToken: 'next' },
    })
  })

  it('checks health with HeadBucket', async () => {
    send.mockResolvedValueOnce({}).mockRejectedValueOnce(new Error('down'))

    expect(await storage.isHealthy()).toBe(true)
    expect(await storage.isHealthy()).toBe(false)
    expect(send.mock.calls[0][0]).toBeInstanceOf(HeadBucketCommand)
  })
})

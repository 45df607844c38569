import type { Redis } from 'ioredis'
import type { MetadataAdapter } from '@/adapters/metadata.adapter'
import { MemoryMetadataAdapter } from '@/adapters/memory-metadata.adapter'
import { RedisMetadataAdapter } from '@/adapters/node/redis-metadata.adapter'
import type { TransferFileRecord, TransferRecord } from '@/common/interfaces/transfer.interface'
import { FakeRedis } from '@test/helpers/fake-redis'

function transferRecord(id: string, expiresAt: string): TransferRecord {
  return {
    id,
    planTier: 'standard',
    totalSize: 5,
    fileCount: 2,
    createdAt: new Date('2026-03-01T00:00:00.000Z'),
    expiresAt: new Date(expiresAt),
    downloadCount: 0,
    senderEmail: 'sender@example.test',
    recipientEmails: ['r@example.test'],
  }
}

function fileRecord(transferId: string, id: string, position: number): TransferFileRecord {
  return {
    id,
    transferId,
    name: `${id}.txt`,
    storageKey: `transfers/${transferId}/${id}`,
    size: position + 2,
    mimeType: 'text/plain',
    sha256: 'a'.repeat(64),
    uploadedAt: new Date('2026-03-01T00:00:01.000Z'),
    position,
  }
}

const adapters: Array<[string, () => MetadataAdapter]> = [
  ['MemoryMetadataAdapter', () => new MemoryMetadataAdapter()],
  [
    'RedisMetadataAdapter',
    () =>
      new RedisMetadataAdapter({
        client: new FakeRedis() as unknown as Redis,
        keyPrefix: 'test:',
      }),
  ],
]

describe.each(adapters)('%s', (_name, create) => {
  let adapter: MetadataAdapter

  beforeEach(async () => {
    adapter = create()
    await adapter.initialize()
  })

  it('stores a transfer with its files in upload order', async () => {
    await adapter.createTransfer(transferRecord('t1', '2026-03-11T00:00:00.000Z'), [
      fileRecord('t1', 'second', 1),
      fileRecord('t1', 'first', 0),
    ])

    const stored = await adapter.getTransfer('t1')
    expect(stored?.transfer).toEqual(transferRecord('t1', '2026-03-11T00:00:00.000Z'))
    expect(stored?.files.map((f) => f.id)).toEqual(['first', 'second'])
    expect(stored?.files[0]).toEqual(fileRecord('t1', 'first', 0))
  })

  it('returns null for an unknown transfer', async () => {
    expect(await adapter.getTransfer('nope')).toBeNull()
    expect(await adapter.hasTransfer('nope')).toBe(false)
  })

  it('increments the download counter of existing transfers only', async () => {
    await adapter.createTransfer(transferRecord('t1', '2026-03-11T00:00:00.000Z'), [])

    expect(await adapter.incrementDownloadCount('t1')).toBe(1)
    expect(await adapter.incrementDownloadCount('t1')).toBe(2)
    expect(await adapter.incrementDownloadCount('gone')).toBeNull()
    expect((await adapter.getTransfer('t1'))?.transfer.downloadCount).toBe(2)
  })

  it('finds transfers that expired strictly before now, oldest first', async () => {
    await adapter.createTransfer(transferRecord('late', '2026-03-05T00:00:00.000Z'), [])
    await adapter.createTransfer(transferRecord('early', '2026-03-02T00:00:00.000Z'), [])
    await adapter.createTransfer(transferRecord('boundary', '2026-03-10T00:00:00.000Z'), [])
    await adapter.createTransfer(transferRecord('live', '2026-04-01T00:00:00.000Z'), [])

    const scan = await adapter.findExpired(new Date('2026-03-10T00:00:00.000Z'), 10)
    expect(scan).toEqual({ ids: ['early', 'late'], hasMore: false })

    const limited = await adapter.findExpired(new Date('2026-03-10T00:00:00.000Z'), 1)
    expect(limited).toEqual({ ids: ['early'], hasMore: true })
  })

  it('deletes the transfer and its files', async () => {
    await adapter.createTransfer(transferRecord('t1', '2026-03-02T00:00:00.000Z'), [
      fileRecord('t1', 'f1', 0),
    ])

    expect(await adapter.deleteTransfer('t1')).toBe(true)
    expect(await adapter.getTransfer('t1')).toBeNull()
    expect(await adapter.hasTransfer('t1')).toBe(false)
    expect((await adapter.findExpired(new Date('2026-03-10T00:00:00.000Z'), 10)).ids).toEqual([])
    expect(await adapter.deleteTransfer('t1')).toBe(false)
  })

  it('tracks pending uploads until they are cleared', async () => {
    await adapter.markUploadPending('up1', new Date('2026-03-01T10:00:00.000Z'))

    expect(await adapter.isUploadPending('up1')).toBe(true)
    expect(await adapter.isUploadPending('up2')).toBe(false)

    await adapter.clearUploadPending('up1')
    expect(await adapter.isUploadPending('up1')).toBe(false)
  })

  it('clears the pending entry when the transfer is committed', async () => {
    await adapter.markUploadPending('t1', new Date('2026-03-01T10:00:00.000Z'))
    await adapter.createTransfer(transferRecord('t1', '2026-03-11T00:00:00.000Z'), [])

    expect(await adapter.isUploadPending('t1')).toBe(false)
  })

  it('prunes pending uploads last refreshed before the cutoff', async () => {
    await adapter.markUploadPending('stale', new Date('2026-03-01T08:00:00.000Z'))
    await adapter.markUploadPending('refreshed', new Date('2026-03-01T08:00:00.000Z'))
    await adapter.markUploadPending('refreshed', new Date('2026-03-01T11:00:00.000Z'))
    await adapter.markUploadPending('boundary', new Date('2026-03-01T10:00:00.000Z'))

    expect(await adapter.prunePendingUploads(new Date('2026-03-01T10:00:00.000Z'))).toBe(1)
    expect(await adapter.isUploadPending('stale')).toBe(false)
    expect(await adapter.isUploadPending('refreshed')).toBe(true)
    expect(await adapter.isUploadPending('boundary')).toBe(true)
  })

  it('reports healthy', async () => {
    expect(await adapter.isHealthy()).toBe(true)
  })
})

describe('RedisMetadataAdapter specifics', () => {
  it('namespaces keys with the prefix', async () => {
    const redis = new FakeRedis()
    const adapter = new RedisMetadataAdapter({ client: redis as unknown as Redis, keyPrefix: 'ft:' })

    await adapter.createTransfer(transferRecord('t1', '2026-03-11T00:00:00.000Z'), [
      fileRecord('t1', 'f1', 0),
    ])

    expect([...redis.hashes.keys()]).toEqual(['ft:transfer:t1'])
    expect([...redis.lists.keys()]).toEqual(['ft:transfer:t1:files'])
    expect(redis.zsets.get('ft:transfers:expiry')?.get('t1')).toBe(
      new Date('2026-03-11T00:00:00.000Z').getTime()
    )
  })

  it('keeps pending uploads in a sorted set scored by refresh time', async () => {
    const redis = new FakeRedis()
    const adapter = new RedisMetadataAdapter({ client: redis as unknown as Redis, keyPrefix: 'ft:' })

    await adapter.markUploadPending('up1', new Date('2026-03-01T10:00:00.000Z'))

    expect(redis.zsets.get('ft:transfers:pending')?.get('up1')).toBe(
      new Date('2026-03-01T10:00:00.000Z').getTime()
    )
  })

  it('reports unhealthy when ping fails', async () => {
    const redis = new FakeRedis()
    redis.failPing = true
    const adapter = new RedisMetadataAdapter({ client: redis as unknown as Redis, keyPrefix: '' })
    expect(await adapter.isHealthy()).toBe(false)
  })

  it('refuses a stored record with an unknown plan', async () => {
    const redis = new FakeRedis()
    redis.hsetNow('transfer:bad', { id: 'bad', planTier: 'gold' })
    const adapter = new RedisMetadataAdapter({ client: redis as unknown as Redis, keyPrefix: '' })

    await expect(adapter.getTransfer('bad')).rejects.toThrow(
      'Stored transfer has unknown plan tier "gold"'
    )
  })
})

import type { Hono } from 'hono'
import { createApp } from '@/app'
import { loadAppEnv } from '@/config/env'
import { createTransferConfig } from '@/config/transfer.config'
import { createServices, type AppServices } from '@/services/services.factory'
import { MemoryMetadataAdapter } from '@/adapters/memory-metadata.adapter'
import type { HonoEnv } from '@/types/hono.types'
import { createMockLogger, InMemoryBlobStorage, type MockLogger } from '@test/helpers/mocks'

export interface TestApp {
  app: Hono<HonoEnv>
  blobs: InMemoryBlobStorage
  metadata: MemoryMetadataAdapter
  logger: MockLogger
  services: AppServices
  setNow(date: Date): void
}

export const TEST_BASE_URL = 'https://files.example.test'

export function createTestApp(envOverrides: Record<string, string> = {}): TestApp {
  const env = loadAppEnv({
    NODE_ENV: 'test',
    METADATA_DRIVER: 'memory',
    DOWNLOAD_BASE_URL: TEST_BASE_URL,
    ...envOverrides,
  })
  const config = createTransferConfig(env)
  const blobs = new InMemoryBlobStorage()
  const metadata = new MemoryMetadataAdapter()
  const logger = createMockLogger()

  let clock = new Date()
  const services = createServices({ env, config, blobs, metadata, logger, now: () => clock })
  const app = createApp({ env, config, blobs, metadata, logger, services })

  return {
    app,
    blobs,
    metadata,
    logger,
    services,
    setNow: (date) => {
      clock = date
    },
  }
}

export function readTransferId(body: unknown): string {
  if (
    typeof body === 'object' &&
    body !== null &&
    'transfer_id' in body &&
    typeof body.transfer_id === 'string'
  ) {
    return body.transfer_id
  }
  throw new Error('Response has no transfer_id')
}

export function uploadForm(
  files: Array<{ name: string; content: string | Uint8Array; type?: string }>,
  fields: Record<string, string> = {}
): FormData {
  const form = new FormData()
  for (const [k, v] of Object.entries(fields)) form.append(k, v)
  for (const f of files) {
    form.append('files', new File([f.content], f.name, { type: f.type ?? 'text/plain' }))
  }
  return form
}

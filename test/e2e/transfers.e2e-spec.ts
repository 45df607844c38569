import {
  createTestApp,
  readTransferId,
  TEST_BASE_URL,
  uploadForm,
  type TestApp,
} from './test-app.factory'

const T0 = new Date('2026-03-01T12:00:00.000Z')

describe('Transfers (e2e)', () => {
  let t: TestApp

  beforeEach(() => {
    t = createTestApp()
    t.setNow(T0)
  })

  const upload = (form: FormData) => t.app.request('/api/upload', { method: 'POST', body: form })

  describe('POST /api/upload', () => {
    it('creates a transfer and returns its download link', async () => {
      const res = await upload(
        uploadForm(
          [
            { name: 'hello.txt', content: 'hello world' },
            { name: 'notes.md', content: '# notes', type: 'text/markdown' },
          ],
          { plan_type: 'standard', sender_email: 'sender@example.test' }
        )
      )

      expect(res.status).toBe(200)
      const body: unknown = await res.json()
      const transferId = readTransferId(body)
      expect(body).toEqual({
        success: true,
        transfer_id: transferId,
        files: [
          { id: expect.any(String), name: 'hello.txt', size: 11 },
          { id: expect.any(String), name: 'notes.md', size: 7 },
        ],
        expires_at: '2026-03-11T12:00:00.000Z',
        download_url: `${TEST_BASE_URL}/download/${transferId}`,
      })
    })

    it('rejects an unknown plan', async () => {
      const res = await upload(uploadForm([{ name: 'a.txt', content: 'a' }], { plan_type: 'gold' }))

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'Invalid plan type' })
      expect(t.blobs.blobs.size).toBe(0)
    })

    it('rejects a batch over the plan limit without storing anything', async () => {
      t = createTestApp({ PLAN_LIMIT_FREE_MB: '1' })

      const res = await upload(
        uploadForm([{ name: 'big.bin', content: new Uint8Array(2 * 1024 * 1024) }])
      )

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'File size exceeds free plan limit' })
      expect(t.blobs.blobs.size).toBe(0)
    })

    it('rejects an upload without files', async () => {
      const res = await upload(uploadForm([], { plan_type: 'free' }))

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'No files provided' })
    })

    it('rejects a non-multipart body', async () => {
      const res = await t.app.request('/api/upload', {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ plan_type: 'free' }),
      })

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'Multipart request expected' })
    })
  })

  describe('GET /api/transfer/:transferId', () => {
    it('returns the transfer snapshot', async () => {
      const transferId = readTransferId(
        await (await upload(uploadForm([{ name: 'a.txt', content: 'abc' }]))).json()
      )

      const res = await t.app.request(`/api/transfer/${transferId}`)

      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({
        transfer_id: transferId,
        plan_type: 'free',
        total_size: 3,
        file_count: 1,
        created_at: '2026-03-01T12:00:00.000Z',
        expires_at: '2026-03-11T12:00:00.000Z',
        download_count: 0,
        files: [{ id: expect.any(String), name: 'a.txt', size: 3 }],
      })
    })

    it('answers 404 for an unknown transfer', async () => {
      const res = await t.app.request('/api/transfer/does-not-exist')

      expect(res.status).toBe(404)
      expect(await res.json()).toEqual({ error: 'Transfer not found' })
    })

    it('answers 410 once the transfer has expired', async () => {
      const transferId = readTransferId(
        await (await upload(uploadForm([{ name: 'a.txt', content: 'abc' }]))).json()
      )
      t.setNow(new Date('2026-03-11T12:00:01.000Z'))

      const res = await t.app.request(`/api/transfer/${transferId}`)

      expect(res.status).toBe(410)
      expect(await res.json()).toEqual({ error: 'Transfer has expired' })
    })
  })

  describe('GET /download/:transferId', () => {
    it('streams the file as an attachment and counts the download', async () => {
      const transferId = readTransferId(
        await (await upload(uploadForm([{ name: 'hello.txt', content: 'hello world' }]))).json()
      )

      const res = await t.app.request(`/download/${transferId}`)

      expect(res.status).toBe(200)
      expect(res.headers.get('content-type')).toBe('text/plain')
      expect(res.headers.get('content-length')).toBe('11')
      expect(res.headers.get('content-disposition')).toBe(
        `attachment; filename="hello.txt"; filename*=UTF-8''hello.txt`
      )
      expect(res.headers.get('etag')).toBe(
        '"b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9"'
      )
      expect(await res.text()).toBe('hello world')

      const info = await t.app.request(`/api/transfer/${transferId}`)
      expect(await info.json()).toMatchObject({ download_count: 1 })
    })

    it('answers 404 for an unknown transfer', async () => {
      const res = await t.app.request('/download/does-not-exist')

      expect(res.status).toBe(404)
      expect(await res.json()).toEqual({ error: 'Transfer not found' })
    })
  })
})

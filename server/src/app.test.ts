import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Server } from 'http'
import { createApp, type AppDeps } from './app'
import { createJobService } from './services/jobs'
import { MemoryQueueGateway } from './queue/memoryQueue'
import { MemoryJobStore } from './store/memoryJobStore'
import { manualClock } from './utils/clock'

const API_KEY = 'test-secret'

describe('HTTP API', () => {
  let store: MemoryJobStore
  let queue: MemoryQueueGateway
  let server: Server | undefined
  let baseUrl: string

  beforeEach(() => {
    const time = manualClock()
    store = new MemoryJobStore({ clock: time.clock })
    queue = new MemoryQueueGateway('test_jobs', time.clock)
  })

  afterEach(async () => {
    const s = server
    server = undefined
    if (s) await new Promise<void>((resolve) => s.close(() => resolve()))
  })

  async function start(overrides: Partial<AppDeps> = {}): Promise<void> {
    let next = 0
    const app = createApp({
      jobs: createJobService({ store, queue, stalenessThresholdSeconds: 60, newId: () => `job-${++next}` }),
      apiKeys: new Map([[API_KEY, 'ops']]),
      pingDatabase: async () => undefined,
      ...overrides,
    })
    const s = app.listen(0)
    server = s
    await new Promise<void>((resolve) => s.once('listening', () => resolve()))
    const address = s.address()
    if (!address || typeof address === 'string') throw new Error('expected a TCP address')
    baseUrl = `http://127.0.0.1:${address.port}`
  }

  function post(path: string, body: unknown, headers: Record<string, string> = {}) {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', ...headers },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    })
  }

  it('accepts a job and returns it as unclaimed', async () => {
    await start()
    const res = await post(
      '/api/jobs',
      { kind: 'transcription', documentId: 'doc-1', mediaUrl: 'https://media.example.com/a.mp3' },
      { 'x-request-id': 'req-42' }
    )

    expect(res.status).toBe(202)
    expect(res.headers.get('x-request-id')).toBe('req-42')
    expect(await res.json()).toMatchObject({
      job: { id: 'job-1', kind: 'transcription', status: 'unclaimed', attemptCount: 0 },
      messageId: '1',
    })
    expect(queue.pending()).toHaveLength(1)
  })

  it('rejects an invalid job body with its issues', async () => {
    await start()
    const res = await post('/api/jobs', { kind: 'transcription', documentId: 'doc-1' })

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ message: 'Invalid job payload', issues: ['mediaUrl: Required'] })
  })

  it('answers malformed JSON with 400', async () => {
    await start()
    const res = await post('/api/jobs', '{"kind":')

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ message: 'Invalid request body' })
  })

  it('returns job status and 404 for unknown jobs', async () => {
    await start()
    await post('/api/jobs', { kind: 'transcription', documentId: 'doc-1', mediaUrl: 'https://media.example.com/a.mp3' })

    const found = await fetch(`${baseUrl}/api/jobs/job-1`)
    expect(found.status).toBe(200)
    expect(found.headers.get('cache-control')).toContain('no-store')
    expect(await found.json()).toMatchObject({ id: 'job-1', status: 'unclaimed' })

    const missing = await fetch(`${baseUrl}/api/jobs/nope`)
    expect(missing.status).toBe(404)
  })

  it('requires an API key to reset and refuses active claims', async () => {
    await start()
    await post('/api/jobs', { kind: 'transcription', documentId: 'doc-1', mediaUrl: 'https://media.example.com/a.mp3' })

    expect((await post('/api/jobs/job-1/reset', {})).status).toBe(401)
    expect((await post('/api/jobs/job-1/reset', {}, { 'x-api-key': 'wrong' })).status).toBe(401)

    await store.claim('job-1', 60)
    const busy = await post('/api/jobs/job-1/reset', {}, { authorization: `Bearer ${API_KEY}` })
    expect(busy.status).toBe(409)

    const missing = await post('/api/jobs/nope/reset', {}, { 'x-api-key': API_KEY })
    expect(missing.status).toBe(404)

    const badBody = await post('/api/jobs/job-1/reset', { preserveHistory: 'yes' }, { 'x-api-key': API_KEY })
    expect(badBody.status).toBe(400)
  })

  it('resets a finished job and re-enqueues it', async () => {
    await start()
    await post('/api/jobs', { kind: 'transcription', documentId: 'doc-1', mediaUrl: 'https://media.example.com/a.mp3' })
    const claim = await store.claim('job-1', 60)
    if (!claim.ok) throw new Error('expected claim')
    await store.finalize(claim.lease, { status: 'skipped', reason: 'empty audio' })

    const res = await post('/api/jobs/job-1/reset', { preserveHistory: true }, { 'x-api-key': API_KEY })

    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      job: { status: 'unclaimed', history: [{ status: 'skipped', result: { skipped: true, reason: 'empty audio' } }] },
      messageId: '2',
    })
  })

  it('reports liveness and readiness', async () => {
    await start({
      pingDatabase: async () => {
        throw new Error('connection refused')
      },
    })

    expect((await fetch(`${baseUrl}/healthz`)).status).toBe(200)
    const ready = await fetch(`${baseUrl}/readyz`)
    expect(ready.status).toBe(503)
    expect(await ready.json()).toEqual({ status: 'unhealthy', database: 'connection refused' })
  })

  it('protects /ops/worker with the API key when asked to', async () => {
    await start({
      protectOps: true,
      heartbeat: { beat: async () => undefined, lastBeatAgeMs: async () => 1500 },
    })

    expect((await fetch(`${baseUrl}/ops/worker`)).status).toBe(401)
    const res = await fetch(`${baseUrl}/ops/worker`, { headers: { 'x-api-key': API_KEY } })
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ worker: null, lastHeartbeatAgeMs: 1500 })
  })

  it('rate limits the job API', async () => {
    await start({ rateLimitPerMinute: 2 })

    expect((await fetch(`${baseUrl}/api/jobs/nope`)).status).toBe(404)
    expect((await fetch(`${baseUrl}/api/jobs/nope`)).status).toBe(404)
    expect((await fetch(`${baseUrl}/api/jobs/nope`)).status).toBe(429)
    expect((await fetch(`${baseUrl}/healthz`)).status).toBe(200)
  })
})

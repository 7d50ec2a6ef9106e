import { describe, it, expect, beforeEach } from 'vitest'
import { MemoryJobStore } from './memoryJobStore'
import { manualClock } from '../utils/clock'
import type { JobPayload } from '../models/JobPayload'
import type { ClaimLease } from '../models/Job'

function transcription(jobId: string): JobPayload {
  return { kind: 'transcription', jobId, documentId: `doc-${jobId}`, mediaUrl: 'https://media.example.com/a.mp4' }
}

async function claimLease(store: MemoryJobStore, jobId: string, staleness = 60): Promise<ClaimLease> {
  const result = await store.claim(jobId, staleness)
  if (!result.ok) throw new Error(`expected claim of ${jobId} to succeed, got ${result.reason}`)
  return result.lease
}

describe('MemoryJobStore.claim', () => {
  let time: ReturnType<typeof manualClock>
  let store: MemoryJobStore

  beforeEach(async () => {
    time = manualClock()
    store = new MemoryJobStore({ clock: time.clock })
    await store.create(transcription('job-1'))
  })

  it('grants exactly one of many concurrent claims', async () => {
    const results = await Promise.all(Array.from({ length: 25 }, () => store.claim('job-1', 60)))
    expect(results.filter((r) => r.ok)).toHaveLength(1)
    expect(results.filter((r) => !r.ok && r.reason === 'active_claim')).toHaveLength(24)
  })

  it('returns the stored kind with the lease', async () => {
    time.advance(5)
    expect(await store.claim('job-1', 60)).toEqual({
      ok: true,
      lease: { jobId: 'job-1', kind: 'transcription', version: 1, claimedAt: time.clock(), attempt: 1 },
    })
  })

  it('refuses a fresh claim and allows takeover once it is stale', async () => {
    expect((await store.claim('job-1', 60)).ok).toBe(true)
    expect(await store.claim('job-1', 60)).toEqual({ ok: false, reason: 'active_claim' })
    time.advance(61)
    const takeover = await store.claim('job-1', 60)
    expect(takeover.ok).toBe(true)
    if (takeover.ok) {
      expect(takeover.lease.version).toBe(2)
      expect(takeover.lease.attempt).toBe(2)
    }
  })

  it('treats a claim exactly at the threshold as still active', async () => {
    await claimLease(store, 'job-1')
    time.advance(60)
    expect(await store.claim('job-1', 60)).toEqual({ ok: false, reason: 'active_claim' })
    time.advance(0.001)
    expect((await store.claim('job-1', 60)).ok).toBe(true)
  })

  it('lets the next claim take over a released claim immediately', async () => {
    const lease = await claimLease(store, 'job-1')
    expect(await store.release(lease, 'upstream 503')).toBe(true)
    const job = await store.get('job-1')
    expect(job?.status).toBe('claimed')
    expect(job?.lastError).toBe('upstream 503')
    expect((await store.claim('job-1', 60)).ok).toBe(true)
  })

  it('reports terminal and unknown jobs', async () => {
    const lease = await claimLease(store, 'job-1')
    await store.finalize(lease, { status: 'completed', result: { words: 10 } })
    expect(await store.claim('job-1', 60)).toEqual({ ok: false, reason: 'terminal' })
    expect(await store.claim('missing', 60)).toEqual({ ok: false, reason: 'not_found' })
  })
})

describe('MemoryJobStore.finalize', () => {
  it('refuses a stale lease so a newer attempt keeps its result', async () => {
    const time = manualClock()
    const store = new MemoryJobStore({ clock: time.clock })
    await store.create(transcription('job-2'))
    const first = await claimLease(store, 'job-2')
    time.advance(61)
    const second = await claimLease(store, 'job-2')

    expect(await store.finalize(second, { status: 'completed', result: { segments: 4 } })).toBe(true)
    expect(await store.finalize(first, { status: 'failed', error: 'late worker' })).toBe(false)
    expect(await store.finalize(second, { status: 'failed', error: 'twice' })).toBe(false)

    const job = await store.get('job-2')
    expect(job?.status).toBe('completed')
    expect(job?.result).toEqual({ segments: 4 })
    expect(job?.error).toBeNull()
  })

  it('records skip reasons and errors', async () => {
    const store = new MemoryJobStore()
    await store.create(transcription('a'))
    await store.create(transcription('b'))
    await store.finalize(await claimLease(store, 'a'), { status: 'skipped', reason: 'no speech' })
    await store.finalize(await claimLease(store, 'b'), { status: 'timed_out', error: 'deadline' })
    expect((await store.get('a'))?.result).toEqual({ skipped: true, reason: 'no speech' })
    const b = await store.get('b')
    expect(b?.status).toBe('timed_out')
    expect(b?.error).toBe('deadline')
    expect(b?.finishedAt).not.toBeNull()
  })

  it('refuses release from a lease that lost the claim', async () => {
    const time = manualClock()
    const store = new MemoryJobStore({ clock: time.clock })
    await store.create(transcription('c'))
    const first = await claimLease(store, 'c')
    time.advance(120)
    await claimLease(store, 'c')
    expect(await store.release(first, 'late')).toBe(false)
    expect((await store.get('c'))?.claimReleased).toBe(false)
  })
})

describe('MemoryJobStore.reset', () => {
  it('returns a failed job to unclaimed and keeps history when asked', async () => {
    const time = manualClock()
    const store = new MemoryJobStore({ clock: time.clock })
    await store.create(transcription('job-3'))
    const lease = await claimLease(store, 'job-3')
    await store.finalize(lease, { status: 'failed', error: 'decoder crashed' })

    const reset = await store.reset('job-3', { preserveHistory: true, stalenessSeconds: 60 })
    expect(reset.ok).toBe(true)
    if (!reset.ok) return
    expect(reset.record.status).toBe('unclaimed')
    expect(reset.record.attemptCount).toBe(0)
    expect(reset.record.error).toBeNull()
    expect(reset.record.claimVersion).toBe(1)
    expect(reset.record.history).toEqual([
      {
        status: 'failed',
        result: null,
        error: 'decoder crashed',
        attemptCount: 1,
        finishedAt: '2026-01-01T00:00:00.000Z',
        resetAt: '2026-01-01T00:00:00.000Z',
      },
    ])
    // the old lease cannot finalize the fresh attempt
    const next = await claimLease(store, 'job-3')
    expect(next.version).toBe(2)
    expect(await store.finalize(lease, { status: 'completed', result: null })).toBe(false)
  })

  it('drops history by default and refuses active claims', async () => {
    const store = new MemoryJobStore()
    await store.create(transcription('job-4'))
    await claimLease(store, 'job-4')
    expect(await store.reset('job-4', { stalenessSeconds: 60 })).toEqual({ ok: false, reason: 'active_claim' })
    expect(await store.reset('nope', { stalenessSeconds: 60 })).toEqual({ ok: false, reason: 'not_found' })
  })

  it('resets a stuck claim', async () => {
    const time = manualClock()
    const store = new MemoryJobStore({ clock: time.clock })
    await store.create(transcription('job-5'))
    await claimLease(store, 'job-5')
    time.advance(3600)
    const reset = await store.reset('job-5', { stalenessSeconds: 60 })
    expect(reset.ok && reset.record.history).toEqual([])
    expect((await store.get('job-5'))?.status).toBe('unclaimed')
  })
})

describe('MemoryJobStore.findReclaimable', () => {
  it('returns unclaimed and stale jobs oldest first, bounded by limit', async () => {
    const time = manualClock()
    const store = new MemoryJobStore({ clock: time.clock })
    await store.create(transcription('old-claimed'))
    time.advance(1)
    await store.create(transcription('fresh-claimed'))
    time.advance(1)
    await store.create(transcription('never-claimed'))
    time.advance(1)
    await store.create(transcription('done'))

    await claimLease(store, 'old-claimed')
    await store.finalize(await claimLease(store, 'done'), { status: 'completed', result: null })
    time.advance(100)
    await claimLease(store, 'fresh-claimed')

    expect(await store.findReclaimable(10, 60)).toEqual(['old-claimed', 'never-claimed'])
    expect(await store.findReclaimable(1, 60)).toEqual(['old-claimed'])
  })

  it('does not list a claim until it is past the threshold', async () => {
    const time = manualClock()
    const store = new MemoryJobStore({ clock: time.clock })
    await store.create(transcription('job-6'))
    await claimLease(store, 'job-6')
    time.advance(60)
    expect(await store.findReclaimable(5, 60)).toEqual([])
    time.advance(1)
    expect(await store.findReclaimable(5, 60)).toEqual(['job-6'])
    expect((await store.claim('job-6', 60)).ok).toBe(true)
  })
})

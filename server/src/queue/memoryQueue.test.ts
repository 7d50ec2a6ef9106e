import { describe, it, expect } from 'vitest'
import { MemoryQueueGateway } from './memoryQueue'
import { manualClock } from '../utils/clock'

describe('MemoryQueueGateway', () => {
  it('returns an empty batch from an empty queue', async () => {
    const queue = new MemoryQueueGateway()
    expect(await queue.dequeue(30, 10)).toEqual([])
  })

  it('hides dequeued messages until the visibility timeout passes', async () => {
    const time = manualClock()
    const queue = new MemoryQueueGateway('media_jobs', time.clock)
    const id = await queue.send({ jobId: 'job-1' })

    const [first] = await queue.dequeue(30, 10)
    expect(first?.id).toBe(id)
    expect(first?.deliveryCount).toBe(1)
    expect(first?.visibleAt.toISOString()).toBe('2026-01-01T00:00:30.000Z')

    time.advance(29)
    expect(await queue.dequeue(30, 10)).toEqual([])
    time.advance(1)
    const [again] = await queue.dequeue(30, 10)
    expect(again?.id).toBe(id)
    expect(again?.deliveryCount).toBe(2)
  })

  it('respects the batch size and enqueue order', async () => {
    const queue = new MemoryQueueGateway()
    await queue.send({ jobId: 'a' })
    await queue.send({ jobId: 'b' })
    await queue.send({ jobId: 'c' })
    const batch = await queue.dequeue(30, 2)
    expect(batch.map((m) => m.payload)).toEqual([{ jobId: 'a' }, { jobId: 'b' }])
  })

  it('deletes and archives idempotently', async () => {
    const queue = new MemoryQueueGateway()
    const kept = await queue.send({ jobId: 'keep' })
    const dead = await queue.send({ jobId: 'dead' })
    await queue.dequeue(30, 10)

    await queue.ackDelete(kept)
    await queue.ackDelete(kept)
    await queue.ackArchive(dead)
    await queue.ackArchive(dead)
    await queue.ackDelete('404')

    expect(queue.pending()).toEqual([])
    expect(queue.archived().map((m) => [m.id, m.deliveryCount])).toEqual([[dead, 1]])
  })

  it('delays a message sent with delaySeconds', async () => {
    const time = manualClock()
    const queue = new MemoryQueueGateway('media_jobs', time.clock)
    await queue.send({ jobId: 'later' }, 10)
    expect(await queue.dequeue(30, 1)).toEqual([])
    time.advance(10)
    expect(await queue.dequeue(30, 1)).toHaveLength(1)
  })
})

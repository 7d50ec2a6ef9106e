import { systemClock, type Clock } from '../utils/clock'
import type { QueueGateway, QueueMessage } from './types'

interface StoredMessage {
  id: string
  payload: unknown
  deliveryCount: number
  enqueuedAt: Date
  visibleAt: Date
}

export interface ArchivedMessage {
  id: string
  payload: unknown
  deliveryCount: number
  archivedAt: Date
}

/**
 * In-process queue with PGMQ semantics: FIFO by enqueue order, per-delivery visibility timeout, delivery count,
 * delete and archive. Backs tests and JOB_BACKEND=memory local runs.
 */
export class MemoryQueueGateway implements QueueGateway {
  readonly name: string
  private readonly clock: Clock
  private readonly messages = new Map<string, StoredMessage>()
  private readonly archive = new Map<string, ArchivedMessage>()
  private nextId = 1

  constructor(name = 'memory', clock: Clock = systemClock) {
    this.name = name
    this.clock = clock
  }

  async dequeue(visibilitySeconds: number, maxCount: number): Promise<QueueMessage[]> {
    const now = this.clock()
    const out: QueueMessage[] = []
    for (const message of this.messages.values()) {
      if (out.length >= maxCount) break
      if (message.visibleAt.getTime() > now.getTime()) continue
      message.deliveryCount += 1
      message.visibleAt = new Date(now.getTime() + visibilitySeconds * 1000)
      out.push({
        id: message.id,
        deliveryCount: message.deliveryCount,
        payload: structuredClone(message.payload),
        enqueuedAt: message.enqueuedAt,
        visibleAt: message.visibleAt,
      })
    }
    return out
  }

  async ackDelete(messageId: string): Promise<void> {
    this.messages.delete(messageId)
  }

  async ackArchive(messageId: string): Promise<void> {
    const message = this.messages.get(messageId)
    if (!message) return
    this.messages.delete(messageId)
    this.archive.set(messageId, {
      id: message.id,
      payload: message.payload,
      deliveryCount: message.deliveryCount,
      archivedAt: this.clock(),
    })
  }

  async send(payload: unknown, delaySeconds = 0): Promise<string> {
    const now = this.clock()
    const id = String(this.nextId++)
    this.messages.set(id, {
      id,
      payload: structuredClone(payload),
      deliveryCount: 0,
      enqueuedAt: now,
      visibleAt: new Date(now.getTime() + delaySeconds * 1000),
    })
    return id
  }

  /** Messages still in circulation (visible or not). */
  pending(): QueueMessage[] {
    return [...this.messages.values()].map((m) => ({ ...m }))
  }

  archived(): ArchivedMessage[] {
    return [...this.archive.values()]
  }
}

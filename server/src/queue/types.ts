/**
 * Contract over the durable queue. Delivery is at-least-once: a message can arrive again after a crash
 * or when its visibility timeout expires mid-processing. Correctness comes from JobStore.claim, never from
 * the queue.
 */

export interface QueueMessage {
  /** Delivery handle, unique per message; redeliveries keep the id. */
  id: string
  /** How many times this message has been handed out, including this delivery. */
  deliveryCount: number
  payload: unknown
  enqueuedAt: Date
  /** Absent an ack, the message becomes visible to consumers again at this instant. */
  visibleAt: Date
}

export interface QueueGateway {
  readonly name: string
  /** Up to maxCount messages, each hidden for visibilitySeconds. Empty array when the queue is empty. */
  dequeue(visibilitySeconds: number, maxCount: number): Promise<QueueMessage[]>
  /** Remove permanently. Deleting an unknown or already-deleted id is a no-op. */
  ackDelete(messageId: string): Promise<void>
  /** Move to the dead-letter archive for inspection. Idempotent. */
  ackArchive(messageId: string): Promise<void>
  /** Enqueue a payload, optionally invisible for delaySeconds. Returns the new message id. */
  send(payload: unknown, delaySeconds?: number): Promise<string>
}

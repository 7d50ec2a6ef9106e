import type { SqlExecutor } from '../db'
import type { QueueGateway, QueueMessage } from './types'

type PgmqRow = {
  msg_id: string | number
  read_ct: number
  enqueued_at: Date | string
  vt: Date | string
  message: unknown
}

/**
 * QueueGateway over Postgres PGMQ. Every call is a single pgmq function invocation; pgmq.read hides the
 * returned rows for vt seconds and increments read_ct on each delivery.
 */
export class PgmqQueueGateway implements QueueGateway {
  readonly name: string
  private readonly db: SqlExecutor

  constructor(db: SqlExecutor, queueName: string) {
    this.db = db
    this.name = queueName
  }

  async dequeue(visibilitySeconds: number, maxCount: number): Promise<QueueMessage[]> {
    const out = await this.db.query<PgmqRow>(
      `SELECT msg_id, read_ct, enqueued_at, vt, message
       FROM pgmq.read($1, $2, $3)`,
      [this.name, visibilitySeconds, maxCount]
    )
    return out.rows.map((row) => ({
      id: String(row.msg_id),
      deliveryCount: Number(row.read_ct),
      payload: row.message,
      enqueuedAt: new Date(row.enqueued_at),
      visibleAt: new Date(row.vt),
    }))
  }

  async ackDelete(messageId: string): Promise<void> {
    // pgmq.delete returns false for unknown ids; that is the idempotent case
    await this.db.query(`SELECT pgmq.delete($1, $2::bigint) AS deleted`, [this.name, messageId])
  }

  async ackArchive(messageId: string): Promise<void> {
    await this.db.query(`SELECT pgmq.archive($1, $2::bigint) AS archived`, [this.name, messageId])
  }

  async send(payload: unknown, delaySeconds = 0): Promise<string> {
    const out = await this.db.query<{ msg_id: string | number }>(
      `SELECT * FROM pgmq.send($1, $2::jsonb, $3) AS msg_id`,
      [this.name, JSON.stringify(payload), delaySeconds]
    )
    const row = out.rows[0]
    if (!row) {
      throw new Error(`pgmq.send returned no message id for queue ${this.name}`)
    }
    return String(row.msg_id)
  }
}

import { describe, it, expect } from 'vitest'
import type { QueryResultRow } from 'pg'
import type { SqlExecutor, SqlQueryResult } from '../db'
import { PgmqQueueGateway } from './pgmqQueue'

class FakeDb implements SqlExecutor {
  calls: Array<{ text: string; params: unknown[] }> = []
  rows: Array<Record<string, unknown>> = []

  async query<Row extends QueryResultRow>(text: string, params: unknown[] = []): Promise<SqlQueryResult<Row>> {
    this.calls.push({ text: text.replace(/\s+/g, ' ').trim(), params })
    return { rows: this.rows as Row[] }
  }
}

describe('PgmqQueueGateway', () => {
  it('reads a batch with the visibility timeout and maps rows to messages', async () => {
    const db = new FakeDb()
    db.rows = [
      {
        msg_id: '42',
        read_ct: 3,
        enqueued_at: new Date('2026-01-01T00:00:00.000Z'),
        vt: '2026-01-01T00:30:00.000Z',
        message: { kind: 'transcription', jobId: 'job-1' },
      },
    ]
    const queue = new PgmqQueueGateway(db, 'media_jobs')

    const messages = await queue.dequeue(1800, 10)
    expect(db.calls[0]).toEqual({
      text: 'SELECT msg_id, read_ct, enqueued_at, vt, message FROM pgmq.read($1, $2, $3)',
      params: ['media_jobs', 1800, 10],
    })
    expect(messages).toEqual([
      {
        id: '42',
        deliveryCount: 3,
        payload: { kind: 'transcription', jobId: 'job-1' },
        enqueuedAt: new Date('2026-01-01T00:00:00.000Z'),
        visibleAt: new Date('2026-01-01T00:30:00.000Z'),
      },
    ])
  })

  it('returns an empty list when pgmq has nothing visible', async () => {
    const queue = new PgmqQueueGateway(new FakeDb(), 'media_jobs')
    expect(await queue.dequeue(30, 5)).toEqual([])
  })

  it('deletes and archives by message id', async () => {
    const db = new FakeDb()
    const queue = new PgmqQueueGateway(db, 'media_jobs')
    await queue.ackDelete('7')
    await queue.ackArchive('8')
    expect(db.calls).toEqual([
      { text: 'SELECT pgmq.delete($1, $2::bigint) AS deleted', params: ['media_jobs', '7'] },
      { text: 'SELECT pgmq.archive($1, $2::bigint) AS archived', params: ['media_jobs', '8'] },
    ])
  })

  it('sends a JSON payload and returns the new id as a string', async () => {
    const db = new FakeDb()
    db.rows = [{ msg_id: 99 }]
    const queue = new PgmqQueueGateway(db, 'media_jobs')
    const id = await queue.send({ jobId: 'job-2' }, 15)
    expect(id).toBe('99')
    expect(db.calls[0]?.params).toEqual(['media_jobs', '{"jobId":"job-2"}', 15])
  })
})

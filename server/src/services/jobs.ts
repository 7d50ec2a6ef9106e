/**
 * Job submission, lookup and operator reset. Shared by the HTTP routes and the enqueue script.
 */
import { v4 as uuidv4 } from 'uuid'
import { getLogger, describeError, type Logger } from '../lib/logger'
import type { JobRecord } from '../models/Job'
import { jobPayloadInputSchema, jobPayloadSchema, type JobPayload } from '../models/JobPayload'
import type { QueueGateway } from '../queue/types'
import type { JobStore } from '../store/types'

export interface JobServiceDeps {
  store: JobStore
  queue: Pick<QueueGateway, 'send'>
  /** Claims younger than this count as active and block a reset. */
  stalenessThresholdSeconds: number
  logger?: Logger
  newId?: () => string
}

export type SubmitResult =
  | { ok: true; job: JobRecord; messageId: string | null }
  | { ok: false; issues: string[] }

export type ResetJobResult =
  | { ok: true; job: JobRecord; messageId: string | null }
  | { ok: false; reason: 'not_found' | 'active_claim' }

export interface JobService {
  submitJob(input: unknown): Promise<SubmitResult>
  getJob(jobId: string): Promise<JobRecord | null>
  resetJob(jobId: string, options?: { preserveHistory?: boolean }): Promise<ResetJobResult>
}

export function createJobService(deps: JobServiceDeps): JobService {
  const log = deps.logger ?? getLogger('api')
  const newId = deps.newId ?? uuidv4

  /**
   * A failed send leaves the record unclaimed; the reclaim sweeper enqueues it once it is older than the
   * staleness threshold, so the job is not lost and the caller gets no error.
   */
  async function enqueue(payload: JobPayload): Promise<string | null> {
    try {
      return await deps.queue.send(payload)
    } catch (err) {
      log.error({ jobId: payload.jobId, err: describeError(err) }, 'Enqueue failed; job left for the reclaim sweeper')
      return null
    }
  }

  return {
    async submitJob(input) {
      const parsed = jobPayloadInputSchema.safeParse(input)
      if (!parsed.success) {
        return {
          ok: false,
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
        }
      }
      const payload = jobPayloadSchema.parse({ ...parsed.data, jobId: newId() })
      const job = await deps.store.create(payload)
      const messageId = await enqueue(payload)
      log.info({ jobId: job.id, kind: job.kind, messageId }, 'Job submitted')
      return { ok: true, job, messageId }
    },

    getJob(jobId) {
      return deps.store.get(jobId)
    },

    async resetJob(jobId, options = {}) {
      const result = await deps.store.reset(jobId, {
        preserveHistory: options.preserveHistory,
        stalenessSeconds: deps.stalenessThresholdSeconds,
      })
      if (!result.ok) {
        log.warn({ jobId, reason: result.reason }, 'Job reset refused')
        return result
      }
      const messageId = await enqueue(result.record.payload)
      log.info({ jobId, messageId, preserveHistory: options.preserveHistory === true }, 'Job reset and re-enqueued')
      return { ok: true, job: result.record, messageId }
    },
  }
}

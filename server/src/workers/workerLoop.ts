import { getLogger, withJobContext, describeError, type Logger } from '../lib/logger'
import { JobTimeoutError, PermanentJobError, errorMessage, truncateError } from '../lib/errors'
import type { ClaimLease, JobOutcome } from '../models/Job'
import { parseJobPayload, type JobPayload } from '../models/JobPayload'
import type { PipelineOutcome, ProcessingPipeline } from '../pipelines/types'
import type { QueueGateway, QueueMessage } from '../queue/types'
import type { JobStore } from '../store/types'
import type { WorkerConfig } from '../utils/workerConfig'
import type { WorkerHeartbeat } from '../utils/workerHeartbeat'
import { sleep } from '../utils/sleep'

/** How one delivery was resolved. */
export type MessageDisposition =
  | 'completed'
  | 'skipped'
  | 'failed'
  | 'timed_out'
  | 'retry'
  | 'redundant'
  | 'superseded'
  | 'malformed'
  | 'unknown_job'
  | 'error'

type CounterName = 'processed' | 'skipped' | 'failed' | 'retried' | 'redundant' | 'archived'

export interface WorkerErrorEntry {
  jobId: string | null
  messageId: string | null
  error: string
  at: string
}

export interface WorkerStatus {
  running: boolean
  startedAt: string | null
  lastPollAt: string | null
  lastJobAt: string | null
  inFlight: number
  counters: Record<CounterName, number>
  recentErrors: WorkerErrorEntry[]
  config: WorkerConfig
}

export interface JobErrorReport {
  jobId: string
  messageId: string
  kind: JobPayload['kind']
  error: unknown
}

export interface WorkerLoopOptions {
  queue: QueueGateway
  store: JobStore
  pipeline: ProcessingPipeline
  config: WorkerConfig
  logger?: Logger
  heartbeat?: WorkerHeartbeat
  /** Called for every failed pipeline run (Sentry in production). */
  onJobError?: (report: JobErrorReport) => void
}

const MAX_RECENT_ERRORS = 10
const LOOP_ERROR_PAUSE_MS = 10_000
const DEFAULT_STOP_TIMEOUT_MS = 120_000

/** Idle sleep after `step` consecutive empty polls: idleSleepSeconds * 2^step, capped. */
export function idleBackoffSeconds(step: number, config: WorkerConfig): number {
  return Math.min(config.idleSleepSeconds * 2 ** Math.min(step, 16), config.maxIdleSleepSeconds)
}

/**
 * Pull-based worker: dequeue a batch, claim each job, run the pipeline, then finalize and ack.
 * Redelivery after the visibility timeout is the only retry mechanism; the loop keeps no retry timers.
 * Per job the order is always claim -> finalize -> ack/archive.
 */
export class WorkerLoop {
  private readonly queue: QueueGateway
  private readonly store: JobStore
  private readonly pipeline: ProcessingPipeline
  private readonly config: WorkerConfig
  private readonly log: Logger
  private readonly heartbeat?: WorkerHeartbeat
  private readonly onJobError?: (report: JobErrorReport) => void

  private loop: Promise<void> | null = null
  private shutdown: AbortController | null = null
  private readonly running = new Set<AbortController>()
  private startedAt: Date | null = null
  private lastPollAt: Date | null = null
  private lastJobAt: Date | null = null
  private readonly counters: Record<CounterName, number> = {
    processed: 0,
    skipped: 0,
    failed: 0,
    retried: 0,
    redundant: 0,
    archived: 0,
  }
  private recentErrors: WorkerErrorEntry[] = []

  constructor(options: WorkerLoopOptions) {
    this.queue = options.queue
    this.store = options.store
    this.pipeline = options.pipeline
    this.config = options.config
    this.log = options.logger ?? getLogger('worker')
    this.heartbeat = options.heartbeat
    this.onJobError = options.onJobError
  }

  start(): void {
    if (this.loop) {
      this.log.warn('Worker loop already running, skipping start')
      return
    }
    const shutdown = new AbortController()
    this.shutdown = shutdown
    this.startedAt = new Date()
    this.log.info(
      {
        queue: this.queue.name,
        batchSize: this.config.batchSize,
        visibilitySeconds: this.config.visibilitySeconds,
        maxRetries: this.config.maxRetries,
        stalenessThresholdSeconds: this.config.stalenessThresholdSeconds,
      },
      'Worker loop starting'
    )
    this.loop = this.run(shutdown.signal)
  }

  /**
   * Signal shutdown, cut any idle sleep short and wait for in-flight jobs. Jobs still running after timeoutMs
   * get their signal aborted; their claims are released through the normal failure path.
   */
  async stop(timeoutMs = DEFAULT_STOP_TIMEOUT_MS): Promise<void> {
    const loop = this.loop
    if (!loop || !this.shutdown) return
    this.log.info('Stopping worker loop')
    this.shutdown.abort()

    const waitLimit = new AbortController()
    const finished = await Promise.race([
      loop.then(() => true),
      sleep(timeoutMs, waitLimit.signal).then(() => false),
    ])
    waitLimit.abort()

    if (!finished) {
      this.log.warn({ inFlight: this.running.size }, 'Worker shutdown timeout, cancelling in-flight jobs')
      for (const controller of this.running) controller.abort(new Error('Worker shutting down'))
      await loop
    }
    this.loop = null
    this.shutdown = null
    this.log.info('Worker loop stopped')
  }

  getStatus(): WorkerStatus {
    return {
      running: this.loop !== null,
      startedAt: this.startedAt?.toISOString() ?? null,
      lastPollAt: this.lastPollAt?.toISOString() ?? null,
      lastJobAt: this.lastJobAt?.toISOString() ?? null,
      inFlight: this.running.size,
      counters: { ...this.counters },
      recentErrors: [...this.recentErrors],
      config: this.config,
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    if (this.config.startupDelaySeconds > 0) {
      await sleep(this.config.startupDelaySeconds * 1000, signal)
    }
    let idleStep = 0
    while (!signal.aborted) {
      let handled: number
      try {
        handled = await this.runOnce()
      } catch (err) {
        this.log.error({ err: describeError(err) }, 'Worker loop error')
        this.recordError(null, null, err)
        await sleep(LOOP_ERROR_PAUSE_MS, signal)
        continue
      }
      if (handled > 0) {
        idleStep = 0
        continue
      }
      const delay = idleBackoffSeconds(idleStep, this.config)
      idleStep += 1
      this.log.debug({ delaySeconds: delay, idleStep }, 'No messages, sleeping')
      await sleep(delay * 1000, signal)
    }
  }

  /** One polling cycle. Resolves with the number of messages dequeued; every message is resolved before it returns. */
  async runOnce(): Promise<number> {
    this.lastPollAt = new Date()
    await this.beat()
    const messages = await this.queue.dequeue(this.config.visibilitySeconds, this.config.batchSize)
    if (messages.length === 0) return 0

    this.log.info({ count: messages.length }, 'Dequeued messages')
    // One slow job must not hold up the rest of the batch
    const results = await Promise.allSettled(messages.map((message) => this.handleMessage(message)))
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        this.log.error({ messageId: messages[i]?.id, err: describeError(result.reason) }, 'Unhandled message error')
      }
    })
    return messages.length
  }

  /** Resolve one delivery. Never rejects: store or queue errors leave the message to be redelivered. */
  async handleMessage(message: QueueMessage): Promise<MessageDisposition> {
    try {
      return await this.resolveMessage(message)
    } catch (err) {
      this.log.error({ messageId: message.id, err: describeError(err) }, 'Failed to resolve message; leaving it for redelivery')
      this.recordError(null, message.id, err)
      return 'error'
    }
  }

  private async resolveMessage(message: QueueMessage): Promise<MessageDisposition> {
    const parsed = parseJobPayload(message.payload)
    if (!parsed.ok) {
      // permanent defect: archive without spending a retry
      this.log.warn({ messageId: message.id, jobId: parsed.jobId, reason: parsed.reason }, 'Malformed payload, archiving')
      await this.queue.ackArchive(message.id)
      this.counters.archived += 1
      return 'malformed'
    }

    const payload = parsed.payload
    const log = withJobContext(this.log, payload.jobId, message.id)
    const claim = await this.store.claim(payload.jobId, this.config.stalenessThresholdSeconds)
    if (!claim.ok) {
      if (claim.reason === 'not_found') {
        log.warn('Message references an unknown job, archiving')
        await this.queue.ackArchive(message.id)
        this.counters.archived += 1
        return 'unknown_job'
      }
      log.info({ reason: claim.reason }, 'Job not claimable, deleting redundant delivery')
      await this.queue.ackDelete(message.id)
      this.counters.redundant += 1
      return 'redundant'
    }

    const lease = claim.lease
    if (lease.kind !== payload.kind) {
      // the stored record is authoritative; the sweeper re-sends it from its own payload
      const reason = `Message kind ${payload.kind} does not match job kind ${lease.kind}`
      log.warn({ messageKind: payload.kind, jobKind: lease.kind }, 'Message kind mismatch, archiving')
      await this.store.release(lease, reason)
      await this.queue.ackArchive(message.id)
      this.counters.archived += 1
      return 'malformed'
    }
    log.info({ kind: payload.kind, attempt: lease.attempt, deliveryCount: message.deliveryCount }, 'Job claimed')
    const controller = new AbortController()
    this.running.add(controller)
    try {
      let outcome: PipelineOutcome
      try {
        outcome = await this.runPipeline(payload, lease, message, controller, log)
      } catch (err) {
        return await this.resolveFailure(message, payload, lease, err, log)
      }
      return await this.finish(message, lease, outcome, 'delete', log)
    } finally {
      this.running.delete(controller)
      this.lastJobAt = new Date()
    }
  }

  private async runPipeline(
    payload: JobPayload,
    lease: ClaimLease,
    message: QueueMessage,
    controller: AbortController,
    log: Logger
  ): Promise<PipelineOutcome> {
    const timeoutMs = this.config.processingTimeoutSeconds * 1000
    let timer: NodeJS.Timeout | undefined
    const deadline = new Promise<never>((_, reject) => {
      if (timeoutMs <= 0) return
      timer = setTimeout(() => {
        const err = new JobTimeoutError(timeoutMs)
        controller.abort(err)
        reject(err)
      }, timeoutMs)
    })
    // settles on abort even when the pipeline ignores its signal
    let rejectCancelled: (reason: unknown) => void = () => undefined
    const cancelled = new Promise<never>((_, reject) => {
      rejectCancelled = reject
    })
    const onAbort = () => rejectCancelled(controller.signal.reason)
    controller.signal.addEventListener('abort', onAbort, { once: true })
    try {
      return await Promise.race([
        this.pipeline(payload.jobId, payload, {
          signal: controller.signal,
          log,
          attempt: lease.attempt,
          deliveryCount: message.deliveryCount,
        }),
        deadline,
        cancelled,
      ])
    } finally {
      clearTimeout(timer)
      controller.signal.removeEventListener('abort', onAbort)
    }
  }

  private async resolveFailure(
    message: QueueMessage,
    payload: JobPayload,
    lease: ClaimLease,
    err: unknown,
    log: Logger
  ): Promise<MessageDisposition> {
    const error = truncateError(errorMessage(err))
    this.recordError(payload.jobId, message.id, err)
    this.onJobError?.({ jobId: payload.jobId, messageId: message.id, kind: payload.kind, error: err })

    if (err instanceof PermanentJobError) {
      log.error({ err: describeError(err) }, 'Job failed permanently')
      return this.finish(message, lease, { status: 'failed', error }, 'archive', log)
    }

    const { deliveryCount } = message
    const { maxRetries } = this.config
    if (deliveryCount < maxRetries) {
      // No ack: the message reappears after its visibility timeout and the released claim lets it be re-claimed
      await this.store.release(lease, `Retry ${deliveryCount}/${maxRetries}: ${error}`)
      this.counters.retried += 1
      log.warn({ deliveryCount, maxRetries, error }, 'Job failed, will retry after visibility timeout')
      return 'retry'
    }

    log.error({ deliveryCount, maxRetries, err: describeError(err) }, 'Max retries reached, archiving')
    const status: 'failed' | 'timed_out' = err instanceof JobTimeoutError ? 'timed_out' : 'failed'
    return this.finish(
      message,
      lease,
      { status, error: `Failed after ${deliveryCount} attempts: ${error}` },
      'archive',
      log
    )
  }

  /** finalize, then ack. When finalize is refused a newer claim owns the job and the message is left alone. */
  private async finish(
    message: QueueMessage,
    lease: ClaimLease,
    outcome: JobOutcome,
    ack: 'delete' | 'archive',
    log: Logger
  ): Promise<MessageDisposition> {
    const finalized = await this.store.finalize(lease, outcome)
    if (!finalized) {
      log.warn({ outcome: outcome.status }, 'Claim was superseded before finalize; leaving delivery to the newer attempt')
      return 'superseded'
    }
    if (ack === 'delete') {
      await this.queue.ackDelete(message.id)
    } else {
      await this.queue.ackArchive(message.id)
      this.counters.archived += 1
    }
    switch (outcome.status) {
      case 'completed':
        this.counters.processed += 1
        break
      case 'skipped':
        this.counters.skipped += 1
        break
      case 'failed':
      case 'timed_out':
        this.counters.failed += 1
        break
    }
    log.info({ status: outcome.status }, 'Job finished')
    return outcome.status
  }

  private async beat(): Promise<void> {
    if (!this.heartbeat) return
    try {
      await this.heartbeat.beat()
    } catch (err) {
      this.log.warn({ err: describeError(err) }, 'Worker heartbeat write failed')
    }
  }

  private recordError(jobId: string | null, messageId: string | null, err: unknown): void {
    this.recentErrors = [
      ...this.recentErrors,
      { jobId, messageId, error: truncateError(errorMessage(err)), at: new Date().toISOString() },
    ].slice(-MAX_RECENT_ERRORS)
  }
}

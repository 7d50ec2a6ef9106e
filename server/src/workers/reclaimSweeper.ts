import { getLogger, describeError, type Logger } from '../lib/logger'
import type { QueueGateway } from '../queue/types'
import type { JobStore, StuckJobScanner } from '../store/types'
import { systemClock, type Clock } from '../utils/clock'
import type { WorkerConfig } from '../utils/workerConfig'

export interface ReclaimSweeperOptions {
  scanner: StuckJobScanner
  store: Pick<JobStore, 'get'>
  queue: Pick<QueueGateway, 'send'>
  config: WorkerConfig
  clock?: Clock
  logger?: Logger
}

/**
 * Re-enqueues jobs whose message is gone: claims left stale by a crashed worker, and unclaimed records whose
 * message was archived or lost. Duplicates are harmless; claim lets only one delivery through.
 */
export class ReclaimSweeper {
  private readonly scanner: StuckJobScanner
  private readonly store: Pick<JobStore, 'get'>
  private readonly queue: Pick<QueueGateway, 'send'>
  private readonly config: WorkerConfig
  private readonly clock: Clock
  private readonly log: Logger
  private timer: NodeJS.Timeout | null = null
  private inFlight: Promise<number> | null = null

  constructor(options: ReclaimSweeperOptions) {
    this.scanner = options.scanner
    this.store = options.store
    this.queue = options.queue
    this.config = options.config
    this.clock = options.clock ?? systemClock
    this.log = options.logger ?? getLogger('worker')
  }

  start(): void {
    if (this.timer) return
    if (this.config.sweepIntervalSeconds <= 0) {
      this.log.info('Reclaim sweeper disabled (SWEEP_INTERVAL_SECONDS=0)')
      return
    }
    this.timer = setInterval(() => this.tick(), this.config.sweepIntervalSeconds * 1000)
    this.timer.unref()
    this.log.info({ intervalSeconds: this.config.sweepIntervalSeconds }, 'Reclaim sweeper started')
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    // failures are logged by tick
    if (this.inFlight) await this.inFlight.catch(() => 0)
  }

  /** One pass. Resolves with the number of messages sent. */
  async sweepOnce(): Promise<number> {
    const stalenessSeconds = this.config.stalenessThresholdSeconds
    const ids = await this.scanner.findReclaimable(this.config.sweepBatchSize, stalenessSeconds)
    const now = this.clock().getTime()
    let sent = 0
    for (const jobId of ids) {
      const job = await this.store.get(jobId)
      if (!job) continue
      // a recently created or reset job still has its own message in the queue
      if (job.status === 'unclaimed' && now - job.updatedAt.getTime() <= stalenessSeconds * 1000) continue
      const messageId = await this.queue.send(job.payload)
      sent += 1
      this.log.info({ jobId, messageId, status: job.status, attemptCount: job.attemptCount }, 'Re-enqueued stuck job')
    }
    return sent
  }

  private tick(): void {
    if (this.inFlight) return
    this.inFlight = this.sweepOnce()
    void this.inFlight
      .catch((err: unknown) => {
        this.log.error({ err: describeError(err) }, 'Reclaim sweep failed')
        return 0
      })
      .finally(() => {
        this.inFlight = null
      })
  }
}

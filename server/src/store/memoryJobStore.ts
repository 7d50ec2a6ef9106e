import type { Logger } from '../lib/logger'
import {
  canTransition,
  isTerminal,
  outcomeFields,
  type ClaimLease,
  type ClaimResult,
  type JobHistoryEntry,
  type JobOutcome,
  type JobRecord,
  type ResetOptions,
  type ResetResult,
} from '../models/Job'
import type { JobPayload } from '../models/JobPayload'
import { systemClock, type Clock } from '../utils/clock'
import type { JobStore, StuckJobScanner } from './types'

/**
 * Map-backed JobStore. Each operation reads and writes without an await in between, so within one process
 * the check and the write are a single atomic step, the same guarantee PgJobStore gets from one UPDATE.
 */
export class MemoryJobStore implements JobStore, StuckJobScanner {
  private readonly jobs = new Map<string, JobRecord>()
  private readonly clock: Clock
  private readonly log?: Logger

  constructor(options: { clock?: Clock; logger?: Logger } = {}) {
    this.clock = options.clock ?? systemClock
    this.log = options.logger
  }

  async create(payload: JobPayload): Promise<JobRecord> {
    if (this.jobs.has(payload.jobId)) {
      throw new Error(`Job ${payload.jobId} already exists`)
    }
    const now = this.clock()
    const record: JobRecord = {
      id: payload.jobId,
      kind: payload.kind,
      payload,
      status: 'unclaimed',
      claimedAt: null,
      claimVersion: 0,
      claimReleased: false,
      attemptCount: 0,
      result: null,
      error: null,
      lastError: null,
      history: [],
      createdAt: now,
      updatedAt: now,
      finishedAt: null,
    }
    this.jobs.set(record.id, record)
    return structuredClone(record)
  }

  async get(jobId: string): Promise<JobRecord | null> {
    const job = this.jobs.get(jobId)
    return job ? structuredClone(job) : null
  }

  async claim(jobId: string, stalenessSeconds: number): Promise<ClaimResult> {
    const job = this.jobs.get(jobId)
    if (!job) return { ok: false, reason: 'not_found' }
    if (isTerminal(job.status)) return { ok: false, reason: 'terminal' }
    const now = this.clock()
    if (job.status === 'claimed' && !job.claimReleased && !this.isStale(job, now, stalenessSeconds)) {
      return { ok: false, reason: 'active_claim' }
    }
    job.status = 'claimed'
    job.claimedAt = now
    job.claimReleased = false
    job.claimVersion += 1
    job.attemptCount += 1
    job.updatedAt = now
    return {
      ok: true,
      lease: { jobId, kind: job.kind, version: job.claimVersion, claimedAt: now, attempt: job.attemptCount },
    }
  }

  async finalize(lease: ClaimLease, outcome: JobOutcome): Promise<boolean> {
    const job = this.jobs.get(lease.jobId)
    if (!job || !this.holds(job, lease) || !canTransition(job.status, outcome.status)) {
      this.log?.warn(
        { jobId: lease.jobId, leaseVersion: lease.version, status: job?.status, currentVersion: job?.claimVersion },
        'Finalize refused: lease no longer holds the claim'
      )
      return false
    }
    const now = this.clock()
    const { result, error } = outcomeFields(outcome)
    job.status = outcome.status
    job.result = result
    job.error = error
    job.claimReleased = false
    job.finishedAt = now
    job.updatedAt = now
    return true
  }

  async release(lease: ClaimLease, error: string): Promise<boolean> {
    const job = this.jobs.get(lease.jobId)
    if (!job || !this.holds(job, lease)) return false
    job.claimReleased = true
    job.lastError = error
    job.updatedAt = this.clock()
    return true
  }

  async reset(jobId: string, options: ResetOptions): Promise<ResetResult> {
    const job = this.jobs.get(jobId)
    if (!job) return { ok: false, reason: 'not_found' }
    const now = this.clock()
    if (job.status === 'claimed' && !job.claimReleased && !this.isStale(job, now, options.stalenessSeconds)) {
      return { ok: false, reason: 'active_claim' }
    }
    if (options.preserveHistory && job.status !== 'unclaimed') {
      const entry: JobHistoryEntry = {
        status: job.status,
        result: job.result,
        error: job.error ?? job.lastError,
        attemptCount: job.attemptCount,
        finishedAt: job.finishedAt?.toISOString() ?? null,
        resetAt: now.toISOString(),
      }
      job.history.push(entry)
    }
    // claimVersion is kept: a worker still holding an old lease must stay unable to finalize
    job.status = 'unclaimed'
    job.claimedAt = null
    job.claimReleased = false
    job.attemptCount = 0
    job.result = null
    job.error = null
    job.lastError = null
    job.finishedAt = null
    job.updatedAt = now
    return { ok: true, record: structuredClone(job) }
  }

  async findReclaimable(limit: number, stalenessSeconds: number): Promise<string[]> {
    const now = this.clock()
    return [...this.jobs.values()]
      .filter(
        (job) =>
          job.status === 'unclaimed' || (job.status === 'claimed' && this.isStale(job, now, stalenessSeconds))
      )
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id.localeCompare(b.id))
      .slice(0, limit)
      .map((job) => job.id)
  }

  private holds(job: JobRecord, lease: ClaimLease): boolean {
    return job.status === 'claimed' && job.claimVersion === lease.version
  }

  /** Strictly older than the threshold: a claim exactly stalenessSeconds old is still active. */
  private isStale(job: JobRecord, now: Date, stalenessSeconds: number): boolean {
    if (!job.claimedAt) return true
    return now.getTime() - job.claimedAt.getTime() > stalenessSeconds * 1000
  }
}

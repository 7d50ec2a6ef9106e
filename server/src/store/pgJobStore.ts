import type { SqlExecutor } from '../db'
import type { Logger } from '../lib/logger'
import {
  isTerminal,
  outcomeFields,
  type ClaimLease,
  type ClaimResult,
  type JobHistoryEntry,
  type JobOutcome,
  type JobRecord,
  type JobStatus,
  type ResetOptions,
  type ResetResult,
} from '../models/Job'
import type { JobKind, JobPayload } from '../models/JobPayload'
import type { JobStore, StuckJobScanner } from './types'

type JobRow = {
  job_id: string
  kind: JobKind
  payload: JobPayload
  status: JobStatus
  claimed_at: Date | string | null
  claim_version: number
  claim_released: boolean
  attempt_count: number
  result: unknown
  error: string | null
  last_error: string | null
  history: JobHistoryEntry[] | null
  created_at: Date | string
  updated_at: Date | string
  finished_at: Date | string | null
}

const JOB_COLUMNS = `job_id, kind, payload, status, claimed_at, claim_version, claim_released, attempt_count,
  result, error, last_error, history, created_at, updated_at, finished_at`

/** A claim younger than $n seconds that its holder has not released. */
const activeClaim = (param: string) =>
  `(status = 'claimed' AND NOT claim_released AND claimed_at IS NOT NULL
    AND claimed_at >= NOW() - make_interval(secs => ${param}))`

function toDate(value: Date | string): Date {
  return value instanceof Date ? value : new Date(value)
}

function toRecord(row: JobRow): JobRecord {
  return {
    id: row.job_id,
    kind: row.kind,
    payload: row.payload,
    status: row.status,
    claimedAt: row.claimed_at === null ? null : toDate(row.claimed_at),
    claimVersion: Number(row.claim_version),
    claimReleased: row.claim_released,
    attemptCount: Number(row.attempt_count),
    result: row.result ?? null,
    error: row.error,
    lastError: row.last_error,
    history: row.history ?? [],
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
    finishedAt: row.finished_at === null ? null : toDate(row.finished_at),
  }
}

function jsonParam(value: unknown): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value)
}

/**
 * JobStore on the job_records table. claim, finalize, release and reset are each one UPDATE whose WHERE clause
 * is the whole precondition; under concurrent updates Postgres re-checks it against the latest row version, so
 * the losers of a race match zero rows.
 */
export class PgJobStore implements JobStore, StuckJobScanner {
  private readonly db: SqlExecutor
  private readonly log?: Logger

  constructor(db: SqlExecutor, logger?: Logger) {
    this.db = db
    this.log = logger
  }

  async create(payload: JobPayload): Promise<JobRecord> {
    const out = await this.db.query<JobRow>(
      `INSERT INTO job_records (job_id, kind, payload)
       VALUES ($1, $2, $3::jsonb)
       RETURNING ${JOB_COLUMNS}`,
      [payload.jobId, payload.kind, JSON.stringify(payload)]
    )
    const row = out.rows[0]
    if (!row) throw new Error(`Insert of job ${payload.jobId} returned no row`)
    return toRecord(row)
  }

  async get(jobId: string): Promise<JobRecord | null> {
    const out = await this.db.query<JobRow>(
      `SELECT ${JOB_COLUMNS} FROM job_records WHERE job_id = $1`,
      [jobId]
    )
    const row = out.rows[0]
    return row ? toRecord(row) : null
  }

  async claim(jobId: string, stalenessSeconds: number): Promise<ClaimResult> {
    const out = await this.db.query<{
      previous_status: JobStatus
      kind: JobKind
      claim_version: number | null
      claimed_at: Date | string | null
      attempt_count: number | null
    }>(
      `WITH target AS (
         SELECT status, kind FROM job_records WHERE job_id = $1
       ), claimed AS (
         UPDATE job_records
         SET status = 'claimed',
             claimed_at = NOW(),
             claim_released = FALSE,
             claim_version = claim_version + 1,
             attempt_count = attempt_count + 1,
             updated_at = NOW()
         WHERE job_id = $1
           AND (status = 'unclaimed' OR (status = 'claimed' AND NOT ${activeClaim('$2')}))
         RETURNING claim_version, claimed_at, attempt_count
       )
       SELECT t.status AS previous_status, t.kind, c.claim_version, c.claimed_at, c.attempt_count
       FROM target t LEFT JOIN claimed c ON TRUE`,
      [jobId, stalenessSeconds]
    )
    const row = out.rows[0]
    if (!row) return { ok: false, reason: 'not_found' }
    if (row.claim_version === null || row.claimed_at === null || row.attempt_count === null) {
      // previous_status can read unclaimed when a concurrent claim won between snapshot and update
      return { ok: false, reason: isTerminal(row.previous_status) ? 'terminal' : 'active_claim' }
    }
    return {
      ok: true,
      lease: {
        jobId,
        kind: row.kind,
        version: Number(row.claim_version),
        claimedAt: toDate(row.claimed_at),
        attempt: Number(row.attempt_count),
      },
    }
  }

  async finalize(lease: ClaimLease, outcome: JobOutcome): Promise<boolean> {
    const { result, error } = outcomeFields(outcome)
    const out = await this.db.query<{ job_id: string }>(
      `UPDATE job_records
       SET status = $3,
           result = $4::jsonb,
           error = $5,
           claim_released = FALSE,
           finished_at = NOW(),
           updated_at = NOW()
       WHERE job_id = $1 AND status = 'claimed' AND claim_version = $2
       RETURNING job_id`,
      [lease.jobId, lease.version, outcome.status, jsonParam(result), error]
    )
    if (out.rows.length === 0) {
      this.log?.warn(
        { jobId: lease.jobId, leaseVersion: lease.version, outcome: outcome.status },
        'Finalize refused: lease no longer holds the claim'
      )
      return false
    }
    return true
  }

  async release(lease: ClaimLease, error: string): Promise<boolean> {
    const out = await this.db.query<{ job_id: string }>(
      `UPDATE job_records
       SET claim_released = TRUE, last_error = $3, updated_at = NOW()
       WHERE job_id = $1 AND status = 'claimed' AND claim_version = $2
       RETURNING job_id`,
      [lease.jobId, lease.version, error]
    )
    return out.rows.length > 0
  }

  async reset(jobId: string, options: ResetOptions): Promise<ResetResult> {
    // SET expressions read the pre-update row, so history captures the outcome being cleared
    const out = await this.db.query<JobRow & { previous_status: JobStatus; was_reset: boolean }>(
      `WITH target AS (
         SELECT status FROM job_records WHERE job_id = $1
       ), cleared AS (
         UPDATE job_records
         SET history = CASE
               WHEN $3::boolean AND status <> 'unclaimed' THEN history || jsonb_build_array(jsonb_build_object(
                 'status', status,
                 'result', result,
                 'error', COALESCE(error, last_error),
                 'attemptCount', attempt_count,
                 'finishedAt', finished_at,
                 'resetAt', NOW()))
               ELSE history
             END,
             status = 'unclaimed',
             claimed_at = NULL,
             claim_released = FALSE,
             attempt_count = 0,
             result = NULL,
             error = NULL,
             last_error = NULL,
             finished_at = NULL,
             updated_at = NOW()
         WHERE job_id = $1 AND NOT ${activeClaim('$2')}
         RETURNING ${JOB_COLUMNS}
       )
       SELECT t.status AS previous_status, (r.job_id IS NOT NULL) AS was_reset, r.*
       FROM target t LEFT JOIN cleared r ON TRUE`,
      [jobId, options.stalenessSeconds, options.preserveHistory === true]
    )
    const row = out.rows[0]
    if (!row) return { ok: false, reason: 'not_found' }
    if (!row.was_reset) return { ok: false, reason: 'active_claim' }
    return { ok: true, record: toRecord(row) }
  }

  async findReclaimable(limit: number, stalenessSeconds: number): Promise<string[]> {
    const out = await this.db.query<{ job_id: string }>(
      `SELECT job_id
       FROM job_records
       WHERE status = 'unclaimed'
          OR (status = 'claimed' AND (claimed_at IS NULL OR claimed_at < NOW() - make_interval(secs => $2)))
       ORDER BY created_at ASC, job_id ASC
       LIMIT $1`,
      [limit, stalenessSeconds]
    )
    return out.rows.map((row) => row.job_id)
  }
}

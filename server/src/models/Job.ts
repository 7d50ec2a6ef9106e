import type { JobKind, JobPayload } from './JobPayload'

export type JobStatus = 'unclaimed' | 'claimed' | 'completed' | 'skipped' | 'failed' | 'timed_out'

export type TerminalStatus = Exclude<JobStatus, 'unclaimed' | 'claimed'>

export const TERMINAL_STATUSES: readonly TerminalStatus[] = ['completed', 'skipped', 'failed', 'timed_out']

/**
 * Allowed transitions. claimed -> claimed is a takeover of a stale or released claim; every way out of a
 * terminal state goes through reset (-> unclaimed).
 */
const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  unclaimed: ['claimed'],
  claimed: ['claimed', 'completed', 'skipped', 'failed', 'timed_out', 'unclaimed'],
  completed: ['unclaimed'],
  skipped: ['unclaimed'],
  failed: ['unclaimed'],
  timed_out: ['unclaimed'],
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to)
}

export function isTerminal(status: JobStatus): status is TerminalStatus {
  return (TERMINAL_STATUSES as readonly JobStatus[]).includes(status)
}

/** Outcome of one attempt, as recorded on the job by finalize. */
export type JobOutcome =
  | { status: 'completed'; result: unknown }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: string }
  | { status: 'timed_out'; error: string }

/** What an outcome writes to the record's result / error columns. */
export function outcomeFields(outcome: JobOutcome): { result: unknown; error: string | null } {
  switch (outcome.status) {
    case 'completed':
      return { result: outcome.result, error: null }
    case 'skipped':
      return { result: { skipped: true, reason: outcome.reason }, error: null }
    case 'failed':
    case 'timed_out':
      return { result: null, error: outcome.error }
  }
}

/** Snapshot of a previous outcome kept by reset({ preserveHistory: true }). */
export interface JobHistoryEntry {
  status: JobStatus
  result: unknown
  error: string | null
  attemptCount: number
  finishedAt: string | null
  resetAt: string
}

export interface JobRecord {
  id: string
  kind: JobKind
  payload: JobPayload
  status: JobStatus
  claimedAt: Date | null
  claimVersion: number
  claimReleased: boolean
  attemptCount: number
  result: unknown
  error: string | null
  lastError: string | null
  history: JobHistoryEntry[]
  createdAt: Date
  updatedAt: Date
  finishedAt: Date | null
}

/** Proof of a successful claim. finalize/release only apply while the record still carries this version. */
export interface ClaimLease {
  jobId: string
  /** Kind of the stored record, checked against the delivered payload. */
  kind: JobKind
  version: number
  claimedAt: Date
  attempt: number
}

export type ClaimResult =
  | { ok: true; lease: ClaimLease }
  | { ok: false; reason: 'active_claim' | 'terminal' | 'not_found' }

export type ResetResult =
  | { ok: true; record: JobRecord }
  | { ok: false; reason: 'not_found' | 'active_claim' }

export interface ResetOptions {
  /** Append the outcome being cleared to the record's history. */
  preserveHistory?: boolean
  /** Claims younger than this are active and cannot be reset. */
  stalenessSeconds: number
}

/** Shape returned by the job status endpoint. */
export function toJobView(job: JobRecord) {
  return {
    id: job.id,
    kind: job.kind,
    status: job.status,
    attemptCount: job.attemptCount,
    claimedAt: job.claimedAt?.toISOString() ?? null,
    result: job.result ?? null,
    error: job.error,
    lastError: job.lastError,
    history: job.history,
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
    finishedAt: job.finishedAt?.toISOString() ?? null,
  }
}

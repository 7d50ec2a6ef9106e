import type {
  ClaimLease,
  ClaimResult,
  JobOutcome,
  JobRecord,
  ResetOptions,
  ResetResult,
} from '../models/Job'
import type { JobPayload } from '../models/JobPayload'

/**
 * Persistent job records. Every mutation is one atomic conditional write; callers never get a
 * read-modify-write pair.
 */
export interface JobStore {
  create(payload: JobPayload): Promise<JobRecord>
  get(jobId: string): Promise<JobRecord | null>
  /**
   * unclaimed -> claimed, or claimed -> claimed when the current claim is older than stalenessSeconds
   * or was released by its holder. At most one concurrent caller gets ok: true.
   */
  claim(jobId: string, stalenessSeconds: number): Promise<ClaimResult>
  /** claimed -> terminal, only while the record still carries the lease's version. false when refused. */
  finalize(lease: ClaimLease, outcome: JobOutcome): Promise<boolean>
  /** Give the claim up after a retryable failure; status stays claimed until the next claim. */
  release(lease: ClaimLease, error: string): Promise<boolean>
  /** Operator action: back to unclaimed, clearing attempt state. */
  reset(jobId: string, options: ResetOptions): Promise<ResetResult>
}

/** Read-only: jobs that need a (new) claim attempt. Never mutates. */
export interface StuckJobScanner {
  /** Stale claims plus never-claimed jobs, oldest first. */
  findReclaimable(limit: number, stalenessSeconds: number): Promise<string[]>
}

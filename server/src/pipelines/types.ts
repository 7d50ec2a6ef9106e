import type { Logger } from '../lib/logger'
import type { JobOutcome } from '../models/Job'
import type { JobKind, JobPayload, PayloadOf } from '../models/JobPayload'

export interface PipelineContext {
  /** Aborted when the in-process deadline fires or the worker is force-stopped. */
  signal: AbortSignal
  log: Logger
  /** attemptCount of the claim this run belongs to. */
  attempt: number
  deliveryCount: number
}

/** Successful ends of a run. Failures are thrown; see PermanentJobError and JobTimeoutError. */
export type PipelineOutcome = Extract<JobOutcome, { status: 'completed' | 'skipped' }>

/**
 * The actual work for one job. May run for minutes and may be invoked more than once for the same job
 * (at-least-once execution); it must not touch the job record itself.
 */
export type ProcessingPipeline = (
  jobId: string,
  payload: JobPayload,
  context: PipelineContext
) => Promise<PipelineOutcome>

export type KindHandler<K extends JobKind> = (
  jobId: string,
  payload: PayloadOf<K>,
  context: PipelineContext
) => Promise<PipelineOutcome>

export type KindHandlers = { [K in JobKind]: KindHandler<K> }

/** One pipeline per job kind behind a single ProcessingPipeline. */
export function routeByKind(handlers: KindHandlers): ProcessingPipeline {
  return (jobId, payload, context) => {
    switch (payload.kind) {
      case 'transcription':
        return handlers.transcription(jobId, payload, context)
      case 'screenshots':
        return handlers.screenshots(jobId, payload, context)
    }
  }
}

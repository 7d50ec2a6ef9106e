/**
 * Worker configuration. Read from the environment once at startup and passed, frozen, into
 * WorkerLoop / ReclaimSweeper constructors; nothing reads process.env after that.
 */
import { z } from 'zod'
import { ConfigError } from '../lib/errors'

const seconds = (fallback: number) => z.coerce.number().int().positive().default(fallback)
const count = (fallback: number) => z.coerce.number().int().min(1).default(fallback)

const workerConfigSchema = z
  .object({
    WORKER_BATCH_SIZE: count(10),
    WORKER_VT_SECONDS: seconds(1800),
    WORKER_MAX_RETRIES: count(5),
    WORKER_IDLE_SLEEP_SECONDS: seconds(5),
    WORKER_MAX_IDLE_SLEEP_SECONDS: seconds(60),
    WORKER_STALENESS_THRESHOLD_SECONDS: seconds(2400),
    // 0 disables the in-process deadline; the visibility timeout still catches hung workers
    WORKER_PROCESSING_TIMEOUT_SECONDS: z.coerce.number().int().min(0).default(0),
    WORKER_STARTUP_DELAY_SECONDS: z.coerce.number().int().min(0).default(5),
    SWEEP_INTERVAL_SECONDS: z.coerce.number().int().min(0).default(300),
    SWEEP_BATCH_SIZE: count(5),
    QUEUE_NAME: z
      .string()
      .regex(/^[a-z_][a-z0-9_]*$/, 'must be a lowercase identifier')
      .default('media_jobs'),
  })
  .refine((c) => c.WORKER_STALENESS_THRESHOLD_SECONDS > c.WORKER_VT_SECONDS, {
    message: 'WORKER_STALENESS_THRESHOLD_SECONDS must exceed WORKER_VT_SECONDS',
    path: ['WORKER_STALENESS_THRESHOLD_SECONDS'],
  })
  .refine((c) => c.WORKER_MAX_IDLE_SLEEP_SECONDS >= c.WORKER_IDLE_SLEEP_SECONDS, {
    message: 'WORKER_MAX_IDLE_SLEEP_SECONDS must be >= WORKER_IDLE_SLEEP_SECONDS',
    path: ['WORKER_MAX_IDLE_SLEEP_SECONDS'],
  })

export interface WorkerConfig {
  readonly batchSize: number
  readonly visibilitySeconds: number
  readonly maxRetries: number
  readonly idleSleepSeconds: number
  readonly maxIdleSleepSeconds: number
  readonly stalenessThresholdSeconds: number
  readonly processingTimeoutSeconds: number
  readonly startupDelaySeconds: number
  readonly sweepIntervalSeconds: number
  readonly sweepBatchSize: number
  readonly queueName: string
}

type EnvSource = Record<string, string | undefined>

/** Blank env values count as unset so defaults apply. */
function nonBlank(env: EnvSource): EnvSource {
  const out: EnvSource = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim().length > 0) out[key] = value.trim()
  }
  return out
}

export function loadWorkerConfig(env: EnvSource = process.env): WorkerConfig {
  const parsed = workerConfigSchema.safeParse(nonBlank(env))
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    )
  }
  const c = parsed.data
  return Object.freeze({
    batchSize: c.WORKER_BATCH_SIZE,
    visibilitySeconds: c.WORKER_VT_SECONDS,
    maxRetries: c.WORKER_MAX_RETRIES,
    idleSleepSeconds: c.WORKER_IDLE_SLEEP_SECONDS,
    maxIdleSleepSeconds: c.WORKER_MAX_IDLE_SLEEP_SECONDS,
    stalenessThresholdSeconds: c.WORKER_STALENESS_THRESHOLD_SECONDS,
    processingTimeoutSeconds: c.WORKER_PROCESSING_TIMEOUT_SECONDS,
    startupDelaySeconds: c.WORKER_STARTUP_DELAY_SECONDS,
    sweepIntervalSeconds: c.SWEEP_INTERVAL_SECONDS,
    sweepBatchSize: c.SWEEP_BATCH_SIZE,
    queueName: c.QUEUE_NAME,
  })
}

/** Test/dev helper: defaults with selected overrides, still validated. */
export function buildWorkerConfig(overrides: Partial<WorkerConfig> = {}): WorkerConfig {
  const base = loadWorkerConfig({})
  const merged = { ...base, ...overrides }
  if (merged.stalenessThresholdSeconds <= merged.visibilitySeconds) {
    throw new ConfigError(['stalenessThresholdSeconds must exceed visibilitySeconds'])
  }
  return Object.freeze(merged)
}

/**
 * Chooses the concrete queue, store and pipeline from the environment. JOB_BACKEND=postgres (default) runs on
 * PGMQ and job_records; JOB_BACKEND=memory keeps everything in this process, for local runs without Postgres.
 */
import { z } from 'zod'
import { closePool, createSqlExecutor } from '../db'
import { ConfigError } from '../lib/errors'
import { getLogger, type Logger } from '../lib/logger'
import { createHttpPipeline } from '../pipelines/httpPipeline'
import { createSimulatedPipeline } from '../pipelines/simulatedPipeline'
import type { ProcessingPipeline } from '../pipelines/types'
import { MemoryQueueGateway } from '../queue/memoryQueue'
import { PgmqQueueGateway } from '../queue/pgmqQueue'
import type { QueueGateway } from '../queue/types'
import { MemoryJobStore } from '../store/memoryJobStore'
import { PgJobStore } from '../store/pgJobStore'
import type { JobStore, StuckJobScanner } from '../store/types'
import { createRedisClient } from '../utils/redis'
import type { WorkerConfig } from '../utils/workerConfig'
import { RedisHeartbeat, type WorkerHeartbeat } from '../utils/workerHeartbeat'

type EnvSource = Record<string, string | undefined>

const backendKindSchema = z.enum(['postgres', 'memory'])
export type JobBackendKind = z.infer<typeof backendKindSchema>

export interface JobBackend {
  kind: JobBackendKind
  queue: QueueGateway
  store: JobStore
  scanner: StuckJobScanner
  pingDatabase(): Promise<void>
  close(): Promise<void>
}

export function resolveBackendKind(env: EnvSource = process.env): JobBackendKind {
  const raw = env.JOB_BACKEND?.trim() || 'postgres'
  const parsed = backendKindSchema.safeParse(raw.toLowerCase())
  if (!parsed.success) {
    throw new ConfigError([`JOB_BACKEND: expected postgres or memory, got "${raw}"`])
  }
  return parsed.data
}

export function createBackend(kind: JobBackendKind, config: WorkerConfig, logger?: Logger): JobBackend {
  if (kind === 'memory') {
    const store = new MemoryJobStore({ logger })
    return {
      kind,
      queue: new MemoryQueueGateway(config.queueName),
      store,
      scanner: store,
      pingDatabase: async () => undefined,
      close: async () => undefined,
    }
  }
  const db = createSqlExecutor()
  const store = new PgJobStore(db, logger)
  return {
    kind,
    queue: new PgmqQueueGateway(db, config.queueName),
    store,
    scanner: store,
    async pingDatabase() {
      await db.query('SELECT 1')
    },
    close: closePool,
  }
}

/** PIPELINE_URL wins; without it only the memory backend may fall back to the simulated pipeline. */
export function createPipeline(kind: JobBackendKind, env: EnvSource = process.env): ProcessingPipeline {
  const url = env.PIPELINE_URL?.trim()
  if (url) {
    try {
      return createHttpPipeline({ baseUrl: url, token: env.PIPELINE_TOKEN?.trim() || undefined })
    } catch (err) {
      throw new ConfigError([`PIPELINE_URL: ${err instanceof Error ? err.message : String(err)}`])
    }
  }
  if (kind === 'memory') {
    getLogger('worker').warn('PIPELINE_URL not set; using the simulated pipeline')
    return createSimulatedPipeline()
  }
  throw new ConfigError(['PIPELINE_URL: required when JOB_BACKEND=postgres'])
}

export interface HeartbeatHandle {
  heartbeat: WorkerHeartbeat
  close(): Promise<void>
}

/** Heartbeat in Redis when REDIS_URL is set; none otherwise. */
export function createHeartbeat(env: EnvSource = process.env): HeartbeatHandle | undefined {
  const url = env.REDIS_URL?.trim()
  if (!url) return undefined
  const client = createRedisClient(url)
  return {
    heartbeat: new RedisHeartbeat(client),
    async close() {
      await client.quit()
    },
  }
}

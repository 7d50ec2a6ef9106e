import '../env'
import { captureJobError, flushSentry, initSentry } from '../lib/sentry'
import { describeError, getLogger } from '../lib/logger'
import type { ProcessingPipeline } from '../pipelines/types'
import { createBackend, createHeartbeat, createPipeline, resolveBackendKind, type JobBackend } from '../services/backend'
import { loadWorkerConfig, type WorkerConfig } from '../utils/workerConfig'
import type { WorkerHeartbeat } from '../utils/workerHeartbeat'
import { ReclaimSweeper } from './reclaimSweeper'
import { WorkerLoop } from './workerLoop'

const log = getLogger('worker')

export interface WorkerDeps {
  backend: JobBackend
  config: WorkerConfig
  pipeline: ProcessingPipeline
  heartbeat?: WorkerHeartbeat
}

export interface RunningWorker {
  loop: WorkerLoop
  sweeper: ReclaimSweeper
  stop(timeoutMs?: number): Promise<void>
}

/** Start the polling loop and the reclaim sweeper on one backend. The API process calls this too unless DISABLE_WORKER=true. */
export function startWorker(deps: WorkerDeps): RunningWorker {
  const { backend, config } = deps
  const loop = new WorkerLoop({
    queue: backend.queue,
    store: backend.store,
    pipeline: deps.pipeline,
    config,
    heartbeat: deps.heartbeat,
    onJobError: (report) => captureJobError(report.jobId, report.messageId, report.kind, report.error),
  })
  const sweeper = new ReclaimSweeper({
    scanner: backend.scanner,
    store: backend.store,
    queue: backend.queue,
    config,
  })
  loop.start()
  sweeper.start()
  return {
    loop,
    sweeper,
    async stop(timeoutMs) {
      await sweeper.stop()
      await loop.stop(timeoutMs)
    },
  }
}

async function main(): Promise<void> {
  initSentry()
  const config = loadWorkerConfig()
  const kind = resolveBackendKind()
  if (kind === 'memory') {
    log.warn('JOB_BACKEND=memory in a standalone worker: it only sees jobs enqueued by this process')
  }
  const backend = createBackend(kind, config, log)
  const pipeline = createPipeline(kind)
  const heartbeat = createHeartbeat()
  const worker = startWorker({ backend, config, pipeline, heartbeat: heartbeat?.heartbeat })
  log.info({ backend: kind, queue: config.queueName }, 'Worker process started')

  let stopping = false
  const shutdown = async (signal: string) => {
    if (stopping) return
    stopping = true
    log.info({ signal }, 'Shutting down worker')
    try {
      await worker.stop()
      await heartbeat?.close()
      await backend.close()
      await flushSentry()
    } catch (err) {
      log.error({ err: describeError(err) }, 'Error during worker shutdown')
      process.exitCode = 1
    }
    process.exit()
  }
  process.on('SIGTERM', () => void shutdown('SIGTERM'))
  process.on('SIGINT', () => void shutdown('SIGINT'))
}

// When run as main (worker container): node dist/server/src/workers/jobProcessor.js
if (require.main === module) {
  main().catch((err: unknown) => {
    log.fatal({ err: describeError(err) }, 'Worker failed to start')
    process.exit(1)
  })
}

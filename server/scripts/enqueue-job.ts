/**
 * Submit one job from the command line, the same way POST /api/jobs does.
 * Run: npm run enqueue -- '{"kind":"transcription","documentId":"doc-1","mediaUrl":"https://media.example.com/a.mp3"}'
 */
import '../src/env'
import { describeError, getLogger } from '../src/lib/logger'
import { createBackend, resolveBackendKind } from '../src/services/backend'
import { createJobService } from '../src/services/jobs'
import { loadWorkerConfig } from '../src/utils/workerConfig'

const log = getLogger('api')

async function main(): Promise<void> {
  const raw = process.argv[2]
  if (!raw) {
    log.error('Usage: enqueue-job <job JSON>')
    process.exitCode = 1
    return
  }
  let input: unknown
  try {
    input = JSON.parse(raw)
  } catch {
    log.error('Job argument is not valid JSON')
    process.exitCode = 1
    return
  }

  const config = loadWorkerConfig()
  const backend = createBackend(resolveBackendKind(), config)
  try {
    const service = createJobService({
      store: backend.store,
      queue: backend.queue,
      stalenessThresholdSeconds: config.stalenessThresholdSeconds,
    })
    const result = await service.submitJob(input)
    if (!result.ok) {
      log.error({ issues: result.issues }, 'Invalid job payload')
      process.exitCode = 1
      return
    }
    log.info({ jobId: result.job.id, messageId: result.messageId }, 'Job enqueued')
  } finally {
    await backend.close()
  }
}

main().catch((err: unknown) => {
  log.fatal({ err: describeError(err) }, 'Enqueue failed')
  process.exitCode = 1
})

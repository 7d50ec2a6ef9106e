import { sleep } from '../utils/sleep'
import { routeByKind, type ProcessingPipeline } from './types'

/**
 * Local stand-in for the media service when JOB_BACKEND=memory and no PIPELINE_URL is configured:
 * waits a little, then returns plausible counts. Honors the abort signal.
 */
export function createSimulatedPipeline(stepMs = 1000): ProcessingPipeline {
  async function wait(signal: AbortSignal): Promise<void> {
    if (!(await sleep(stepMs, signal))) {
      throw signal.reason instanceof Error ? signal.reason : new Error('Simulated run aborted')
    }
  }

  return routeByKind({
    transcription: async (_jobId, payload, context) => {
      await wait(context.signal)
      return {
        status: 'completed',
        result: { documentId: payload.documentId, language: payload.language ?? 'en', segmentCount: 3, wordCount: 42 },
      }
    },
    screenshots: async (_jobId, payload, context) => {
      await wait(context.signal)
      return {
        status: 'completed',
        result: { transcriptionId: payload.transcriptionId, count: payload.timestamps.length, failedTimestamps: [] },
      }
    },
  })
}

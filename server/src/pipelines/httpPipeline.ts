/**
 * Delegates processing to the media service over HTTP: POST {baseUrl}/{kind} with the job payload.
 * 2xx answers carry the outcome; 4xx (other than 408/429) means the job can never succeed.
 */
import { z } from 'zod'
import { PermanentJobError, PipelineHttpError } from '../lib/errors'
import type { KindHandler, ProcessingPipeline } from './types'
import { routeByKind } from './types'
import type { JobKind } from '../models/JobPayload'

const outcomeSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('completed'), result: z.unknown() }),
  z.object({ status: z.literal('skipped'), reason: z.string().min(1) }),
])

const RETRYABLE_CLIENT_STATUSES = new Set([408, 425, 429])

export interface HttpPipelineOptions {
  baseUrl: string
  token?: string
  fetchImpl?: typeof fetch
}

function isPermanentStatus(status: number): boolean {
  return status >= 400 && status < 500 && !RETRYABLE_CLIENT_STATUSES.has(status)
}

export function createHttpPipeline(options: HttpPipelineOptions): ProcessingPipeline {
  const baseUrl = options.baseUrl.trim().replace(/\/+$/, '')
  if (!baseUrl.startsWith('https://') && !baseUrl.startsWith('http://')) {
    throw new Error(`PIPELINE_URL must be an http(s) URL, got "${options.baseUrl}"`)
  }
  const doFetch = options.fetchImpl ?? fetch

  function handler<K extends JobKind>(kind: K): KindHandler<K> {
    return async (jobId, payload, context) => {
      const headers: Record<string, string> = { 'Content-Type': 'application/json' }
      if (options.token) headers.Authorization = `Bearer ${options.token}`

      const res = await doFetch(`${baseUrl}/${kind}`, {
        method: 'POST',
        headers,
        body: JSON.stringify({ jobId, attempt: context.attempt, payload }),
        signal: context.signal,
      })
      const text = await res.text()
      if (!res.ok) {
        const httpError = new PipelineHttpError(res.status, text)
        if (isPermanentStatus(res.status)) {
          throw new PermanentJobError(httpError.message, { cause: httpError })
        }
        throw httpError
      }

      let body: unknown
      try {
        body = JSON.parse(text)
      } catch {
        throw new Error(`Pipeline endpoint returned non-JSON body for job ${jobId}`)
      }
      const parsed = outcomeSchema.safeParse(body)
      if (!parsed.success) {
        throw new Error(`Pipeline endpoint returned an unexpected body for job ${jobId}`)
      }
      context.log.debug({ kind, status: parsed.data.status }, 'Pipeline endpoint answered')
      return parsed.data
    }
  }

  return routeByKind({
    transcription: handler('transcription'),
    screenshots: handler('screenshots'),
  })
}

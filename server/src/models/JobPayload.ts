/**
 * Queue message payloads, one variant per job kind. Validated at the boundary (dequeue and job submission)
 * so pipelines only ever see a well-formed payload.
 */
import { z } from 'zod'

const transcriptionPayload = z.object({
  kind: z.literal('transcription'),
  jobId: z.string().min(1),
  documentId: z.string().min(1),
  mediaUrl: z.string().url(),
  language: z.string().min(2).max(5).optional(),
})

const screenshotsPayload = z.object({
  kind: z.literal('screenshots'),
  jobId: z.string().min(1),
  transcriptionId: z.string().min(1),
  videoUrl: z.string().url(),
  timestamps: z.array(z.number().nonnegative()).min(1).max(200),
})

export const jobPayloadSchema = z.discriminatedUnion('kind', [transcriptionPayload, screenshotsPayload])

export type JobPayload = z.infer<typeof jobPayloadSchema>
export type JobKind = JobPayload['kind']
export type PayloadOf<K extends JobKind> = Extract<JobPayload, { kind: K }>

/** Submission body: everything but the id, which the service assigns. */
export const jobPayloadInputSchema = z.discriminatedUnion('kind', [
  transcriptionPayload.omit({ jobId: true }),
  screenshotsPayload.omit({ jobId: true }),
])

export type JobPayloadInput = z.infer<typeof jobPayloadInputSchema>

export type PayloadParseResult =
  | { ok: true; payload: JobPayload }
  | { ok: false; jobId: string | null; reason: string }

/** Best-effort job reference from a payload that may not pass validation. */
export function resolveJobId(raw: unknown): string | null {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) return null
  const jobId: unknown = Reflect.get(raw, 'jobId')
  return typeof jobId === 'string' && jobId.trim().length > 0 ? jobId.trim() : null
}

export function parseJobPayload(raw: unknown): PayloadParseResult {
  let value = raw
  if (typeof value === 'string') {
    try {
      value = JSON.parse(value)
    } catch {
      return { ok: false, jobId: null, reason: 'payload is not valid JSON' }
    }
  }
  const jobId = resolveJobId(value)
  if (!jobId) {
    return { ok: false, jobId: null, reason: 'payload has no jobId' }
  }
  const parsed = jobPayloadSchema.safeParse(value)
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'payload'}: ${issue.message}`)
      .join('; ')
    return { ok: false, jobId, reason }
  }
  return { ok: true, payload: parsed.data }
}

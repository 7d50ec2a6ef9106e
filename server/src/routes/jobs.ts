import express, { type Request, type Response, type RequestHandler } from 'express'
import { z } from 'zod'
import { describeError, withRequestId } from '../lib/logger'
import { toJobView } from '../models/Job'
import type { JobService } from '../services/jobs'

const NO_STORE = {
  'Cache-Control': 'no-store, no-cache, must-revalidate, proxy-revalidate',
  Pragma: 'no-cache',
  Expires: '0',
}

const resetBodySchema = z.object({ preserveHistory: z.boolean().optional() }).strict()

export function createJobsRouter(service: JobService, requireApiKey: RequestHandler) {
  const router = express.Router()

  /** POST /api/jobs: validate, create the record and enqueue it. 202: processing happens in the worker. */
  router.post('/', async (req: Request, res: Response) => {
    const log = withRequestId(req.requestId)
    try {
      const result = await service.submitJob(req.body)
      if (!result.ok) {
        return res.status(400).json({ message: 'Invalid job payload', issues: result.issues })
      }
      return res.status(202).json({ job: toJobView(result.job), messageId: result.messageId })
    } catch (err) {
      log.error({ err: describeError(err) }, 'Job submission failed')
      return res.status(500).json({ message: 'Failed to submit job' })
    }
  })

  router.get('/:jobId', async (req: Request, res: Response) => {
    const log = withRequestId(req.requestId)
    res.set(NO_STORE)
    try {
      const job = await service.getJob(req.params.jobId)
      if (!job) return res.status(404).json({ message: 'Job not found' })
      return res.json(toJobView(job))
    } catch (err) {
      log.error({ err: describeError(err), jobId: req.params.jobId }, 'Job status error')
      return res.status(500).json({ message: 'Failed to get job status' })
    }
  })

  /** POST /api/jobs/:jobId/reset: operator action; body { preserveHistory?: boolean }. */
  router.post('/:jobId/reset', requireApiKey, async (req: Request, res: Response) => {
    const log = withRequestId(req.requestId)
    const body = resetBodySchema.safeParse(req.body ?? {})
    if (!body.success) {
      return res.status(400).json({ message: 'Invalid reset options', issues: body.error.issues.map((i) => i.message) })
    }
    try {
      const result = await service.resetJob(req.params.jobId, body.data)
      if (!result.ok) {
        return result.reason === 'not_found'
          ? res.status(404).json({ message: 'Job not found' })
          : res.status(409).json({ message: 'Job is being processed; retry after the claim goes stale' })
      }
      log.info({ jobId: result.job.id, operator: req.apiKeyUser?.name }, 'Job reset by operator')
      return res.json({ job: toJobView(result.job), messageId: result.messageId })
    } catch (err) {
      log.error({ err: describeError(err), jobId: req.params.jobId }, 'Job reset error')
      return res.status(500).json({ message: 'Failed to reset job' })
    }
  })

  return router
}

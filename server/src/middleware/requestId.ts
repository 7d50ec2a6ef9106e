/**
 * Request ID middleware: read x-request-id from the edge proxy or generate a UUID.
 * Echoed back in the response header so an API call can be matched to the worker logs of the job it created.
 */
import type { Request, Response, NextFunction } from 'express'
import { v4 as uuidv4 } from 'uuid'

export const REQUEST_ID_HEADER = 'x-request-id'

declare global {
  namespace Express {
    interface Request {
      requestId?: string
    }
  }
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers[REQUEST_ID_HEADER]
  const id = typeof incoming === 'string' && incoming.trim() ? incoming.trim().slice(0, 128) : uuidv4()
  req.requestId = id
  res.setHeader(REQUEST_ID_HEADER, id)
  next()
}

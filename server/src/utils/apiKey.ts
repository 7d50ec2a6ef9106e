import type { Request, Response, NextFunction, RequestHandler } from 'express'

/** Operator identity set by requireApiKey once the presented key matched. */
export interface ApiKeyUser {
  name: string
}

declare global {
  namespace Express {
    interface Request {
      apiKeyUser?: ApiKeyUser
    }
  }
}

/**
 * Key -> operator name. Format: API_KEYS=key1:alice,key2:ops-bot
 * Or single key: API_KEY=secret (operator "api-user")
 */
export function loadApiKeys(env: Record<string, string | undefined> = process.env): Map<string, string> {
  const keys = new Map<string, string>()
  const single = env.API_KEY?.trim()
  if (single) keys.set(single, 'api-user')
  const pairs = env.API_KEYS
  if (pairs) {
    for (const pair of pairs.split(',')) {
      const [key, name] = pair.trim().split(':')
      if (key?.trim() && name?.trim()) keys.set(key.trim(), name.trim())
    }
  }
  return keys
}

/** Authorization: Bearer <key> or X-Api-Key: <key>. */
export function readApiKey(req: Request): string | undefined {
  const header = req.headers['x-api-key']
  const direct = typeof header === 'string' ? header.trim() : undefined
  if (direct) return direct
  const auth = req.headers.authorization
  return auth?.startsWith('Bearer ') ? auth.slice(7).trim() || undefined : undefined
}

/** Middleware: 401 unless a configured key is presented. With no keys configured every request is refused. */
export function requireApiKey(keys: ReadonlyMap<string, string>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const key = readApiKey(req)
    const name = key ? keys.get(key) : undefined
    if (!name) {
      res.status(401).json({ message: 'A valid API key is required for this endpoint.' })
      return
    }
    req.apiKeyUser = { name }
    next()
  }
}

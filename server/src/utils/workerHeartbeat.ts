/** Shared key and TTL for the worker heartbeat in Redis (written by the worker, read by GET /ops/worker). */
export const WORKER_HEARTBEAT_KEY = 'media-jobs:worker:heartbeat'
export const HEARTBEAT_TTL_SEC = 120

/** The two Redis commands the heartbeat uses; an ioredis client satisfies it. */
export interface HeartbeatClient {
  set(key: string, value: string, secondsToken: 'EX', seconds: number): Promise<unknown>
  get(key: string): Promise<string | null>
}

export interface WorkerHeartbeat {
  beat(): Promise<void>
  /** Milliseconds since the last beat, or null when none is recorded (expired or never written). */
  lastBeatAgeMs(): Promise<number | null>
}

export class RedisHeartbeat implements WorkerHeartbeat {
  constructor(
    private readonly client: HeartbeatClient,
    private readonly key: string = WORKER_HEARTBEAT_KEY,
    private readonly now: () => number = Date.now
  ) {}

  async beat(): Promise<void> {
    await this.client.set(this.key, String(this.now()), 'EX', HEARTBEAT_TTL_SEC)
  }

  async lastBeatAgeMs(): Promise<number | null> {
    const raw = await this.client.get(this.key)
    if (!raw) return null
    const t = parseInt(raw, 10)
    return Number.isNaN(t) ? null : Math.max(0, this.now() - t)
  }
}

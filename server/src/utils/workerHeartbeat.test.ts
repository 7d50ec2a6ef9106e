import { describe, it, expect } from 'vitest'
import { HEARTBEAT_TTL_SEC, RedisHeartbeat, WORKER_HEARTBEAT_KEY, type HeartbeatClient } from './workerHeartbeat'

class FakeRedis implements HeartbeatClient {
  values = new Map<string, string>()
  setCalls: Array<[string, string, 'EX', number]> = []

  async set(key: string, value: string, secondsToken: 'EX', seconds: number): Promise<unknown> {
    this.setCalls.push([key, value, secondsToken, seconds])
    this.values.set(key, value)
    return 'OK'
  }

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null
  }
}

describe('RedisHeartbeat', () => {
  it('writes the current time with a TTL and reports its age', async () => {
    const redis = new FakeRedis()
    let now = 1_000_000
    const heartbeat = new RedisHeartbeat(redis, WORKER_HEARTBEAT_KEY, () => now)

    await heartbeat.beat()
    expect(redis.setCalls).toEqual([[WORKER_HEARTBEAT_KEY, '1000000', 'EX', HEARTBEAT_TTL_SEC]])

    now += 2500
    expect(await heartbeat.lastBeatAgeMs()).toBe(2500)
  })

  it('returns null when no heartbeat is stored or it is garbage', async () => {
    const redis = new FakeRedis()
    const heartbeat = new RedisHeartbeat(redis)
    expect(await heartbeat.lastBeatAgeMs()).toBeNull()
    redis.values.set(WORKER_HEARTBEAT_KEY, 'soon')
    expect(await heartbeat.lastBeatAgeMs()).toBeNull()
  })
})

import { describe, it, expect, vi, afterEach } from 'vitest'
import { sleep } from './sleep'

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('resolves true after the delay', async () => {
    vi.useFakeTimers()
    const done = sleep(5000)
    await vi.advanceTimersByTimeAsync(5000)
    await expect(done).resolves.toBe(true)
  })

  it('resolves false as soon as the signal aborts', async () => {
    vi.useFakeTimers()
    const controller = new AbortController()
    const done = sleep(60_000, controller.signal)
    await vi.advanceTimersByTimeAsync(1000)
    controller.abort()
    await expect(done).resolves.toBe(false)
    expect(vi.getTimerCount()).toBe(0)
  })

  it('does not wait at all on an aborted signal', async () => {
    const controller = new AbortController()
    controller.abort()
    await expect(sleep(60_000, controller.signal)).resolves.toBe(false)
  })
})

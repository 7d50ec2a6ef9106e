/** Source of "now". Memory-backed stores and the sweeper take one so tests can move time by hand. */
export type Clock = () => Date

export const systemClock: Clock = () => new Date()

/** Test clock starting at a fixed instant. */
export function manualClock(start: Date = new Date('2026-01-01T00:00:00.000Z')) {
  let current = start.getTime()
  const clock: Clock = () => new Date(current)
  return {
    clock,
    advance(seconds: number): void {
      current += Math.round(seconds * 1000)
    },
    set(at: Date): void {
      current = at.getTime()
    },
  }
}

/** Raised at startup when an environment value cannot be parsed. Never retried. */
export class ConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid worker configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

/**
 * Thrown by a pipeline when the job can never succeed (unsupported media, missing source).
 * The worker finalizes the job as failed and archives the message without spending the retry budget.
 */
export class PermanentJobError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PermanentJobError'
  }
}

/** A pipeline call ran past its deadline. Retried like any transient failure; terminal status is timed_out. */
export class JobTimeoutError extends Error {
  readonly timeoutMs: number

  constructor(timeoutMs: number) {
    super(`Job exceeded maximum runtime of ${Math.round(timeoutMs / 1000)}s`)
    this.name = 'JobTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

/** Non-2xx answer from the processing endpoint. */
export class PipelineHttpError extends Error {
  readonly status: number

  constructor(status: number, body: string) {
    super(`Pipeline endpoint returned ${status}${body ? `: ${body.slice(0, 200)}` : ''}`)
    this.name = 'PipelineHttpError'
    this.status = status
  }
}

/** Text for any thrown value, including undefined, BigInt and circular objects. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  if (typeof err === 'string') return err
  try {
    return JSON.stringify(err) ?? String(err)
  } catch {
    return String(err)
  }
}

/** Long error strings are cut before they land on a job record. */
export function truncateError(message: string, max = 500): string {
  return message.length > max ? `${message.slice(0, max - 1)}…` : message
}

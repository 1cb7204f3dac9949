import { Debugger } from './debug'

/**
 * Options for polling operations
 */
export interface PollOptions {
  /** Give up after this many milliseconds */
  timeoutMs: number
  /** Delay between attempts in milliseconds (default: 5000) */
  intervalMs?: number
  /** Debug namespace for logging (optional) */
  debugNamespace?: string
}

/**
 * Thrown by pollUntil when the condition never held within the timeout.
 */
export class PollTimeoutError extends Error {
  readonly attempts: number

  constructor (message: string, attempts: number) {
    super(message)
    this.name = 'PollTimeoutError'
    this.attempts = attempts
  }
}

/**
 * Repeatedly calls `fn` until `done` accepts its result.
 *
 * Errors thrown by `fn` are not retried; they propagate immediately.
 *
 * @returns The first result accepted by `done`
 * @throws PollTimeoutError once `timeoutMs` has elapsed
 *
 * @example
 * ```typescript
 * const storage = await pollUntil(
 *   async () => await api.getStorage(uuid),
 *   (s) => s.state === 'online',
 *   { timeoutMs: 300000, intervalMs: 5000 }
 * )
 * ```
 */
export async function pollUntil<T> (
  fn: () => Promise<T>,
  done: (value: T) => boolean,
  options: PollOptions
): Promise<T> {
  const { timeoutMs, intervalMs = 5000, debugNamespace } = options

  const debug = debugNamespace ? new Debugger(debugNamespace) : null
  const deadline = Date.now() + timeoutMs
  let attempt = 0

  for (;;) {
    attempt++
    const value = await fn()
    if (done(value)) {
      if (attempt > 1 && debug) {
        debug.log(`Condition met on attempt ${attempt}`)
      }
      return value
    }

    if (Date.now() + intervalMs >= deadline) {
      if (debug) {
        debug.log('error', `Condition not met after ${attempt} attempts (${timeoutMs}ms)`)
      }
      throw new PollTimeoutError(`Timed out after ${timeoutMs}ms`, attempt)
    }

    if (debug) {
      debug.log(`Attempt ${attempt} not done yet. Polling again in ${intervalMs}ms...`)
    }
    await sleep(intervalMs)
  }
}

/**
 * Sleep utility function
 */
function sleep (ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export { sleep }

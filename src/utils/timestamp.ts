/**
 * Produces `YYYYMMDD-HHmmss` tokens (UTC) for resource titles.
 *
 * A source never hands out the same token twice: a request landing in the
 * same second as the previous one, or on a clock that went backwards, gets
 * the previous base with an increasing `-<n>` suffix.
 */
export class TimestampSource {
  private lastBase = ''
  private counter = 0

  constructor (private readonly now: () => Date = () => new Date()) {}

  next (): string {
    const base = formatTimestamp(this.now())
    if (this.lastBase !== '' && base <= this.lastBase) {
      this.counter++
      return `${this.lastBase}-${this.counter}`
    }
    this.lastBase = base
    this.counter = 0
    return base
  }
}

export function formatTimestamp (date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0')
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
}

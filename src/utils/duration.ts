const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000
}

const SEGMENT = /(\d+(?:\.\d+)?)(ms|h|m|s)/y

/**
 * Parses a duration such as `90s`, `5m`, `1h30m` or `250ms` into milliseconds.
 * @returns null when the string is not a valid duration
 */
export function parseDuration (value: string): number | null {
  const input = value.trim()
  if (input === '') return null
  if (input === '0') return 0

  SEGMENT.lastIndex = 0
  let total = 0
  while (SEGMENT.lastIndex < input.length) {
    const match = SEGMENT.exec(input)
    if (!match) return null
    total += parseFloat(match[1]) * UNIT_MS[match[2]]
  }
  return Math.round(total)
}

export function formatDuration (ms: number): string {
  if (ms % UNIT_MS.h === 0 && ms > 0) return `${ms / UNIT_MS.h}h`
  if (ms % UNIT_MS.m === 0 && ms > 0) return `${ms / UNIT_MS.m}m`
  if (ms % UNIT_MS.s === 0 && ms > 0) return `${ms / UNIT_MS.s}s`
  return `${ms}ms`
}

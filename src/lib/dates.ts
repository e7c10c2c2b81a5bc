const MS_PER_DAY = 24 * 60 * 60 * 1000

export function dateKeyUtc(date: Date): string {
  return date.toISOString().slice(0, 10)
}

export function shiftUtcDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY)
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()))
}

/** Inclusive on both ends; empty when start is after end. */
export function eachUtcDay(start: Date, end: Date): Date[] {
  const days: Date[] = []
  const last = startOfUtcDay(end).getTime()
  for (let cursor = startOfUtcDay(start); cursor.getTime() <= last; cursor = shiftUtcDays(cursor, 1)) {
    days.push(cursor)
  }
  return days
}

/** YYMMDD, as used in MRCI page names. */
export function yymmddUtc(date: Date): string {
  return dateKeyUtc(date).slice(2).replace(/-/g, '')
}

/** Nanosecond epoch string (Databento ts_event) → YYYY-MM-DD in UTC. */
export function dateKeyFromNanos(tsEvent: string): string {
  const seconds = Number(BigInt(tsEvent) / 1_000_000_000n)
  return dateKeyUtc(new Date(seconds * 1000))
}

// src/utils/time.ts
// wall-clock helpers for IANA timezones, built on Intl (no tz database bundled)

export interface LocalTime {
  hour: number
  minute: number
}

interface ZonedParts {
  year: number
  month: number // 1-12
  day: number
  hour: number
  minute: number
  second: number
}

const formatters = new Map<string, Intl.DateTimeFormat>()

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let f = formatters.get(timeZone)
  if (!f) {
    f = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit'
    })
    formatters.set(timeZone, f)
  }
  return f
}

// throws RangeError for unknown zones
export function assertTimeZone(timeZone: string): void {
  formatterFor(timeZone)
}

export function parseLocalTime(raw: string): LocalTime {
  const m = /^(\d{1,2}):(\d{2})$/.exec(raw.trim())
  if (!m) throw new Error(`invalid local time "${raw}", expected HH:MM`)
  const hour = Number(m[1])
  const minute = Number(m[2])
  if (hour > 23 || minute > 59) throw new Error(`invalid local time "${raw}", expected HH:MM`)
  return { hour, minute }
}

export function zonedParts(instant: number, timeZone: string): ZonedParts {
  const out: ZonedParts = { year: 0, month: 0, day: 0, hour: 0, minute: 0, second: 0 }
  for (const p of formatterFor(timeZone).formatToParts(new Date(instant))) {
    if (p.type === 'year') out.year = Number(p.value)
    else if (p.type === 'month') out.month = Number(p.value)
    else if (p.type === 'day') out.day = Number(p.value)
    else if (p.type === 'hour') out.hour = Number(p.value)
    else if (p.type === 'minute') out.minute = Number(p.value)
    else if (p.type === 'second') out.second = Number(p.value)
  }
  return out
}

// offset of the zone from UTC at the given instant, in ms
function offsetAt(instant: number, timeZone: string): number {
  const p = zonedParts(instant, timeZone)
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second)
  return asUtc - Math.floor(instant / 1000) * 1000
}

// UTC instant of a local wall-clock time on a local calendar day
export function localToInstant(
  year: number,
  month: number,
  day: number,
  time: LocalTime,
  timeZone: string
): number {
  const guess = Date.UTC(year, month - 1, day, time.hour, time.minute)
  const first = guess - offsetAt(guess, timeZone)
  // re-evaluate once so instants near a DST switch use the offset in force at that moment
  return guess - offsetAt(first, timeZone)
}

// most recent occurrence of `time` in `timeZone` at or before `now`
export function latestOccurrence(time: LocalTime, timeZone: string, now: number): number {
  const p = zonedParts(now, timeZone)
  const today = localToInstant(p.year, p.month, p.day, time, timeZone)
  if (today <= now) return today
  const y = new Date(Date.UTC(p.year, p.month - 1, p.day - 1))
  return localToInstant(y.getUTCFullYear(), y.getUTCMonth() + 1, y.getUTCDate(), time, timeZone)
}

// first occurrence strictly after `now`
export function nextOccurrence(time: LocalTime, timeZone: string, now: number): number {
  const p = zonedParts(now, timeZone)
  const today = localToInstant(p.year, p.month, p.day, time, timeZone)
  if (today > now) return today
  const t = new Date(Date.UTC(p.year, p.month - 1, p.day + 1))
  return localToInstant(t.getUTCFullYear(), t.getUTCMonth() + 1, t.getUTCDate(), time, timeZone)
}

// UTC calendar day, used as the quota reset boundary
export function utcDayKey(instant: number): string {
  return new Date(instant).toISOString().slice(0, 10)
}

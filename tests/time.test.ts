// tests/time.test.ts
import {
  assertTimeZone,
  latestOccurrence,
  localToInstant,
  nextOccurrence,
  parseLocalTime,
  utcDayKey
} from '../src/utils/time'

describe('parseLocalTime', () => {
  test('reads HH:MM', () => {
    expect(parseLocalTime('08:00')).toEqual({ hour: 8, minute: 0 })
    expect(parseLocalTime(' 23:05 ')).toEqual({ hour: 23, minute: 5 })
  })

  test('rejects out of range and malformed values', () => {
    expect(() => parseLocalTime('24:00')).toThrow('invalid local time')
    expect(() => parseLocalTime('8am')).toThrow('invalid local time')
    expect(() => parseLocalTime('12:60')).toThrow('invalid local time')
  })
})

describe('timezone conversion', () => {
  test('unknown zones are rejected', () => {
    expect(() => assertTimeZone('Not/AZone')).toThrow(RangeError)
  })

  test('Moscow morning slot maps to 05:00 UTC', () => {
    expect(localToInstant(2024, 1, 15, { hour: 8, minute: 0 }, 'Europe/Moscow')).toBe(Date.UTC(2024, 0, 15, 5, 0))
  })

  test('New York follows daylight saving time', () => {
    const eight = { hour: 8, minute: 0 }
    expect(localToInstant(2024, 1, 15, eight, 'America/New_York')).toBe(Date.UTC(2024, 0, 15, 13, 0))
    expect(localToInstant(2024, 7, 1, eight, 'America/New_York')).toBe(Date.UTC(2024, 6, 1, 12, 0))
  })
})

describe('occurrences', () => {
  const eight = { hour: 8, minute: 0 }

  test('latest occurrence is today once the slot has passed', () => {
    expect(latestOccurrence(eight, 'Europe/Moscow', Date.UTC(2024, 0, 15, 6, 0))).toBe(Date.UTC(2024, 0, 15, 5, 0))
  })

  test('latest occurrence is yesterday before the slot', () => {
    expect(latestOccurrence(eight, 'Europe/Moscow', Date.UTC(2024, 0, 15, 4, 0))).toBe(Date.UTC(2024, 0, 14, 5, 0))
  })

  test('slot instant itself counts as reached', () => {
    const slot = Date.UTC(2024, 0, 15, 5, 0)
    expect(latestOccurrence(eight, 'Europe/Moscow', slot)).toBe(slot)
  })

  test('spring forward day in New York', () => {
    // 2024-03-10: clocks jump from 02:00 EST to 03:00 EDT
    expect(latestOccurrence(eight, 'America/New_York', Date.UTC(2024, 2, 10, 12, 30))).toBe(Date.UTC(2024, 2, 10, 12, 0))
    expect(latestOccurrence(eight, 'America/New_York', Date.UTC(2024, 2, 10, 11, 0))).toBe(Date.UTC(2024, 2, 9, 13, 0))
  })

  test('next occurrence rolls over the local day boundary', () => {
    // 21:00Z is already 00:00 of the next day in Moscow
    expect(nextOccurrence({ hour: 23, minute: 0 }, 'Europe/Moscow', Date.UTC(2024, 0, 15, 21, 0))).toBe(
      Date.UTC(2024, 0, 16, 20, 0)
    )
    expect(nextOccurrence(eight, 'Europe/Moscow', Date.UTC(2024, 0, 15, 5, 0))).toBe(Date.UTC(2024, 0, 16, 5, 0))
  })

  test('utc day key', () => {
    expect(utcDayKey(Date.UTC(2024, 0, 15, 23, 59))).toBe('2024-01-15')
    expect(utcDayKey(Date.UTC(2024, 0, 16, 0, 0))).toBe('2024-01-16')
  })
})

/**
 * Zoned Clock
 *
 * Resolves civil (wall-clock) date-times against a time zone, handling
 * DST ambiguity and non-existent local times explicitly instead of
 * relying on Luxon's "current offset" guess.
 */

import { DateTime, Info, type Zone } from 'luxon'
import {
  InvalidLocalTimeError,
  InvalidTimeZoneError,
  TimeParseError,
  err,
  ok,
  type Result,
} from '../errors.js'
import type { CivilDateTime, Disambiguation, Instant } from './types.js'

const MINUTE_MS = 60_000
const DAY_MS = 86_400_000

const CIVIL_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})$/

// ─────────────────────────────────────────────────────────────────
// Zones
// ─────────────────────────────────────────────────────────────────

/**
 * Resolve a zone name (IANA, "UTC", or a fixed offset like "UTC+5").
 */
export function resolveZone(zone: string | Zone): Result<Zone, InvalidTimeZoneError> {
  if (typeof zone !== 'string') {
    return zone.isValid ? ok(zone) : err(new InvalidTimeZoneError(zone.name))
  }
  if (zone.trim() === '') {
    return err(new InvalidTimeZoneError(zone))
  }
  const normalized = Info.normalizeZone(zone)
  if (!normalized.isValid) {
    return err(new InvalidTimeZoneError(zone))
  }
  return ok(normalized)
}

// ─────────────────────────────────────────────────────────────────
// Civil date-times
// ─────────────────────────────────────────────────────────────────

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28
  return [4, 6, 9, 11].includes(month) ? 30 : 31
}

export function isValidCivil(civil: CivilDateTime): boolean {
  const { year, month, day, hour, minute, second } = civil
  return (
    Number.isInteger(year) &&
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month) &&
    hour >= 0 &&
    hour <= 23 &&
    minute >= 0 &&
    minute <= 59 &&
    second >= 0 &&
    second <= 59
  )
}

/**
 * Parse `YYYY-MM-DD HH:MM:SS` or `YYYY-MM-DDTHH:MM:SS`.
 */
export function parseCivil(text: string): Result<CivilDateTime, TimeParseError> {
  const match = CIVIL_PATTERN.exec(text)
  if (!match) {
    return err(new TimeParseError(text))
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number)
  const civil: CivilDateTime = { year, month, day, hour, minute, second }
  if (!isValidCivil(civil)) {
    return err(new TimeParseError(text, `'${text}' is not a valid calendar date and time`))
  }
  return ok(civil)
}

export function formatCivil(civil: CivilDateTime): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, '0')
  return (
    `${pad(civil.year, 4)}-${pad(civil.month)}-${pad(civil.day)} ` +
    `${pad(civil.hour)}:${pad(civil.minute)}:${pad(civil.second)}`
  )
}

/** Civil fields of an instant in its own zone */
export function civilOf(instant: Instant): CivilDateTime {
  return {
    year: instant.year,
    month: instant.month,
    day: instant.day,
    hour: instant.hour,
    minute: instant.minute,
    second: instant.second,
  }
}

/** `YYYY-MM-DD` of an instant in its own zone */
export function civilDateOf(instant: Instant): string {
  return instant.toFormat('yyyy-MM-dd')
}

// ─────────────────────────────────────────────────────────────────
// Resolution
// ─────────────────────────────────────────────────────────────────

/**
 * Every absolute instant whose wall clock in `zone` reads `civil`, ascending.
 * Empty for a gap time, two entries for an ambiguous time.
 */
function candidateInstants(civil: CivilDateTime, zone: Zone): number[] {
  const local = DateTime.utc(
    civil.year,
    civil.month,
    civil.day,
    civil.hour,
    civil.minute,
    civil.second,
  ).toMillis()

  const offsets = new Set([zone.offset(local - DAY_MS), zone.offset(local + DAY_MS)])
  const candidates: number[] = []
  for (const offset of offsets) {
    const ts = local - offset * MINUTE_MS
    if (zone.offset(ts) === offset) {
      candidates.push(ts)
    }
  }
  return candidates.sort((a, b) => a - b)
}

/**
 * Resolve a civil date-time in a zone to an absolute instant.
 */
export function resolve(
  civil: string | CivilDateTime,
  zone: string | Zone,
  disambiguation: Disambiguation = 'earliest',
): Result<Instant> {
  const zoneResult = resolveZone(zone)
  if (!zoneResult.ok) return zoneResult
  const tz = zoneResult.value

  let fields: CivilDateTime
  if (typeof civil === 'string') {
    const parsed = parseCivil(civil)
    if (!parsed.ok) return parsed
    fields = parsed.value
  } else {
    if (!isValidCivil(civil)) {
      const text = formatCivil(civil)
      return err(new TimeParseError(text, `'${text}' is not a valid calendar date and time`))
    }
    fields = civil
  }

  const candidates = candidateInstants(fields, tz)

  if (candidates.length === 0) {
    if (disambiguation !== 'compatible') {
      return err(new InvalidLocalTimeError(formatCivil(fields), tz.name))
    }
    // Shift forward: interpret with the offset in effect before the transition
    const local = DateTime.utc(
      fields.year,
      fields.month,
      fields.day,
      fields.hour,
      fields.minute,
      fields.second,
    ).toMillis()
    const offsetBefore = tz.offset(local - DAY_MS)
    return ok(DateTime.fromMillis(local - offsetBefore * MINUTE_MS, { zone: tz }))
  }

  const ts = disambiguation === 'latest' ? candidates[candidates.length - 1] : candidates[0]
  return ok(DateTime.fromMillis(ts, { zone: tz }))
}

// ─────────────────────────────────────────────────────────────────
// Day bounds & conversions
// ─────────────────────────────────────────────────────────────────

/** 00:00:00 of the instant's civil day, earliest disambiguation */
export function startOfCivilDay(instant: Instant): Result<Instant> {
  return resolve({ ...civilOf(instant), hour: 0, minute: 0, second: 0 }, instant.zone, 'earliest')
}

/** 23:59:59 of the instant's civil day, latest disambiguation */
export function endOfCivilDay(instant: Instant): Result<Instant> {
  return resolve({ ...civilOf(instant), hour: 23, minute: 59, second: 59 }, instant.zone, 'latest')
}

export function convertZone(instant: Instant, zone: string | Zone): Result<Instant> {
  const zoneResult = resolveZone(zone)
  if (!zoneResult.ok) return zoneResult
  return ok(instant.setZone(zoneResult.value))
}

export function isDst(instant: Instant): boolean {
  return instant.isInDST
}

export function isSameInstant(a: Instant, b: Instant): boolean {
  return a.toMillis() === b.toMillis()
}

export function compareInstants(a: Instant, b: Instant): number {
  return a.toMillis() - b.toMillis()
}

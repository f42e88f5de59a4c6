/**
 * Recurrence Engine
 *
 * Generates a bounded, strictly increasing sequence of occurrence instants
 * from a rule and an anchor. Occurrence k is derived from the anchor's civil
 * fields (never from occurrence k-1), so a DST shift on one occurrence does
 * not drift into the following ones.
 */

import { DateTime } from 'luxon'
import { RecurrenceError, err, ok, type Result } from '../errors.js'
import { civilOf, daysInMonth, resolve } from '../time/clock.js'
import type { CivilDateTime, Instant } from '../time/types.js'
import { validateRule } from './rule.js'
import type { Frequency, RecurrenceRule } from './types.js'

/**
 * Civil date-time `steps` frequency units after `base`, keeping the time of day.
 * Returns undefined when the target month has no such day (day 31 in a
 * 30-day month, Feb 29 in a common year).
 */
export function stepCivil(
  base: CivilDateTime,
  frequency: Frequency,
  steps: number,
): CivilDateTime | undefined {
  switch (frequency) {
    case 'daily':
    case 'weekly': {
      const days = frequency === 'weekly' ? steps * 7 : steps
      const date = DateTime.utc(base.year, base.month, base.day).plus({ days })
      return { ...base, year: date.year, month: date.month, day: date.day }
    }
    case 'monthly': {
      const monthIndex = base.month - 1 + steps
      const year = base.year + Math.floor(monthIndex / 12)
      const month = (monthIndex % 12) + 1
      if (base.day > daysInMonth(year, month)) return undefined
      return { ...base, year, month }
    }
    case 'yearly': {
      const year = base.year + steps
      if (base.day > daysInMonth(year, base.month)) return undefined
      return { ...base, year }
    }
    default: {
      const unsupported: never = frequency
      throw new Error(`Unhandled frequency: ${String(unsupported)}`)
    }
  }
}

/**
 * Generate occurrences of `rule` starting at `anchor`.
 *
 * Yields `min(count ?? cap, cap)` instants unless an until terminator or a
 * missing calendar day stops generation first. The caller must always
 * supply `cap`.
 */
export function generateOccurrences(
  rule: RecurrenceRule,
  anchor: Instant,
  cap: number,
): Result<Instant[], RecurrenceError> {
  const invalid = validateRule(rule)
  if (invalid) return err(invalid)

  if (!Number.isInteger(cap) || cap < 0) {
    return err(new RecurrenceError(`Occurrence cap must be a non-negative integer, got ${cap}`))
  }

  const limit =
    rule.terminator.kind === 'count' ? Math.min(rule.terminator.count, cap) : cap
  const untilMs =
    rule.terminator.kind === 'until' ? rule.terminator.until.toMillis() : undefined

  const base = civilOf(anchor)
  const occurrences: Instant[] = []

  for (let k = 0; k < limit; k++) {
    let current = anchor

    if (k > 0) {
      const civil = stepCivil(base, rule.frequency, k * rule.interval)
      if (!civil) break

      const resolved = resolve(civil, anchor.zone, 'compatible')
      if (!resolved.ok) {
        return err(
          new RecurrenceError(`Could not resolve occurrence ${k}: ${resolved.error.message}`),
        )
      }
      current = resolved.value
    }

    if (untilMs !== undefined && current.toMillis() > untilMs) break

    occurrences.push(current)
  }

  return ok(occurrences)
}

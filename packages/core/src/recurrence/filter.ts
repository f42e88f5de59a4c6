/**
 * Recurrence Filter
 *
 * Post-filters generated occurrences. Skip dates match on civil date only:
 * the time of day and the zone of the stored date are ignored, and each
 * side is read in its own zone.
 */

import { civilDateOf } from '../time/clock.js'
import type { Instant } from '../time/types.js'
import type { RecurrenceFilterOptions } from './types.js'

const SATURDAY = 6
const SUNDAY = 7

/**
 * True when any of `dates` falls on the same civil date as `instant`.
 */
export function hasCivilDate(dates: readonly Instant[], instant: Instant): boolean {
  const target = civilDateOf(instant)
  return dates.some((date) => civilDateOf(date) === target)
}

export class RecurrenceFilter {
  readonly skipWeekends: boolean
  readonly skipDates: readonly Instant[]

  constructor(options: RecurrenceFilterOptions = {}) {
    this.skipWeekends = options.skipWeekends ?? false
    this.skipDates = [...(options.skipDates ?? [])]
  }

  withSkipWeekends(skip: boolean): RecurrenceFilter {
    return new RecurrenceFilter({ skipWeekends: skip, skipDates: [...this.skipDates] })
  }

  /** Adds to the existing skip dates */
  withSkipDates(dates: Instant[]): RecurrenceFilter {
    return new RecurrenceFilter({
      skipWeekends: this.skipWeekends,
      skipDates: [...this.skipDates, ...dates],
    })
  }

  shouldSkip(instant: Instant): boolean {
    if (this.skipWeekends && (instant.weekday === SATURDAY || instant.weekday === SUNDAY)) {
      return true
    }
    return hasCivilDate(this.skipDates, instant)
  }

  filterOccurrences(occurrences: readonly Instant[]): Instant[] {
    return occurrences.filter((instant) => !this.shouldSkip(instant))
  }
}

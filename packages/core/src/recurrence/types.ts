/**
 * Recurrence Types
 */

import type { Instant } from '../time/types.js'

export type Frequency = 'daily' | 'weekly' | 'monthly' | 'yearly'

export const FREQUENCIES: readonly Frequency[] = ['daily', 'weekly', 'monthly', 'yearly']

/** RFC 5545 two-letter weekday codes */
export type WeekdayCode = 'MO' | 'TU' | 'WE' | 'TH' | 'FR' | 'SA' | 'SU'

export const WEEKDAY_CODES: readonly WeekdayCode[] = ['MO', 'TU', 'WE', 'TH', 'FR', 'SA', 'SU']

/**
 * What bounds a rule: a fixed number of occurrences, a last instant
 * (inclusive), or nothing but the caller's cap.
 */
export type RecurrenceTerminator =
  | { kind: 'count'; count: number }
  | { kind: 'until'; until: Instant }
  | { kind: 'none' }

export interface RecurrenceRule {
  frequency: Frequency

  /** Steps between occurrences, >= 1 */
  interval: number

  terminator: RecurrenceTerminator

  /**
   * Stored for export only. Generation never consults it.
   */
  weekdays?: WeekdayCode[]
}

/**
 * Options for createRule(). `count` and `until` are mutually exclusive.
 */
export interface RuleOptions {
  interval?: number
  count?: number
  until?: Instant
  weekdays?: string[]
}

export interface RecurrenceFilterOptions {
  skipWeekends?: boolean
  skipDates?: Instant[]
}

/**
 * Zoned Clock Types
 */

import type { DateTime } from 'luxon'

/**
 * An absolute point in time tagged with the zone used to render it.
 * Equality and ordering compare `toMillis()`; the zone only affects display
 * and civil-field access.
 */
export type Instant = DateTime

/**
 * A zone-less wall-clock date and time as a human writes it.
 */
export interface CivilDateTime {
  year: number
  month: number // 1-12
  day: number // 1-31
  hour: number
  minute: number
  second: number
}

/**
 * How a civil time maps to an instant when the zone's offset changes.
 *
 * - earliest: first instant for an ambiguous (fall-back) time; rejects gap times
 * - latest: second instant for an ambiguous time; rejects gap times
 * - compatible: earliest for ambiguous times; gap times shift forward by the gap length
 */
export type Disambiguation = 'earliest' | 'latest' | 'compatible'

/**
 * Calendar Types
 *
 * Occurrences are transient views of an event within a query window.
 * They point back at their event by index in the owning calendar.
 */

import type { Instant } from '../time/types.js'

/**
 * One concrete instance of an event.
 */
export interface Occurrence {
  /** Index of the owning event in `Calendar.getEvents()` */
  eventIndex: number

  /** Start instant, in the event's zone */
  start: Instant
}

export interface CalendarOptions {
  /** Optional free-text description */
  description?: string

  /** Display zone, written to exports. Defaults to UTC */
  zone?: string

  /** Per-event expansion cap for queries. Defaults to the engine config */
  maxOccurrencesPerEvent?: number
}

export interface QueryOptions {
  /** Drop cancelled events before expansion */
  activeOnly?: boolean
}

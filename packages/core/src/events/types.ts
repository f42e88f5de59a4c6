/**
 * Event Types
 */

import type { DurationLike, Zone } from 'luxon'
import type { RecurrenceFilter } from '../recurrence/filter.js'
import type { RecurrenceRule } from '../recurrence/types.js'
import type { Instant } from '../time/types.js'

/**
 * Booking lifecycle status.
 * Only `cancelled` stops an event from occupying time.
 */
export type EventStatus = 'confirmed' | 'tentative' | 'cancelled' | 'blocked'

export const EVENT_STATUSES: readonly EventStatus[] = [
  'confirmed',
  'tentative',
  'cancelled',
  'blocked',
]

/**
 * Fully-structured construction input (codecs, programmatic use).
 * Exactly one of `end` / `duration` is required.
 */
export interface EventProps {
  title: string
  description?: string
  start: Instant
  end?: Instant
  duration?: DurationLike
  zone: string | Zone
  attendees?: string[]
  recurrence?: RecurrenceRule
  filter?: RecurrenceFilter
  exceptionDates?: Instant[]
  location?: string
  uid?: string
  status?: EventStatus
}

/**
 * Raw builder configuration. Civil strings are interpreted in `zone`
 * and every field is validated together at build time.
 */
export interface EventConfig {
  title?: string
  description?: string
  start?: string | Instant
  end?: string | Instant
  duration?: DurationLike
  zone?: string
  attendees?: string[]
  recurrence?: RecurrenceRule
  filter?: RecurrenceFilter
  skipWeekends?: boolean
  exceptionDates?: Array<string | Instant>
  location?: string
  uid?: string
  status?: EventStatus
}

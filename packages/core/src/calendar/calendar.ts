/**
 * Calendar
 *
 * An insertion-ordered list of events that expands into a single
 * chronologically sorted occurrence sequence on demand. Nothing is cached:
 * every query re-expands.
 */

import { DEFAULT_ENGINE_CONFIG } from '../config.js'
import { ok, type CalendarError, type InvalidTimeZoneError, type Result } from '../errors.js'
import type { CalendarEvent } from '../events/event.js'
import { compareInstants, endOfCivilDay, resolveZone, startOfCivilDay } from '../time/clock.js'
import type { Instant } from '../time/types.js'
import type { CalendarOptions, Occurrence, QueryOptions } from './types.js'

export class Calendar {
  name: string
  description?: string
  /** Normalized zone name, e.g. `Europe/Berlin` or `UTC` */
  readonly zone: string
  readonly maxOccurrencesPerEvent: number
  private events: CalendarEvent[] = []

  /**
   * @throws InvalidTimeZoneError when `options.zone` is not a known zone.
   * Use Calendar.create() for untrusted input.
   */
  constructor(name: string, options: CalendarOptions = {}) {
    const zone = resolveZone(options.zone ?? 'UTC')
    if (!zone.ok) {
      throw zone.error
    }
    this.name = name
    this.description = options.description
    this.zone = zone.value.name
    this.maxOccurrencesPerEvent =
      options.maxOccurrencesPerEvent ?? DEFAULT_ENGINE_CONFIG.occurrences.maxPerEvent
  }

  static create(
    name: string,
    options: CalendarOptions = {},
  ): Result<Calendar, InvalidTimeZoneError> {
    const zone = resolveZone(options.zone ?? 'UTC')
    if (!zone.ok) return zone
    return ok(new Calendar(name, { ...options, zone: zone.value.name }))
  }

  // ─── Event management ───

  /** Append an event. Duplicates are kept. */
  addEvent(event: CalendarEvent): void {
    this.events.push(event)
  }

  addEvents(events: Iterable<CalendarEvent>): void {
    for (const event of events) {
      this.events.push(event)
    }
  }

  /**
   * Remove the event at `index`. Later events shift down by one.
   */
  removeEvent(index: number): CalendarEvent | undefined {
    if (!this.hasIndex(index)) return undefined
    const [removed] = this.events.splice(index, 1)
    return removed
  }

  /**
   * Apply `update` to the event at `index`.
   * Returns false when there is no such event.
   */
  updateEvent(index: number, update: (event: CalendarEvent) => void): boolean {
    const event = this.getEvent(index)
    if (!event) return false
    update(event)
    return true
  }

  getEvent(index: number): CalendarEvent | undefined {
    return this.hasIndex(index) ? this.events[index] : undefined
  }

  getEvents(): readonly CalendarEvent[] {
    return this.events
  }

  /** Case-insensitive substring match on the title */
  findEventsByTitle(query: string): CalendarEvent[] {
    const needle = query.toLowerCase()
    return this.events.filter((event) => event.title.toLowerCase().includes(needle))
  }

  eventCount(): number {
    return this.events.length
  }

  clearEvents(): void {
    this.events = []
  }

  // ─── Queries ───

  /**
   * Every occurrence starting within `[start, end]`, sorted by absolute
   * instant. Ties keep calendar insertion order, then generation order.
   */
  eventsBetween(
    start: Instant,
    end: Instant,
    options: QueryOptions = {},
  ): Result<Occurrence[], CalendarError> {
    const occurrences: Occurrence[] = []

    for (const [eventIndex, event] of this.events.entries()) {
      if (options.activeOnly && !event.isActive()) continue

      const starts = event.occurrencesBetween(start, end, this.maxOccurrencesPerEvent)
      if (!starts.ok) return starts

      for (const occurrenceStart of starts.value) {
        occurrences.push({ eventIndex, start: occurrenceStart })
      }
    }

    // Array.prototype.sort is stable
    occurrences.sort((a, b) => compareInstants(a.start, b.start))
    return ok(occurrences)
  }

  /**
   * Occurrences within the civil day of `date`, in `date`'s zone.
   */
  eventsOnDate(date: Instant, options: QueryOptions = {}): Result<Occurrence[], CalendarError> {
    const dayStart = startOfCivilDay(date)
    if (!dayStart.ok) return dayStart
    const dayEnd = endOfCivilDay(date)
    if (!dayEnd.ok) return dayEnd
    return this.eventsBetween(dayStart.value, dayEnd.value, options)
  }

  // ─── Occurrence lookups ───

  eventFor(occurrence: Occurrence): CalendarEvent | undefined {
    return this.getEvent(occurrence.eventIndex)
  }

  /** Occurrence start plus the event's duration */
  endOf(occurrence: Occurrence): Instant | undefined {
    const event = this.eventFor(occurrence)
    return event ? occurrence.start.plus(event.duration()) : undefined
  }

  titleOf(occurrence: Occurrence): string | undefined {
    return this.eventFor(occurrence)?.title
  }

  private hasIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.events.length
  }
}

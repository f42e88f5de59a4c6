/**
 * Event Builder
 *
 * Fluent setters only record raw configuration. Every field, including
 * zone names and civil date strings, is validated together in build(), so
 * a bad value is reported instead of being dropped on the way.
 */

import type { DurationLike, Zone } from 'luxon'
import { ValidationError, err, ok, type CalendarError, type Result } from '../errors.js'
import { RecurrenceFilter } from '../recurrence/filter.js'
import type { RecurrenceRule } from '../recurrence/types.js'
import { resolve, resolveZone } from '../time/clock.js'
import type { Instant } from '../time/types.js'
import { CalendarEvent } from './event.js'
import type { EventConfig, EventStatus } from './types.js'

/**
 * Turn a civil string or an instant into an instant. Civil strings need a
 * zone and resolve with `earliest`.
 */
function toInstant(
  value: string | Instant,
  zone: Zone | undefined,
  field: string,
): Result<Instant, CalendarError> {
  if (typeof value !== 'string') {
    if (!value.isValid) {
      return err(new ValidationError(`${field} is not a valid instant`))
    }
    return ok(zone ? value.setZone(zone) : value)
  }
  if (!zone) {
    return err(new ValidationError(`A time zone is required to interpret ${field} '${value}'`))
  }
  return resolve(value, zone, 'earliest')
}

/**
 * Validate a raw configuration and construct the event.
 */
export function buildEvent(config: EventConfig): Result<CalendarEvent, CalendarError> {
  if (config.title === undefined) {
    return err(new ValidationError('Event title is required'))
  }
  if (config.start === undefined) {
    return err(new ValidationError('Event start time is required'))
  }
  if (config.end !== undefined && config.duration !== undefined) {
    return err(new ValidationError('Set either an end time or a duration, not both'))
  }

  let zone: Zone | undefined
  if (config.zone !== undefined) {
    const zoneResult = resolveZone(config.zone)
    if (!zoneResult.ok) return zoneResult
    zone = zoneResult.value
  }

  const start = toInstant(config.start, zone, 'start')
  if (!start.ok) return start
  // An instant start carries its own zone when none was configured
  const eventZone = zone ?? start.value.zone

  let end: Instant | undefined
  if (config.end !== undefined) {
    const resolved = toInstant(config.end, eventZone, 'end')
    if (!resolved.ok) return resolved
    end = resolved.value
  }

  const exceptionDates: Instant[] = []
  for (const date of config.exceptionDates ?? []) {
    const resolved = toInstant(date, eventZone, 'exception date')
    if (!resolved.ok) return resolved
    exceptionDates.push(resolved.value)
  }

  let filter = config.filter
  if (config.skipWeekends) {
    filter = (filter ?? new RecurrenceFilter()).withSkipWeekends(true)
  }

  return CalendarEvent.create({
    title: config.title,
    description: config.description,
    start: start.value,
    end,
    duration: config.duration,
    zone: eventZone,
    attendees: config.attendees,
    recurrence: config.recurrence,
    filter,
    exceptionDates,
    location: config.location,
    uid: config.uid,
    status: config.status,
  })
}

export class EventBuilder {
  private config: EventConfig = {}

  title(title: string): this {
    this.config.title = title
    return this
  }

  description(description: string): this {
    this.config.description = description
    return this
  }

  /** Start as a civil string (`YYYY-MM-DD HH:MM:SS`) or an instant */
  start(start: string | Instant, zone?: string): this {
    this.config.start = start
    if (zone !== undefined) this.config.zone = zone
    return this
  }

  end(end: string | Instant): this {
    this.config.end = end
    return this
  }

  zone(zone: string): this {
    this.config.zone = zone
    return this
  }

  duration(duration: DurationLike): this {
    this.config.duration = duration
    return this
  }

  durationHours(hours: number): this {
    return this.duration({ hours })
  }

  durationMinutes(minutes: number): this {
    return this.duration({ minutes })
  }

  attendee(attendee: string): this {
    this.config.attendees = [...(this.config.attendees ?? []), attendee]
    return this
  }

  attendees(attendees: string[]): this {
    this.config.attendees = [...(this.config.attendees ?? []), ...attendees]
    return this
  }

  location(location: string): this {
    this.config.location = location
    return this
  }

  uid(uid: string): this {
    this.config.uid = uid
    return this
  }

  status(status: EventStatus): this {
    this.config.status = status
    return this
  }

  recurrence(rule: RecurrenceRule): this {
    this.config.recurrence = rule
    return this
  }

  filter(filter: RecurrenceFilter): this {
    this.config.filter = filter
    return this
  }

  skipWeekends(skip = true): this {
    this.config.skipWeekends = skip
    return this
  }

  exceptionDate(date: string | Instant): this {
    this.config.exceptionDates = [...(this.config.exceptionDates ?? []), date]
    return this
  }

  exceptionDates(dates: Array<string | Instant>): this {
    this.config.exceptionDates = [...(this.config.exceptionDates ?? []), ...dates]
    return this
  }

  build(): Result<CalendarEvent, CalendarError> {
    return buildEvent(this.config)
  }
}

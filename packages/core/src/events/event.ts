/**
 * Calendar Event
 *
 * A titled interval with an owning zone, an optional recurrence rule and
 * filter, exception dates, and a four-state booking status. `end > start`
 * holds from construction onwards.
 */

import { Duration, type Zone } from 'luxon'
import { DEFAULT_ENGINE_CONFIG } from '../config.js'
import {
  ValidationError,
  err,
  ok,
  type CalendarError,
  type RecurrenceError,
  type Result,
} from '../errors.js'
import { generateOccurrences } from '../recurrence/engine.js'
import { hasCivilDate, type RecurrenceFilter } from '../recurrence/filter.js'
import { validateRule } from '../recurrence/rule.js'
import type { RecurrenceRule } from '../recurrence/types.js'
import { civilDateOf, civilOf, resolve, resolveZone } from '../time/clock.js'
import type { Instant } from '../time/types.js'
import { EVENT_STATUSES, type EventProps, type EventStatus } from './types.js'

function withinWindow(instant: Instant, start: Instant, end: Instant): boolean {
  const ms = instant.toMillis()
  return ms >= start.toMillis() && ms <= end.toMillis()
}

export class CalendarEvent {
  title: string
  description?: string
  attendees: string[]
  recurrence?: RecurrenceRule
  filter?: RecurrenceFilter
  location?: string
  uid?: string

  readonly zone: Zone
  private _start: Instant
  private _end: Instant
  private _status: EventStatus
  private _exceptionDates: Instant[]

  private constructor(props: {
    title: string
    start: Instant
    end: Instant
    zone: Zone
    status: EventStatus
    description?: string
    attendees: string[]
    recurrence?: RecurrenceRule
    filter?: RecurrenceFilter
    exceptionDates: Instant[]
    location?: string
    uid?: string
  }) {
    this.title = props.title
    this.description = props.description
    this.zone = props.zone
    this._start = props.start
    this._end = props.end
    this._status = props.status
    this.attendees = props.attendees
    this.recurrence = props.recurrence
    this.filter = props.filter
    this._exceptionDates = props.exceptionDates
    this.location = props.location
    this.uid = props.uid
  }

  /**
   * Validated construction. Fails with ValidationError when a required field
   * is missing or `end <= start`, InvalidTimeZoneError for an unknown zone,
   * and RecurrenceError for a malformed rule.
   */
  static create(props: EventProps): Result<CalendarEvent, CalendarError> {
    if (typeof props.title !== 'string' || props.title.trim() === '') {
      return err(new ValidationError('Event title is required'))
    }
    if (!props.start || !props.start.isValid) {
      return err(new ValidationError('Event start time is required'))
    }
    if (props.zone === undefined || props.zone === null) {
      return err(new ValidationError('Event time zone is required'))
    }

    const zoneResult = resolveZone(props.zone)
    if (!zoneResult.ok) return zoneResult
    const zone = zoneResult.value

    if (props.end !== undefined && props.duration !== undefined) {
      return err(new ValidationError('Set either an end time or a duration, not both'))
    }

    const start = props.start.setZone(zone)
    let end: Instant
    if (props.end !== undefined) {
      end = props.end.setZone(zone)
    } else if (props.duration !== undefined) {
      const duration = Duration.fromDurationLike(props.duration)
      if (!duration.isValid) {
        return err(new ValidationError('Event duration is invalid'))
      }
      end = start.plus(duration)
    } else {
      return err(new ValidationError('Event end time is required'))
    }

    if (!end.isValid || end.toMillis() <= start.toMillis()) {
      return err(new ValidationError('Event end time must be after start time'))
    }

    const status = props.status ?? 'confirmed'
    if (!EVENT_STATUSES.includes(status)) {
      return err(new ValidationError(`Unknown event status: ${String(status)}`))
    }

    if (props.recurrence) {
      const invalid = validateRule(props.recurrence)
      if (invalid) return err(invalid)
    }

    const exceptionDates = props.exceptionDates ?? []
    if (exceptionDates.some((date) => !date.isValid)) {
      return err(new ValidationError('Exception dates must be valid instants'))
    }

    return ok(
      new CalendarEvent({
        title: props.title,
        description: props.description,
        start,
        end,
        zone,
        status,
        attendees: [...(props.attendees ?? [])],
        recurrence: props.recurrence,
        filter: props.filter,
        exceptionDates: [...exceptionDates],
        location: props.location,
        uid: props.uid,
      }),
    )
  }

  // ─── Accessors ───

  get start(): Instant {
    return this._start
  }

  get end(): Instant {
    return this._end
  }

  get status(): EventStatus {
    return this._status
  }

  get zoneName(): string {
    return this.zone.name
  }

  get exceptionDates(): readonly Instant[] {
    return this._exceptionDates
  }

  duration(): Duration {
    return Duration.fromMillis(this._end.toMillis() - this._start.toMillis())
  }

  /** False only for cancelled events */
  isActive(): boolean {
    return this._status !== 'cancelled'
  }

  isRecurring(): boolean {
    return this.recurrence !== undefined
  }

  // ─── Status transitions ───

  confirm(): void {
    this._status = 'confirmed'
  }

  cancel(): void {
    this._status = 'cancelled'
  }

  tentative(): void {
    this._status = 'tentative'
  }

  block(): void {
    this._status = 'blocked'
  }

  /**
   * Move the event. A cancelled event becomes confirmed again.
   */
  reschedule(newStart: Instant, newEnd: Instant): Result<void, ValidationError> {
    if (!newStart.isValid || !newEnd.isValid) {
      return err(new ValidationError('Reschedule times must be valid instants'))
    }
    if (newEnd.toMillis() <= newStart.toMillis()) {
      return err(new ValidationError('Event end time must be after start time'))
    }

    this._start = newStart.setZone(this.zone)
    this._end = newEnd.setZone(this.zone)

    if (this._status === 'cancelled') {
      this._status = 'confirmed'
    }
    return ok(undefined)
  }

  // ─── Collections ───

  addAttendee(attendee: string): void {
    this.attendees.push(attendee)
  }

  /**
   * Exclude the civil date of `date` from the recurrence.
   * Returns false when that civil date is already excluded.
   */
  addExceptionDate(date: Instant): boolean {
    if (hasCivilDate(this._exceptionDates, date)) {
      return false
    }
    this._exceptionDates.push(date)
    return true
  }

  // ─── Occurrences ───

  /**
   * Occurrence start instants within `[start, end]` (inclusive).
   */
  occurrencesBetween(
    start: Instant,
    end: Instant,
    maxOccurrences: number,
  ): Result<Instant[], RecurrenceError> {
    if (!this.recurrence) {
      return ok(withinWindow(this._start, start, end) ? [this._start] : [])
    }

    const generated = generateOccurrences(this.recurrence, this._start, maxOccurrences)
    if (!generated.ok) return generated

    let occurrences = generated.value.filter((instant) => withinWindow(instant, start, end))

    if (this.filter) {
      occurrences = this.filter.filterOccurrences(occurrences)
    }

    if (this._exceptionDates.length > 0) {
      const excluded = new Set(this._exceptionDates.map(civilDateOf))
      occurrences = occurrences.filter((instant) => !excluded.has(civilDateOf(instant)))
    }

    return ok(occurrences)
  }

  /**
   * Whether an occurrence falls on the civil date of `date`, with the day
   * bounds taken in this event's zone.
   */
  occursOn(
    date: Instant,
    maxOccurrences: number = DEFAULT_ENGINE_CONFIG.occurrences.maxPerEvent,
  ): Result<boolean> {
    const civil = civilOf(date)
    const dayStart = resolve({ ...civil, hour: 0, minute: 0, second: 0 }, this.zone, 'earliest')
    if (!dayStart.ok) return dayStart
    const dayEnd = resolve({ ...civil, hour: 23, minute: 59, second: 59 }, this.zone, 'latest')
    if (!dayEnd.ok) return dayEnd

    const occurrences = this.occurrencesBetween(dayStart.value, dayEnd.value, maxOccurrences)
    if (!occurrences.ok) return occurrences
    return ok(occurrences.value.length > 0)
  }
}

/**
 * Event Builder Tests
 *
 * Every configured value is checked at build(); nothing is silently dropped.
 */

import { describe, it, expect } from 'vitest'
import { DateTime } from 'luxon'

import { EventBuilder, buildEvent } from '../src/events/builder.js'
import { createRule } from '../src/recurrence/rule.js'
import { unwrap } from '../src/errors.js'

describe('EventBuilder', () => {
  it('resolves civil strings in the configured zone', () => {
    const event = unwrap(
      new EventBuilder()
        .title('Standup')
        .start('2024-01-15 09:00:00', 'Europe/Berlin')
        .durationMinutes(15)
        .location('Room 4')
        .attendee('alice@example.com')
        .attendees(['bob@example.com'])
        .build(),
    )

    expect(event.start.toMillis()).toBe(Date.UTC(2024, 0, 15, 8, 0, 0))
    expect(event.zoneName).toBe('Europe/Berlin')
    expect(event.duration().as('minutes')).toBe(15)
    expect(event.location).toBe('Room 4')
    expect(event.attendees).toEqual(['alice@example.com', 'bob@example.com'])
  })

  it('accepts an explicit end', () => {
    const event = unwrap(
      new EventBuilder()
        .title('Workshop')
        .zone('UTC')
        .start('2024-01-15T13:00:00')
        .end('2024-01-15T16:30:00')
        .build(),
    )
    expect(event.duration().as('hours')).toBe(3.5)
  })

  it('takes the zone from an instant start', () => {
    const start = DateTime.fromISO('2024-01-15T09:00:00', { zone: 'Asia/Tokyo' })
    const event = unwrap(new EventBuilder().title('Sync').start(start).durationHours(1).build())
    expect(event.zoneName).toBe('Asia/Tokyo')
  })

  it('reports an unknown zone instead of dropping it', () => {
    const result = new EventBuilder()
      .title('Standup')
      .start('2024-01-15 09:00:00', 'Europe/Atlantis')
      .durationMinutes(15)
      .build()

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('invalid_time_zone')
  })

  it('reports an unparsable date string', () => {
    const result = new EventBuilder()
      .title('Standup')
      .start('15/01/2024 09:00', 'UTC')
      .durationMinutes(15)
      .build()

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('time_parse')
  })

  it('reports a civil string without a zone', () => {
    const result = new EventBuilder().title('Standup').start('2024-01-15 09:00:00').durationHours(1).build()

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('validation')
  })

  it('reports a start inside a DST gap', () => {
    const result = new EventBuilder()
      .title('Early')
      .start('2024-03-31 02:30:00', 'Europe/Berlin')
      .durationHours(1)
      .build()

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('invalid_local_time')
  })

  it('reports an invalid exception date', () => {
    const result = new EventBuilder()
      .title('Standup')
      .start('2024-01-15 09:00:00', 'UTC')
      .durationMinutes(15)
      .exceptionDate('2024-01-32 09:00:00')
      .build()

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('time_parse')
  })

  it('wires recurrence, weekend skipping and exception dates', () => {
    const event = unwrap(
      new EventBuilder()
        .title('Standup')
        .start('2024-01-01 09:00:00', 'UTC')
        .durationMinutes(15)
        .recurrence(unwrap(createRule('daily', { count: 10 })))
        .skipWeekends()
        .exceptionDates(['2024-01-02 00:00:00'])
        .status('tentative')
        .build(),
    )

    expect(event.status).toBe('tentative')
    expect(event.filter?.skipWeekends).toBe(true)
    const occurrences = unwrap(event.occurrencesBetween(event.start, event.start.plus({ days: 30 }), 1000))
    expect(occurrences.map((instant) => instant.day)).toEqual([1, 3, 4, 5, 8, 9, 10])
  })
})

describe('buildEvent', () => {
  it('requires a title and a start', () => {
    const noTitle = buildEvent({ start: '2024-01-15 09:00:00', zone: 'UTC', duration: { hours: 1 } })
    const noStart = buildEvent({ title: 'x', zone: 'UTC', duration: { hours: 1 } })

    expect(noTitle.ok).toBe(false)
    if (!noTitle.ok) expect(noTitle.error.message).toBe('Event title is required')
    expect(noStart.ok).toBe(false)
    if (!noStart.ok) expect(noStart.error.message).toBe('Event start time is required')
  })

  it('rejects both an end and a duration', () => {
    const result = buildEvent({
      title: 'x',
      zone: 'UTC',
      start: '2024-01-15 09:00:00',
      end: '2024-01-15 10:00:00',
      duration: { hours: 1 },
    })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('validation')
  })
})

/**
 * JSON Codec Tests
 */

import { describe, it, expect } from 'vitest'

import { Calendar } from '../src/calendar/calendar.js'
import { calendarFromJson, calendarToJson, eventToJson } from '../src/codec/json.js'
import { CalendarEvent } from '../src/events/event.js'
import { RecurrenceFilter } from '../src/recurrence/filter.js'
import { createRule } from '../src/recurrence/rule.js'
import { resolve } from '../src/time/clock.js'
import { unwrap } from '../src/errors.js'

const NEW_YORK = 'America/New_York'

function sampleCalendar(): Calendar {
  const calendar = new Calendar('Team', { description: 'Shared team calendar' })

  const planning = unwrap(
    CalendarEvent.create({
      title: 'Planning',
      description: 'Sprint planning',
      start: unwrap(resolve('2024-01-08 10:00:00', NEW_YORK)),
      duration: { hours: 1 },
      zone: NEW_YORK,
      attendees: ['alice@example.com', 'bob@example.com'],
      location: 'Room 4',
      uid: 'planning-1@test',
      recurrence: unwrap(createRule('weekly', { count: 4, weekdays: ['MO'] })),
      filter: new RecurrenceFilter({ skipWeekends: true }),
      exceptionDates: [unwrap(resolve('2024-01-15 10:00:00', NEW_YORK))],
    }),
  )
  planning.block()

  const review = unwrap(
    CalendarEvent.create({
      title: 'Review',
      start: unwrap(resolve('2024-01-09 15:00:00', 'UTC')),
      duration: { minutes: 30 },
      zone: 'UTC',
      recurrence: unwrap(
        createRule('daily', { until: unwrap(resolve('2024-01-12 15:00:00', 'UTC')) }),
      ),
    }),
  )
  review.cancel()

  calendar.addEvents([planning, review])
  return calendar
}

describe('eventToJson', () => {
  it('writes instants as ISO-8601 with offset', () => {
    const [planning] = sampleCalendar().getEvents()
    const json = eventToJson(planning)

    expect(json.start).toBe('2024-01-08T10:00:00.000-05:00')
    expect(json.end).toBe('2024-01-08T11:00:00.000-05:00')
    expect(json.status).toBe('blocked')
    expect(json.recurrence).toEqual({ frequency: 'weekly', interval: 1, count: 4, weekdays: ['MO'] })
    expect(json.exceptionDates).toEqual(['2024-01-15T10:00:00.000-05:00'])
  })
})

describe('calendar JSON round trip', () => {
  it('preserves every event field', () => {
    const original = sampleCalendar()
    const decoded = unwrap(calendarFromJson(calendarToJson(original)))

    expect(decoded.name).toBe('Team')
    expect(decoded.description).toBe('Shared team calendar')
    expect(decoded.eventCount()).toBe(2)

    const [planning, review] = decoded.getEvents()
    expect(planning.title).toBe('Planning')
    expect(planning.description).toBe('Sprint planning')
    expect(planning.zoneName).toBe(NEW_YORK)
    expect(planning.start.toMillis()).toBe(original.getEvents()[0].start.toMillis())
    expect(planning.start.zoneName).toBe(NEW_YORK)
    expect(planning.duration().as('hours')).toBe(1)
    expect(planning.attendees).toEqual(['alice@example.com', 'bob@example.com'])
    expect(planning.location).toBe('Room 4')
    expect(planning.uid).toBe('planning-1@test')
    expect(planning.status).toBe('blocked')
    expect(planning.recurrence?.terminator).toEqual({ kind: 'count', count: 4 })
    expect(planning.recurrence?.weekdays).toEqual(['MO'])
    expect(planning.filter?.skipWeekends).toBe(true)
    expect(planning.exceptionDates.map((d) => d.toFormat('yyyy-MM-dd'))).toEqual(['2024-01-15'])

    expect(review.status).toBe('cancelled')
    expect(review.zoneName).toBe('UTC')
    const terminator = review.recurrence?.terminator
    expect(terminator?.kind).toBe('until')
    if (terminator?.kind === 'until') {
      expect(terminator.until.toMillis()).toBe(Date.UTC(2024, 0, 12, 15))
    }
  })

  it('keeps the decoded occurrences identical', () => {
    const original = sampleCalendar()
    const decoded = unwrap(calendarFromJson(calendarToJson(original)))
    const start = unwrap(resolve('2024-01-01 00:00:00', 'UTC'))
    const end = unwrap(resolve('2024-02-01 00:00:00', 'UTC'))

    const before = unwrap(original.eventsBetween(start, end)).map((o) => o.start.toMillis())
    const after = unwrap(decoded.eventsBetween(start, end)).map((o) => o.start.toMillis())
    expect(after).toEqual(before)
    expect(after).toHaveLength(7)
  })
})

describe('calendarFromJson errors', () => {
  it('rejects malformed JSON', () => {
    const result = calendarFromJson('{ not json')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('validation')
  })

  it('names the failing path for schema violations', () => {
    const result = calendarFromJson(
      JSON.stringify({ name: 'x', events: [{ start: 'a', end: 'b', zone: 'UTC' }] }),
    )
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toContain('events.0.title')
  })

  it('rejects an unknown calendar zone', () => {
    const result = calendarFromJson(JSON.stringify({ name: 'x', zone: 'Nowhere/Land' }))
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('invalid_time_zone')
  })

  it('passes through event errors', () => {
    const base = {
      title: 'x',
      start: '2024-01-08T10:00:00.000Z',
      end: '2024-01-08T11:00:00.000Z',
      zone: 'UTC',
    }
    const badZone = calendarFromJson(
      JSON.stringify({ name: 'x', events: [{ ...base, zone: 'Nowhere/Land' }] }),
    )
    const badRule = calendarFromJson(
      JSON.stringify({
        name: 'x',
        events: [{ ...base, recurrence: { frequency: 'hourly', interval: 1 } }],
      }),
    )
    const badTime = calendarFromJson(
      JSON.stringify({ name: 'x', events: [{ ...base, start: 'yesterday' }] }),
    )

    expect(badZone.ok || badZone.error.code).toBe('invalid_time_zone')
    expect(badRule.ok || badRule.error.code).toBe('recurrence')
    expect(badTime.ok || badTime.error.code).toBe('validation')
  })
})

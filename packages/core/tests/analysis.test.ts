/**
 * Schedule Analysis Tests
 *
 * Gaps, overlaps, density, slot availability and suggestions, including
 * the end-to-end scenarios for a single working day.
 */

import { describe, it, expect } from 'vitest'
import { DateTime } from 'luxon'

import { Calendar } from '../src/calendar/calendar.js'
import { CalendarEvent } from '../src/events/event.js'
import { calculateDensity } from '../src/analysis/density.js'
import { findAvailableSlots, findGaps, findLongestGap } from '../src/analysis/gaps.js'
import { findOverlaps } from '../src/analysis/overlaps.js'
import { isSlotAvailable, suggestAlternatives } from '../src/analysis/slots.js'
import { resolve } from '../src/time/clock.js'
import { unwrap } from '../src/errors.js'
import type { Gap } from '../src/analysis/types.js'

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

function at(time: string, date = '2024-01-15') {
  return unwrap(resolve(`${date} ${time}:00`, 'UTC'))
}

function event(title: string, start: string, minutes: number): CalendarEvent {
  return unwrap(
    CalendarEvent.create({ title, start: at(start), duration: { minutes }, zone: 'UTC' }),
  )
}

function calendarOf(...events: CalendarEvent[]): Calendar {
  const calendar = new Calendar('Test')
  calendar.addEvents(events)
  return calendar
}

function describeGap(gap: Gap) {
  return {
    start: gap.start.toFormat('HH:mm'),
    end: gap.end.toFormat('HH:mm'),
    minutes: gap.duration.as('minutes'),
    precedingLabel: gap.precedingLabel,
    followingLabel: gap.followingLabel,
  }
}

const dayStart = at('08:00')
const dayEnd = at('18:00')

// -------------------------------------------------------------------
// Gaps
// -------------------------------------------------------------------

describe('findGaps', () => {
  const calendar = calendarOf(event('Standup', '09:00', 15), event('Review', '11:00', 60))

  it('finds the free intervals of a working day', () => {
    const gaps = unwrap(findGaps(calendar, dayStart, dayEnd, { minutes: 30 }))

    expect(gaps.map(describeGap)).toEqual([
      {
        start: '08:00',
        end: '09:00',
        minutes: 60,
        precedingLabel: undefined,
        followingLabel: 'Standup',
      },
      {
        start: '09:15',
        end: '11:00',
        minutes: 105,
        precedingLabel: 'Standup',
        followingLabel: 'Review',
      },
      {
        start: '12:00',
        end: '18:00',
        minutes: 360,
        precedingLabel: 'Review',
        followingLabel: undefined,
      },
    ])
  })

  it('drops gaps shorter than the minimum', () => {
    const gaps = unwrap(findGaps(calendar, dayStart, dayEnd, { hours: 2 }))
    expect(gaps.map((gap) => gap.duration.as('minutes'))).toEqual([360])
  })

  it('treats a nested occurrence as already covered', () => {
    const nested = calendarOf(event('Workshop', '09:00', 180), event('Break', '10:00', 15))
    const gaps = unwrap(findGaps(nested, dayStart, dayEnd, 0))

    expect(gaps.map(describeGap)).toEqual([
      {
        start: '08:00',
        end: '09:00',
        minutes: 60,
        precedingLabel: undefined,
        followingLabel: 'Workshop',
      },
      {
        start: '12:00',
        end: '18:00',
        minutes: 360,
        precedingLabel: 'Workshop',
        followingLabel: undefined,
      },
    ])
  })

  it('returns the whole window for an empty calendar', () => {
    const gaps = unwrap(findGaps(new Calendar('Empty'), dayStart, dayEnd, 0))
    expect(gaps.map(describeGap)).toEqual([
      {
        start: '08:00',
        end: '18:00',
        minutes: 600,
        precedingLabel: undefined,
        followingLabel: undefined,
      },
    ])
  })

  it('renders gaps in the zone of the query start', () => {
    const berlinStart = dayStart.setZone('Europe/Berlin')
    const [first] = unwrap(findGaps(calendar, berlinStart, dayEnd, 0))
    expect(first.start.zoneName).toBe('Europe/Berlin')
    expect(first.start.toFormat('HH:mm')).toBe('09:00')
    expect(first.end.toFormat('HH:mm')).toBe('10:00')
  })

  it('frees the slot of a cancelled event', () => {
    const meeting = event('Meeting', '10:00', 60)
    const booked = calendarOf(meeting)
    meeting.cancel()

    const gaps = unwrap(findGaps(booked, dayStart, dayEnd, 0))
    expect(gaps.map((gap) => gap.duration.as('minutes'))).toEqual([600])

    const unfiltered = unwrap(findGaps(booked, dayStart, dayEnd, 0, { activeOnly: false }))
    expect(unfiltered).toHaveLength(2)
  })
})

describe('findLongestGap and findAvailableSlots', () => {
  const calendar = calendarOf(event('Standup', '09:00', 15), event('Review', '11:00', 60))

  it('returns the longest gap', () => {
    const longest = unwrap(findLongestGap(calendar, dayStart, dayEnd))
    expect(longest?.start.toFormat('HH:mm')).toBe('12:00')
    expect(longest?.duration.as('minutes')).toBe(360)
  })

  it('prefers the last of equally long gaps', () => {
    const split = calendarOf(event('Lunch', '12:00', 120))
    const longest = unwrap(findLongestGap(split, at('08:00'), at('18:00')))
    expect(longest?.start.toFormat('HH:mm')).toBe('14:00')
    expect(longest?.end.toFormat('HH:mm')).toBe('18:00')
    expect(longest?.precedingLabel).toBe('Lunch')
  })

  it('returns undefined when there are no gaps', () => {
    const full = calendarOf(event('All day', '08:00', 600))
    expect(unwrap(findLongestGap(full, dayStart, dayEnd))).toBeUndefined()
  })

  it('lists slots that fit a duration', () => {
    const slots = unwrap(findAvailableSlots(calendar, dayStart, dayEnd, { minutes: 90 }))
    expect(slots.map((slot) => slot.start.toFormat('HH:mm'))).toEqual(['09:15', '12:00'])
  })
})

// -------------------------------------------------------------------
// Overlaps
// -------------------------------------------------------------------

describe('findOverlaps', () => {
  it('reports one overlap for two intersecting events', () => {
    const calendar = calendarOf(event('Planning', '09:00', 120), event('Interview', '10:00', 120))
    const overlaps = unwrap(findOverlaps(calendar, dayStart, dayEnd))

    expect(overlaps).toHaveLength(1)
    expect(overlaps[0].start.toFormat('HH:mm')).toBe('10:00')
    expect(overlaps[0].end.toFormat('HH:mm')).toBe('11:00')
    expect(overlaps[0].duration.as('minutes')).toBe(60)
    expect(overlaps[0].participants).toEqual(['Planning', 'Interview'])
  })

  it('stays pairwise for three-way overlaps', () => {
    const calendar = calendarOf(
      event('A', '09:00', 120),
      event('B', '09:30', 120),
      event('C', '10:00', 120),
    )
    const overlaps = unwrap(findOverlaps(calendar, dayStart, dayEnd))

    expect(overlaps.map((overlap) => overlap.participants)).toEqual([
      ['A', 'B'],
      ['A', 'C'],
      ['B', 'C'],
    ])
  })

  it('ignores touching events', () => {
    const calendar = calendarOf(event('A', '09:00', 60), event('B', '10:00', 60))
    expect(unwrap(findOverlaps(calendar, dayStart, dayEnd))).toEqual([])
  })
})

// -------------------------------------------------------------------
// Density
// -------------------------------------------------------------------

describe('calculateDensity', () => {
  it('measures a single two-hour event in a ten-hour window', () => {
    const calendar = calendarOf(event('Deep work', '10:00', 120))
    const density = unwrap(calculateDensity(calendar, dayStart, dayEnd))

    expect(density.occupancyPercent).toBe(20)
    expect(density.coveragePercent).toBe(20)
    expect(density.busyDuration.as('minutes')).toBe(120)
    expect(density.freeDuration.as('minutes')).toBe(480)
    expect(density.windowDuration.as('hours')).toBe(10)
    expect(density.occurrenceCount).toBe(1)
    expect(density.gapCount).toBe(2)
    expect(density.overlapCount).toBe(0)
    expect(density.isLight()).toBe(true)
    expect(density.isBusy()).toBe(false)
    expect(density.hasConflicts()).toBe(false)
  })

  it('double counts overlaps in busy time but not in coverage', () => {
    const calendar = calendarOf(event('Planning', '09:00', 120), event('Interview', '10:00', 120))
    const density = unwrap(calculateDensity(calendar, dayStart, dayEnd))

    expect(density.busyDuration.as('minutes')).toBe(240)
    expect(density.coveredDuration.as('minutes')).toBe(180)
    expect(density.occupancyPercent).toBe(40)
    expect(density.coveragePercent).toBe(30)
    expect(density.hasConflicts()).toBe(true)
  })

  it('clips occurrences to the window', () => {
    const calendar = calendarOf(event('Overtime', '17:00', 180))
    const density = unwrap(calculateDensity(calendar, dayStart, dayEnd))
    expect(density.busyDuration.as('minutes')).toBe(60)
  })

  it('classifies by the thresholds', () => {
    const busy = unwrap(calculateDensity(calendarOf(event('Offsite', '08:00', 420)), dayStart, dayEnd))
    expect(busy.occupancyPercent).toBe(70)
    expect(busy.isBusy()).toBe(true)

    const middle = unwrap(calculateDensity(calendarOf(event('Block', '08:00', 180)), dayStart, dayEnd))
    expect(middle.occupancyPercent).toBe(30)
    expect(middle.isLight()).toBe(false)
    expect(middle.isBusy()).toBe(false)

    const custom = unwrap(
      calculateDensity(calendarOf(event('Block', '08:00', 180)), dayStart, dayEnd, {
        lightThresholdPercent: 35,
      }),
    )
    expect(custom.isLight()).toBe(true)
  })

  it('reports zero occupancy for an empty window', () => {
    const density = unwrap(calculateDensity(calendarOf(event('A', '08:00', 60)), dayStart, dayStart))
    expect(density.occupancyPercent).toBe(0)
  })
})

// -------------------------------------------------------------------
// Slots
// -------------------------------------------------------------------

describe('isSlotAvailable', () => {
  const calendar = calendarOf(event('Meeting', '10:00', 60))

  it('treats touching boundaries as free', () => {
    expect(unwrap(isSlotAvailable(calendar, at('11:00'), at('12:00')))).toBe(true)
    expect(unwrap(isSlotAvailable(calendar, at('09:00'), at('10:00')))).toBe(true)
  })

  it('detects any intersection', () => {
    expect(unwrap(isSlotAvailable(calendar, at('10:30'), at('11:30')))).toBe(false)
    expect(unwrap(isSlotAvailable(calendar, at('09:00'), at('12:00')))).toBe(false)
    expect(unwrap(isSlotAvailable(calendar, at('10:15'), at('10:45')))).toBe(false)
  })

  it('catches an occurrence that started the day before', () => {
    const overnight = calendarOf(
      unwrap(
        CalendarEvent.create({
          title: 'Night shift',
          start: at('23:00', '2024-01-14'),
          duration: { hours: 2 },
          zone: 'UTC',
        }),
      ),
    )
    expect(unwrap(isSlotAvailable(overnight, at('00:30'), at('01:30')))).toBe(false)
    expect(unwrap(isSlotAvailable(overnight, at('01:00'), at('02:00')))).toBe(true)
  })

  it('frees a cancelled booking', () => {
    const meeting = event('Meeting', '10:00', 60)
    const booked = calendarOf(meeting)
    expect(unwrap(isSlotAvailable(booked, at('10:00'), at('11:00')))).toBe(false)

    meeting.cancel()
    expect(unwrap(isSlotAvailable(booked, at('10:00'), at('11:00')))).toBe(true)
    expect(unwrap(isSlotAvailable(booked, at('10:00'), at('11:00'), { activeOnly: false }))).toBe(
      false,
    )
  })
})

describe('suggestAlternatives', () => {
  const calendar = calendarOf(event('Meeting', '10:00', 60))

  it('suggests hourly starts inside fitting gaps', () => {
    const suggestions = unwrap(
      suggestAlternatives(calendar, at('10:00'), { minutes: 60 }, { hours: 2 }),
    )
    expect(suggestions.map((instant) => instant.toFormat('HH:mm'))).toEqual([
      '08:00',
      '09:00',
      '11:00',
    ])
  })

  it('uses the configured step', () => {
    const suggestions = unwrap(
      suggestAlternatives(calendar, at('10:00'), { minutes: 60 }, { hours: 2 }, {
        suggestionStepMinutes: 30,
      }),
    )
    expect(suggestions.map((instant) => instant.toFormat('HH:mm'))).toEqual([
      '08:00',
      '08:30',
      '09:00',
      '11:00',
    ])
  })

  it('returns nothing when no gap is long enough', () => {
    const suggestions = unwrap(
      suggestAlternatives(calendar, at('10:00'), { hours: 3 }, { hours: 2 }),
    )
    expect(suggestions).toEqual([])
  })

  it('rejects a non-positive step', () => {
    const result = suggestAlternatives(calendar, at('10:00'), { minutes: 60 }, { hours: 2 }, {
      suggestionStepMinutes: 0,
    })
    expect(result.ok).toBe(false)
  })

  it('keeps the zone of the requested start', () => {
    const requested = DateTime.fromISO('2024-01-15T11:00:00', { zone: 'Europe/Berlin' })
    const [first] = unwrap(suggestAlternatives(calendar, requested, { minutes: 60 }, { hours: 2 }))
    expect(first.zoneName).toBe('Europe/Berlin')
    expect(first.toFormat('HH:mm')).toBe('09:00')
  })
})

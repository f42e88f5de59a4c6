/**
 * Slot availability and alternative suggestions.
 */

import { Duration, type DurationLike } from 'luxon'
import { ValidationError, err, ok, type CalendarError, type Result } from '../errors.js'
import type { Calendar } from '../calendar/calendar.js'
import type { Instant } from '../time/types.js'
import { findGaps } from './gaps.js'
import { expandSpans, resolveOptions } from './spans.js'
import type { AnalysisOptions } from './types.js'

/**
 * Whether `[slotStart, slotEnd)` is free. The query looks back
 * `slotLookbackHours` so occurrences that began earlier but run into the
 * slot are caught. Touching boundaries do not conflict.
 */
export function isSlotAvailable(
  calendar: Calendar,
  slotStart: Instant,
  slotEnd: Instant,
  options?: AnalysisOptions,
): Result<boolean, CalendarError> {
  const config = resolveOptions(options)
  const queryStart = slotStart.minus({ hours: config.slotLookbackHours })
  const spans = expandSpans(calendar, queryStart, slotEnd, config.activeOnly)
  if (!spans.ok) return spans

  const from = slotStart.toMillis()
  const to = slotEnd.toMillis()
  const conflict = spans.value.some(
    (span) => span.start.toMillis() < to && from < span.end.toMillis(),
  )
  return ok(!conflict)
}

/**
 * Candidate start times for a `duration`-long booking near `requestedStart`.
 * Each qualifying gap in `requestedStart ± searchWindow` contributes its own
 * start, then further starts every `suggestionStepMinutes` that still fit.
 */
export function suggestAlternatives(
  calendar: Calendar,
  requestedStart: Instant,
  duration: DurationLike,
  searchWindow: DurationLike,
  options?: AnalysisOptions,
): Result<Instant[], CalendarError> {
  const config = resolveOptions(options)
  const length = Duration.fromDurationLike(duration)
  const reach = Duration.fromDurationLike(searchWindow)
  const stepMs = config.suggestionStepMinutes * 60_000
  if (!(stepMs > 0)) {
    return err(new ValidationError('Suggestion step must be a positive number of minutes'))
  }

  const gaps = findGaps(
    calendar,
    requestedStart.minus(reach),
    requestedStart.plus(reach),
    length,
    config,
  )
  if (!gaps.ok) return gaps

  const lengthMs = length.toMillis()
  const candidates: Instant[] = []
  for (const gap of gaps.value) {
    const gapEnd = gap.end.toMillis()
    let candidate = gap.start
    while (candidate.toMillis() + lengthMs <= gapEnd) {
      candidates.push(candidate)
      candidate = candidate.plus(stepMs)
    }
  }

  candidates.sort((a, b) => a.toMillis() - b.toMillis())
  return ok(candidates)
}

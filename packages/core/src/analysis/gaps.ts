/**
 * Gap Finder
 *
 * Left-to-right sweep over sorted occurrences with a free frontier that only
 * ever moves forward, so overlapping occurrences need no special handling.
 */

import { DateTime, Duration, type DurationLike } from 'luxon'
import { ok, type CalendarError, type Result } from '../errors.js'
import type { Calendar } from '../calendar/calendar.js'
import type { Instant } from '../time/types.js'
import { expandSpans, resolveOptions } from './spans.js'
import type { AnalysisOptions, Gap } from './types.js'

/**
 * Free intervals in `[start, end]` of at least `minDuration`.
 * Gap instants are rendered in the zone of `start`.
 */
export function findGaps(
  calendar: Calendar,
  start: Instant,
  end: Instant,
  minDuration: DurationLike,
  options?: AnalysisOptions,
): Result<Gap[], CalendarError> {
  const { activeOnly } = resolveOptions(options)
  const spans = expandSpans(calendar, start, end, activeOnly)
  if (!spans.ok) return spans

  const minMs = Duration.fromDurationLike(minDuration).toMillis()
  const zone = start.zone
  const gaps: Gap[] = []

  const emit = (from: number, to: number, precedingLabel?: string, followingLabel?: string) => {
    const ms = to - from
    if (ms < minMs) return
    const gap: Gap = {
      start: DateTime.fromMillis(from, { zone }),
      end: DateTime.fromMillis(to, { zone }),
      duration: Duration.fromMillis(ms),
    }
    if (precedingLabel !== undefined) gap.precedingLabel = precedingLabel
    if (followingLabel !== undefined) gap.followingLabel = followingLabel
    gaps.push(gap)
  }

  let frontier = start.toMillis()
  let precedingLabel: string | undefined

  for (const span of spans.value) {
    const spanStart = span.start.toMillis()
    const spanEnd = span.end.toMillis()

    if (spanStart > frontier) {
      emit(frontier, spanStart, precedingLabel, span.title)
    }
    if (spanEnd > frontier) {
      frontier = spanEnd
      precedingLabel = span.title
    }
  }

  if (end.toMillis() > frontier) {
    emit(frontier, end.toMillis(), precedingLabel)
  }

  return ok(gaps)
}

/**
 * The longest gap in the window (the last one wins ties), or undefined.
 */
export function findLongestGap(
  calendar: Calendar,
  start: Instant,
  end: Instant,
  options?: AnalysisOptions,
): Result<Gap | undefined, CalendarError> {
  const gaps = findGaps(calendar, start, end, 0, options)
  if (!gaps.ok) return gaps

  let longest: Gap | undefined
  for (const gap of gaps.value) {
    if (!longest || gap.duration.toMillis() >= longest.duration.toMillis()) {
      longest = gap
    }
  }
  return ok(longest)
}

/**
 * Gaps long enough to hold `duration`.
 */
export function findAvailableSlots(
  calendar: Calendar,
  start: Instant,
  end: Instant,
  duration: DurationLike,
  options?: AnalysisOptions,
): Result<Gap[], CalendarError> {
  return findGaps(calendar, start, end, duration, options)
}

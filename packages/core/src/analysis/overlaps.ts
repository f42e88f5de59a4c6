/**
 * Overlap Finder
 *
 * Pairwise: three mutually overlapping occurrences produce three records.
 */

import { Duration } from 'luxon'
import { ok, type CalendarError, type Result } from '../errors.js'
import type { Calendar } from '../calendar/calendar.js'
import type { Instant } from '../time/types.js'
import { earlierOf, expandSpans, laterOf, resolveOptions } from './spans.js'
import type { AnalysisOptions, Overlap } from './types.js'

export function findOverlaps(
  calendar: Calendar,
  start: Instant,
  end: Instant,
  options?: AnalysisOptions,
): Result<Overlap[], CalendarError> {
  const { activeOnly } = resolveOptions(options)
  const expanded = expandSpans(calendar, start, end, activeOnly)
  if (!expanded.ok) return expanded

  const spans = expanded.value
  const zone = start.zone
  const overlaps: Overlap[] = []

  for (let i = 0; i < spans.length; i++) {
    for (let j = i + 1; j < spans.length; j++) {
      const a = spans[i]
      const b = spans[j]
      if (a.start.toMillis() < b.end.toMillis() && b.start.toMillis() < a.end.toMillis()) {
        const overlapStart = laterOf(a.start, b.start)
        const overlapEnd = earlierOf(a.end, b.end)
        overlaps.push({
          start: overlapStart.setZone(zone),
          end: overlapEnd.setZone(zone),
          duration: Duration.fromMillis(overlapEnd.toMillis() - overlapStart.toMillis()),
          participants: [a.title, b.title],
        })
      }
    }
  }

  return ok(overlaps)
}

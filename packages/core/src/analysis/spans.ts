/**
 * Occurrence expansion shared by the analyzers.
 */

import { DEFAULT_ENGINE_CONFIG, type AnalysisConfig } from '../config.js'
import { ok, type CalendarError, type Result } from '../errors.js'
import type { Calendar } from '../calendar/calendar.js'
import type { Instant } from '../time/types.js'
import type { AnalysisOptions, Span } from './types.js'

export function resolveOptions(options: AnalysisOptions = {}): AnalysisConfig {
  return {
    activeOnly: options.activeOnly ?? DEFAULT_ENGINE_CONFIG.analysis.activeOnly,
    busyThresholdPercent:
      options.busyThresholdPercent ?? DEFAULT_ENGINE_CONFIG.analysis.busyThresholdPercent,
    lightThresholdPercent:
      options.lightThresholdPercent ?? DEFAULT_ENGINE_CONFIG.analysis.lightThresholdPercent,
    suggestionStepMinutes:
      options.suggestionStepMinutes ?? DEFAULT_ENGINE_CONFIG.analysis.suggestionStepMinutes,
    slotLookbackHours:
      options.slotLookbackHours ?? DEFAULT_ENGINE_CONFIG.analysis.slotLookbackHours,
  }
}

/**
 * Expand the calendar over `[start, end]` into sorted spans.
 */
export function expandSpans(
  calendar: Calendar,
  start: Instant,
  end: Instant,
  activeOnly: boolean,
): Result<Span[], CalendarError> {
  const occurrences = calendar.eventsBetween(start, end, { activeOnly })
  if (!occurrences.ok) return occurrences

  const spans: Span[] = []
  for (const occurrence of occurrences.value) {
    const event = calendar.eventFor(occurrence)
    if (!event) continue
    spans.push({
      start: occurrence.start,
      end: occurrence.start.plus(event.duration()),
      title: event.title,
    })
  }
  return ok(spans)
}

export function laterOf(a: Instant, b: Instant): Instant {
  return a.toMillis() >= b.toMillis() ? a : b
}

export function earlierOf(a: Instant, b: Instant): Instant {
  return a.toMillis() <= b.toMillis() ? a : b
}

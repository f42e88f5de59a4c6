/**
 * Schedule Density
 *
 * `busyDuration` sums clipped occurrences without merging, so overlapping
 * time is counted once per occurrence. `coveredDuration` is the merged union.
 */

import { Duration } from 'luxon'
import { ok, type CalendarError, type Result } from '../errors.js'
import type { Calendar } from '../calendar/calendar.js'
import type { Instant } from '../time/types.js'
import { findGaps } from './gaps.js'
import { findOverlaps } from './overlaps.js'
import { expandSpans, resolveOptions } from './spans.js'
import type { AnalysisOptions } from './types.js'

export interface ScheduleDensityInit {
  windowDuration: Duration
  busyDuration: Duration
  coveredDuration: Duration
  occurrenceCount: number
  gapCount: number
  overlapCount: number
  busyThresholdPercent: number
  lightThresholdPercent: number
}

function percentOf(partMs: number, wholeMs: number): number {
  return wholeMs > 0 ? (partMs * 100) / wholeMs : 0
}

export class ScheduleDensity {
  readonly windowDuration: Duration
  readonly busyDuration: Duration
  readonly freeDuration: Duration
  readonly coveredDuration: Duration
  readonly occupancyPercent: number
  readonly coveragePercent: number
  readonly occurrenceCount: number
  readonly gapCount: number
  readonly overlapCount: number
  private readonly busyThresholdPercent: number
  private readonly lightThresholdPercent: number

  constructor(init: ScheduleDensityInit) {
    const windowMs = init.windowDuration.toMillis()
    const busyMs = init.busyDuration.toMillis()
    const coveredMs = init.coveredDuration.toMillis()

    this.windowDuration = init.windowDuration
    this.busyDuration = init.busyDuration
    this.freeDuration = Duration.fromMillis(windowMs - busyMs)
    this.coveredDuration = init.coveredDuration
    this.occupancyPercent = percentOf(busyMs, windowMs)
    this.coveragePercent = percentOf(coveredMs, windowMs)
    this.occurrenceCount = init.occurrenceCount
    this.gapCount = init.gapCount
    this.overlapCount = init.overlapCount
    this.busyThresholdPercent = init.busyThresholdPercent
    this.lightThresholdPercent = init.lightThresholdPercent
  }

  isBusy(): boolean {
    return this.occupancyPercent > this.busyThresholdPercent
  }

  isLight(): boolean {
    return this.occupancyPercent < this.lightThresholdPercent
  }

  hasConflicts(): boolean {
    return this.overlapCount > 0
  }
}

export function calculateDensity(
  calendar: Calendar,
  start: Instant,
  end: Instant,
  options?: AnalysisOptions,
): Result<ScheduleDensity, CalendarError> {
  const config = resolveOptions(options)
  const spans = expandSpans(calendar, start, end, config.activeOnly)
  if (!spans.ok) return spans

  const windowStart = start.toMillis()
  const windowEnd = end.toMillis()

  // Clip to the window; spans arrive sorted by start
  const clipped: Array<[number, number]> = []
  for (const span of spans.value) {
    const from = Math.max(span.start.toMillis(), windowStart)
    const to = Math.min(span.end.toMillis(), windowEnd)
    if (to > from) clipped.push([from, to])
  }

  let busyMs = 0
  let coveredMs = 0
  let frontier = windowStart
  for (const [from, to] of clipped) {
    busyMs += to - from
    if (to > frontier) {
      coveredMs += to - Math.max(from, frontier)
      frontier = to
    }
  }

  const gaps = findGaps(calendar, start, end, 0, config)
  if (!gaps.ok) return gaps
  const overlaps = findOverlaps(calendar, start, end, config)
  if (!overlaps.ok) return overlaps

  return ok(
    new ScheduleDensity({
      windowDuration: Duration.fromMillis(Math.max(windowEnd - windowStart, 0)),
      busyDuration: Duration.fromMillis(busyMs),
      coveredDuration: Duration.fromMillis(coveredMs),
      occurrenceCount: spans.value.length,
      gapCount: gaps.value.length,
      overlapCount: overlaps.value.length,
      busyThresholdPercent: config.busyThresholdPercent,
      lightThresholdPercent: config.lightThresholdPercent,
    }),
  )
}

/**
 * Analysis Types
 */

import type { Duration } from 'luxon'
import type { AnalysisConfig } from '../config.js'
import type { Instant } from '../time/types.js'

/**
 * A free interval inside a query window.
 */
export interface Gap {
  start: Instant
  end: Instant
  duration: Duration

  /** Title of the occurrence that last pushed the free frontier forward */
  precedingLabel?: string

  /** Title of the occurrence that closes the gap (absent on the trailing gap) */
  followingLabel?: string
}

/**
 * The shared interval of two simultaneously active occurrences.
 */
export interface Overlap {
  start: Instant
  end: Instant
  duration: Duration
  participants: [string, string]
}

/**
 * Overrides for the engine's analysis settings.
 */
export type AnalysisOptions = Partial<AnalysisConfig>

/** @internal Occurrence resolved to its interval and title */
export interface Span {
  start: Instant
  end: Instant
  title: string
}

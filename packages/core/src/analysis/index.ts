/**
 * Schedule Analysis
 *
 * Gaps, overlaps, density and slot search over a calendar window.
 */

export type { Gap, Overlap, AnalysisOptions } from './types.js'
export { findGaps, findLongestGap, findAvailableSlots } from './gaps.js'
export { findOverlaps } from './overlaps.js'
export { ScheduleDensity, calculateDensity, type ScheduleDensityInit } from './density.js'
export { isSlotAvailable, suggestAlternatives } from './slots.js'

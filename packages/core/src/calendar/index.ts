/**
 * Calendar
 *
 * Ordered event collection and occurrence index.
 */

// Types
export type { Occurrence, CalendarOptions, QueryOptions } from './types.js'

// Implementation
export { Calendar } from './calendar.js'

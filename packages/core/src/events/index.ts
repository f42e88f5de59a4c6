/**
 * Events
 */

export type { EventStatus, EventProps, EventConfig } from './types.js'
export { EVENT_STATUSES } from './types.js'
export { CalendarEvent } from './event.js'
export { EventBuilder, buildEvent } from './builder.js'

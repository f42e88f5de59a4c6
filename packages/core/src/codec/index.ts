/**
 * Codecs
 */

export {
  calendarToJson,
  calendarFromJson,
  eventToJson,
  eventFromJson,
  type CalendarJson,
  type EventJson,
} from './json.js'

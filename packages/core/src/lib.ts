// Public API for consumption by other packages (codec plugins, applications)

// Errors & results
export {
  CalendarError,
  TimeParseError,
  InvalidTimeZoneError,
  InvalidLocalTimeError,
  ValidationError,
  RecurrenceError,
  ok,
  err,
  unwrap,
} from './errors.js'
export type { Result, CalendarErrorCode } from './errors.js'

// Configuration
export {
  loadEngineConfig,
  findConfigDir,
  DEFAULT_ENGINE_CONFIG,
  EngineConfigSchema,
} from './config.js'
export type { EngineConfig, AnalysisConfig } from './config.js'

// Zoned clock
export {
  resolveZone,
  parseCivil,
  formatCivil,
  isValidCivil,
  isLeapYear,
  daysInMonth,
  civilOf,
  civilDateOf,
  resolve,
  startOfCivilDay,
  endOfCivilDay,
  convertZone,
  isDst,
  isSameInstant,
  compareInstants,
} from './time/index.js'
export type { Instant, CivilDateTime, Disambiguation } from './time/index.js'

// Recurrence
export {
  FREQUENCIES,
  WEEKDAY_CODES,
  createRule,
  validateRule,
  isFrequency,
  isWeekdayCode,
  generateOccurrences,
  stepCivil,
  RecurrenceFilter,
  hasCivilDate,
} from './recurrence/index.js'
export type {
  Frequency,
  WeekdayCode,
  RecurrenceRule,
  RecurrenceTerminator,
  RuleOptions,
  RecurrenceFilterOptions,
} from './recurrence/index.js'

// Events
export { CalendarEvent, EventBuilder, buildEvent, EVENT_STATUSES } from './events/index.js'
export type { EventStatus, EventProps, EventConfig } from './events/index.js'

// Calendar
export { Calendar } from './calendar/index.js'
export type { Occurrence, CalendarOptions, QueryOptions } from './calendar/index.js'

// Analysis
export {
  findGaps,
  findLongestGap,
  findAvailableSlots,
  findOverlaps,
  calculateDensity,
  ScheduleDensity,
  isSlotAvailable,
  suggestAlternatives,
} from './analysis/index.js'
export type { Gap, Overlap, AnalysisOptions, ScheduleDensityInit } from './analysis/index.js'

// JSON codec
export { calendarToJson, calendarFromJson, eventToJson, eventFromJson } from './codec/index.js'
export type { CalendarJson, EventJson } from './codec/index.js'

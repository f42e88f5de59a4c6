/**
 * Recurrence
 */

export type {
  Frequency,
  WeekdayCode,
  RecurrenceRule,
  RecurrenceTerminator,
  RuleOptions,
  RecurrenceFilterOptions,
} from './types.js'
export { FREQUENCIES, WEEKDAY_CODES } from './types.js'
export { createRule, validateRule, isFrequency, isWeekdayCode } from './rule.js'
export { generateOccurrences, stepCivil } from './engine.js'
export { RecurrenceFilter, hasCivilDate } from './filter.js'

/**
 * Recurrence rule construction and validation.
 *
 * Rules arriving from codecs are plain data, so validation accepts
 * loosely-typed input and reports problems as RecurrenceError.
 */

import { RecurrenceError, err, ok, type Result } from '../errors.js'
import {
  FREQUENCIES,
  WEEKDAY_CODES,
  type Frequency,
  type RecurrenceRule,
  type RecurrenceTerminator,
  type RuleOptions,
  type WeekdayCode,
} from './types.js'

export function isFrequency(value: string): value is Frequency {
  return FREQUENCIES.some((frequency) => frequency === value)
}

export function isWeekdayCode(value: string): value is WeekdayCode {
  return WEEKDAY_CODES.some((code) => code === value)
}

/**
 * Check a rule built elsewhere. Returns null when the rule is usable.
 */
export function validateRule(rule: RecurrenceRule): RecurrenceError | null {
  if (!isFrequency(rule.frequency)) {
    return new RecurrenceError(
      `Unsupported frequency '${String(rule.frequency)}'. Supported: ${FREQUENCIES.join(', ')}`,
    )
  }

  if (!Number.isInteger(rule.interval) || rule.interval < 1) {
    return new RecurrenceError(`Interval must be an integer >= 1, got ${rule.interval}`)
  }

  const terminator = rule.terminator
  switch (terminator.kind) {
    case 'count':
      if (!Number.isInteger(terminator.count) || terminator.count < 0) {
        return new RecurrenceError(`Count must be a non-negative integer, got ${terminator.count}`)
      }
      break
    case 'until':
      if (!terminator.until.isValid) {
        return new RecurrenceError('Until must be a valid instant')
      }
      break
    case 'none':
      break
    default:
      return new RecurrenceError('Malformed recurrence terminator')
  }

  if (rule.weekdays) {
    const unknown = rule.weekdays.filter((day) => !isWeekdayCode(day))
    if (unknown.length > 0) {
      return new RecurrenceError(`Unknown weekday codes: ${unknown.join(', ')}`)
    }
  }

  return null
}

/**
 * Build a validated rule.
 *
 * @example
 * const weekly = createRule('weekly', { interval: 2, count: 10 })
 */
export function createRule(
  frequency: string,
  options: RuleOptions = {},
): Result<RecurrenceRule, RecurrenceError> {
  const normalized = frequency.toLowerCase()
  if (!isFrequency(normalized)) {
    return err(
      new RecurrenceError(
        `Unsupported frequency '${frequency}'. Supported: ${FREQUENCIES.join(', ')}`,
      ),
    )
  }

  if (options.count !== undefined && options.until !== undefined) {
    return err(new RecurrenceError('A rule may set count or until, not both'))
  }

  let terminator: RecurrenceTerminator = { kind: 'none' }
  if (options.count !== undefined) {
    terminator = { kind: 'count', count: options.count }
  } else if (options.until !== undefined) {
    terminator = { kind: 'until', until: options.until }
  }

  const weekdays = options.weekdays?.map((day) => day.toUpperCase())
  if (weekdays) {
    const unknown = weekdays.filter((day) => !isWeekdayCode(day))
    if (unknown.length > 0) {
      return err(new RecurrenceError(`Unknown weekday codes: ${unknown.join(', ')}`))
    }
  }

  const rule: RecurrenceRule = {
    frequency: normalized,
    interval: options.interval ?? 1,
    terminator,
    ...(weekdays && { weekdays: weekdays.filter(isWeekdayCode) }),
  }

  const invalid = validateRule(rule)
  return invalid ? err(invalid) : ok(rule)
}

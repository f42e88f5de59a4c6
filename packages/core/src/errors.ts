/**
 * Error Taxonomy
 *
 * Every fallible core operation returns a Result instead of throwing.
 * The error side is always a CalendarError subclass so callers can
 * switch on `code` or use instanceof.
 */

// ─────────────────────────────────────────────────────────────────
// Result
// ─────────────────────────────────────────────────────────────────

export type Result<T, E extends Error = CalendarError> =
  | {
      ok: true
      value: T
    }
  | {
      ok: false
      error: E
    }

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value }
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error }
}

/**
 * Return the value or throw the carried error.
 * For call sites (tests, scripts) that prefer exceptions.
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (!result.ok) {
    throw result.error
  }
  return result.value
}

// ─────────────────────────────────────────────────────────────────
// Error classes
// ─────────────────────────────────────────────────────────────────

export type CalendarErrorCode =
  | 'time_parse'
  | 'invalid_time_zone'
  | 'invalid_local_time'
  | 'validation'
  | 'recurrence'
  | 'ics'

export class CalendarError extends Error {
  readonly code: CalendarErrorCode

  constructor(code: CalendarErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause })
    this.name = 'CalendarError'
    this.code = code
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
    }
  }
}

/** Malformed civil date-time string */
export class TimeParseError extends CalendarError {
  readonly input: string

  constructor(input: string, message?: string) {
    super(
      'time_parse',
      message ??
        `Could not parse '${input}'. Expected format: 'YYYY-MM-DD HH:MM:SS' or 'YYYY-MM-DDTHH:MM:SS'`,
    )
    this.name = 'TimeParseError'
    this.input = input
  }
}

export class InvalidTimeZoneError extends CalendarError {
  readonly zone: string

  constructor(zone: string) {
    super('invalid_time_zone', `Invalid time zone: ${zone}`)
    this.name = 'InvalidTimeZoneError'
    this.zone = zone
  }
}

/** Local time that does not exist (DST gap) under a strategy that rejects it */
export class InvalidLocalTimeError extends CalendarError {
  constructor(civil: string, zone: string) {
    super('invalid_local_time', `Local time '${civil}' does not exist in time zone '${zone}'`)
    this.name = 'InvalidLocalTimeError'
  }
}

export class ValidationError extends CalendarError {
  constructor(message: string) {
    super('validation', message)
    this.name = 'ValidationError'
  }
}

export class RecurrenceError extends CalendarError {
  constructor(message: string) {
    super('recurrence', message)
    this.name = 'RecurrenceError'
  }
}

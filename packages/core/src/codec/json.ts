/**
 * JSON Calendar Codec
 *
 * Serializes a calendar with every event field, instants as ISO-8601 with
 * offset. Decoding validates the document shape with zod and then rebuilds
 * each event through the validated construction path.
 */

import { DateTime, type Zone } from 'luxon'
import { z } from 'zod'
import { Calendar } from '../calendar/calendar.js'
import type { CalendarOptions } from '../calendar/types.js'
import { ValidationError, err, ok, type CalendarError, type Result } from '../errors.js'
import { CalendarEvent } from '../events/event.js'
import { RecurrenceFilter } from '../recurrence/filter.js'
import { createRule } from '../recurrence/rule.js'
import type { RecurrenceRule } from '../recurrence/types.js'
import { resolveZone } from '../time/clock.js'
import type { Instant } from '../time/types.js'

const ISO_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSSZZ"

// ─────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────

const RecurrenceJsonSchema = z.object({
  frequency: z.string(),
  interval: z.number(),
  count: z.number().optional(),
  until: z.string().optional(),
  weekdays: z.array(z.string()).optional(),
})

const FilterJsonSchema = z.object({
  skipWeekends: z.boolean().default(false),
  skipDates: z.array(z.string()).default([]),
})

const EventJsonSchema = z.object({
  title: z.string(),
  description: z.string().optional(),
  start: z.string(),
  end: z.string(),
  zone: z.string(),
  attendees: z.array(z.string()).default([]),
  location: z.string().optional(),
  uid: z.string().optional(),
  status: z.enum(['confirmed', 'tentative', 'cancelled', 'blocked']).default('confirmed'),
  recurrence: RecurrenceJsonSchema.optional(),
  filter: FilterJsonSchema.optional(),
  exceptionDates: z.array(z.string()).default([]),
})

const CalendarJsonSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  zone: z.string().default('UTC'),
  events: z.array(EventJsonSchema).default([]),
})

export type EventJson = z.infer<typeof EventJsonSchema>
export type CalendarJson = z.infer<typeof CalendarJsonSchema>

// ─────────────────────────────────────────────────────────────────
// Encoding
// ─────────────────────────────────────────────────────────────────

function formatInstant(instant: Instant): string {
  return instant.toFormat(ISO_FORMAT)
}

function ruleToJson(rule: RecurrenceRule): z.input<typeof RecurrenceJsonSchema> {
  const json: z.input<typeof RecurrenceJsonSchema> = {
    frequency: rule.frequency,
    interval: rule.interval,
  }
  if (rule.terminator.kind === 'count') json.count = rule.terminator.count
  if (rule.terminator.kind === 'until') json.until = formatInstant(rule.terminator.until)
  if (rule.weekdays) json.weekdays = [...rule.weekdays]
  return json
}

export function eventToJson(event: CalendarEvent): EventJson {
  const json: EventJson = {
    title: event.title,
    start: formatInstant(event.start),
    end: formatInstant(event.end),
    zone: event.zoneName,
    attendees: [...event.attendees],
    status: event.status,
    exceptionDates: event.exceptionDates.map(formatInstant),
  }
  if (event.description !== undefined) json.description = event.description
  if (event.location !== undefined) json.location = event.location
  if (event.uid !== undefined) json.uid = event.uid
  if (event.recurrence) json.recurrence = ruleToJson(event.recurrence)
  if (event.filter) {
    json.filter = {
      skipWeekends: event.filter.skipWeekends,
      skipDates: event.filter.skipDates.map(formatInstant),
    }
  }
  return json
}

export function calendarToJson(calendar: Calendar): string {
  const json: CalendarJson = {
    name: calendar.name,
    zone: calendar.zone,
    events: calendar.getEvents().map(eventToJson),
  }
  if (calendar.description !== undefined) json.description = calendar.description
  return JSON.stringify(json, null, 2)
}

// ─────────────────────────────────────────────────────────────────
// Decoding
// ─────────────────────────────────────────────────────────────────

function parseInstant(text: string, zone: Zone, field: string): Result<Instant, ValidationError> {
  const instant = DateTime.fromISO(text, { setZone: true })
  if (!instant.isValid) {
    return err(new ValidationError(`${field} '${text}' is not an ISO-8601 date-time`))
  }
  return ok(instant.setZone(zone))
}

function parseInstants(
  texts: string[],
  zone: Zone,
  field: string,
): Result<Instant[], ValidationError> {
  const instants: Instant[] = []
  for (const text of texts) {
    const parsed = parseInstant(text, zone, field)
    if (!parsed.ok) return parsed
    instants.push(parsed.value)
  }
  return ok(instants)
}

export function eventFromJson(json: EventJson): Result<CalendarEvent, CalendarError> {
  const zone = resolveZone(json.zone)
  if (!zone.ok) return zone

  const start = parseInstant(json.start, zone.value, 'start')
  if (!start.ok) return start
  const end = parseInstant(json.end, zone.value, 'end')
  if (!end.ok) return end
  const exceptionDates = parseInstants(json.exceptionDates, zone.value, 'exception date')
  if (!exceptionDates.ok) return exceptionDates

  let recurrence: RecurrenceRule | undefined
  if (json.recurrence) {
    const { frequency, interval, count, until, weekdays } = json.recurrence
    let untilInstant: Instant | undefined
    if (until !== undefined) {
      const parsed = parseInstant(until, zone.value, 'until')
      if (!parsed.ok) return parsed
      untilInstant = parsed.value
    }
    const rule = createRule(frequency, { interval, count, until: untilInstant, weekdays })
    if (!rule.ok) return rule
    recurrence = rule.value
  }

  let filter: RecurrenceFilter | undefined
  if (json.filter) {
    const skipDates = parseInstants(json.filter.skipDates, zone.value, 'skip date')
    if (!skipDates.ok) return skipDates
    filter = new RecurrenceFilter({
      skipWeekends: json.filter.skipWeekends,
      skipDates: skipDates.value,
    })
  }

  return CalendarEvent.create({
    title: json.title,
    description: json.description,
    start: start.value,
    end: end.value,
    zone: zone.value,
    attendees: json.attendees,
    location: json.location,
    uid: json.uid,
    status: json.status,
    recurrence,
    filter,
    exceptionDates: exceptionDates.value,
  })
}

/**
 * Decode a calendar. The first invalid event fails the whole document with
 * that event's error.
 */
export function calendarFromJson(
  text: string,
  options: Pick<CalendarOptions, 'maxOccurrencesPerEvent'> = {},
): Result<Calendar, CalendarError> {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    return err(
      new ValidationError(
        `Calendar JSON could not be parsed: ${error instanceof Error ? error.message : String(error)}`,
      ),
    )
  }

  const parsed = CalendarJsonSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    return err(new ValidationError(`Invalid calendar JSON: ${issues}`))
  }

  const calendar = Calendar.create(parsed.data.name, {
    description: parsed.data.description,
    zone: parsed.data.zone,
    maxOccurrencesPerEvent: options.maxOccurrencesPerEvent,
  })
  if (!calendar.ok) return calendar

  for (const eventJson of parsed.data.events) {
    const event = eventFromJson(eventJson)
    if (!event.ok) return event
    calendar.value.addEvent(event.value)
  }

  return calendar
}

import IcalExpander from "ical-expander";
import type { Zone } from "luxon";
import {
  Calendar,
  CalendarEvent,
  err,
  ok,
  resolve,
  resolveZone,
  type CalendarError,
  type CalendarOptions,
  type EventStatus,
  type Instant,
  type RecurrenceRule,
  type Result,
} from "@tzcal/core";
import { IcsError } from "./errors.js";
import { parseRRule } from "./rrule.js";
import { unescapeText } from "./text.js";

export interface IcsReadOptions extends Pick<CalendarOptions, "maxOccurrencesPerEvent"> {
  /** Zone for floating times when X-WR-TIMEZONE is absent or unknown. Defaults to UTC */
  defaultZone?: string;
}

const DEFAULT_CALENDAR_NAME = "Imported Calendar";

// Shapes of the ical.js objects ical-expander exposes (not exported by the library)
interface IcalTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  isDate: boolean;
  zone?: { tzid: string };
}

interface IcalProperty {
  getParameter(name: string): unknown;
  getFirstValue(): unknown;
  getValues(): unknown[];
}

interface IcalComponent {
  name: string;
  getFirstProperty(name: string): IcalProperty | null;
  getAllProperties(name: string): IcalProperty[];
  getFirstPropertyValue(name: string): unknown;
}

interface IcalEvent {
  component: IcalComponent;
  startDate: IcalTime;
  endDate: IcalTime;
}

interface IcalDocument {
  component: IcalComponent;
  events: IcalEvent[];
}

function isIcalDocument(value: unknown): value is IcalDocument {
  return (
    typeof value === "object" &&
    value !== null &&
    "component" in value &&
    typeof value.component === "object" &&
    value.component !== null &&
    "events" in value &&
    Array.isArray(value.events)
  );
}

// ─────────────────────────────────────────────────────────────────
// Property access
// ─────────────────────────────────────────────────────────────────

function parameterValue(
  property: IcalProperty | null | undefined,
  name: string,
): string | undefined {
  const value = property?.getParameter(name);
  return typeof value === "string" ? value : undefined;
}

function isIcalTime(value: unknown): value is IcalTime {
  return (
    typeof value === "object" &&
    value !== null &&
    "year" in value &&
    "month" in value &&
    "day" in value &&
    "isDate" in value
  );
}

function textValue(component: IcalComponent, name: string): string | undefined {
  const value = component.getFirstPropertyValue(name);
  return typeof value === "string" && value !== "" ? value : undefined;
}

/**
 * Instant for an iCalendar time. UTC times stay UTC, TZID times are read in
 * that zone, floating times in `floatingZone`. Dates read as midnight.
 */
function readTime(
  time: IcalTime,
  tzid: string | undefined,
  floatingZone: Zone,
): Result<Instant, CalendarError> {
  let zone: string | Zone = floatingZone;
  if (time.zone?.tzid === "UTC") {
    zone = "UTC";
  } else if (tzid) {
    zone = tzid;
  }

  const civil = time.isDate
    ? { year: time.year, month: time.month, day: time.day, hour: 0, minute: 0, second: 0 }
    : {
        year: time.year,
        month: time.month,
        day: time.day,
        hour: time.hour,
        minute: time.minute,
        second: time.second,
      };
  return resolve(civil, zone, "compatible");
}

function readStatus(component: IcalComponent): EventStatus {
  const extension = textValue(component, "x-tzcal-status");
  if (extension?.toUpperCase() === "BLOCKED") {
    return "blocked";
  }
  switch (textValue(component, "status")?.toUpperCase()) {
    case "TENTATIVE":
      return "tentative";
    case "CANCELLED":
      return "cancelled";
    default:
      return "confirmed";
  }
}

function readAttendees(component: IcalComponent): string[] {
  return component
    .getAllProperties("attendee")
    .map((property) => property.getFirstValue())
    .filter((value): value is string => typeof value === "string")
    .map((value) => value.replace(/^mailto:/i, ""));
}

function readExceptionDates(
  component: IcalComponent,
  floatingZone: Zone,
): Result<Instant[], CalendarError> {
  const dates: Instant[] = [];
  for (const property of component.getAllProperties("exdate")) {
    const tzid = parameterValue(property, "tzid");
    for (const value of property.getValues()) {
      if (!isIcalTime(value)) continue;
      const date = readTime(value, tzid, floatingZone);
      if (!date.ok) return date;
      dates.push(date.value);
    }
  }
  return ok(dates);
}

// ─────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────

function convertEvent(
  event: IcalEvent,
  floatingZone: Zone,
): Result<CalendarEvent, CalendarError> {
  const component = event.component;
  const startTzid = parameterValue(component.getFirstProperty("dtstart"), "tzid");
  const endTzid = parameterValue(component.getFirstProperty("dtend"), "tzid") ?? startTzid;

  const start = readTime(event.startDate, startTzid, floatingZone);
  if (!start.ok) return start;
  const end = readTime(event.endDate, endTzid, floatingZone);
  if (!end.ok) return end;
  const zone = start.value.zone;

  let recurrence: RecurrenceRule | undefined;
  const rrule = component.getFirstPropertyValue("rrule");
  if (rrule) {
    const parsed = parseRRule(String(rrule), zone);
    if (!parsed.ok) return parsed;
    recurrence = parsed.value;
  }

  const exceptionDates = readExceptionDates(component, floatingZone);
  if (!exceptionDates.ok) return exceptionDates;

  return CalendarEvent.create({
    title: textValue(component, "summary") ?? "",
    description: textValue(component, "description"),
    location: textValue(component, "location"),
    uid: textValue(component, "uid"),
    start: start.value,
    end: end.value,
    zone,
    status: readStatus(component),
    attendees: readAttendees(component),
    recurrence,
    exceptionDates: exceptionDates.value,
  });
}

// ─────────────────────────────────────────────────────────────────
// Documents
// ─────────────────────────────────────────────────────────────────

/**
 * Parse an iCalendar document into a calendar. VEVENTs that cannot be
 * converted are skipped with a warning.
 */
/**
 * Zone for floating times. An X-WR-TIMEZONE that does not resolve (Outlook
 * writes Windows zone names) falls back to `defaultZone`, then UTC.
 */
function floatingZoneOf(root: IcalComponent, options: IcsReadOptions): Result<Zone, IcsError> {
  const fallback = options.defaultZone ?? "UTC";
  const declared = textValue(root, "x-wr-timezone");
  if (declared) {
    const zone = resolveZone(declared);
    if (zone.ok) return zone;
    console.warn(`[codec-ics] Unknown X-WR-TIMEZONE ${declared}, using ${fallback}`);
  }

  const zone = resolveZone(fallback);
  if (!zone.ok) {
    return err(new IcsError(`Unknown default time zone: ${fallback}`));
  }
  return zone;
}

/**
 * Parse an iCalendar document into a calendar. VEVENTs that cannot be
 * converted are skipped with a warning.
 */
export function fromIcsString(
  text: string,
  options: IcsReadOptions = {},
): Result<Calendar, IcsError> {
  let parsed: unknown;
  try {
    parsed = new IcalExpander({ ics: text, maxIterations: 0 });
  } catch (error) {
    return err(
      new IcsError(
        `Could not parse iCalendar data: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      ),
    );
  }
  if (!isIcalDocument(parsed)) {
    return err(new IcsError("Could not parse iCalendar data: unexpected parser output"));
  }

  const root = parsed.component;
  if (root.name !== "vcalendar") {
    return err(
      new IcsError(`Expected a VCALENDAR component, found ${String(root.name).toUpperCase()}`),
    );
  }

  const floatingZone = floatingZoneOf(root, options);
  if (!floatingZone.ok) return floatingZone;

  const name = textValue(root, "x-wr-calname");
  const description = textValue(root, "x-wr-caldesc");
  const calendar = new Calendar(name ? unescapeText(name) : DEFAULT_CALENDAR_NAME, {
    description: description ? unescapeText(description) : undefined,
    zone: floatingZone.value.name,
    maxOccurrencesPerEvent: options.maxOccurrencesPerEvent,
  });

  for (const event of parsed.events) {
    const converted = convertEvent(event, floatingZone.value);
    if (!converted.ok) {
      const label = textValue(event.component, "uid") ?? textValue(event.component, "summary");
      console.warn(
        `[codec-ics] Skipping VEVENT ${label ?? "(unnamed)"}: ${converted.error.message}`,
      );
      continue;
    }
    calendar.addEvent(converted.value);
  }

  return ok(calendar);
}

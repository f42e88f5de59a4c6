import { randomUUID } from "node:crypto";
import { DateTime } from "luxon";
import type { Calendar, CalendarEvent, Instant } from "@tzcal/core";
import { formatRRule } from "./rrule.js";
import { escapeText, foldLine } from "./text.js";

const PRODID = "-//tzcal//codec-ics//EN";
const UTC_FORMAT = "yyyyMMdd'T'HHmmss'Z'";
const LOCAL_FORMAT = "yyyyMMdd'T'HHmmss";

const STATUS_VALUES: Record<CalendarEvent["status"], string> = {
  confirmed: "CONFIRMED",
  tentative: "TENTATIVE",
  cancelled: "CANCELLED",
  // RFC 5545 has no blocked status; the extension property carries it
  blocked: "CONFIRMED",
};

/**
 * A date-time property. Fixed-offset zones (UTC included) are written in
 * UTC form; named zones as local time with a TZID parameter.
 */
function dateTimeProperty(name: string, instant: Instant, event: CalendarEvent): string {
  if (event.zone.isUniversal) {
    return `${name}:${instant.toUTC().toFormat(UTC_FORMAT)}`;
  }
  return `${name};TZID=${event.zoneName}:${instant.setZone(event.zone).toFormat(LOCAL_FORMAT)}`;
}

function eventLines(event: CalendarEvent, stamp: string): string[] {
  const lines: string[] = [
    "BEGIN:VEVENT",
    `UID:${event.uid ?? `${randomUUID()}@tzcal`}`,
    `DTSTAMP:${stamp}`,
    dateTimeProperty("DTSTART", event.start, event),
    dateTimeProperty("DTEND", event.end, event),
    `SUMMARY:${escapeText(event.title)}`,
  ];

  if (event.description) {
    lines.push(`DESCRIPTION:${escapeText(event.description)}`);
  }
  if (event.location) {
    lines.push(`LOCATION:${escapeText(event.location)}`);
  }

  lines.push(`STATUS:${STATUS_VALUES[event.status]}`);
  if (event.status === "blocked") {
    lines.push("X-TZCAL-STATUS:BLOCKED");
  }

  for (const attendee of event.attendees) {
    const address = /^mailto:/i.test(attendee) ? attendee : `mailto:${attendee}`;
    lines.push(`ATTENDEE:${address}`);
  }

  if (event.recurrence) {
    lines.push(`RRULE:${formatRRule(event.recurrence)}`);
  }

  for (const date of event.exceptionDates) {
    lines.push(dateTimeProperty("EXDATE", date, event));
  }

  lines.push("END:VEVENT");
  return lines;
}

/**
 * Serialize a calendar as an iCalendar document with CRLF line endings and
 * folded lines.
 */
export function toIcsString(calendar: Calendar): string {
  const stamp = DateTime.now().toUTC().toFormat(UTC_FORMAT);

  const lines: string[] = [
    "BEGIN:VCALENDAR",
    "VERSION:2.0",
    `PRODID:${PRODID}`,
    "CALSCALE:GREGORIAN",
    `X-WR-CALNAME:${escapeText(calendar.name)}`,
  ];
  if (calendar.description) {
    lines.push(`X-WR-CALDESC:${escapeText(calendar.description)}`);
  }
  lines.push(`X-WR-TIMEZONE:${calendar.zone}`);

  for (const event of calendar.getEvents()) {
    lines.push(...eventLines(event, stamp));
  }

  lines.push("END:VCALENDAR");
  return lines.map(foldLine).join("\r\n") + "\r\n";
}

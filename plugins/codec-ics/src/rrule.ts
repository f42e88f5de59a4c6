import { DateTime, type Zone } from "luxon";
import {
  RecurrenceError,
  createRule,
  err,
  type Instant,
  type RecurrenceRule,
  type Result,
} from "@tzcal/core";

const UTC_FORMAT = "yyyyMMdd'T'HHmmss'Z'";
const LOCAL_FORMAT = "yyyyMMdd'T'HHmmss";
const DATE_FORMAT = "yyyyMMdd";

/**
 * RRULE value for a rule. UNTIL is always written in UTC.
 */
export function formatRRule(rule: RecurrenceRule): string {
  const parts = [`FREQ=${rule.frequency.toUpperCase()}`];
  if (rule.interval > 1) {
    parts.push(`INTERVAL=${rule.interval}`);
  }
  if (rule.terminator.kind === "count") {
    parts.push(`COUNT=${rule.terminator.count}`);
  } else if (rule.terminator.kind === "until") {
    parts.push(`UNTIL=${rule.terminator.until.toUTC().toFormat(UTC_FORMAT)}`);
  }
  if (rule.weekdays && rule.weekdays.length > 0) {
    parts.push(`BYDAY=${rule.weekdays.join(",")}`);
  }
  return parts.join(";");
}

function parseUntil(value: string, zone: Zone): Instant | undefined {
  const candidates = [
    DateTime.fromFormat(value, UTC_FORMAT, { zone: "UTC" }),
    DateTime.fromFormat(value, LOCAL_FORMAT, { zone }),
    // A date-only UNTIL covers the whole day
    DateTime.fromFormat(value, DATE_FORMAT, { zone }).endOf("day").set({ millisecond: 0 }),
  ];
  const until = candidates.find((candidate) => candidate.isValid);
  return until?.setZone(zone);
}

/**
 * Parse an RRULE value. Only FREQ, INTERVAL, COUNT, UNTIL and BYDAY are
 * read; other parts are ignored. Floating UNTIL values are read in `zone`.
 */
export function parseRRule(text: string, zone: Zone): Result<RecurrenceRule, RecurrenceError> {
  const fields = new Map<string, string>();
  for (const part of text.trim().replace(/^RRULE:/i, "").split(";")) {
    const [key, value] = part.split("=");
    if (key && value !== undefined) {
      fields.set(key.trim().toUpperCase(), value.trim());
    }
  }

  const frequency = fields.get("FREQ");
  if (!frequency) {
    return err(new RecurrenceError(`RRULE has no FREQ: ${text}`));
  }

  let interval: number | undefined;
  const intervalText = fields.get("INTERVAL");
  if (intervalText !== undefined) {
    interval = Number(intervalText);
  }

  let count: number | undefined;
  const countText = fields.get("COUNT");
  if (countText !== undefined) {
    count = Number(countText);
  }

  let until: Instant | undefined;
  const untilText = fields.get("UNTIL");
  if (untilText !== undefined) {
    until = parseUntil(untilText, zone);
    if (!until) {
      return err(new RecurrenceError(`Unreadable RRULE UNTIL: ${untilText}`));
    }
  }

  // Ordinal prefixes (1MO, -1FR) are dropped: weekdays are kept for export only
  const weekdays = fields
    .get("BYDAY")
    ?.split(",")
    .map((day) => day.trim().slice(-2))
    .filter((day) => day !== "");

  return createRule(frequency, { interval, count, until, weekdays });
}

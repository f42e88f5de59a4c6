import { CalendarError } from "@tzcal/core";

/** Unparsable iCalendar document or unreadable file */
export class IcsError extends CalendarError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ics", message, options);
    this.name = "IcsError";
  }
}

export { toIcsString } from "./writer.js";
export { fromIcsString, type IcsReadOptions } from "./reader.js";
export { exportToIcs, importFromIcs } from "./files.js";
export { formatRRule, parseRRule } from "./rrule.js";
export { escapeText, unescapeText, foldLine } from "./text.js";
export { IcsError } from "./errors.js";

// ─────────────────────────────────────────────────────────────────
// RFC 5545 text values and content lines
// ─────────────────────────────────────────────────────────────────

const MAX_LINE_OCTETS = 75;

/**
 * Escape a TEXT value (backslash, semicolon, comma, newline).
 */
export function escapeText(text: string): string {
  return text
    .replace(/\\/g, "\\\\")
    .replace(/;/g, "\\;")
    .replace(/,/g, "\\,")
    .replace(/\r\n|\r|\n/g, "\\n");
}

export function unescapeText(text: string): string {
  return text.replace(/\\([\\;,nN])/g, (_match, char: string) =>
    char === "n" || char === "N" ? "\n" : char,
  );
}

/**
 * Fold a content line so no physical line exceeds 75 octets.
 * Continuation lines start with a single space. Multi-byte characters are
 * never split.
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, "utf-8") <= MAX_LINE_OCTETS) {
    return line;
  }

  const parts: string[] = [];
  let current = "";
  let octets = 0;
  // The leading space of a continuation line counts toward its limit
  let limit = MAX_LINE_OCTETS;

  for (const char of line) {
    const size = Buffer.byteLength(char, "utf-8");
    if (octets + size > limit) {
      parts.push(current);
      current = "";
      octets = 0;
      limit = MAX_LINE_OCTETS - 1;
    }
    current += char;
    octets += size;
  }
  parts.push(current);

  return parts.join("\r\n ");
}

/**
 * iCalendar content-line helpers: TEXT escaping, folding and parsing
 */

export const CRLF = '\r\n';

/** Maximum octets per physical line, excluding the CRLF */
const MAX_LINE_OCTETS = 75;

export interface ContentLine {
  name: string;
  params: Map<string, string>;
  value: string;
}

/**
 * Escape a TEXT value: backslash, semicolon, comma and line terminators
 */
export function escapeText(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r\n|\r|\n/g, '\\n');
}

/**
 * Reverse of escapeText
 */
export function unescapeText(value: string): string {
  return value.replace(/\\([\\;,nN])/g, (_match, escaped: string) => {
    if (escaped === 'n' || escaped === 'N') {
      return '\n';
    }
    return escaped;
  });
}

/**
 * Split a TEXT list value (e.g. CATEGORIES) on unescaped commas
 */
export function splitTextList(value: string): string[] {
  const items: string[] = [];
  let current = '';

  for (let i = 0; i < value.length; i++) {
    const char = value[i];
    if (char === '\\' && i + 1 < value.length) {
      current += char + value[i + 1];
      i++;
    } else if (char === ',') {
      items.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  items.push(current);

  return items.map(unescapeText);
}

/**
 * Fold a content line at 75 octets
 * Continuation lines start with a single space; characters are never split.
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf8') <= MAX_LINE_OCTETS) {
    return line;
  }

  const segments: string[] = [];
  let current = '';
  let currentOctets = 0;
  // The leading space of a continuation line counts against the limit
  let limit = MAX_LINE_OCTETS;

  for (const char of line) {
    const octets = Buffer.byteLength(char, 'utf8');
    if (currentOctets + octets > limit) {
      segments.push(current);
      current = '';
      currentOctets = 0;
      limit = MAX_LINE_OCTETS - 1;
    }
    current += char;
    currentOctets += octets;
  }
  segments.push(current);

  return segments.join(`${CRLF} `);
}

/**
 * Split ICS text into logical lines, joining folded continuations
 */
export function unfoldLines(ics: string): string[] {
  const rawLines = ics.split(/\r\n|\n|\r/);
  const unfolded: string[] = [];

  for (const line of rawLines) {
    if ((line.startsWith(' ') || line.startsWith('\t')) && unfolded.length > 0) {
      unfolded[unfolded.length - 1] += line.substring(1);
    } else if (line !== '') {
      unfolded.push(line);
    }
  }

  return unfolded;
}

/**
 * Index of the colon separating name/params from the value
 * Colons inside quoted parameter values are skipped.
 */
function findValueSeparator(line: string): number {
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (char === '"') {
      quoted = !quoted;
    } else if (char === ':' && !quoted) {
      return i;
    }
  }
  return -1;
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Parse `NAME;PARAM=VALUE:value`; returns null for lines without a value separator
 */
export function parseContentLine(line: string): ContentLine | null {
  const colonIdx = findValueSeparator(line);
  if (colonIdx === -1) return null;

  const beforeColon = line.substring(0, colonIdx);
  const value = line.substring(colonIdx + 1);

  const semiIdx = beforeColon.indexOf(';');
  const name = semiIdx === -1 ? beforeColon : beforeColon.substring(0, semiIdx);
  const params = new Map<string, string>();

  if (semiIdx !== -1) {
    const paramParts = beforeColon.substring(semiIdx + 1).split(';');
    for (const part of paramParts) {
      const eqIdx = part.indexOf('=');
      if (eqIdx !== -1) {
        params.set(part.substring(0, eqIdx).toUpperCase(), unquote(part.substring(eqIdx + 1)));
      }
    }
  }

  return { name: name.toUpperCase(), params, value };
}

/**
 * Format a UTC offset in minutes as `+HHMM` / `-HHMM`
 */
export function formatUtcOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(offsetMinutes);
  const hours = String(Math.floor(absolute / 60)).padStart(2, '0');
  const minutes = String(absolute % 60).padStart(2, '0');
  return `${sign}${hours}${minutes}`;
}

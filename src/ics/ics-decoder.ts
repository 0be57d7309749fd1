/**
 * ICS Decoder
 *
 * Reads the VEVENT subset this exporter writes back into canonical events.
 * VTIMEZONE blocks, nested components (VALARM) and unknown properties are
 * ignored; timed values are resolved to the configured zone.
 */

import { DateTime } from 'luxon';
import type { CalendarEvent } from '../types/event.js';
import { icsLogger } from '../utils/logger.js';
import { generateEventId, UNTITLED_EVENT } from '../core/normalizer.js';
import { type ContentLine, parseContentLine, splitTextList, unescapeText, unfoldLines } from './ics-text.js';
import { isKnownTimezone } from './timezone-definition.js';

const LOCAL_TIME_FORMAT = "yyyyMMdd'T'HHmmss";
const DATE_FORMAT = 'yyyyMMdd';
const DATE_ONLY_VALUE = /^\d{8}$/;

export interface DecodeOptions {
  /** Zone for floating values and for the returned DateTimes */
  timezone: string;
}

export interface DecodeResult {
  events: CalendarEvent[];
  warnings: string[];
  /** VEVENT components seen, including skipped ones */
  componentCount: number;
  skippedCount: number;
}

interface DecodedDate {
  value: DateTime;
  allDay: boolean;
}

type EventProperties = Map<string, ContentLine>;

/**
 * Parse a DTSTART/DTEND line
 * Returns null when the value is not a DATE or DATE-TIME this decoder reads.
 */
export function parseDateProperty(line: ContentLine, timezone: string): DecodedDate | null {
  const raw = line.value.trim();
  const allDay = line.params.get('VALUE')?.toUpperCase() === 'DATE' || DATE_ONLY_VALUE.test(raw);

  let value: DateTime;
  if (allDay) {
    value = DateTime.fromFormat(raw, DATE_FORMAT, { zone: timezone });
  } else if (raw.endsWith('Z')) {
    value = DateTime.fromFormat(raw.slice(0, -1), LOCAL_TIME_FORMAT, { zone: 'utc' }).setZone(timezone);
  } else {
    const tzid = line.params.get('TZID');
    const zone = tzid !== undefined && isKnownTimezone(tzid) ? tzid : timezone;
    value = DateTime.fromFormat(raw, LOCAL_TIME_FORMAT, { zone }).setZone(timezone);
  }

  return value.isValid ? { value, allDay } : null;
}

function textValue(properties: EventProperties, name: string): string | undefined {
  const line = properties.get(name);
  if (!line) {
    return undefined;
  }
  const value = unescapeText(line.value);
  return value.trim() === '' ? undefined : value;
}

function categoryName(properties: EventProperties): string | undefined {
  const line = properties.get('CATEGORIES');
  if (!line) {
    return undefined;
  }
  const first = splitTextList(line.value)[0];
  return first !== undefined && first.trim() !== '' ? first : undefined;
}

/**
 * Decode ICS text into canonical events
 *
 * Each VEVENT is handled on its own: one with an unparseable date is
 * skipped with a warning and still counted in componentCount.
 */
export function decode(icsText: string, options: DecodeOptions): DecodeResult {
  const components: EventProperties[] = [];
  let current: EventProperties | null = null;
  let nestedDepth = 0;
  let fallbackCalendarName = '';

  for (const rawLine of unfoldLines(icsText)) {
    const line = parseContentLine(rawLine);
    if (!line) continue;

    const marker = line.value.trim().toUpperCase();

    if (current) {
      if (line.name === 'BEGIN') {
        nestedDepth++;
      } else if (line.name === 'END' && nestedDepth > 0) {
        nestedDepth--;
      } else if (line.name === 'END' && marker === 'VEVENT') {
        components.push(current);
        current = null;
      } else if (nestedDepth === 0 && !current.has(line.name)) {
        current.set(line.name, line);
      }
      continue;
    }

    if (line.name === 'BEGIN' && marker === 'VEVENT') {
      current = new Map();
      nestedDepth = 0;
    } else if (line.name === 'X-WR-CALNAME') {
      fallbackCalendarName = unescapeText(line.value);
    }
  }

  const events: CalendarEvent[] = [];
  const warnings: string[] = [];

  components.forEach((properties, index) => {
    const uid = textValue(properties, 'UID');
    const label = uid !== undefined ? `VEVENT #${index + 1} (${uid})` : `VEVENT #${index + 1}`;

    const startLine = properties.get('DTSTART');
    const start = startLine ? parseDateProperty(startLine, options.timezone) : null;
    if (!start) {
      warnings.push(`Skipped ${label}: missing or unparseable DTSTART`);
      return;
    }

    const endLine = properties.get('DTEND');
    let end: DateTime;
    if (endLine) {
      const decodedEnd = parseDateProperty(endLine, options.timezone);
      if (!decodedEnd) {
        warnings.push(`Skipped ${label}: unparseable DTEND`);
        return;
      }
      end = decodedEnd.value;
    } else {
      end = start.allDay ? start.value.plus({ days: 1 }) : start.value;
    }

    if (end < start.value) {
      warnings.push(`Skipped ${label}: DTEND is before DTSTART`);
      return;
    }

    const title = textValue(properties, 'SUMMARY') ?? UNTITLED_EVENT;
    const calendarName = categoryName(properties) ?? fallbackCalendarName;
    const id = uid ?? generateEventId(calendarName, title, start.value);

    const location = textValue(properties, 'LOCATION');
    const description = textValue(properties, 'DESCRIPTION');
    const url = properties.get('URL')?.value.trim();

    const event: CalendarEvent = {
      id,
      calendarName,
      title,
      start: start.value,
      end,
      allDay: start.allDay,
      ...(location !== undefined ? { location } : {}),
      ...(description !== undefined ? { description } : {}),
      ...(url ? { url } : {}),
    };
    events.push(Object.freeze(event));
  });

  const skippedCount = components.length - events.length;
  if (skippedCount > 0) {
    icsLogger.warn({ skippedCount, componentCount: components.length }, 'Skipped malformed VEVENT components');
  }

  return { events, warnings, componentCount: components.length, skippedCount };
}

/**
 * Event Normalizer
 * Turns raw calendar source records into canonical event records,
 * applying detail suppression and title truncation.
 */

import { createHash } from 'crypto';
import type { DateTime } from 'luxon';
import type { CalendarEvent, RawCalendarEvent } from '../types/event.js';
import { parseSourceDate } from '../utils/dates.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('normalizer');

export const TITLE_ELLIPSIS = '...';
export const UNTITLED_EVENT = '(No Title)';
export const GENERATED_ID_DOMAIN = 'calendar-exporter';

export interface NormalizeOptions {
  includeDetails: boolean;
  /** 0 = unlimited */
  titleLengthLimit: number;
  timezone: string;
}

export interface NormalizeResult {
  events: CalendarEvent[];
  warnings: string[];
}

/**
 * Truncate a title to `limit` characters and mark it with an ellipsis
 * Counts code points, so a surrogate pair is never split.
 */
export function truncateTitle(title: string, limit: number): string {
  if (limit <= 0) {
    return title;
  }

  const chars = Array.from(title);
  if (chars.length <= limit) {
    return title;
  }

  return chars.slice(0, limit).join('') + TITLE_ELLIPSIS;
}

/**
 * Stable identifier for events the source reported without one
 */
export function generateEventId(calendarName: string, title: string, start: DateTime): string {
  const hash = createHash('sha1')
    .update(`${calendarName}\u0000${title}\u0000${start.toMillis()}`)
    .digest('hex');
  return `${hash.slice(0, 20)}@${GENERATED_ID_DOMAIN}`;
}

function presentOrUndefined(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

type EventDetails = Pick<CalendarEvent, 'location' | 'description' | 'url'>;

/**
 * Detail fields that carry a value; empty strings count as absent
 */
function pickDetails(raw: RawCalendarEvent): EventDetails {
  const details: { -readonly [K in keyof EventDetails]: EventDetails[K] } = {};
  const location = presentOrUndefined(raw.location);
  const description = presentOrUndefined(raw.description);
  const url = presentOrUndefined(raw.url);

  if (location !== undefined) details.location = location;
  if (description !== undefined) details.description = description;
  if (url !== undefined) details.url = url;

  return details;
}

function describeRaw(raw: RawCalendarEvent): string {
  const title = raw.title ?? UNTITLED_EVENT;
  const id = raw.eventId ? ` (${raw.eventId})` : '';
  return `'${title}'${id} in '${raw.calendarName}'`;
}

/**
 * Resolve all-day bounds to midnight values with an exclusive end
 * Sources report the last day as 23:59:59 or as the same date.
 */
function allDayBounds(start: DateTime, end: DateTime): { start: DateTime; end: DateTime } {
  const dayStart = start.startOf('day');
  const endIsMidnight = end.equals(end.startOf('day'));

  if (endIsMidnight && end > dayStart) {
    return { start: dayStart, end };
  }

  return { start: dayStart, end: end.startOf('day').plus({ days: 1 }) };
}

/**
 * Normalize raw source events
 *
 * Output preserves source order. Records with a missing or unparseable
 * start or end, or an end before the start, are skipped with a warning.
 */
export function normalize(rawEvents: RawCalendarEvent[], options: NormalizeOptions): NormalizeResult {
  const events: CalendarEvent[] = [];
  const warnings: string[] = [];

  for (const raw of rawEvents) {
    const start = parseSourceDate(raw.startDate, options.timezone);
    const end = parseSourceDate(raw.endDate, options.timezone);

    if (!start || !end) {
      const missing = !start ? 'start' : 'end';
      warnings.push(`Skipped event ${describeRaw(raw)}: missing or unparseable ${missing} date`);
      continue;
    }

    if (end < start) {
      warnings.push(`Skipped event ${describeRaw(raw)}: end is before start`);
      continue;
    }

    const bounds = raw.allDay ? allDayBounds(start, end) : { start, end };
    const sourceTitle = presentOrUndefined(raw.title) ?? UNTITLED_EVENT;
    const id = presentOrUndefined(raw.eventId) ?? generateEventId(raw.calendarName, sourceTitle, bounds.start);

    const event: CalendarEvent = {
      id,
      calendarName: raw.calendarName,
      title: truncateTitle(sourceTitle, options.titleLengthLimit),
      start: bounds.start,
      end: bounds.end,
      allDay: raw.allDay,
      ...(options.includeDetails ? pickDetails(raw) : {}),
    };

    events.push(Object.freeze(event));
  }

  logger.debug(
    { received: rawEvents.length, normalized: events.length, skipped: warnings.length },
    'Normalized calendar events'
  );

  return { events, warnings };
}

/**
 * ICS Encoder
 * Serializes canonical events into a single VCALENDAR with an embedded
 * VTIMEZONE for the export zone.
 */

import { DateTime } from 'luxon';
import type { CalendarEvent } from '../types/event.js';
import { ConfigurationError } from '../types/errors.js';
import { icsLogger } from '../utils/logger.js';
import { CRLF, escapeText, foldLine } from './ics-text.js';
import { getTimezoneDefinition, isKnownTimezone, renderTimezone } from './timezone-definition.js';

export const PRODUCT_ID = '-//calendar-exporter//calendar-exporter//EN';
export const ALL_DAY_MARKER = 'X-MICROSOFT-CDO-ALLDAYEVENT:TRUE';

const LOCAL_TIME_FORMAT = "yyyyMMdd'T'HHmmss";
const DATE_FORMAT = 'yyyyMMdd';

function dateProperty(name: 'DTSTART' | 'DTEND', value: DateTime, allDay: boolean, timezoneId: string): string {
  if (allDay) {
    return `${name};VALUE=DATE:${value.toFormat(DATE_FORMAT)}`;
  }
  const local = value.setZone(timezoneId).toFormat(LOCAL_TIME_FORMAT);
  // A wall time inside the repeated hour after a DST change names two instants
  if (DateTime.fromFormat(local, LOCAL_TIME_FORMAT, { zone: timezoneId }).toMillis() !== value.toMillis()) {
    return `${name}:${value.toUTC().toFormat(LOCAL_TIME_FORMAT)}Z`;
  }
  return `${name};TZID=${timezoneId}:${local}`;
}

function encodeEvent(event: CalendarEvent, timezoneId: string): string[] {
  const lines = [
    'BEGIN:VEVENT',
    `UID:${escapeText(event.id)}`,
    `CATEGORIES:${escapeText(event.calendarName)}`,
    `SUMMARY:${escapeText(event.title)}`,
    dateProperty('DTSTART', event.start, event.allDay, timezoneId),
    dateProperty('DTEND', event.end, event.allDay, timezoneId),
  ];

  if (event.allDay) {
    lines.push(ALL_DAY_MARKER);
  }
  if (event.location !== undefined) {
    lines.push(`LOCATION:${escapeText(event.location)}`);
  }
  if (event.description !== undefined) {
    lines.push(`DESCRIPTION:${escapeText(event.description)}`);
  }
  if (event.url !== undefined) {
    // URI values are not TEXT and take no escaping
    lines.push(`URL:${event.url}`);
  }

  lines.push('END:VEVENT');
  return lines;
}

/**
 * Encode events as iCalendar text
 *
 * Output carries no clock-derived values, so identical input yields
 * byte-identical output.
 *
 * @throws ConfigurationError when timezoneId is not a known IANA zone
 */
export function encode(events: readonly CalendarEvent[], calendarName: string, timezoneId: string): string {
  if (!isKnownTimezone(timezoneId)) {
    throw new ConfigurationError('timezone', `Unknown timezone: ${timezoneId}`);
  }

  const lines = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    `PRODID:${PRODUCT_ID}`,
    'CALSCALE:GREGORIAN',
    'METHOD:PUBLISH',
    `X-WR-CALNAME:${escapeText(calendarName)}`,
    `X-WR-TIMEZONE:${timezoneId}`,
    ...renderTimezone(getTimezoneDefinition(timezoneId)),
  ];

  for (const event of events) {
    lines.push(...encodeEvent(event, timezoneId));
  }

  lines.push('END:VCALENDAR');

  icsLogger.debug({ events: events.length, calendarName, timezoneId }, 'Encoded ICS artifact');

  return lines.map(foldLine).join(CRLF) + CRLF;
}

/**
 * VTIMEZONE generation
 *
 * Derives STANDARD/DAYLIGHT observances for an IANA zone from the
 * transitions luxon reports in a fixed reference year, and expresses them
 * as yearly RRULEs anchored in 1970.
 */

import { DateTime, FixedOffsetZone, IANAZone } from 'luxon';
import { formatUtcOffset } from './ics-text.js';

/** Fixed so that generated artifacts do not depend on the run date */
export const RULE_REFERENCE_YEAR = 2025;

const ANCHOR_YEAR = 1970;
const DAY_MS = 24 * 60 * 60 * 1000;
const WEEKDAY_CODES = ['MO', 'TU', 'WE', 'TH', 'FR', 'SA', 'SU'] as const;

/**
 * Abbreviations Intl does not report for en-US (it prints `GMT+1` instead)
 * [standard, daylight]
 */
const ZONE_ABBREVIATIONS: Record<string, readonly [string, string?]> = {
  'Europe/Amsterdam': ['CET', 'CEST'],
  'Europe/Berlin': ['CET', 'CEST'],
  'Europe/Brussels': ['CET', 'CEST'],
  'Europe/Budapest': ['CET', 'CEST'],
  'Europe/Copenhagen': ['CET', 'CEST'],
  'Europe/Madrid': ['CET', 'CEST'],
  'Europe/Oslo': ['CET', 'CEST'],
  'Europe/Paris': ['CET', 'CEST'],
  'Europe/Prague': ['CET', 'CEST'],
  'Europe/Rome': ['CET', 'CEST'],
  'Europe/Stockholm': ['CET', 'CEST'],
  'Europe/Vienna': ['CET', 'CEST'],
  'Europe/Warsaw': ['CET', 'CEST'],
  'Europe/Zurich': ['CET', 'CEST'],
  'Europe/London': ['GMT', 'BST'],
  'Europe/Lisbon': ['WET', 'WEST'],
  'Europe/Athens': ['EET', 'EEST'],
  'Europe/Helsinki': ['EET', 'EEST'],
  'Asia/Kolkata': ['IST'],
  'Asia/Tokyo': ['JST'],
  'Australia/Melbourne': ['AEST', 'AEDT'],
  'Australia/Sydney': ['AEST', 'AEDT'],
};

export interface TimezoneObservance {
  /** Local wall time of the first onset, `yyyyMMddTHHmmss` */
  dtstart: string;
  rrule?: string;
  /** Minutes east of UTC */
  offsetFrom: number;
  offsetTo: number;
  name?: string;
}

export interface TimezoneDefinition {
  tzid: string;
  standard: TimezoneObservance;
  daylight?: TimezoneObservance;
}

interface Transition {
  /** First instant (epoch ms) with the new offset */
  at: number;
  offsetFrom: number;
  offsetTo: number;
}

const definitionCache = new Map<string, TimezoneDefinition>();

export function isKnownTimezone(tzid: string): boolean {
  return IANAZone.isValidZone(tzid);
}

function offsetAt(millis: number, tzid: string): number {
  return DateTime.fromMillis(millis, { zone: tzid }).offset;
}

function findTransitions(tzid: string, year: number): Transition[] {
  const yearStart = DateTime.utc(year, 1, 1).toMillis();
  const yearEnd = DateTime.utc(year + 1, 1, 1).toMillis();
  const transitions: Transition[] = [];

  let cursor = yearStart;
  let cursorOffset = offsetAt(cursor, tzid);

  while (cursor < yearEnd) {
    const next = Math.min(cursor + DAY_MS, yearEnd);
    const nextOffset = offsetAt(next, tzid);

    if (nextOffset !== cursorOffset) {
      let lo = cursor;
      let hi = next;
      while (hi - lo > 1) {
        const mid = lo + Math.floor((hi - lo) / 2);
        if (offsetAt(mid, tzid) === cursorOffset) {
          lo = mid;
        } else {
          hi = mid;
        }
      }
      transitions.push({ at: hi, offsetFrom: cursorOffset, offsetTo: nextOffset });
    }

    cursor = next;
    cursorOffset = nextOffset;
  }

  return transitions;
}

/**
 * Day of month of the n-th (or, for -1, last) weekday
 * @param weekday - luxon weekday, 1 = Monday
 */
function nthWeekdayOfMonth(year: number, month: number, weekday: number, ordinal: number): number {
  const first = DateTime.utc(year, month, 1);
  if (ordinal > 0) {
    const delta = (weekday - first.weekday + 7) % 7;
    return 1 + delta + (ordinal - 1) * 7;
  }

  const last = first.endOf('month');
  const delta = (last.weekday - weekday + 7) % 7;
  return last.day - delta;
}

function abbreviation(tzid: string, millis: number, kind: 'standard' | 'daylight'): string | undefined {
  const known = ZONE_ABBREVIATIONS[tzid];
  if (known) {
    return kind === 'standard' ? known[0] : known[1];
  }

  const name = DateTime.fromMillis(millis, { zone: tzid }).setLocale('en-US').offsetNameShort;
  return name && /^[A-Z]{2,5}$/.test(name) ? name : undefined;
}

function observanceFromTransition(
  tzid: string,
  transition: Transition,
  kind: 'standard' | 'daylight'
): TimezoneObservance {
  // Onset is expressed in the wall time that was in effect before it
  const local = DateTime.fromMillis(transition.at, {
    zone: FixedOffsetZone.instance(transition.offsetFrom),
  });
  const daysInMonth = local.daysInMonth ?? 31;
  const ordinal = local.day + 7 > daysInMonth ? -1 : Math.ceil(local.day / 7);
  const weekdayCode = WEEKDAY_CODES[local.weekday - 1];
  const anchorDay = nthWeekdayOfMonth(ANCHOR_YEAR, local.month, local.weekday, ordinal);

  const anchor = DateTime.utc(ANCHOR_YEAR, local.month, anchorDay, local.hour, local.minute, local.second);

  return {
    dtstart: anchor.toFormat("yyyyMMdd'T'HHmmss"),
    rrule: `FREQ=YEARLY;BYMONTH=${local.month};BYDAY=${ordinal}${weekdayCode}`,
    offsetFrom: transition.offsetFrom,
    offsetTo: transition.offsetTo,
    name: abbreviation(tzid, transition.at, kind),
  };
}

function fixedObservance(tzid: string, millis: number): TimezoneObservance {
  const offset = offsetAt(millis, tzid);
  return {
    dtstart: `${ANCHOR_YEAR}0101T000000`,
    offsetFrom: offset,
    offsetTo: offset,
    name: abbreviation(tzid, millis, 'standard'),
  };
}

/**
 * Build the timezone definition for an IANA zone
 * @throws Error when luxon does not know the zone
 */
export function getTimezoneDefinition(tzid: string): TimezoneDefinition {
  const cached = definitionCache.get(tzid);
  if (cached) {
    return cached;
  }

  if (!isKnownTimezone(tzid)) {
    throw new Error(`Unknown timezone: ${tzid}`);
  }

  const transitions = findTransitions(tzid, RULE_REFERENCE_YEAR);
  const toDaylight = transitions.find((t) => t.offsetTo > t.offsetFrom);
  const toStandard = transitions.find((t) => t.offsetTo < t.offsetFrom);

  const definition: TimezoneDefinition =
    toDaylight && toStandard
      ? {
          tzid,
          standard: observanceFromTransition(tzid, toStandard, 'standard'),
          daylight: observanceFromTransition(tzid, toDaylight, 'daylight'),
        }
      : {
          tzid,
          standard: fixedObservance(tzid, DateTime.utc(RULE_REFERENCE_YEAR + 1, 1, 1).toMillis()),
        };

  definitionCache.set(tzid, definition);
  return definition;
}

function renderObservance(kind: 'STANDARD' | 'DAYLIGHT', observance: TimezoneObservance): string[] {
  const lines = [`BEGIN:${kind}`, `DTSTART:${observance.dtstart}`];
  if (observance.rrule) {
    lines.push(`RRULE:${observance.rrule}`);
  }
  lines.push(`TZOFFSETFROM:${formatUtcOffset(observance.offsetFrom)}`);
  lines.push(`TZOFFSETTO:${formatUtcOffset(observance.offsetTo)}`);
  if (observance.name) {
    lines.push(`TZNAME:${observance.name}`);
  }
  lines.push(`END:${kind}`);
  return lines;
}

/**
 * VTIMEZONE component lines for a definition
 */
export function renderTimezone(definition: TimezoneDefinition): string[] {
  const lines = ['BEGIN:VTIMEZONE', `TZID:${definition.tzid}`];
  lines.push(...renderObservance('STANDARD', definition.standard));
  if (definition.daylight) {
    lines.push(...renderObservance('DAYLIGHT', definition.daylight));
  }
  lines.push('END:VTIMEZONE');
  return lines;
}

/**
 * Date parsing helpers shared by calendar sources and the normalizer
 */

import { DateTime } from 'luxon';

const WALL_TIME_FORMAT = 'yyyy-MM-dd HH:mm:ss';
const DATE_ONLY_FORMAT = 'yyyy-MM-dd';

/**
 * Parse a calendar source date into a DateTime in the given zone
 *
 * Accepts `yyyy-MM-dd HH:mm:ss` and `yyyy-MM-dd` as wall time in `zone`,
 * and ISO 8601 values, whose own offset wins when present.
 * Returns null when the value cannot be parsed.
 */
export function parseSourceDate(value: string | undefined, zone: string): DateTime | null {
  if (value === undefined) {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed === '') {
    return null;
  }

  const candidates = [
    DateTime.fromFormat(trimmed, WALL_TIME_FORMAT, { zone }),
    DateTime.fromFormat(trimmed, DATE_ONLY_FORMAT, { zone }),
    DateTime.fromISO(trimmed, { zone, setZone: false }),
  ];

  for (const candidate of candidates) {
    if (candidate.isValid) {
      return candidate.setZone(zone);
    }
  }

  return null;
}

/**
 * Format a DateTime as source wall time (`yyyy-MM-dd HH:mm:ss`) in its zone
 */
export function formatWallTime(value: DateTime): string {
  return value.toFormat(WALL_TIME_FORMAT);
}

/**
 * Whether a DateTime falls within the half-open range [start, end)
 */
export function isWithinRange(value: DateTime, start: DateTime, end: DateTime): boolean {
  const millis = value.toMillis();
  return millis >= start.toMillis() && millis < end.toMillis();
}

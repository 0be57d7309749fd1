/**
 * Export window resolution
 */

import { DateTime } from 'luxon';
import type { ExportWindow } from '../types/event.js';

export interface WindowOptions {
  daysAhead: number;
  daysBehind: number;
  timezone: string;
}

/**
 * Compute [today - daysBehind, today + daysAhead) in the configured zone
 *
 * `today` is local midnight of `now`. Reads and deletions of a run share
 * the returned window.
 */
export function computeExportWindow(now: Date, options: WindowOptions): ExportWindow {
  const today = DateTime.fromJSDate(now, { zone: options.timezone }).startOf('day');

  return {
    start: today.minus({ days: options.daysBehind }),
    end: today.plus({ days: options.daysAhead }),
    timezone: options.timezone,
  };
}

/**
 * Half-open notation, e.g. `[2026-09-18, 2026-11-17)`
 */
export function describeWindow(window: ExportWindow): string {
  return `[${window.start.toISODate()}, ${window.end.toISODate()})`;
}

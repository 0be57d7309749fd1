/**
 * Calendar event type definitions
 *
 * Raw records as reported by a calendar source, and the canonical
 * records passed between the normalizer, the ICS codec and the engine.
 */

import type { DateTime } from 'luxon';

/**
 * Calendar metadata reported by a calendar source
 */
export interface CalendarInfo {
  title: string;
  id: string;
  type: string;
  source: string;
}

/**
 * Event record as returned by a calendar source
 *
 * Dates are either `yyyy-MM-dd HH:mm:ss` wall time in the configured zone,
 * `yyyy-MM-dd` date-only values, or ISO 8601 instants with an offset.
 */
export interface RawCalendarEvent {
  eventId?: string;
  calendarName: string;
  title?: string;
  startDate?: string;
  endDate?: string;
  allDay: boolean;
  location?: string;
  description?: string;
  url?: string;
}

/**
 * Canonical event record
 * start <= end; all-day events hold midnight values with an exclusive end.
 */
export interface CalendarEvent {
  readonly id: string;
  readonly calendarName: string;
  readonly title: string;
  readonly start: DateTime;
  readonly end: DateTime;
  readonly allDay: boolean;
  readonly location?: string;
  readonly description?: string;
  readonly url?: string;
}

/**
 * Half-open date range [start, end) used for reading and deleting
 */
export interface ExportWindow {
  readonly start: DateTime;
  readonly end: DateTime;
  readonly timezone: string;
}

/**
 * Serialized ICS text plus the calendar name it declares
 */
export interface ExportArtifact {
  content: string;
  calendarName: string;
  eventCount: number;
}

/**
 * Per-event failure reported by a delete or create operation
 */
export interface EventOperationError {
  eventId?: string;
  title?: string;
  message: string;
}

export interface DeleteEventsResult {
  deletedCount: number;
  errors: EventOperationError[];
}

export interface CreateEventsResult {
  createdCount: number;
  errors: EventOperationError[];
}

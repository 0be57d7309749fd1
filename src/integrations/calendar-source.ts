/**
 * Calendar Source
 * Capability the export engine needs from a calendar store.
 *
 * Implementations raise CalendarAccessError when the store cannot be used
 * and CalendarNotFoundError for an unknown calendar name. Listing and
 * deletion both select events whose start lies in [start, end).
 */

import type { DateTime } from 'luxon';
import type {
  CalendarEvent,
  CalendarInfo,
  CreateEventsResult,
  DeleteEventsResult,
  RawCalendarEvent,
} from '../types/event.js';

export interface CalendarSource {
  /**
   * Acquire read/write access, blocking until granted, denied or timed out
   */
  requestAccess(): Promise<void>;

  listCalendars(): Promise<CalendarInfo[]>;

  /**
   * @param calendarNames - calendars to read; undefined reads every calendar
   */
  listEvents(calendarNames: string[] | undefined, start: DateTime, end: DateTime): Promise<RawCalendarEvent[]>;

  deleteEvents(calendarName: string, start: DateTime, end: DateTime): Promise<DeleteEventsResult>;

  createEvents(calendarName: string, events: readonly CalendarEvent[]): Promise<CreateEventsResult>;
}

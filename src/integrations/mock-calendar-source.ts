/**
 * Mock Calendar Source
 *
 * In-memory calendar store used with --mock, as the fallback when the live
 * store is unreachable, and by tests. Unseeded, it serves a fixed weekly
 * schedule for the first calendar it is asked about.
 */

import type { DateTime } from 'luxon';
import { CalendarAccessError, CalendarNotFoundError } from '../types/errors.js';
import type {
  CalendarEvent,
  CalendarInfo,
  CreateEventsResult,
  DeleteEventsResult,
  EventOperationError,
  RawCalendarEvent,
} from '../types/event.js';
import { formatWallTime, isWithinRange, parseSourceDate } from '../utils/dates.js';
import { calendarLogger } from '../utils/logger.js';
import type { CalendarSource } from './calendar-source.js';

export const DEFAULT_MOCK_CALENDARS = ['Work', 'Personal', 'Family', 'Calendar'] as const;

const FIXTURE_FALLBACK_CALENDAR = 'Calendar';

export interface MockCalendarSourceOptions {
  zone: string;
  /** Seeded store; omit to serve the fixture schedule */
  calendars?: Record<string, RawCalendarEvent[]>;
  /** Event ids that refuse deletion */
  lockedEventIds?: string[];
  /** Event ids whose creation fails */
  rejectedEventIds?: string[];
  /** Every operation raises CalendarAccessError */
  denyAccess?: boolean;
}

/**
 * Fixture schedule for the days in [start, end), filtered to events starting in it
 *
 * Weekdays 09:00 team meeting, daily 12:00 lunch, Fridays 15:00 review,
 * Saturdays an all-day brunch, and an all-day holiday on May 1.
 */
export function generateFixtureEvents(calendarName: string, start: DateTime, end: DateTime): RawCalendarEvent[] {
  const events: RawCalendarEvent[] = [];
  let nextId = 1;

  const timed = (day: DateTime, hour: number, title: string, details: Partial<RawCalendarEvent> = {}): void => {
    const startAt = day.set({ hour });
    if (!isWithinRange(startAt, start, end)) return;
    events.push({
      eventId: `event-${nextId++}`,
      calendarName,
      title,
      startDate: formatWallTime(startAt),
      endDate: formatWallTime(startAt.plus({ hours: 1 })),
      allDay: false,
      ...details,
    });
  };

  const allDay = (day: DateTime, title: string, details: Partial<RawCalendarEvent> = {}): void => {
    if (!isWithinRange(day, start, end)) return;
    const date = day.toISODate() ?? undefined;
    events.push({
      eventId: `event-${nextId++}`,
      calendarName,
      title,
      startDate: date,
      endDate: date,
      allDay: true,
      ...details,
    });
  };

  for (let day = start.startOf('day'); day < end; day = day.plus({ days: 1 })) {
    if (day.weekday <= 5) {
      timed(day, 9, 'Morning Team Meeting', {
        location: 'Conference Room',
        description: 'Daily team sync-up',
      });
    }

    timed(day, 12, 'Lunch Break');

    if (day.weekday === 5) {
      timed(day, 15, 'Weekly Review', {
        location: 'Main Conference Room',
        description: "Review of the week's progress",
      });
    }

    if (day.weekday === 6) {
      allDay(day, 'Weekend Brunch', { location: 'Cafe Central', description: 'Brunch with friends' });
    }

    if (day.month === 5 && day.day === 1) {
      allDay(day, 'Labor Day', { description: 'Public Holiday' });
    }
  }

  return events;
}

/**
 * Convert a canonical event back into the record shape sources report
 * All-day ends are stored as the exclusive end date.
 */
export function toRawEvent(event: CalendarEvent, calendarName: string): RawCalendarEvent {
  return {
    eventId: event.id,
    calendarName,
    title: event.title,
    startDate: event.allDay ? (event.start.toISODate() ?? undefined) : formatWallTime(event.start),
    endDate: event.allDay ? (event.end.toISODate() ?? undefined) : formatWallTime(event.end),
    allDay: event.allDay,
    location: event.location,
    description: event.description,
    url: event.url,
  };
}

export class MockCalendarSource implements CalendarSource {
  private readonly store = new Map<string, RawCalendarEvent[]>();
  private readonly lockedEventIds: Set<string>;
  private readonly rejectedEventIds: Set<string>;
  private readonly options: MockCalendarSourceOptions;
  private fixtureCalendar: string | null = null;

  constructor(options: MockCalendarSourceOptions) {
    this.options = options;
    this.lockedEventIds = new Set(options.lockedEventIds ?? []);
    this.rejectedEventIds = new Set(options.rejectedEventIds ?? []);

    const seeded = options.calendars ?? Object.fromEntries(DEFAULT_MOCK_CALENDARS.map((name): [string, RawCalendarEvent[]] => [name, []]));
    for (const [name, events] of Object.entries(seeded)) {
      this.store.set(name, [...events]);
    }
  }

  get servesFixtures(): boolean {
    return this.options.calendars === undefined;
  }

  async requestAccess(): Promise<void> {
    this.assertAccess();
  }

  async listCalendars(): Promise<CalendarInfo[]> {
    this.assertAccess();
    return Array.from(this.store.keys()).map((title, index) => ({
      title,
      id: `mock-calendar-${index + 1}`,
      type: 'local',
      source: 'Mock',
    }));
  }

  async listEvents(calendarNames: string[] | undefined, start: DateTime, end: DateTime): Promise<RawCalendarEvent[]> {
    this.assertAccess();

    if (this.servesFixtures) {
      return this.listFixtureEvents(calendarNames, start, end);
    }

    const names = calendarNames ?? Array.from(this.store.keys());
    const events: RawCalendarEvent[] = [];
    for (const name of names) {
      events.push(...this.calendarEvents(name).filter((event) => this.startsWithin(event, start, end)));
    }
    return events;
  }

  async deleteEvents(calendarName: string, start: DateTime, end: DateTime): Promise<DeleteEventsResult> {
    this.assertAccess();

    const kept: RawCalendarEvent[] = [];
    const errors: EventOperationError[] = [];
    let deletedCount = 0;

    for (const event of this.calendarEvents(calendarName)) {
      const eventStart = parseSourceDate(event.startDate, this.options.zone);
      if (eventStart === null || !isWithinRange(eventStart, start, end)) {
        kept.push(event);
      } else if (event.eventId !== undefined && this.lockedEventIds.has(event.eventId)) {
        kept.push(event);
        errors.push({ eventId: event.eventId, title: event.title, message: 'Event is read-only' });
      } else {
        deletedCount++;
      }
    }

    this.store.set(calendarName, kept);
    calendarLogger.debug({ calendarName, deletedCount, failed: errors.length }, 'Deleted mock events');
    return { deletedCount, errors };
  }

  async createEvents(calendarName: string, events: readonly CalendarEvent[]): Promise<CreateEventsResult> {
    this.assertAccess();

    const target = this.calendarEvents(calendarName);
    const errors: EventOperationError[] = [];
    let createdCount = 0;

    for (const event of events) {
      if (this.rejectedEventIds.has(event.id)) {
        errors.push({ eventId: event.id, title: event.title, message: 'Event could not be saved' });
        continue;
      }
      target.push(toRawEvent(event, calendarName));
      createdCount++;
    }

    return { createdCount, errors };
  }

  /**
   * Current contents of a calendar
   */
  eventsIn(calendarName: string): RawCalendarEvent[] {
    return [...(this.store.get(calendarName) ?? [])];
  }

  private listFixtureEvents(calendarNames: string[] | undefined, start: DateTime, end: DateTime): RawCalendarEvent[] {
    const requested = calendarNames?.[0] ?? FIXTURE_FALLBACK_CALENDAR;
    if (this.fixtureCalendar === null) {
      this.fixtureCalendar = requested;
    }
    if (requested !== this.fixtureCalendar) {
      return [];
    }

    const events = generateFixtureEvents(requested, start, end);
    calendarLogger.info({ calendarName: requested, count: events.length }, 'Generated mock events');
    return events;
  }

  private calendarEvents(calendarName: string): RawCalendarEvent[] {
    const events = this.store.get(calendarName);
    if (!events) {
      throw new CalendarNotFoundError(calendarName);
    }
    return events;
  }

  private startsWithin(event: RawCalendarEvent, start: DateTime, end: DateTime): boolean {
    const eventStart = parseSourceDate(event.startDate, this.options.zone);
    // Unparseable records are passed on for the normalizer to report
    return eventStart === null || isWithinRange(eventStart, start, end);
  }

  private assertAccess(): void {
    if (this.options.denyAccess) {
      throw new CalendarAccessError('Calendar access denied');
    }
  }
}

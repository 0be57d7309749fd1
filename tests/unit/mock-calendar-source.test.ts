/**
 * Mock calendar source tests
 */

import { DateTime } from 'luxon';
import { generateFixtureEvents, MockCalendarSource } from '../../src/integrations/mock-calendar-source.js';
import type { CalendarEvent } from '../../src/types/event.js';
import { CalendarAccessError, CalendarNotFoundError } from '../../src/types/errors.js';
import { rawEvent } from '../helpers/index.js';

const ZONE = 'Europe/Berlin';

function berlin(iso: string): DateTime {
  return DateTime.fromISO(iso, { zone: ZONE });
}

describe('generateFixtureEvents', () => {
  it('should build the weekly schedule', () => {
    // Monday to Sunday
    const events = generateFixtureEvents('Work', berlin('2026-03-09T00:00:00'), berlin('2026-03-16T00:00:00'));

    expect(events).toHaveLength(14);
    expect(events[0]).toEqual({
      eventId: 'event-1',
      calendarName: 'Work',
      title: 'Morning Team Meeting',
      startDate: '2026-03-09 09:00:00',
      endDate: '2026-03-09 10:00:00',
      allDay: false,
      location: 'Conference Room',
      description: 'Daily team sync-up',
    });
    expect(events.filter((event) => event.startDate?.startsWith('2026-03-13')).map((event) => event.title)).toEqual([
      'Morning Team Meeting',
      'Lunch Break',
      'Weekly Review',
    ]);
    expect(events.find((event) => event.title === 'Weekend Brunch')).toEqual({
      eventId: 'event-13',
      calendarName: 'Work',
      title: 'Weekend Brunch',
      startDate: '2026-03-14',
      endDate: '2026-03-14',
      allDay: true,
      location: 'Cafe Central',
      description: 'Brunch with friends',
    });
  });

  it('should add the May 1 holiday', () => {
    // Friday
    const events = generateFixtureEvents('Work', berlin('2026-05-01T00:00:00'), berlin('2026-05-02T00:00:00'));

    expect(events.map((event) => event.title)).toEqual([
      'Morning Team Meeting',
      'Lunch Break',
      'Weekly Review',
      'Labor Day',
    ]);
    expect(events[3].description).toBe('Public Holiday');
    expect(events[3].allDay).toBe(true);
  });

  it('should leave out events starting before the window start', () => {
    const events = generateFixtureEvents('Work', berlin('2026-03-09T11:00:00'), berlin('2026-03-10T00:00:00'));
    expect(events.map((event) => event.title)).toEqual(['Lunch Break']);
  });
});

describe('MockCalendarSource', () => {
  const start = berlin('2026-03-10T00:00:00');
  const end = berlin('2026-03-17T00:00:00');

  describe('fixture mode', () => {
    it('should list the default calendars', async () => {
      const source = new MockCalendarSource({ zone: ZONE });

      await expect(source.listCalendars()).resolves.toEqual([
        { title: 'Work', id: 'mock-calendar-1', type: 'local', source: 'Mock' },
        { title: 'Personal', id: 'mock-calendar-2', type: 'local', source: 'Mock' },
        { title: 'Family', id: 'mock-calendar-3', type: 'local', source: 'Mock' },
        { title: 'Calendar', id: 'mock-calendar-4', type: 'local', source: 'Mock' },
      ]);
    });

    it('should serve fixtures for the first calendar asked about only', async () => {
      const source = new MockCalendarSource({ zone: ZONE });

      const work = await source.listEvents(['Work'], start, end);
      const family = await source.listEvents(['Family'], start, end);

      expect(work).toHaveLength(14);
      expect(family).toEqual([]);
    });

    it('should name fixtures after the default calendar when none is given', async () => {
      const source = new MockCalendarSource({ zone: ZONE });
      const events = await source.listEvents(undefined, start, end);

      expect(new Set(events.map((event) => event.calendarName))).toEqual(new Set(['Calendar']));
    });
  });

  describe('seeded mode', () => {
    function seededSource(): MockCalendarSource {
      return new MockCalendarSource({
        zone: ZONE,
        calendars: {
          Mirror: [
            rawEvent('m-1', 'Mirror', 'Mirror 1', '2026-03-10 09:00:00', '2026-03-10 10:00:00'),
            rawEvent('m-2', 'Mirror', 'Locked', '2026-03-11 09:00:00', '2026-03-11 10:00:00'),
            rawEvent('m-3', 'Mirror', 'Earlier', '2026-03-01 09:00:00', '2026-03-01 10:00:00'),
          ],
        },
        lockedEventIds: ['m-2'],
        rejectedEventIds: ['bad'],
      });
    }

    it('should list events starting inside the window', async () => {
      const events = await seededSource().listEvents(['Mirror'], start, end);
      expect(events.map((event) => event.eventId)).toEqual(['m-1', 'm-2']);
    });

    it('should apply the same half-open window to listing and deletion', async () => {
      const source = new MockCalendarSource({
        zone: ZONE,
        calendars: {
          Mirror: [
            rawEvent('at-start', 'Mirror', 'At start', '2026-03-10 00:00:00', '2026-03-10 01:00:00'),
            rawEvent('before-end', 'Mirror', 'Before end', '2026-03-16 23:59:59', '2026-03-17 00:30:00'),
            rawEvent('at-end', 'Mirror', 'At end', '2026-03-17 00:00:00', '2026-03-17 01:00:00'),
            { eventId: 'day-start', calendarName: 'Mirror', title: 'First day', startDate: '2026-03-10', allDay: true },
            { eventId: 'day-end', calendarName: 'Mirror', title: 'Day after', startDate: '2026-03-17', allDay: true },
          ],
        },
      });

      const listed = await source.listEvents(['Mirror'], start, end);
      const deletion = await source.deleteEvents('Mirror', start, end);

      expect(listed.map((event) => event.eventId)).toEqual(['at-start', 'before-end', 'day-start']);
      expect(deletion).toEqual({ deletedCount: 3, errors: [] });
      expect(source.eventsIn('Mirror').map((event) => event.eventId)).toEqual(['at-end', 'day-end']);
    });

    it('should raise CalendarNotFoundError for unknown calendars', async () => {
      await expect(seededSource().listEvents(['Holidays'], start, end)).rejects.toThrow(CalendarNotFoundError);
    });

    it('should delete inside the window and report locked events', async () => {
      const source = seededSource();

      await expect(source.deleteEvents('Mirror', start, end)).resolves.toEqual({
        deletedCount: 1,
        errors: [{ eventId: 'm-2', title: 'Locked', message: 'Event is read-only' }],
      });
      expect(source.eventsIn('Mirror').map((event) => event.eventId)).toEqual(['m-2', 'm-3']);
    });

    it('should store created events under the target calendar', async () => {
      const source = seededSource();
      const offsite: CalendarEvent = {
        id: 'day-1',
        calendarName: 'Work',
        title: 'Offsite',
        start: berlin('2026-03-14T00:00:00'),
        end: berlin('2026-03-15T00:00:00'),
        allDay: true,
      };
      const rejected: CalendarEvent = { ...offsite, id: 'bad', title: 'Rejected' };

      await expect(source.createEvents('Mirror', [offsite, rejected])).resolves.toEqual({
        createdCount: 1,
        errors: [{ eventId: 'bad', title: 'Rejected', message: 'Event could not be saved' }],
      });
      expect(source.eventsIn('Mirror')[3]).toEqual({
        eventId: 'day-1',
        calendarName: 'Mirror',
        title: 'Offsite',
        startDate: '2026-03-14',
        endDate: '2026-03-15',
        allDay: true,
        location: undefined,
        description: undefined,
        url: undefined,
      });
    });
  });

  it('should deny every operation when access is denied', async () => {
    const source = new MockCalendarSource({ zone: ZONE, denyAccess: true });

    await expect(source.requestAccess()).rejects.toThrow(new CalendarAccessError('Calendar access denied'));
    await expect(source.listCalendars()).rejects.toThrow(CalendarAccessError);
  });
});

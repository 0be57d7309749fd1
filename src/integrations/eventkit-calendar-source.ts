/**
 * EventKit Calendar Source
 * Reads, deletes and creates macOS Calendar events through AppleScriptObjC
 *
 * Scripts exchange dates as ISO 8601 instants (NSISO8601DateFormatter) and
 * return records separated by ASCII record/unit separators. Failures come
 * back as `ERROR:ACCESS:<message>` or `ERROR:NOT_FOUND:<calendar>`.
 */

import type { DateTime } from 'luxon';
import type { AuthorizationStatus, CalendarPlatformInfo } from '../types/calendar.js';
import { CalendarAccessError, CalendarNotFoundError } from '../types/errors.js';
import type {
  CalendarEvent,
  CalendarInfo,
  CreateEventsResult,
  DeleteEventsResult,
  EventOperationError,
  RawCalendarEvent,
} from '../types/event.js';
import { isWithinRange, parseSourceDate } from '../utils/dates.js';
import { calendarLogger } from '../utils/logger.js';
import { retryWithBackoff, SCRIPT_READ_POLICY } from '../utils/retry.js';
import type { CalendarSource } from './calendar-source.js';

export type ScriptRunner = (script: string) => Promise<string>;

export interface EventKitSourceOptions {
  /** Zone the returned wall times are resolved in */
  zone: string;
  authorizationTimeoutMs: number;
  /** Defaults to run-applescript, loaded on first use */
  runScript?: ScriptRunner;
  /** Defaults to process.platform */
  platform?: string;
  /** Wait between read retries; defaults to a timer */
  sleep?: (ms: number) => Promise<void>;
}

export const FIELD_SEPARATOR = '\u001f';
export const RECORD_SEPARATOR = '\u001e';

/** Events per create script; each batch commits on its own */
const CREATE_BATCH_SIZE = 50;

const CALENDAR_TYPES = ['local', 'caldav', 'exchange', 'subscription', 'birthday'] as const;

/**
 * Escape a value for an AppleScript string literal
 */
export function escapeAppleScriptString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

const SCRIPT_HEADER = `
use AppleScript version "2.7"
use framework "Foundation"
use framework "EventKit"
use scripting additions

on textOrEmpty(value)
  if value is missing value then return ""
  return value as text
end textOrEmpty
`;

const SCRIPT_PRELUDE = `${SCRIPT_HEADER}
set theStore to current application's EKEventStore's alloc()'s init()
set accessStatus to (current application's EKEventStore's authorizationStatusForEntityType:0) as integer
if accessStatus is not 3 then
  return "ERROR:ACCESS:Calendar access not granted (status " & accessStatus & ")"
end if

set isoFormatter to current application's NSISO8601DateFormatter's alloc()'s init()
set dayFormatter to current application's NSDateFormatter's alloc()'s init()
dayFormatter's setDateFormat:"yyyy-MM-dd"
set fieldSep to character id 31
set recordSep to character id 30
`;

function findCalendarBlock(calendarName: string): string {
  const name = escapeAppleScriptString(calendarName);
  return `
set targetCalendar to missing value
repeat with aCalendar in ((theStore's calendarsForEntityType:0) as list)
  if ((aCalendar's title()) as text) is "${name}" then
    set targetCalendar to aCalendar
    exit repeat
  end if
end repeat
if targetCalendar is missing value then
  return "ERROR:NOT_FOUND:${name}"
end if
`;
}

function windowBlock(start: DateTime, end: DateTime, calendarList: string): string {
  return `
set startNSDate to isoFormatter's dateFromString:"${start.toUTC().toISO({ suppressMilliseconds: true })}"
set endNSDate to isoFormatter's dateFromString:"${end.toUTC().toISO({ suppressMilliseconds: true })}"
set thePredicate to theStore's predicateForEventsWithStartDate:startNSDate endDate:endNSDate calendars:${calendarList}
set theEvents to (theStore's eventsMatchingPredicate:thePredicate) as list
`;
}

function splitRecords(output: string): string[][] {
  return output
    .split(RECORD_SEPARATOR)
    .map((record) => record.replace(/^[\r\n]+/, ''))
    .filter((record) => record !== '')
    .map((record) => record.split(FIELD_SEPARATOR));
}

/**
 * Raise the error a script reported, if any
 */
export function assertScriptSucceeded(output: string): void {
  const trimmed = output.trim();
  if (trimmed.startsWith('ERROR:NOT_FOUND:')) {
    throw new CalendarNotFoundError(trimmed.substring('ERROR:NOT_FOUND:'.length));
  }
  if (trimmed.startsWith('ERROR:ACCESS:')) {
    throw new CalendarAccessError(trimmed.substring('ERROR:ACCESS:'.length));
  }
  if (trimmed.startsWith('ERROR:')) {
    throw new CalendarAccessError(trimmed.substring('ERROR:'.length));
  }
}

function parseFailures(records: string[][]): EventOperationError[] {
  return records
    .filter((fields) => fields[0] === 'FAILED')
    .map(([, eventId, title, message]) => ({
      eventId: eventId || undefined,
      title: title || undefined,
      message: message || 'Unknown EventKit error',
    }));
}

function countFrom(records: string[][], marker: 'DELETED' | 'CREATED'): number {
  const record = records.find((fields) => fields[0] === marker);
  const count = record ? Number.parseInt(record[1] ?? '', 10) : Number.NaN;
  if (Number.isNaN(count)) {
    throw new CalendarAccessError(`Unexpected EventKit output: missing ${marker} count`);
  }
  return count;
}

/**
 * EventKit Calendar Source
 * Live calendar store access on macOS
 */
export class EventKitCalendarSource implements CalendarSource {
  private runAppleScript: ScriptRunner | null;
  private authorization: Promise<void> | null = null;
  private readonly options: EventKitSourceOptions;

  constructor(options: EventKitSourceOptions) {
    this.options = options;
    this.runAppleScript = options.runScript ?? null;
  }

  /**
   * Detect current platform
   */
  detectPlatform(): CalendarPlatformInfo {
    if ((this.options.platform ?? process.platform) === 'darwin') {
      return { platform: 'macos', hasEventKitAccess: true };
    }
    return { platform: 'unknown', hasEventKitAccess: false };
  }

  /**
   * Request full calendar access
   * The prompt is shown once; later calls reuse the first outcome.
   */
  async requestAccess(): Promise<void> {
    if (!this.authorization) {
      // A failed attempt may be retried by a later call
      this.authorization = this.authorize().catch((error: unknown) => {
        this.authorization = null;
        throw error;
      });
    }
    return this.authorization;
  }

  async listCalendars(): Promise<CalendarInfo[]> {
    const script = `${SCRIPT_PRELUDE}
set output to ""
repeat with aCalendar in ((theStore's calendarsForEntityType:0) as list)
  set calTitle to my textOrEmpty(aCalendar's title())
  set calId to my textOrEmpty(aCalendar's calendarIdentifier())
  set calType to (aCalendar's type()) as integer
  set calSource to my textOrEmpty(aCalendar's source()'s title())
  set output to output & calTitle & fieldSep & calId & fieldSep & calType & fieldSep & calSource & recordSep
end repeat
return output`;

    const output = await this.runRead(script, 'list calendars');
    return splitRecords(output).map(([title = '', id = '', type = '', source = '']) => ({
      title,
      id,
      type: CALENDAR_TYPES[Number.parseInt(type, 10)] ?? 'unknown',
      source,
    }));
  }

  async listEvents(
    calendarNames: string[] | undefined,
    start: DateTime,
    end: DateTime
  ): Promise<RawCalendarEvent[]> {
    if (calendarNames === undefined) {
      return this.listCalendarEvents(undefined, start, end);
    }

    const events: RawCalendarEvent[] = [];
    for (const name of calendarNames) {
      events.push(...(await this.listCalendarEvents(name, start, end)));
    }
    return events;
  }

  /**
   * Build the read script for one calendar, or all calendars when name is undefined
   */
  buildListEventsScript(calendarName: string | undefined, start: DateTime, end: DateTime): string {
    const lookup = calendarName === undefined ? '' : findCalendarBlock(calendarName);
    const calendarList =
      calendarName === undefined ? '(missing value)' : "(current application's NSArray's arrayWithObject:targetCalendar)";

    return `${SCRIPT_PRELUDE}${lookup}${windowBlock(start, end, calendarList)}
set output to ""
repeat with anEvent in theEvents
  set isAllDay to (anEvent's isAllDay()) as boolean
  if isAllDay then
    set eventStart to (dayFormatter's stringFromDate:(anEvent's startDate())) as text
    -- EventKit ends all-day events at 23:59:59 of the last day
    set eventEnd to (dayFormatter's stringFromDate:((anEvent's endDate())'s dateByAddingTimeInterval:1)) as text
  else
    set eventStart to (isoFormatter's stringFromDate:(anEvent's startDate())) as text
    set eventEnd to (isoFormatter's stringFromDate:(anEvent's endDate())) as text
  end if
  set eventUrl to ""
  if (anEvent's |URL|()) is not missing value then set eventUrl to my textOrEmpty(anEvent's |URL|()'s absoluteString())
  set output to output & my textOrEmpty(anEvent's eventIdentifier()) & fieldSep & my textOrEmpty(anEvent's calendar()'s title()) & fieldSep & my textOrEmpty(anEvent's title()) & fieldSep & eventStart & fieldSep & eventEnd & fieldSep & (isAllDay as text) & fieldSep & my textOrEmpty(anEvent's location()) & fieldSep & my textOrEmpty(anEvent's notes()) & fieldSep & eventUrl & recordSep
end repeat
return output`;
  }

  /**
   * Parse list output, keeping events that start inside the window
   * (the EventKit predicate also matches events overlapping it)
   */
  parseListEventsResult(output: string, start: DateTime, end: DateTime): RawCalendarEvent[] {
    const events: RawCalendarEvent[] = [];

    for (const fields of splitRecords(output)) {
      if (fields.length < 6) {
        calendarLogger.warn({ fields: fields.length }, 'Ignoring malformed EventKit record');
        continue;
      }

      const [eventId, calendarName = '', title, startDate, endDate, allDay, location, description, url] = fields;
      const parsedStart = parseSourceDate(startDate, this.options.zone);
      if (parsedStart && !isWithinRange(parsedStart, start, end)) {
        continue;
      }

      events.push({
        eventId: eventId || undefined,
        calendarName,
        title: title || undefined,
        startDate: startDate || undefined,
        endDate: endDate || undefined,
        allDay: allDay === 'true',
        location: location || undefined,
        description: description || undefined,
        url: url || undefined,
      });
    }

    return events;
  }

  buildDeleteEventsScript(calendarName: string, start: DateTime, end: DateTime): string {
    return `${SCRIPT_PRELUDE}${findCalendarBlock(calendarName)}
if not ((targetCalendar's allowsContentModifications()) as boolean) then
  return "ERROR:ACCESS:Calendar '${escapeAppleScriptString(calendarName)}' is read-only"
end if
${windowBlock(start, end, "(current application's NSArray's arrayWithObject:targetCalendar)")}
set deletedCount to 0
set failures to ""
repeat with anEvent in theEvents
  set startsAfter to ((anEvent's startDate()'s compare:startNSDate) as integer) is not -1
  set startsBefore to ((anEvent's startDate()'s compare:endNSDate) as integer) is -1
  if startsAfter and startsBefore then
    set eventId to my textOrEmpty(anEvent's eventIdentifier())
    set eventTitle to my textOrEmpty(anEvent's title())
    set {didRemove, removeError} to theStore's removeEvent:anEvent span:0 commit:false |error|:(reference)
    if didRemove as boolean then
      set deletedCount to deletedCount + 1
    else
      set failures to failures & "FAILED" & fieldSep & eventId & fieldSep & eventTitle & fieldSep & my textOrEmpty(removeError's localizedDescription()) & recordSep
    end if
  end if
end repeat
set {didCommit, commitError} to theStore's commit:(reference)
if not (didCommit as boolean) then
  return "ERROR:ACCESS:" & my textOrEmpty(commitError's localizedDescription())
end if
return "DELETED" & fieldSep & deletedCount & recordSep & failures`;
  }

  async deleteEvents(calendarName: string, start: DateTime, end: DateTime): Promise<DeleteEventsResult> {
    const output = await this.runWrite(this.buildDeleteEventsScript(calendarName, start, end), 'delete events');
    const records = splitRecords(output);
    const result = { deletedCount: countFrom(records, 'DELETED'), errors: parseFailures(records) };

    calendarLogger.info(
      { calendarName, deleted: result.deletedCount, failed: result.errors.length },
      'Deleted events from calendar'
    );
    return result;
  }

  buildCreateEventsScript(calendarName: string, events: readonly CalendarEvent[]): string {
    const blocks = events.map((event) => this.buildCreateEventBlock(event));
    return `${SCRIPT_PRELUDE}${findCalendarBlock(calendarName)}
set createdCount to 0
set failures to ""
${blocks.join('\n')}
set {didCommit, commitError} to theStore's commit:(reference)
if not (didCommit as boolean) then
  return "ERROR:ACCESS:" & my textOrEmpty(commitError's localizedDescription())
end if
return "CREATED" & fieldSep & createdCount & recordSep & failures`;
  }

  private buildCreateEventBlock(event: CalendarEvent): string {
    // EventKit stores all-day ends as the last covered day
    const end = event.allDay ? event.end.minus({ seconds: 1 }) : event.end;
    const iso = (value: DateTime): string => value.toUTC().toISO({ suppressMilliseconds: true }) ?? '';

    const setters = [
      'newEvent\'s setCalendar:targetCalendar',
      `newEvent's setTitle:"${escapeAppleScriptString(event.title)}"`,
      `newEvent's setStartDate:(isoFormatter's dateFromString:"${iso(event.start)}")`,
      `newEvent's setEndDate:(isoFormatter's dateFromString:"${iso(end)}")`,
      `newEvent's setAllDay:${event.allDay ? 'true' : 'false'}`,
    ];
    if (event.location !== undefined) {
      setters.push(`newEvent's setLocation:"${escapeAppleScriptString(event.location)}"`);
    }
    if (event.description !== undefined) {
      setters.push(`newEvent's setNotes:"${escapeAppleScriptString(event.description)}"`);
    }
    if (event.url !== undefined) {
      setters.push(`newEvent's setURL:(current application's NSURL's URLWithString:"${escapeAppleScriptString(event.url)}")`);
    }

    return `
set newEvent to current application's EKEvent's eventWithEventStore:theStore
${setters.join('\n')}
set {didSave, saveError} to theStore's saveEvent:newEvent span:0 commit:false |error|:(reference)
if didSave as boolean then
  set createdCount to createdCount + 1
else
  set failures to failures & "FAILED" & fieldSep & "${escapeAppleScriptString(event.id)}" & fieldSep & "${escapeAppleScriptString(event.title)}" & fieldSep & my textOrEmpty(saveError's localizedDescription()) & recordSep
end if`;
  }

  async createEvents(calendarName: string, events: readonly CalendarEvent[]): Promise<CreateEventsResult> {
    let createdCount = 0;
    const errors: EventOperationError[] = [];

    for (let i = 0; i < events.length; i += CREATE_BATCH_SIZE) {
      const batch = events.slice(i, i + CREATE_BATCH_SIZE);
      let output: string;
      try {
        output = await this.runWrite(this.buildCreateEventsScript(calendarName, batch), 'create events');
      } catch (error) {
        // Nothing committed yet: the whole import failed
        if (i === 0) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        calendarLogger.warn({ calendarName, committed: createdCount, err: error }, 'Create batch failed');
        errors.push(
          ...events.slice(i).map((event) => ({ eventId: event.id, title: event.title, message }))
        );
        break;
      }
      const records = splitRecords(output);
      createdCount += countFrom(records, 'CREATED');
      errors.push(...parseFailures(records));
    }

    calendarLogger.info({ calendarName, created: createdCount, failed: errors.length }, 'Created events in calendar');
    return { createdCount, errors };
  }

  /**
   * Build the authorization script
   * Polls the authorization status until it leaves "not determined" or the timeout passes.
   */
  buildAuthorizationScript(timeoutMs: number): string {
    const timeoutSeconds = Math.max(1, Math.ceil(timeoutMs / 1000));
    return `${SCRIPT_HEADER}
set theStore to current application's EKEventStore's alloc()'s init()
theStore's requestFullAccessToEventsWithCompletion:(missing value)
set waited to 0
repeat
  set accessStatus to (current application's EKEventStore's authorizationStatusForEntityType:0) as integer
  if accessStatus is not 0 then exit repeat
  if waited is greater than or equal to ${timeoutSeconds} then exit repeat
  delay 0.2
  set waited to waited + 0.2
end repeat
if accessStatus is 3 then return "GRANTED"
if accessStatus is 0 then return "TIMEOUT"
return "DENIED"`;
  }

  private async authorize(): Promise<void> {
    const timeoutMs = this.options.authorizationTimeoutMs;
    const runner = await this.getRunner();

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<AuthorizationStatus>((resolve) => {
      // Slack over the script's own poll for osascript start-up
      timer = setTimeout(() => resolve('timeout'), timeoutMs + 5000);
    });

    const status = await Promise.race([
      runner(this.buildAuthorizationScript(timeoutMs)).then((output): AuthorizationStatus => {
        const trimmed = output.trim();
        if (trimmed === 'GRANTED') return 'granted';
        if (trimmed === 'TIMEOUT') return 'timeout';
        return 'denied';
      }),
      timeout,
    ]).finally(() => clearTimeout(timer));

    calendarLogger.info({ status }, 'Calendar authorization finished');

    if (status === 'timeout') {
      throw new CalendarAccessError(`Calendar authorization timed out after ${timeoutMs}ms`);
    }
    if (status === 'denied') {
      throw new CalendarAccessError('Calendar access denied');
    }
  }

  private async getRunner(): Promise<ScriptRunner> {
    if (!this.detectPlatform().hasEventKitAccess) {
      throw new CalendarAccessError('Calendar integration is only available on macOS', {
        platform: this.options.platform ?? process.platform,
      });
    }

    if (!this.runAppleScript) {
      // Lazy load run-applescript
      const module = await import('run-applescript');
      this.runAppleScript = module.runAppleScript;
    }
    return this.runAppleScript;
  }

  private async listCalendarEvents(
    calendarName: string | undefined,
    start: DateTime,
    end: DateTime
  ): Promise<RawCalendarEvent[]> {
    const output = await this.runRead(this.buildListEventsScript(calendarName, start, end), 'list events');
    const events = this.parseListEventsResult(output, start, end);
    calendarLogger.debug({ calendarName: calendarName ?? '(all)', count: events.length }, 'Read calendar events');
    return events;
  }

  private async runRead(script: string, operation: string): Promise<string> {
    const runner = await this.getRunner();
    let output: string;
    try {
      output = await retryWithBackoff(() => runner(script), SCRIPT_READ_POLICY, {
        sleep: this.options.sleep,
        onRetry: (error, attempt, delayMs) => {
          calendarLogger.warn({ operation, attempt, delayMs, err: error }, 'EventKit script failed, retrying');
        },
      });
    } catch (error) {
      throw new CalendarAccessError(
        `EventKit ${operation} failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    assertScriptSucceeded(output);
    return output;
  }

  private async runWrite(script: string, operation: string): Promise<string> {
    const runner = await this.getRunner();
    let output: string;
    try {
      output = await runner(script);
    } catch (error) {
      throw new CalendarAccessError(
        `EventKit ${operation} failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    assertScriptSucceeded(output);
    return output;
  }
}

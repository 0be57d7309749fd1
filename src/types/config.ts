/**
 * Configuration type definitions
 */

import type { LogLevel } from '../utils/logger.js';

export interface SftpConfig {
  host: string;
  port: number;
  username: string;
  password?: string;
  keyFile?: string;
  remotePath: string;
  createDirs: boolean;
  /** Bound on a whole transfer, in ms */
  timeoutMs: number;
}

export interface ExporterConfig {
  /** Calendars to export, in order; empty means all calendars */
  calendarNames: string[];
  daysAhead: number;
  daysBehind: number;
  outputFile: string;
  /** X-WR-CALNAME of the generated artifact */
  icsCalendarName: string;
  /** IANA zone used for wall times and the embedded VTIMEZONE */
  timezone: string;
  includeDetails: boolean;
  /** 0 = unlimited */
  titleLengthLimit: number;
  useMockOnFailure: boolean;
  enableSftp: boolean;
  sftp: SftpConfig;
  /** Target calendar for delete-then-reimport; empty disables it */
  localImportCalendar: string;
  logLevel: LogLevel;
  /** Treat malformed records as fatal */
  strict: boolean;
  authorizationTimeoutMs: number;
}

export const DEFAULT_CONFIG: ExporterConfig = {
  calendarNames: [],
  daysAhead: 30,
  daysBehind: 30,
  outputFile: '~/calendar_export.ics',
  icsCalendarName: 'Exported Calendar',
  timezone: 'Europe/Berlin',
  includeDetails: false,
  titleLengthLimit: 36,
  useMockOnFailure: false,
  enableSftp: false,
  sftp: {
    host: '',
    port: 22,
    username: '',
    remotePath: '/calendar/calendar.ics',
    createDirs: true,
    timeoutMs: 30000,
  },
  localImportCalendar: '',
  logLevel: 'info',
  strict: false,
  authorizationTimeoutMs: 10000,
};

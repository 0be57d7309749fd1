/**
 * Calendar Source Common Types
 *
 * Shared type definitions for the live and mock calendar sources.
 */

/**
 * Supported platform types for calendar operations
 */
export type CalendarPlatform = 'macos' | 'unknown';

/**
 * Platform info reported by the EventKit source
 */
export interface CalendarPlatformInfo {
  platform: CalendarPlatform;
  hasEventKitAccess: boolean;
}

/**
 * Outcome of the calendar authorization handshake
 */
export type AuthorizationStatus = 'granted' | 'denied' | 'timeout';

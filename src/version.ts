/**
 * Version information for calendar-exporter
 *
 * Single source of truth for version number.
 * Import this instead of hardcoding version strings.
 */

// Keep in sync with package.json
export const VERSION = '0.1.0';
export const APP_NAME = 'calendar-exporter';

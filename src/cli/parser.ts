/**
 * CLI Parser for calendar-exporter
 *
 * Parses command line arguments into a command plus configuration
 * overrides. Flags win over the configuration file and environment.
 */

import type { ConfigOverrides } from '../config/loader.js';
import type { SftpConfig } from '../types/config.js';
import { APP_NAME, VERSION } from '../version.js';

export const COMMANDS = ['export', 'list-calendars', 'show-config', 'configure-calendar', 'configure-sftp'] as const;

export type CLICommand = (typeof COMMANDS)[number];

/**
 * CLI Options interface
 */
export interface CLIOptions {
  command: CLICommand;
  /** Path to configuration file */
  config?: string;
  /** Repeatable --calendar values */
  calendars: string[];
  daysAhead?: number;
  daysBehind?: number;
  output?: string;
  name?: string;
  titleLength?: number;
  includeDetails: boolean;
  /** Skip the SFTP upload even when configured */
  noUpload: boolean;
  /** Read from the mock calendar store */
  mock: boolean;
  /** configure-sftp settings */
  host?: string;
  port?: number;
  username?: string;
  keyFile?: string;
  remotePath?: string;
  debug: boolean;
  /** Show help message */
  help: boolean;
  /** Show version */
  version: boolean;
  /** Invalid values and unknown commands */
  errors: string[];
}

/** Flags that take a value; their argument is never a command */
const VALUE_FLAGS = new Set([
  '--config',
  '-c',
  '--calendar',
  '--days-ahead',
  '--days-behind',
  '--output',
  '-o',
  '--name',
  '-n',
  '--title-length',
  '-t',
  '--host',
  '--port',
  '--username',
  '--user',
  '--key-file',
  '--remote-path',
]);

function isCommand(value: string): value is CLICommand {
  return (COMMANDS as readonly string[]).includes(value);
}

/**
 * Get the value of an argument that takes a parameter
 * @param longFlag - Long flag (e.g., '--output')
 * @param shortFlag - Short flag (e.g., '-o')
 */
function getArgValue(args: string[], longFlag: string, shortFlag?: string): string | undefined {
  const values = getArgValues(args, longFlag, shortFlag);
  return values[values.length - 1];
}

/**
 * Every value given for a repeatable flag, in order
 */
function getArgValues(args: string[], longFlag: string, shortFlag?: string): string[] {
  const values: string[] = [];
  for (let i = 0; i < args.length - 1; i++) {
    if (args[i] === longFlag || (shortFlag !== undefined && args[i] === shortFlag)) {
      const value = args[i + 1];
      // Make sure it's not another flag
      if (!value.startsWith('-')) {
        values.push(value);
        i++;
      }
    }
  }
  return values;
}

/**
 * Check if a boolean flag is present in the arguments
 */
function hasFlag(args: string[], longFlag: string, shortFlag?: string): boolean {
  return args.includes(longFlag) || (shortFlag ? args.includes(shortFlag) : false);
}

/**
 * Parse a non-negative integer flag value
 */
function parseCount(value: string | undefined, flag: string, errors: string[]): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  if (!/^\d+$/.test(value)) {
    errors.push(`${flag} expects a non-negative integer, got '${value}'`);
    return undefined;
  }

  return parseInt(value, 10);
}

/**
 * First positional argument, skipping flag values
 */
function findPositional(args: string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      i++;
    } else if (!arg.startsWith('-')) {
      return arg;
    }
  }
  return undefined;
}

/**
 * Parse command line arguments
 * @param args - Command line arguments (without node and script path)
 */
export function parseArgs(args: string[]): CLIOptions {
  const errors: string[] = [];

  const positional = findPositional(args);
  let command: CLICommand = 'export';
  if (positional !== undefined) {
    if (isCommand(positional)) {
      command = positional;
    } else {
      errors.push(`Unknown command '${positional}'`);
    }
  }

  const host = getArgValue(args, '--host');
  const username = getArgValue(args, '--username', '--user');
  if (command === 'configure-sftp') {
    if (host === undefined) errors.push('configure-sftp requires --host');
    if (username === undefined) errors.push('configure-sftp requires --username');
  }

  const port = parseCount(getArgValue(args, '--port'), '--port', errors);
  if (port !== undefined && (port < 1 || port > 65535)) {
    errors.push(`--port expects a value between 1 and 65535, got '${port}'`);
  }

  return {
    command,
    config: getArgValue(args, '--config', '-c'),
    calendars: getArgValues(args, '--calendar'),
    daysAhead: parseCount(getArgValue(args, '--days-ahead'), '--days-ahead', errors),
    daysBehind: parseCount(getArgValue(args, '--days-behind'), '--days-behind', errors),
    output: getArgValue(args, '--output', '-o'),
    name: getArgValue(args, '--name', '-n'),
    titleLength: parseCount(getArgValue(args, '--title-length', '-t'), '--title-length', errors),
    includeDetails: hasFlag(args, '--include-details'),
    noUpload: hasFlag(args, '--no-upload'),
    mock: hasFlag(args, '--mock'),
    host,
    port,
    username,
    keyFile: getArgValue(args, '--key-file'),
    remotePath: getArgValue(args, '--remote-path'),
    debug: hasFlag(args, '--debug'),
    help: hasFlag(args, '--help', '-h'),
    version: hasFlag(args, '--version', '-v'),
    errors,
  };
}

/**
 * Configuration overrides carried by the flags
 */
export function toConfigOverrides(options: CLIOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  if (options.calendars.length > 0) overrides.calendarNames = options.calendars;
  if (options.daysAhead !== undefined) overrides.daysAhead = options.daysAhead;
  if (options.daysBehind !== undefined) overrides.daysBehind = options.daysBehind;
  if (options.output !== undefined) overrides.outputFile = options.output;
  if (options.name !== undefined) overrides.icsCalendarName = options.name;
  if (options.titleLength !== undefined) overrides.titleLengthLimit = options.titleLength;
  if (options.includeDetails) overrides.includeDetails = true;
  if (options.noUpload) overrides.enableSftp = false;
  if (options.debug) overrides.logLevel = 'debug';

  return overrides;
}

/**
 * Settings a configure command writes to the configuration file
 * Only flags that were given change; everything else keeps its saved value.
 */
export function toConfigureChanges(options: CLIOptions): ConfigOverrides {
  if (options.command === 'configure-sftp') {
    const sftp: Partial<SftpConfig> = {};
    if (options.host !== undefined) sftp.host = options.host;
    if (options.port !== undefined) sftp.port = options.port;
    if (options.username !== undefined) sftp.username = options.username;
    if (options.keyFile !== undefined) sftp.keyFile = options.keyFile;
    if (options.remotePath !== undefined) sftp.remotePath = options.remotePath;
    return { enableSftp: true, sftp };
  }

  const changes: ConfigOverrides = {};
  if (options.calendars.length > 0) changes.calendarNames = options.calendars;
  if (options.daysAhead !== undefined) changes.daysAhead = options.daysAhead;
  if (options.daysBehind !== undefined) changes.daysBehind = options.daysBehind;
  if (options.output !== undefined) changes.outputFile = options.output;
  if (options.name !== undefined) changes.icsCalendarName = options.name;
  if (options.titleLength !== undefined) changes.titleLengthLimit = options.titleLength;
  if (options.includeDetails) changes.includeDetails = true;
  return changes;
}

/**
 * Generate help message
 */
export function getHelpMessage(): string {
  return `
${APP_NAME} - export macOS calendars to iCalendar

Usage:
  ${APP_NAME} [command] [options]

Commands:
  export                 Export events and dispatch the artifact (default)
  list-calendars         List calendars in the calendar store
  show-config            Print the effective configuration without secrets
  configure-calendar     Save export settings (calendar options below)
  configure-sftp         Save SFTP settings and enable uploads

Options:
  --config, -c <path>    Path to configuration file
                         (default: ~/.config/${APP_NAME}/config.json)
  --calendar <name>      Calendar to export; repeat for several
  --days-ahead <n>       Days after today to export
  --days-behind <n>      Days before today to export
  --output, -o <path>    Output ICS file
  --name, -n <name>      Calendar name written to the ICS file
  --title-length, -t <n> Truncate titles to n characters (0 = no limit)
  --include-details      Export location, notes and URL
  --no-upload            Do not upload via SFTP
  --host <host>          SFTP host (configure-sftp)
  --port <n>             SFTP port (configure-sftp, default 22)
  --username <name>      SFTP user (configure-sftp)
  --key-file <path>      SSH private key (configure-sftp)
  --remote-path <path>   Remote file path (configure-sftp)
  --mock                 Use mock calendar data
  --debug                Enable debug logging
  --help, -h             Show this help message
  --version, -v          Show version

Exit codes:
  0  success
  1  failed
  2  partial success (see warnings)

Examples:
  ${APP_NAME} --calendar Work --calendar Family --days-ahead 14
  ${APP_NAME} --mock --output /tmp/calendar.ics --no-upload
  ${APP_NAME} list-calendars
  ${APP_NAME} configure-sftp --host sftp.example.com --username calendar --key-file ~/.ssh/id_ed25519
`.trim();
}

/**
 * Get version string
 */
export function getVersion(): string {
  return VERSION;
}

/**
 * Main Entry Point for calendar-exporter
 *
 * Runs one command from parsed CLI options and reports its output and exit
 * code; writing to the terminal is left to the caller.
 */

import { ConfigLoader, type LoadOptions } from '../config/loader.js';
import { ExportEngine, exitCodeFor, type RunResult } from '../core/export-engine.js';
import type { CalendarSource } from '../integrations/calendar-source.js';
import { EventKitCalendarSource } from '../integrations/eventkit-calendar-source.js';
import { MockCalendarSource } from '../integrations/mock-calendar-source.js';
import type { TransportSink } from '../transport/transport-sink.js';
import type { ExporterConfig } from '../types/config.js';
import { ErrorHandler, ExporterError } from '../types/errors.js';
import { cliLogger, setLogLevel } from '../utils/logger.js';
import { APP_NAME } from '../version.js';
import {
  type CLIOptions,
  getHelpMessage,
  getVersion,
  parseArgs,
  toConfigOverrides,
  toConfigureChanges,
} from './parser.js';

/**
 * What runCli did
 */
export type CliMode =
  | 'export'
  | 'list-calendars'
  | 'show-config'
  | 'configure-calendar'
  | 'configure-sftp'
  | 'help'
  | 'version'
  | 'error';

export interface CliResult {
  mode: CliMode;
  exitCode: number;
  /** Text for stdout, or for stderr when mode is 'error' */
  output: string;
  runResult?: RunResult;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  loadConfig?: (options: LoadOptions) => Promise<ExporterConfig>;
  createSource?: (config: ExporterConfig, options: CLIOptions) => CalendarSource;
  transport?: TransportSink;
  clock?: () => Date;
  writeArtifact?: (path: string, content: string) => Promise<void>;
}

/**
 * Live EventKit store, or the mock store with --mock
 */
export function createDefaultSource(config: ExporterConfig, options: CLIOptions): CalendarSource {
  if (options.mock) {
    return new MockCalendarSource({ zone: config.timezone });
  }
  return new EventKitCalendarSource({
    zone: config.timezone,
    authorizationTimeoutMs: config.authorizationTimeoutMs,
  });
}

/**
 * Render an error with its suggestions
 */
export function formatError(error: unknown): string {
  const info = ErrorHandler.handle(ErrorHandler.toError(error), 'command');
  const message = error instanceof ExporterError ? error.message : info.message;
  const lines = [`Error: ${message}`];
  if (!(error instanceof ExporterError) && typeof info.details === 'string') {
    lines.push(`  ${info.details}`);
  }
  for (const suggestion of ErrorHandler.getSuggestions(info)) {
    lines.push(`  - ${suggestion}`);
  }
  return lines.join('\n');
}

/**
 * Persist the settings of a configure command
 */
async function runConfigure(
  options: CLIOptions & { command: 'configure-calendar' | 'configure-sftp' }
): Promise<CliResult> {
  let saved: Awaited<ReturnType<typeof ConfigLoader.save>>;
  try {
    saved = await ConfigLoader.save(toConfigureChanges(options), options.config);
  } catch (error) {
    return { mode: 'error', exitCode: 1, output: formatError(error) };
  }

  const lines: string[] = [];
  if (options.command === 'configure-sftp') {
    lines.push(`SFTP configuration saved to ${saved.path}`);
    if (saved.config.sftp.keyFile === undefined) {
      lines.push('No key file configured; provide the password through SFTP_PASSWORD when exporting.');
    }
  } else {
    lines.push(`Calendar configuration saved to ${saved.path}`);
    if (saved.config.calendarNames.length === 0) {
      lines.push('No calendars selected; all calendars will be exported.');
    }
  }

  return { mode: options.command, exitCode: 0, output: lines.join('\n') };
}

/**
 * Run a command
 * @param args - Command line arguments (without node and script path)
 */
export async function runCli(args: string[], deps: CliDeps = {}): Promise<CliResult> {
  const options = parseArgs(args);

  // Handle help
  if (options.help) {
    return { mode: 'help', exitCode: 0, output: getHelpMessage() };
  }

  // Handle version
  if (options.version) {
    return { mode: 'version', exitCode: 0, output: getVersion() };
  }

  if (options.errors.length > 0) {
    return {
      mode: 'error',
      exitCode: 1,
      output: [...options.errors, `Run '${APP_NAME} --help' for usage.`].join('\n'),
    };
  }

  const { command } = options;
  if (command === 'configure-calendar' || command === 'configure-sftp') {
    return runConfigure({ ...options, command });
  }

  let config: ExporterConfig;
  try {
    const load = deps.loadConfig ?? ((loadOptions: LoadOptions) => ConfigLoader.load(loadOptions));
    config = await load({
      configPath: options.config,
      env: deps.env ?? process.env,
      overrides: toConfigOverrides(options),
    });
  } catch (error) {
    return { mode: 'error', exitCode: 1, output: formatError(error) };
  }

  setLogLevel(config.logLevel);
  cliLogger.debug({ command: options.command }, 'Running command');

  const source = (deps.createSource ?? createDefaultSource)(config, options);

  switch (command) {
    case 'show-config':
      return {
        mode: 'show-config',
        exitCode: 0,
        output: JSON.stringify(ConfigLoader.toSaveable(config), null, 2),
      };

    case 'list-calendars':
      try {
        await source.requestAccess();
        const calendars = await source.listCalendars();
        return {
          mode: 'list-calendars',
          exitCode: 0,
          output: calendars.map((calendar) => `${calendar.title}\t${calendar.type}\t${calendar.source}`).join('\n'),
        };
      } catch (error) {
        return { mode: 'error', exitCode: 1, output: formatError(error) };
      }

    case 'export': {
      const engine = new ExportEngine({
        source,
        transport: deps.transport,
        clock: deps.clock,
        writeArtifact: deps.writeArtifact,
      });
      const runResult = await engine.run(config);
      return {
        mode: 'export',
        exitCode: exitCodeFor(runResult.status),
        output: JSON.stringify(runResult, null, 2),
        runResult,
      };
    }
  }
}

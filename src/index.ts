#!/usr/bin/env node
/**
 * calendar-exporter - export macOS calendars to iCalendar
 *
 * Reads events from the macOS calendar store, writes an ICS file and
 * uploads it via SFTP or reimports it into a local calendar. Intended to be
 * run once per invocation by cron or launchd.
 */

import { runCli } from './cli/main-entry.js';
import { cliLogger } from './utils/logger.js';

async function main(): Promise<void> {
  const result = await runCli(process.argv.slice(2));

  if (result.output) {
    const stream = result.mode === 'error' ? process.stderr : process.stdout;
    stream.write(`${result.output}\n`);
  }

  process.exitCode = result.exitCode;
}

main().catch((error: unknown) => {
  cliLogger.fatal({ err: error }, 'Unexpected failure');
  process.exitCode = 1;
});

/**
 * Export Engine
 * One run: validate, read, normalize, encode, write, dispatch, report.
 *
 * Run-level failures are reported in the RunResult, never thrown.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { validateRunConfig } from '../config/validation.js';
import { decode, encode } from '../ics/index.js';
import type { CalendarSource } from '../integrations/calendar-source.js';
import { MockCalendarSource } from '../integrations/mock-calendar-source.js';
import { SftpTransport } from '../transport/sftp-transport.js';
import type { TransportSink } from '../transport/transport-sink.js';
import type { ExporterConfig } from '../types/config.js';
import {
  CalendarNotFoundError,
  ErrorHandler,
  ErrorType,
  ExporterError,
  type ExporterErrorInfo,
} from '../types/errors.js';
import type {
  CreateEventsResult,
  DeleteEventsResult,
  EventOperationError,
  ExportArtifact,
  ExportWindow,
  RawCalendarEvent,
} from '../types/event.js';
import { syncLogger } from '../utils/logger.js';
import { computeExportWindow, describeWindow } from './export-window.js';
import { normalize } from './normalizer.js';

export type RunStatus = 'success' | 'partial' | 'failed';

export type DispatchTarget = 'transport' | 'local-import' | 'none';

export interface CalendarReadError {
  calendarName: string;
  message: string;
}

export interface RunResult {
  status: RunStatus;
  window?: ExportWindow;
  exportedCount: number;
  deletedCount: number;
  importedCount: number;
  /** VEVENTs found in the artifact when importing it locally */
  decodedComponents: number;
  /** VEVENTs the importer could not read */
  skippedComponents: number;
  warnings: string[];
  eventErrors: EventOperationError[];
  calendarErrors: CalendarReadError[];
  dispatch: { target: DispatchTarget; success: boolean };
  usedMockData: boolean;
  artifactPath?: string;
  fatalError?: ExporterErrorInfo;
}

export interface ExportEngineDeps {
  source: CalendarSource;
  /** Serves fixture data when the source is unreachable; defaults to MockCalendarSource */
  fallbackSource?: CalendarSource;
  /** Replaces the SFTP transport built from configuration */
  transport?: TransportSink;
  clock?: () => Date;
  writeArtifact?: (path: string, content: string) => Promise<void>;
  /** Replaces the ICS encoder */
  encodeArtifact?: typeof encode;
}

const EXIT_CODES: Record<RunStatus, number> = {
  success: 0,
  failed: 1,
  partial: 2,
};

export function exitCodeFor(status: RunStatus): number {
  return EXIT_CODES[status];
}

async function writeArtifactFile(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, 'utf-8');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Thrown inside a run to short-circuit with a fatal error
 */
class FatalRunError extends Error {
  readonly info: ExporterErrorInfo;

  constructor(info: ExporterErrorInfo) {
    super(info.message);
    this.name = 'FatalRunError';
    this.info = info;
  }
}

export class ExportEngine {
  private readonly deps: ExportEngineDeps;

  constructor(deps: ExportEngineDeps) {
    this.deps = deps;
  }

  async run(config: ExporterConfig): Promise<RunResult> {
    const result: RunResult = {
      status: 'success',
      exportedCount: 0,
      deletedCount: 0,
      importedCount: 0,
      decodedComponents: 0,
      skippedComponents: 0,
      warnings: [],
      eventErrors: [],
      calendarErrors: [],
      dispatch: { target: 'none', success: true },
      usedMockData: false,
    };

    try {
      await this.execute(config, result);
    } catch (error) {
      result.fatalError =
        error instanceof FatalRunError ? error.info : ErrorHandler.handle(ErrorHandler.toError(error), 'export run');
    }

    result.status = this.resolveStatus(result);
    syncLogger.info(
      {
        status: result.status,
        exported: result.exportedCount,
        deleted: result.deletedCount,
        imported: result.importedCount,
        warnings: result.warnings.length,
      },
      'Export run finished'
    );
    if (result.fatalError) {
      syncLogger.error({ fatalError: result.fatalError }, 'Export run failed');
    }

    return result;
  }

  private async execute(config: ExporterConfig, result: RunResult): Promise<void> {
    try {
      validateRunConfig(config);
    } catch (error) {
      throw new FatalRunError(ErrorHandler.handle(ErrorHandler.toError(error), 'configuration'));
    }

    const now = (this.deps.clock ?? (() => new Date()))();
    const window = computeExportWindow(now, config);
    result.window = window;
    syncLogger.info({ window: describeWindow(window), timezone: window.timezone }, 'Resolved export window');

    const rawEvents = await this.read(config, window, result);

    const normalized = normalize(rawEvents, {
      includeDetails: config.includeDetails,
      titleLengthLimit: config.titleLengthLimit,
      timezone: config.timezone,
    });
    result.warnings.push(...normalized.warnings);
    this.assertLenient(config, normalized.warnings, 'source event');

    const artifact: ExportArtifact = {
      content: (this.deps.encodeArtifact ?? encode)(normalized.events, config.icsCalendarName, config.timezone),
      calendarName: config.icsCalendarName,
      eventCount: normalized.events.length,
    };
    result.exportedCount = artifact.eventCount;

    try {
      await (this.deps.writeArtifact ?? writeArtifactFile)(config.outputFile, artifact.content);
    } catch (error) {
      throw new FatalRunError(
        new ExporterError(
          ErrorType.OUTPUT_ERROR,
          'ARTIFACT_WRITE_FAILED',
          `Cannot write ${config.outputFile}: ${errorMessage(error)}`,
          { recoverable: false }
        ).toJSON()
      );
    }
    result.artifactPath = config.outputFile;
    syncLogger.info({ path: config.outputFile, events: result.exportedCount }, 'Wrote ICS artifact');

    await this.dispatch(config, window, artifact, result);
  }

  /**
   * Read every configured calendar, substituting fixture data on access errors when allowed
   */
  private async read(config: ExporterConfig, window: ExportWindow, result: RunResult): Promise<RawCalendarEvent[]> {
    try {
      const { events, calendarErrors } = await this.readSource(config, window);
      result.calendarErrors.push(...calendarErrors);
      result.warnings.push(...calendarErrors.map((entry) => entry.message));
      return events;
    } catch (error) {
      const info = ErrorHandler.handle(ErrorHandler.toError(error), 'reading calendar events');
      if (!config.useMockOnFailure) {
        throw new FatalRunError(info);
      }

      syncLogger.warn({ err: error }, 'Calendar store unavailable, using mock data');
      const fallback = this.deps.fallbackSource ?? new MockCalendarSource({ zone: config.timezone });
      const names = config.calendarNames.length > 0 ? config.calendarNames : undefined;
      const events = await fallback.listEvents(names, window.start, window.end);

      result.usedMockData = true;
      result.warnings.push(`Calendar store unavailable (${errorMessage(error)}); exported mock data instead`);
      return events;
    }
  }

  private async readSource(
    config: ExporterConfig,
    window: ExportWindow
  ): Promise<{ events: RawCalendarEvent[]; calendarErrors: CalendarReadError[] }> {
    const { source } = this.deps;
    await source.requestAccess();

    if (config.calendarNames.length === 0) {
      return { events: await source.listEvents(undefined, window.start, window.end), calendarErrors: [] };
    }

    const events: RawCalendarEvent[] = [];
    const calendarErrors: CalendarReadError[] = [];

    for (const calendarName of config.calendarNames) {
      try {
        const calendarEvents = await source.listEvents([calendarName], window.start, window.end);
        syncLogger.debug({ calendarName, count: calendarEvents.length }, 'Read calendar');
        events.push(...calendarEvents);
      } catch (error) {
        if (!(error instanceof CalendarNotFoundError)) {
          throw error;
        }
        syncLogger.warn({ calendarName }, 'Calendar not found');
        calendarErrors.push({ calendarName, message: error.message });
      }
    }

    return { events, calendarErrors };
  }

  private async dispatch(
    config: ExporterConfig,
    window: ExportWindow,
    artifact: ExportArtifact,
    result: RunResult
  ): Promise<void> {
    if (config.enableSftp) {
      if (config.localImportCalendar) {
        result.warnings.push(
          `Local import into '${config.localImportCalendar}' skipped: SFTP transport takes precedence`
        );
      }

      const transport = this.deps.transport ?? new SftpTransport(config.sftp);
      const sent = await transport.send(Buffer.from(artifact.content, 'utf-8'), config.sftp.remotePath);
      result.dispatch = { target: 'transport', success: sent.success };
      if (!sent.success) {
        result.warnings.push(`SFTP upload failed: ${sent.error ?? 'unknown error'}`);
      }
      return;
    }

    if (config.localImportCalendar) {
      result.dispatch = { target: 'local-import', success: false };
      const reconciled = await this.reconcile(config, window, artifact, result);
      result.dispatch = { target: 'local-import', success: reconciled };
      return;
    }

    result.warnings.push('No dispatch target configured; the artifact was only written locally');
    result.dispatch = { target: 'none', success: true };
  }

  /**
   * Decode the artifact, delete the window in the target calendar, then import
   * Creation only starts once deletion fully succeeded.
   *
   * @returns whether every deletion and creation succeeded
   */
  private async reconcile(
    config: ExporterConfig,
    window: ExportWindow,
    artifact: ExportArtifact,
    result: RunResult
  ): Promise<boolean> {
    const target = config.localImportCalendar;
    const { source } = this.deps;

    // Strict failures must leave the target untouched
    const decoded = decode(artifact.content, { timezone: config.timezone });
    result.decodedComponents = decoded.componentCount;
    result.skippedComponents = decoded.skippedCount;
    result.warnings.push(...decoded.warnings);
    this.assertLenient(config, decoded.warnings, 'ICS component');

    let deletion: DeleteEventsResult;
    try {
      deletion = await source.deleteEvents(target, window.start, window.end);
    } catch (error) {
      result.warnings.push(`Deleting events in '${target}' failed (${errorMessage(error)}); import skipped`);
      return false;
    }

    result.deletedCount = deletion.deletedCount;
    if (deletion.errors.length > 0) {
      result.eventErrors.push(...deletion.errors);
      const attempted = deletion.deletedCount + deletion.errors.length;
      result.warnings.push(
        `Could not delete ${deletion.errors.length} of ${attempted} event(s) in '${target}'; import skipped`
      );
      return false;
    }

    let creation: CreateEventsResult;
    try {
      creation = await source.createEvents(target, decoded.events);
    } catch (error) {
      result.warnings.push(`Importing events into '${target}' failed: ${errorMessage(error)}`);
      return false;
    }

    result.importedCount = creation.createdCount;
    result.eventErrors.push(...creation.errors);
    for (const failure of creation.errors) {
      result.warnings.push(`Failed to import '${failure.title ?? failure.eventId ?? 'event'}': ${failure.message}`);
    }

    syncLogger.info(
      { target, deleted: result.deletedCount, imported: result.importedCount, failed: creation.errors.length },
      'Reconciled local calendar'
    );
    return creation.errors.length === 0;
  }

  /**
   * In strict mode, malformed records end the run
   */
  private assertLenient(config: ExporterConfig, warnings: string[], kind: string): void {
    if (!config.strict || warnings.length === 0) {
      return;
    }
    throw new FatalRunError(
      new ExporterError(
        ErrorType.MALFORMED_RECORD,
        'MALFORMED_RECORD',
        `Strict mode: ${warnings.length} malformed ${kind}(s) found`,
        { recoverable: false, details: warnings }
      ).toJSON()
    );
  }

  private resolveStatus(result: RunResult): RunStatus {
    if (result.fatalError) {
      return 'failed';
    }
    if (result.calendarErrors.length > 0 || result.eventErrors.length > 0 || !result.dispatch.success) {
      return 'partial';
    }
    return 'success';
  }
}

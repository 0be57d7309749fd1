/**
 * Configuration validation schemas using Zod
 * Provides runtime type validation for the configuration file
 */

import { z } from 'zod';
import { isKnownTimezone } from '../ics/timezone-definition.js';
import type { ExporterConfig } from '../types/config.js';
import { ConfigurationError } from '../types/errors.js';

const nonNegativeInt = z.number().int().min(0);

/**
 * SFTP section of the configuration file
 */
export const SftpConfigFileSchema = z.object({
  host: z.string().optional(),
  port: z.number().int().min(1).max(65535).optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  keyFile: z.string().optional(),
  remotePath: z.string().min(1).optional(),
  createDirs: z.boolean().optional(),
  timeoutMs: z.number().int().positive().optional(),
});

/**
 * Configuration file schema
 * Every key is optional; missing keys keep their defaults.
 */
export const ConfigFileSchema = z.object({
  calendarNames: z.array(z.string().min(1)).optional(),
  daysAhead: nonNegativeInt.optional(),
  daysBehind: nonNegativeInt.optional(),
  outputFile: z.string().min(1).optional(),
  icsCalendarName: z.string().min(1).optional(),
  timezone: z.string().min(1).optional(),
  includeDetails: z.boolean().optional(),
  titleLengthLimit: nonNegativeInt.optional(),
  useMockOnFailure: z.boolean().optional(),
  enableSftp: z.boolean().optional(),
  sftp: SftpConfigFileSchema.optional(),
  localImportCalendar: z.string().optional(),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  strict: z.boolean().optional(),
  authorizationTimeoutMs: z.number().int().positive().optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Validate parsed configuration file contents
 * @returns Validation result with parsed data or error
 */
export function validateConfigFile(data: unknown): {
  success: boolean;
  data?: ConfigFile;
  error?: z.ZodError;
} {
  const result = ConfigFileSchema.safeParse(data);

  if (result.success) {
    return {
      success: true,
      data: result.data,
    };
  }

  return {
    success: false,
    error: result.error,
  };
}

/**
 * One line per issue, e.g. `daysAhead: Number must be greater than or equal to 0`
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Check a merged configuration before a run touches any calendar
 * @throws ConfigurationError naming the first offending field
 */
export function validateRunConfig(config: ExporterConfig): void {
  const counts: Array<['daysAhead' | 'daysBehind' | 'titleLengthLimit', number]> = [
    ['daysAhead', config.daysAhead],
    ['daysBehind', config.daysBehind],
    ['titleLengthLimit', config.titleLengthLimit],
  ];
  for (const [field, value] of counts) {
    if (!Number.isInteger(value) || value < 0) {
      throw new ConfigurationError(field, `${field} must be a non-negative integer (got ${value})`);
    }
  }

  if (!isKnownTimezone(config.timezone)) {
    throw new ConfigurationError('timezone', `Unknown timezone: ${config.timezone}`);
  }

  if (config.outputFile.trim() === '') {
    throw new ConfigurationError('outputFile', 'outputFile must not be empty');
  }

  if (config.enableSftp) {
    if (!config.sftp.host) {
      throw new ConfigurationError('sftp.host', 'SFTP is enabled but no host is configured');
    }
    if (!config.sftp.username) {
      throw new ConfigurationError('sftp.username', 'SFTP is enabled but no username is configured');
    }
    if (!config.sftp.password && !config.sftp.keyFile) {
      throw new ConfigurationError('sftp.password', 'SFTP is enabled but neither a password nor a key file is configured');
    }
  }
}

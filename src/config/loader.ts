/**
 * Configuration loader
 * Layers defaults, the JSON configuration file, environment variables and
 * command-line overrides, in that order of precedence.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { homedir } from 'os';
import { dirname, join } from 'path';
import type { ExporterConfig, SftpConfig } from '../types/config.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import { ConfigurationError } from '../types/errors.js';
import { configLogger, isLogLevel } from '../utils/logger.js';
import { type ConfigFile, formatValidationError, validateConfigFile } from './validation.js';

const CONFIG_DIR = join('.config', 'calendar-exporter');
const CONFIG_FILE = 'config.json';

const TRUE_VALUES = ['true', 'yes', '1'];

/**
 * Partial configuration layered over a base; absent keys keep the base value
 */
export interface ConfigOverrides extends Partial<Omit<ExporterConfig, 'sftp'>> {
  sftp?: Partial<SftpConfig>;
}

/**
 * Configuration with secrets removed, as printed by show-config and
 * written by the configure commands
 */
export type SaveableConfig = Omit<ExporterConfig, 'sftp'> & {
  sftp: Omit<SftpConfig, 'password'>;
};

export interface LoadOptions {
  /** Explicit file path; it must exist when given */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

export class ConfigLoader {
  /**
   * Get the path to the configuration directory
   */
  static getConfigDir(): string {
    return join(homedir(), CONFIG_DIR);
  }

  /**
   * Get the path to the default configuration file
   */
  static getConfigPath(): string {
    return join(this.getConfigDir(), CONFIG_FILE);
  }

  /**
   * Expand a leading `~` to the home directory
   */
  static expandHome(path: string): string {
    if (path === '~') {
      return homedir();
    }
    if (path.startsWith('~/')) {
      return join(homedir(), path.slice(2));
    }
    return path;
  }

  /**
   * Get the default configuration
   */
  static getDefaultConfig(): ExporterConfig {
    return {
      ...DEFAULT_CONFIG,
      calendarNames: [...DEFAULT_CONFIG.calendarNames],
      sftp: { ...DEFAULT_CONFIG.sftp },
    };
  }

  /**
   * Load the effective configuration
   * @throws ConfigurationError for an unreadable or invalid configuration file
   */
  static async load(options: LoadOptions = {}): Promise<ExporterConfig> {
    const explicitPath = options.configPath !== undefined;
    const configPath = explicitPath ? this.expandHome(options.configPath ?? '') : this.getConfigPath();

    let config = this.getDefaultConfig();

    const file = await this.readConfigFile(configPath, explicitPath);
    if (file) {
      config = this.merge(config, file);
    }

    config = this.merge(config, this.envOverrides(options.env ?? process.env));

    if (options.overrides) {
      config = this.merge(config, options.overrides);
    }

    return this.resolvePaths(config);
  }

  /**
   * Read and validate a configuration file
   * @returns null when an optional file does not exist
   */
  static async readConfigFile(path: string, required: boolean): Promise<ConfigFile | null> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (!required && isErrnoException(error) && error.code === 'ENOENT') {
        configLogger.debug({ path }, 'No configuration file, using defaults');
        return null;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError('configPath', `Cannot read configuration file ${path}: ${reason}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError('configPath', `Configuration file ${path} is not valid JSON: ${reason}`);
    }

    const validation = validateConfigFile(parsed);
    if (!validation.success || !validation.data) {
      const reason = validation.error ? formatValidationError(validation.error) : 'unknown error';
      throw new ConfigurationError('configPath', `Invalid configuration file ${path}: ${reason}`);
    }

    configLogger.debug({ path }, 'Loaded configuration file');
    return validation.data;
  }

  /**
   * Apply changes to the configuration file and write it back
   *
   * The file is rewritten in full over the defaults. Environment variables are
   * not persisted, and neither is the SFTP password.
   *
   * @throws ConfigurationError when the existing file or the result is invalid
   */
  static async save(changes: ConfigOverrides, configPath?: string): Promise<{ path: string; config: SaveableConfig }> {
    const path = configPath !== undefined ? this.expandHome(configPath) : this.getConfigPath();

    let config = this.getDefaultConfig();
    const file = await this.readConfigFile(path, false);
    if (file) {
      config = this.merge(config, file);
    }
    const saveable = this.toSaveable(this.merge(config, changes));

    const validation = validateConfigFile(saveable);
    if (!validation.success) {
      const reason = validation.error ? formatValidationError(validation.error) : 'unknown error';
      throw new ConfigurationError('configPath', `Refusing to save invalid configuration: ${reason}`);
    }

    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, `${JSON.stringify(saveable, null, 2)}\n`, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError('configPath', `Cannot write configuration file ${path}: ${reason}`);
    }

    configLogger.info({ path }, 'Saved configuration file');
    return { path, config: saveable };
  }

  /**
   * Overrides from environment variables
   * Unparseable numbers are ignored with a warning.
   */
  static envOverrides(env: NodeJS.ProcessEnv): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    const sftp: Partial<SftpConfig> = {};

    const readInt = (name: string): number | undefined => {
      const raw = env[name];
      if (raw === undefined || raw.trim() === '') {
        return undefined;
      }
      if (!/^\d+$/.test(raw.trim())) {
        configLogger.warn({ variable: name, value: raw }, 'Ignoring invalid integer in environment');
        return undefined;
      }
      return Number.parseInt(raw.trim(), 10);
    };

    const readBool = (name: string): boolean | undefined => {
      const raw = env[name];
      if (raw === undefined || raw.trim() === '') {
        return undefined;
      }
      return TRUE_VALUES.includes(raw.trim().toLowerCase());
    };

    const readString = (...names: string[]): string | undefined => {
      for (const name of names) {
        const raw = env[name];
        if (raw !== undefined && raw !== '') {
          return raw;
        }
      }
      return undefined;
    };

    const calendarNames = readString('CALENDAR_NAMES');
    if (calendarNames !== undefined) overrides.calendarNames = splitList(calendarNames);

    const daysAhead = readInt('DAYS_AHEAD');
    if (daysAhead !== undefined) overrides.daysAhead = daysAhead;

    const daysBehind = readInt('DAYS_BEHIND');
    if (daysBehind !== undefined) overrides.daysBehind = daysBehind;

    const outputFile = readString('ICS_FILE');
    if (outputFile !== undefined) overrides.outputFile = outputFile;

    const icsCalendarName = readString('ICS_CALENDAR_NAME');
    if (icsCalendarName !== undefined) overrides.icsCalendarName = icsCalendarName;

    const timezone = readString('ICS_TIMEZONE');
    if (timezone !== undefined) overrides.timezone = timezone;

    const includeDetails = readBool('INCLUDE_DETAILS');
    if (includeDetails !== undefined) overrides.includeDetails = includeDetails;

    const titleLengthLimit = readInt('TITLE_LENGTH_LIMIT');
    if (titleLengthLimit !== undefined) overrides.titleLengthLimit = titleLengthLimit;

    const useMockOnFailure = readBool('USE_MOCK_ON_FAILURE');
    if (useMockOnFailure !== undefined) overrides.useMockOnFailure = useMockOnFailure;

    const enableSftp = readBool('ENABLE_SFTP');
    if (enableSftp !== undefined) overrides.enableSftp = enableSftp;

    const localImportCalendar = readString('LOCAL_IMPORT_CALENDAR');
    if (localImportCalendar !== undefined) overrides.localImportCalendar = localImportCalendar;

    const logLevel = readString('LOG_LEVEL')?.toLowerCase();
    if (logLevel !== undefined && isLogLevel(logLevel)) overrides.logLevel = logLevel;

    // SFTP_USER, SFTP_PASS and SFTP_PATH are older spellings
    const host = readString('SFTP_HOST');
    if (host !== undefined) sftp.host = host;

    const port = readInt('SFTP_PORT');
    if (port !== undefined) sftp.port = port;

    const username = readString('SFTP_USERNAME', 'SFTP_USER');
    if (username !== undefined) sftp.username = username;

    const password = readString('SFTP_PASSWORD', 'SFTP_PASS');
    if (password !== undefined) sftp.password = password;

    const keyFile = readString('SFTP_KEY_FILE');
    if (keyFile !== undefined) sftp.keyFile = keyFile;

    const remotePath = readString('SFTP_REMOTE_PATH', 'SFTP_PATH');
    if (remotePath !== undefined) sftp.remotePath = remotePath;

    if (Object.keys(sftp).length > 0) {
      overrides.sftp = sftp;
    }

    return overrides;
  }

  /**
   * Merge overrides into a configuration
   */
  static merge(base: ExporterConfig, overrides: ConfigOverrides): ExporterConfig {
    const { sftp, ...rest } = overrides;
    return {
      ...base,
      ...rest,
      sftp: { ...base.sftp, ...sftp },
    };
  }

  /**
   * Configuration without the SFTP password
   */
  static toSaveable(config: ExporterConfig): SaveableConfig {
    const { host, port, username, keyFile, remotePath, createDirs, timeoutMs } = config.sftp;
    return {
      ...config,
      sftp: {
        host,
        port,
        username,
        ...(keyFile !== undefined ? { keyFile } : {}),
        remotePath,
        createDirs,
        timeoutMs,
      },
    };
  }

  private static resolvePaths(config: ExporterConfig): ExporterConfig {
    return {
      ...config,
      outputFile: this.expandHome(config.outputFile),
      sftp: {
        ...config.sftp,
        ...(config.sftp.keyFile !== undefined ? { keyFile: this.expandHome(config.sftp.keyFile) } : {}),
      },
    };
  }
}

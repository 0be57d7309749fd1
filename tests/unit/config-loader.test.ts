/**
 * Config Loader Unit Tests
 */

import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { homedir, tmpdir } from 'os';
import { join } from 'path';
import { ConfigLoader } from '../../src/config/loader.js';
import { ConfigurationError } from '../../src/types/errors.js';
import { createTestConfig } from '../helpers/index.js';

describe('ConfigLoader', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'calendar-exporter-config-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(content: unknown): Promise<string> {
    const path = join(tempDir, 'config.json');
    await writeFile(path, typeof content === 'string' ? content : JSON.stringify(content), 'utf-8');
    return path;
  }

  describe('getConfigPath', () => {
    it('should live under ~/.config/calendar-exporter', () => {
      expect(ConfigLoader.getConfigPath()).toBe(join(homedir(), '.config', 'calendar-exporter', 'config.json'));
    });
  });

  describe('expandHome', () => {
    it('should expand a leading tilde only', () => {
      expect(ConfigLoader.expandHome('~/calendar.ics')).toBe(join(homedir(), 'calendar.ics'));
      expect(ConfigLoader.expandHome('~')).toBe(homedir());
      expect(ConfigLoader.expandHome('/tmp/~/calendar.ics')).toBe('/tmp/~/calendar.ics');
    });
  });

  describe('load', () => {
    it('should layer the file over defaults', async () => {
      const configPath = await writeConfig({
        daysAhead: 14,
        calendarNames: ['Work'],
        sftp: { host: 'sftp.example.test' },
      });

      const config = await ConfigLoader.load({ configPath, env: {} });

      expect(config.daysAhead).toBe(14);
      expect(config.daysBehind).toBe(30);
      expect(config.calendarNames).toEqual(['Work']);
      expect(config.sftp.host).toBe('sftp.example.test');
      expect(config.sftp.port).toBe(22);
      expect(config.outputFile).toBe(join(homedir(), 'calendar_export.ics'));
    });

    it('should let environment variables win over the file', async () => {
      const configPath = await writeConfig({ daysAhead: 14 });

      const config = await ConfigLoader.load({ configPath, env: { DAYS_AHEAD: '3' } });

      expect(config.daysAhead).toBe(3);
    });

    it('should let overrides win over environment variables', async () => {
      const configPath = await writeConfig({});

      const config = await ConfigLoader.load({
        configPath,
        env: { DAYS_AHEAD: '3', SFTP_HOST: 'env.example.test' },
        overrides: { daysAhead: 5, sftp: { remotePath: '/upload/calendar.ics' } },
      });

      expect(config.daysAhead).toBe(5);
      expect(config.sftp.host).toBe('env.example.test');
      expect(config.sftp.remotePath).toBe('/upload/calendar.ics');
    });

    it('should expand the key file path', async () => {
      const configPath = await writeConfig({ sftp: { keyFile: '~/.ssh/id_test' } });

      const config = await ConfigLoader.load({ configPath, env: {} });

      expect(config.sftp.keyFile).toBe(join(homedir(), '.ssh', 'id_test'));
    });

    it('should fail when an explicit file is missing', async () => {
      await expect(ConfigLoader.load({ configPath: join(tempDir, 'missing.json'), env: {} })).rejects.toThrow(
        ConfigurationError
      );
    });

    it('should fail on invalid JSON', async () => {
      const configPath = await writeConfig('{ not json');

      await expect(ConfigLoader.load({ configPath, env: {} })).rejects.toThrow('is not valid JSON');
    });

    it('should fail on values the schema rejects', async () => {
      const configPath = await writeConfig({ daysAhead: -1 });

      await expect(ConfigLoader.load({ configPath, env: {} })).rejects.toThrow(
        `Invalid configuration file ${configPath}: daysAhead: Number must be greater than or equal to 0`
      );
    });
  });

  describe('readConfigFile', () => {
    it('should return null for a missing optional file', async () => {
      await expect(ConfigLoader.readConfigFile(join(tempDir, 'missing.json'), false)).resolves.toBeNull();
    });
  });

  describe('envOverrides', () => {
    it('should read lists, booleans and numbers', () => {
      expect(
        ConfigLoader.envOverrides({
          CALENDAR_NAMES: ' Work, Family ,',
          INCLUDE_DETAILS: 'yes',
          USE_MOCK_ON_FAILURE: 'no',
          TITLE_LENGTH_LIMIT: '0',
          ICS_TIMEZONE: 'America/New_York',
          LOG_LEVEL: 'DEBUG',
        })
      ).toEqual({
        calendarNames: ['Work', 'Family'],
        includeDetails: true,
        useMockOnFailure: false,
        titleLengthLimit: 0,
        timezone: 'America/New_York',
        logLevel: 'debug',
      });
    });

    it('should ignore invalid integers and log levels', () => {
      expect(ConfigLoader.envOverrides({ DAYS_AHEAD: 'abc', DAYS_BEHIND: '-2', LOG_LEVEL: 'loud' })).toEqual({});
    });

    it('should accept the older SFTP variable names', () => {
      expect(
        ConfigLoader.envOverrides({
          SFTP_HOST: 'sftp.example.test',
          SFTP_PORT: '2222',
          SFTP_USER: 'exporter',
          SFTP_PASS: 'test-secret',
          SFTP_PATH: '/upload/calendar.ics',
        })
      ).toEqual({
        sftp: {
          host: 'sftp.example.test',
          port: 2222,
          username: 'exporter',
          password: 'test-secret',
          remotePath: '/upload/calendar.ics',
        },
      });
    });

    it('should prefer the current SFTP variable names', () => {
      const overrides = ConfigLoader.envOverrides({ SFTP_USERNAME: 'current', SFTP_USER: 'older' });
      expect(overrides.sftp?.username).toBe('current');
    });
  });

  describe('save', () => {
    async function readSaved(path: string): Promise<Record<string, unknown>> {
      return JSON.parse(await readFile(path, 'utf-8'));
    }

    it('should create the file and its directory', async () => {
      const path = join(tempDir, 'nested', 'config.json');

      const saved = await ConfigLoader.save({ daysAhead: 14 }, path);

      expect(saved.path).toBe(path);
      const written = await readSaved(path);
      expect(written).toMatchObject({ daysAhead: 14, daysBehind: 30, outputFile: '~/calendar_export.ics' });
      expect(written).toEqual(saved.config);
      await expect(ConfigLoader.load({ configPath: path, env: {} })).resolves.toMatchObject({ daysAhead: 14 });
    });

    it('should keep existing settings and drop the password', async () => {
      const path = await writeConfig({
        calendarNames: ['Work'],
        sftp: { host: 'old.example.test', password: 'test-secret' },
      });

      await ConfigLoader.save({ enableSftp: true, sftp: { host: 'sftp.example.test', username: 'exporter' } }, path);

      const written = await readSaved(path);
      expect(written).toMatchObject({
        calendarNames: ['Work'],
        enableSftp: true,
        sftp: { host: 'sftp.example.test', username: 'exporter', port: 22, remotePath: '/calendar/calendar.ics' },
      });
      expect(JSON.stringify(written)).not.toContain('test-secret');
    });

    it('should leave environment variables out of the file', async () => {
      const path = join(tempDir, 'config.json');
      process.env.DAYS_AHEAD = '3';
      try {
        await ConfigLoader.save({ daysBehind: 1 }, path);
      } finally {
        delete process.env.DAYS_AHEAD;
      }

      expect(await readSaved(path)).toMatchObject({ daysAhead: 30, daysBehind: 1 });
    });

    it('should refuse to write an invalid configuration', async () => {
      const path = join(tempDir, 'config.json');

      await expect(ConfigLoader.save({ sftp: { port: 0 } }, path)).rejects.toThrow(
        new ConfigurationError(
          'configPath',
          'Refusing to save invalid configuration: sftp.port: Number must be greater than or equal to 1'
        )
      );
      await expect(readFile(path, 'utf-8')).rejects.toThrow('ENOENT');
    });
  });

  describe('toSaveable', () => {
    it('should drop the SFTP password', () => {
      const saved = ConfigLoader.toSaveable(
        createTestConfig({ sftp: { host: 'sftp.example.test', password: 'test-secret' } })
      );

      expect(saved.sftp.host).toBe('sftp.example.test');
      expect('password' in saved.sftp).toBe(false);
      expect('keyFile' in saved.sftp).toBe(false);
    });

    it('should keep the key file path', () => {
      const saved = ConfigLoader.toSaveable(createTestConfig({ sftp: { keyFile: '/tmp/test-key' } }));
      expect(saved.sftp.keyFile).toBe('/tmp/test-key');
    });
  });
});

/**
 * SFTP transport tests
 */

import { SftpTransport } from '../../src/transport/sftp-transport.js';
import type { SftpConfig } from '../../src/types/config.js';
import { createMockSftpClient, type MockSftpClient } from '../helpers/index.js';

const baseConfig: SftpConfig = {
  host: 'sftp.example.test',
  port: 22,
  username: 'exporter',
  password: 'test-secret',
  remotePath: '/calendar/calendar.ics',
  createDirs: true,
  timeoutMs: 1000,
};

describe('SftpTransport', () => {
  let client: MockSftpClient;

  beforeEach(() => {
    client = createMockSftpClient();
  });

  function transport(config: Partial<SftpConfig> = {}, readKeyFile?: (path: string) => Promise<Buffer>): SftpTransport {
    return new SftpTransport({ ...baseConfig, ...config }, { createClient: () => client, readKeyFile });
  }

  it('should connect, create the directory, upload and close', async () => {
    const content = Buffer.from('BEGIN:VCALENDAR\r\n');

    await expect(transport().send(content, '/calendar/calendar.ics')).resolves.toEqual({ success: true });

    expect(client.connect).toHaveBeenCalledWith({
      host: 'sftp.example.test',
      port: 22,
      username: 'exporter',
      password: 'test-secret',
      readyTimeout: 1000,
    });
    expect(client.mkdir).toHaveBeenCalledWith('/calendar', true);
    expect(client.put).toHaveBeenCalledWith(content, '/calendar/calendar.ics');
    expect(client.end).toHaveBeenCalledTimes(1);
  });

  it('should prefer a key file over a password', async () => {
    const key = Buffer.from('test-key');
    const readKeyFile = jest.fn().mockResolvedValue(key);

    await transport({ keyFile: '/tmp/test-key' }, readKeyFile).send(Buffer.from('x'), '/calendar/calendar.ics');

    expect(readKeyFile).toHaveBeenCalledWith('/tmp/test-key');
    expect(client.connect).toHaveBeenCalledWith({
      host: 'sftp.example.test',
      port: 22,
      username: 'exporter',
      privateKey: key,
      readyTimeout: 1000,
    });
  });

  it('should skip directory creation when disabled or at the root', async () => {
    await transport({ createDirs: false }).send(Buffer.from('x'), '/calendar/calendar.ics');
    await transport().send(Buffer.from('x'), '/calendar.ics');

    expect(client.mkdir).not.toHaveBeenCalled();
  });

  it('should report upload failures and still close', async () => {
    client.put.mockRejectedValue(new Error('Permission denied'));

    await expect(transport().send(Buffer.from('x'), '/calendar/calendar.ics')).resolves.toEqual({
      success: false,
      error: 'Permission denied',
    });
    expect(client.end).toHaveBeenCalledTimes(1);
  });

  it('should time out a stalled transfer', async () => {
    client.connect.mockReturnValue(new Promise<unknown>(() => undefined));

    await expect(transport({ timeoutMs: 20 }).send(Buffer.from('x'), '/calendar/calendar.ics')).resolves.toEqual({
      success: false,
      error: 'SFTP transfer timed out after 20ms',
    });
    expect(client.end).toHaveBeenCalledTimes(1);
  });

  it('should fail without credentials', async () => {
    await expect(
      transport({ password: undefined }).send(Buffer.from('x'), '/calendar/calendar.ics')
    ).resolves.toEqual({ success: false, error: 'SFTP requires a password or a key file' });
    expect(client.put).not.toHaveBeenCalled();
  });

  it('should ignore errors while closing', async () => {
    client.end.mockRejectedValue(new Error('Connection already closed'));

    await expect(transport().send(Buffer.from('x'), '/calendar/calendar.ics')).resolves.toEqual({ success: true });
  });
});

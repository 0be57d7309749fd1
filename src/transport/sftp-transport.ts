/**
 * SFTP Transport
 * Uploads the artifact with ssh2-sftp-client.
 *
 * One attempt per run: connect, optionally create the remote directory,
 * upload, always close. The whole exchange is bounded by timeoutMs.
 */

import { readFile } from 'fs/promises';
import { posix } from 'path';
import SftpClient from 'ssh2-sftp-client';
import type { SftpConfig } from '../types/config.js';
import { TransportError } from '../types/errors.js';
import { transportLogger } from '../utils/logger.js';
import type { TransportResult, TransportSink } from './transport-sink.js';

export interface SftpConnectOptions {
  host: string;
  port: number;
  username: string;
  password?: string;
  privateKey?: Buffer;
  readyTimeout?: number;
}

/**
 * The part of ssh2-sftp-client the transport uses
 */
export interface SftpConnection {
  connect(options: SftpConnectOptions): Promise<unknown>;
  mkdir(remotePath: string, recursive?: boolean): Promise<unknown>;
  put(input: Buffer, remotePath: string): Promise<unknown>;
  end(): Promise<unknown>;
}

export type SftpClientFactory = () => SftpConnection;

export interface SftpTransportOptions {
  createClient?: SftpClientFactory;
  readKeyFile?: (path: string) => Promise<Buffer>;
}

export class SftpTransport implements TransportSink {
  private readonly config: SftpConfig;
  private readonly createClient: SftpClientFactory;
  private readonly readKeyFile: (path: string) => Promise<Buffer>;

  constructor(config: SftpConfig, options: SftpTransportOptions = {}) {
    this.config = config;
    this.createClient = options.createClient ?? (() => new SftpClient('calendar-exporter'));
    this.readKeyFile = options.readKeyFile ?? ((path) => readFile(path));
  }

  async send(content: Buffer, destinationPath: string): Promise<TransportResult> {
    const client = this.createClient();
    const target = `${this.config.username}@${this.config.host}:${this.config.port}${destinationPath}`;

    try {
      await this.withTimeout(this.upload(client, content, destinationPath));
      transportLogger.info({ target, bytes: content.length }, 'Uploaded artifact');
      return { success: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      transportLogger.error({ target, err: error }, 'Upload failed');
      return { success: false, error: message };
    } finally {
      await this.close(client);
    }
  }

  /**
   * Connection options; a key file takes precedence over a password
   */
  async buildConnectOptions(): Promise<SftpConnectOptions> {
    const options: SftpConnectOptions = {
      host: this.config.host,
      port: this.config.port,
      username: this.config.username,
      readyTimeout: this.config.timeoutMs,
    };

    if (this.config.keyFile) {
      options.privateKey = await this.readKeyFile(this.config.keyFile);
    } else if (this.config.password) {
      options.password = this.config.password;
    } else {
      throw new TransportError('SFTP requires a password or a key file');
    }

    return options;
  }

  private async upload(client: SftpConnection, content: Buffer, destinationPath: string): Promise<void> {
    await client.connect(await this.buildConnectOptions());

    if (this.config.createDirs) {
      const directory = posix.dirname(destinationPath);
      if (directory !== '.' && directory !== '/') {
        await client.mkdir(directory, true);
      }
    }

    await client.put(content, destinationPath);
  }

  private async withTimeout<T>(operation: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(
        () => reject(new TransportError(`SFTP transfer timed out after ${this.config.timeoutMs}ms`)),
        this.config.timeoutMs
      );
    });

    try {
      return await Promise.race([operation, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async close(client: SftpConnection): Promise<void> {
    try {
      await client.end();
    } catch (error) {
      transportLogger.debug({ err: error }, 'Closing SFTP connection failed');
    }
  }
}

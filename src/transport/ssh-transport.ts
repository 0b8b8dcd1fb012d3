import { Client, type ConnectConfig } from 'ssh2';

import type { ConnectionConfig } from '../config/types.js';
import type { SessionLogger } from '../logging/index.js';
import { classifyClientError, enrichError, RemoteTransportError } from './remote-transport.js';
import { SshShellChannel } from './shell-channel.js';
import type { ShellChannel, SshSession, TerminalOptions } from './types.js';

export const DEFAULT_READY_TIMEOUT_MS = 20_000;

function buildConnectConfig(config: ConnectionConfig): ConnectConfig {
  return {
    host: config.host,
    port: config.port,
    username: config.username,
    password: config.password,
    readyTimeout: config.connectTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS,
  };
}

/**
 * One ssh2 client, one connection. Not reusable after `disconnect`.
 */
export class SshClientSession implements SshSession {
  private readonly client = new Client();
  private connected = false;

  constructor(
    private readonly config: ConnectionConfig,
    private readonly logger?: SessionLogger,
  ) {
    this.client
      .on('end', () => {
        this.connected = false;
      })
      .on('close', () => {
        this.connected = false;
      });
  }

  async connect(): Promise<void> {
    const { host } = this.config;

    const connectPromise = new Promise<void>((resolve, reject) => {
      this.client
        .once('ready', () => {
          this.connected = true;
          resolve();
        })
        .on('error', (error) => {
          // ssh2 keeps emitting on this listener after the handshake.
          const wasConnected = this.connected;
          this.connected = false;
          if (wasConnected) {
            this.logger?.logSuppressed('transport', error);
          }
          reject(enrichError(error, classifyClientError(error.level), host));
        });
    });

    this.client.connect(buildConnectConfig(this.config));

    try {
      await connectPromise;
    } catch (err) {
      this.client.end();
      throw err;
    }
  }

  openShell(options: TerminalOptions): Promise<ShellChannel> {
    const { host, shellTimeoutMs } = this.config;

    return new Promise<ShellChannel>((resolve, reject) => {
      let timeoutId: NodeJS.Timeout | undefined;
      if (shellTimeoutMs !== undefined) {
        timeoutId = setTimeout(() => {
          reject(
            new RemoteTransportError('shell', `Opening a shell on ${host} timed out after ${shellTimeoutMs}ms`),
          );
        }, shellTimeoutMs);
      }

      try {
        this.client.shell(
          {
            term: options.term,
            cols: options.cols,
            rows: options.rows,
            width: options.width,
            height: options.height,
          },
          (shellErr, stream) => {
            clearTimeout(timeoutId);
            if (shellErr) {
              reject(enrichError(shellErr, 'shell', host));
              return;
            }
            resolve(new SshShellChannel(stream, host));
          },
        );
      } catch (error) {
        // ssh2 throws synchronously when the connection is gone.
        clearTimeout(timeoutId);
        reject(enrichError(error, 'shell', host));
      }
    });
  }

  isConnected(): boolean {
    return this.connected;
  }

  disconnect(): void {
    this.connected = false;
    this.client.end();
  }
}

/**
 * SSH transport using the ssh2 library.
 * Password authentication, exec and shell channels, SFTP upload.
 */

import { stat } from 'fs/promises';
import { Client as SSHClient, type ClientChannel } from 'ssh2';
import { DEFAULT_SSH_READY_TIMEOUT_MS } from '../constants';
import type { RemoteSession, RemoteTransport, SSHCredentials, SSHTarget } from '../types';
import { AuthenticationError, ConnectionError, toError } from './errors';

export interface SshTransportOptions {
  /** How long to wait for handshake and authentication */
  readyTimeoutMs?: number;
}

/**
 * Map an error emitted by the ssh2 client before `ready`.
 * ssh2 tags authentication failures with level "client-authentication".
 */
export function classifyConnectError(error: Error & { level?: string }, target: SSHTarget): ConnectionError | AuthenticationError {
  const where = `${target.host}:${target.port}`;
  if (error.level === 'client-authentication') {
    return new AuthenticationError(`Credentials not accepted by ${where}`, error);
  }
  return new ConnectionError(`Failed to connect to ${where}: ${error.message}`, undefined, error);
}

/**
 * Collect stdout of a channel until it closes. stderr is drained and dropped.
 */
function collectStdout(stream: ClientChannel): Promise<string> {
  return new Promise((resolve, reject) => {
    let stdout = '';

    stream.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    stream.stderr.resume();

    stream.on('error', (streamErr: Error) => {
      reject(new ConnectionError(`SSH channel failed: ${streamErr.message}`, undefined, streamErr));
    });

    stream.on('close', () => {
      resolve(stdout);
    });
  });
}

/**
 * One authenticated ssh2 client
 */
export class SshSession implements RemoteSession {
  private closed = false;
  private failure: Error | null = null;

  constructor(private readonly client: SSHClient) {
    // Errors after `ready` would otherwise be unhandled 'error' events
    client.on('error', (error) => {
      this.failure = error;
    });
    client.on('close', () => {
      this.closed = true;
    });
  }

  private ensureOpen(): void {
    if (this.closed) {
      const reason = this.failure ? `: ${this.failure.message}` : '';
      throw new ConnectionError(`SSH session is closed${reason}`);
    }
  }

  async exec(command: string): Promise<string> {
    this.ensureOpen();

    const stream = await new Promise<ClientChannel>((resolve, reject) => {
      this.client.exec(command, (execErr, channel) => {
        if (execErr) {
          reject(new ConnectionError(`Failed to open exec channel: ${execErr.message}`, undefined, execErr));
          return;
        }
        resolve(channel);
      });
    });

    return collectStdout(stream);
  }

  async execInteractive(commands: readonly string[]): Promise<string> {
    this.ensureOpen();

    // No pseudo-tty: the shell reads commands from stdin and does not echo them
    const stream = await new Promise<ClientChannel>((resolve, reject) => {
      this.client.shell(false, (shellErr, channel) => {
        if (shellErr) {
          reject(new ConnectionError(`Failed to open shell channel: ${shellErr.message}`, undefined, shellErr));
          return;
        }
        resolve(channel);
      });
    });

    const output = collectStdout(stream);
    for (const command of commands) {
      stream.write(`${command}\n`);
    }
    stream.end();

    return output;
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    this.ensureOpen();

    const info = await stat(localPath);
    if (!info.isFile()) {
      throw new Error(`Not a regular file: ${localPath}`);
    }

    await new Promise<void>((resolve, reject) => {
      this.client.sftp((sftpErr, sftp) => {
        if (sftpErr) {
          reject(new ConnectionError(`Failed to start SFTP: ${sftpErr.message}`, undefined, sftpErr));
          return;
        }

        sftp.fastPut(localPath, remotePath, (putErr) => {
          sftp.end();
          if (putErr) {
            reject(toError(putErr));
            return;
          }
          resolve();
        });
      });
    });
  }

  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.client.once('close', () => resolve());
      this.client.end();
    });
  }
}

/**
 * Opens password-authenticated ssh2 sessions
 */
export class SshTransport implements RemoteTransport {
  constructor(private readonly options: SshTransportOptions = {}) {}

  open(target: SSHTarget, credentials: SSHCredentials): Promise<RemoteSession> {
    return new Promise((resolve, reject) => {
      const client = new SSHClient();
      let settled = false;

      // Stays attached until ready so late errors after a failed handshake are absorbed
      const onError = (error: Error & { level?: string }): void => {
        if (settled) return;
        settled = true;
        client.end();
        reject(classifyConnectError(error, target));
      };

      client.once('ready', () => {
        if (settled) return;
        settled = true;
        client.removeListener('error', onError);
        resolve(new SshSession(client));
      });
      client.on('error', onError);

      client.connect({
        host: target.host,
        port: target.port,
        username: credentials.username,
        password: credentials.password,
        tryKeyboard: false,
        hostVerifier: () => true,
        readyTimeout: this.options.readyTimeoutMs ?? DEFAULT_SSH_READY_TIMEOUT_MS,
      });
    });
  }
}

/**
 * Session Manager
 *
 * Owns at most one live remote session per node name. A new session always
 * replaces the previous one, which is closed first. Structural changes for a
 * name run one at a time through a per-name lock.
 */

import type {
  ConnStatus,
  RemoteSession,
  RemoteTransport,
  SSHCredentials,
  SSHTarget,
} from '../types';
import { PoolStatus } from '../types';
import { AuthenticationError, toError } from '../utils/errors';
import type { Logger } from '../utils/output';
import { PLATFORM_COMMAND } from '../utils/remote-commands';
import { createConnStatus } from './status-tracker';

/**
 * Live session slot of one node
 */
export interface Instance {
  session: RemoteSession;
  status: ConnStatus;
}

export type OpenSessionResult = PoolStatus.Ok | PoolStatus.NotAuthenticated | PoolStatus.ConnectFailed;

export class SessionManager {
  private readonly instances = new Map<string, Instance>();
  private readonly locks = new Map<string, Promise<void>>();

  constructor(
    private readonly transport: RemoteTransport,
    private readonly logger: Logger
  ) {}

  get(name: string): Instance | undefined {
    return this.instances.get(name);
  }

  has(name: string): boolean {
    return this.instances.has(name);
  }

  names(): string[] {
    return Array.from(this.instances.keys());
  }

  /**
   * Run a task after every earlier task queued for the same name has settled
   */
  async withLock<T>(name: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(name) ?? Promise.resolve();
    const current = previous.then(task);
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(name, tail);

    try {
      return await current;
    } finally {
      if (this.locks.get(name) === tail) {
        this.locks.delete(name);
      }
    }
  }

  /**
   * Close any existing session for the name, then open and authenticate a new one
   * and capture the platform string. Callers hold the lock for the name.
   */
  async open(name: string, target: SSHTarget, credentials: SSHCredentials): Promise<OpenSessionResult> {
    await this.close(name);

    let session: RemoteSession;
    try {
      session = await this.transport.open(target, credentials);
    } catch (error) {
      if (error instanceof AuthenticationError) {
        this.logger.error(`Credentials not accepted: ${name} (error '${error.message}')`);
        return PoolStatus.NotAuthenticated;
      }
      this.logger.error(`Failed to connect: ${name} (${toError(error).message})`);
      return PoolStatus.ConnectFailed;
    }

    let platform: string;
    try {
      platform = (await session.exec(PLATFORM_COMMAND)).trim();
    } catch (error) {
      this.logger.error(`Failed to identify platform of ${name}: ${toError(error).message}`);
      await this.closeSession(name, session);
      return PoolStatus.ConnectFailed;
    }

    this.instances.set(name, { session, status: createConnStatus(true, platform) });
    return PoolStatus.Ok;
  }

  /**
   * Drop the instance and close its session. Callers hold the lock for the name.
   */
  async close(name: string): Promise<void> {
    const instance = this.instances.get(name);
    if (!instance) {
      return;
    }
    this.instances.delete(name);
    await this.closeSession(name, instance.session);
  }

  async closeAll(): Promise<void> {
    await Promise.all(this.names().map((name) => this.withLock(name, () => this.close(name))));
  }

  private async closeSession(name: string, session: RemoteSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      this.logger.warn(`Error while closing session of ${name}: ${toError(error).message}`);
    }
  }
}

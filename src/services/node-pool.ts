/**
 * Node Pool
 *
 * Registry of nodes and their live sessions, and the deploy/run/alive
 * protocols on top of them. Every operation resolves to a PoolStatus value;
 * transport failures are caught and mapped, never rethrown.
 *
 * Usage:
 * ```typescript
 * const pool = new NodePool({ transport: new SshTransport() });
 * pool.add('n1', '10.0.0.5:22', { username: 'deploy', password: 'change-me', distr: './agent.tar.xz' });
 * await pool.connect('n1');
 * await pool.deploy('n1', DeploySubject.Agent);
 * await pool.run('n1', DeploySubject.Agent);
 * const alive = await pool.isAlive('n1');
 * ```
 */

import { DEFAULT_STARTUP_DELAY_SECONDS, MAX_STARTUP_DELAY_SECONDS } from '../constants';
import {
  DeploySubject,
  NodeParam,
  PoolStatus,
  type AddResult,
  type ConnStatus,
  type ConnectResult,
  type DeployResult,
  type DisconnectResult,
  type NodeConfig,
  type NodeParams,
  type RemoteTransport,
  type RemoveResult,
  type RunResult,
  type SubjectAliveStatus,
} from '../types';
import { resolveBindEndpoint } from '../utils/bind-endpoint';
import { parseAddress } from '../utils/connection-parser';
import { silentLogger, type Logger } from '../utils/output';
import { createRemoteLayout, type RemoteLayout } from '../utils/remote-commands';
import { DeployService } from './deploy-service';
import { LivenessService, createAliveStatus } from './liveness-service';
import { NodeRegistry } from './node-registry';
import { RunService } from './run-service';
import { SessionManager, type Instance } from './session-manager';
import { cloneConnStatus, createConnStatus, getSubjectStatus, withSubjectStatus } from './status-tracker';

export interface PoolOptions {
  transport: RemoteTransport;
  logger?: Logger;
  /** Pool-wide parameter defaults */
  defaults?: NodeParams;
  /** Deployment directory on every node */
  remoteRoot?: string;
  /** Pause between starting the binary and checking it is alive */
  startupDelaySeconds?: number;
}

export class NodePool {
  private readonly registry: NodeRegistry;
  private readonly sessions: SessionManager;
  private readonly logger: Logger;
  private readonly layout: RemoteLayout;
  private readonly startupDelaySeconds: number;

  constructor(options: PoolOptions) {
    this.logger = options.logger ?? silentLogger;
    this.registry = new NodeRegistry(options.defaults);
    this.sessions = new SessionManager(options.transport, this.logger);
    this.layout = createRemoteLayout(options.remoteRoot);

    const delay = options.startupDelaySeconds ?? DEFAULT_STARTUP_DELAY_SECONDS;
    this.startupDelaySeconds =
      Number.isInteger(delay) && delay >= 0 && delay <= MAX_STARTUP_DELAY_SECONDS ? delay : DEFAULT_STARTUP_DELAY_SECONDS;
  }

  /**
   * Remote paths used on every node
   */
  get remoteLayout(): RemoteLayout {
    return { ...this.layout };
  }

  // ── Registry ──

  add(name: string, address: string, params: NodeParams = {}): AddResult {
    if (!this.registry.add(name, address, params)) {
      this.logger.error(`Node already exists: ${name}`);
      return PoolStatus.NodeAlreadyExists;
    }

    this.logger.info(`Added node ${name} (${address})`);
    return PoolStatus.Ok;
  }

  remove(name: string): Promise<RemoveResult> {
    return this.sessions.withLock(name, async () => {
      if (!this.registry.delete(name)) {
        this.logger.error(`Node doesn't exist: ${name}`);
        return PoolStatus.NodeNotFound;
      }

      await this.sessions.close(name);

      this.logger.info(`Removed node: ${name}`);
      return PoolStatus.Ok;
    });
  }

  getParam(name: string, key: string): string {
    return this.registry.getParam(name, key);
  }

  setDefault(key: string, value: string): void {
    this.registry.setDefault(key, value);
  }

  getNode(name: string): NodeConfig | undefined {
    return this.registry.get(name);
  }

  listNodes(): NodeConfig[] {
    return this.registry.list();
  }

  // ── Sessions ──

  connect(name: string): Promise<ConnectResult> {
    return this.sessions.withLock(name, async () => {
      const node = this.registry.get(name);
      if (!node) {
        this.logger.error(`Node doesn't exist: ${name}`);
        return PoolStatus.NodeNotFound;
      }

      const target = parseAddress(node.address);
      if (!target.success) {
        await this.sessions.close(name);
        this.logger.error(`Cannot connect ${name}: ${target.error.message}`);
        return PoolStatus.ConnectFailed;
      }

      const result = await this.sessions.open(name, target.data, {
        username: this.registry.getParam(name, NodeParam.Username),
        password: this.registry.getParam(name, NodeParam.Password),
      });

      if (result === PoolStatus.Ok) {
        this.logger.info(`Connected node: ${name}`);
      }
      return result;
    });
  }

  disconnect(name: string): Promise<DisconnectResult> {
    return this.sessions.withLock(name, async () => {
      if (!this.registry.has(name)) {
        this.logger.error(`Node doesn't exist: ${name}`);
        return PoolStatus.NodeNotFound;
      }

      await this.sessions.close(name);

      this.logger.info(`Disconnected node: ${name}`);
      return PoolStatus.Ok;
    });
  }

  isConnected(name: string): ConnStatus {
    const instance = this.sessions.get(name);
    return instance ? cloneConnStatus(instance.status) : createConnStatus(false);
  }

  /**
   * Close every session. Nodes stay registered.
   */
  async shutdown(): Promise<void> {
    await this.sessions.closeAll();
  }

  // ── Pipelines ──

  async deploy(name: string, subject: DeploySubject): Promise<DeployResult> {
    if (subject === DeploySubject.Self) {
      this.logger.error(`Refusing to deploy ${subject} to ${name}`);
      return PoolStatus.InvalidArgument;
    }

    const instance = this.requireInstance(name);
    if (instance === PoolStatus.NodeNotFound || instance === PoolStatus.NodeNotConnected) {
      return instance;
    }

    const service = new DeployService(instance.session, this.layout, this.logger);
    const outcome = await service.deploy(
      subject,
      this.registry.getParam(name, NodeParam.Distr),
      getSubjectStatus(instance.status, subject)
    );
    instance.status = withSubjectStatus(instance.status, subject, outcome.status);

    if (outcome.result === PoolStatus.Ok) {
      this.logger.info(`Deployed ${subject} to ${name}`);
    } else {
      this.logger.error(`Deploy of ${subject} to ${name} failed: ${outcome.result}`);
    }
    return outcome.result;
  }

  async run(name: string, subject: DeploySubject): Promise<RunResult> {
    const instance = this.requireInstance(name);
    if (instance === PoolStatus.NodeNotFound || instance === PoolStatus.NodeNotConnected) {
      return instance;
    }

    const endpoint = resolveBindEndpoint(
      this.registry.getParam(name, NodeParam.BindAddr),
      this.registry.getParam(name, NodeParam.BindPort),
      this.logger
    );

    const service = new RunService(instance.session, this.layout, this.logger);
    const outcome = await service.run(
      subject,
      endpoint,
      this.startupDelaySeconds,
      getSubjectStatus(instance.status, subject)
    );
    instance.status = withSubjectStatus(instance.status, subject, outcome.status);

    if (outcome.result === PoolStatus.Ok) {
      this.logger.info(`Started ${subject} on ${name} at ${endpoint.addr}:${endpoint.port}`);
    }
    return outcome.result;
  }

  async isAlive(name: string): Promise<SubjectAliveStatus> {
    const instance = this.sessions.get(name);
    if (!instance) {
      return createAliveStatus();
    }

    return new LivenessService(instance.session, this.layout, this.logger).probe();
  }

  private requireInstance(name: string): Instance | PoolStatus.NodeNotFound | PoolStatus.NodeNotConnected {
    if (!this.registry.has(name)) {
      this.logger.error(`Node doesn't exist: ${name}`);
      return PoolStatus.NodeNotFound;
    }

    const instance = this.sessions.get(name);
    if (!instance) {
      this.logger.error(`Node not connected: ${name}`);
      return PoolStatus.NodeNotConnected;
    }
    return instance;
  }
}

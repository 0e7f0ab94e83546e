/**
 * Command utilities - Shared functions for pool commands
 */

import { InvalidArgumentError, type Command } from 'commander';
import ora, { type Ora } from 'ora';
import {
  DEPLOY_SUBJECTS,
  DeploySubject,
  PoolStatus,
  isDeploySubject,
  type ConnStatus,
  type SubjectStatus,
} from '../types';
import type { Inventory } from '../schemas';
import { NodePool, getSubjectStatus } from '../services';
import { loadInventory } from '../utils/config';
import { CLIError, ErrorCode, statusToError } from '../utils/errors';
import { createConsoleLogger, formatFlag, printKeyValue, setDebug } from '../utils/output';
import { loadSecrets } from '../utils/secrets';
import { SshTransport } from '../utils/ssh';

/**
 * Options every pool command accepts
 */
export interface PoolCommandOptions {
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

export interface SubjectCommandOptions extends PoolCommandOptions {
  subject: DeploySubject;
}

export interface LoadedPool {
  pool: NodePool;
  inventory: Inventory;
}

/**
 * Add --config, --json and --verbose to a command
 */
export function withPoolOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Inventory file (defaults to .nodepool/nodes.yml)')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Print pool debug messages');
}

/**
 * Add --subject to a command
 */
export function withSubjectOption(command: Command): Command {
  return command.option(
    '-s, --subject <subject>',
    `What to deploy or run (${DEPLOY_SUBJECTS.join(', ')})`,
    parseSubject,
    DeploySubject.Agent
  );
}

/**
 * Commander argument parser for --subject
 */
export function parseSubject(value: string): DeploySubject {
  if (!isDeploySubject(value)) {
    throw new InvalidArgumentError(`Expected one of: ${DEPLOY_SUBJECTS.join(', ')}`);
  }
  return value;
}

/**
 * Load secrets and the inventory, and register every node on a new pool
 */
export function loadPool(options: PoolCommandOptions): LoadedPool {
  if (options.verbose) {
    setDebug(true);
  }

  loadSecrets();
  const inventory = loadInventory(options.config);

  const pool = new NodePool({
    transport: new SshTransport({ readyTimeoutMs: inventory.options.ready_timeout_ms }),
    logger: createConsoleLogger(),
    defaults: inventory.defaults,
    remoteRoot: inventory.options.remote_root,
    startupDelaySeconds: inventory.options.startup_delay_seconds,
  });

  for (const [name, node] of Object.entries(inventory.nodes)) {
    pool.add(name, node.address, node.params);
  }

  return { pool, inventory };
}

/**
 * Run a task against a freshly loaded pool and close every session afterwards
 */
export async function usePool<T>(options: PoolCommandOptions, task: (pool: NodePool) => Promise<T>): Promise<T> {
  const { pool } = loadPool(options);
  try {
    return await task(pool);
  } finally {
    await pool.shutdown();
  }
}

/**
 * Spinner that stays quiet when the command prints JSON
 */
export function createSpinner(text: string, options: PoolCommandOptions): Ora {
  return ora({ text, isSilent: Boolean(options.json) }).start();
}

/**
 * Connect a node or throw the matching CLIError
 */
export async function connectNode(pool: NodePool, node: string, options: PoolCommandOptions): Promise<ConnStatus> {
  const spinner = createSpinner(`Connecting to ${node}...`, options);

  const result = await pool.connect(node);
  if (result !== PoolStatus.Ok) {
    spinner.fail(`Cannot connect to ${node}`);
    throw statusToError(result, node);
  }

  const status = pool.isConnected(node);
  spinner.succeed(`Connected to ${node}`);
  return status;
}

/**
 * Current pipeline flags of a subject on a node
 */
export function subjectStatusOf(pool: NodePool, node: string, subject: DeploySubject): SubjectStatus {
  return getSubjectStatus(pool.isConnected(node), subject);
}

export function printSubjectStatus(status: SubjectStatus): void {
  printKeyValue('  Archive copied   ', formatFlag(status.deployArchiveCopied));
  printKeyValue('  Archive extracted', formatFlag(status.deployArchiveExtracted));
  printKeyValue('  Archive tested   ', formatFlag(status.deployArchiveTested));
  printKeyValue('  Deployed         ', formatFlag(status.deployed));
  printKeyValue('  Running          ', formatFlag(status.running));
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Error for a node whose probe came back negative
 */
export function notAliveError(node: string): CLIError {
  return new CLIError(`${node}: no live process`, ErrorCode.NOT_ALIVE, `Start it with: nodepool run ${node}`);
}

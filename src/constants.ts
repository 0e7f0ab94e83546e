/**
 * Application-wide constants
 */

import { readFileSync } from 'fs';

// Read version from package.json (single source of truth)
const packageJson: unknown = JSON.parse(
  readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
);

export const NODEPOOL_VERSION =
  typeof packageJson === 'object' &&
  packageJson !== null &&
  'version' in packageJson &&
  typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

/**
 * Remote layout
 */
export const DEFAULT_REMOTE_ROOT = '/tmp/nodepool';

/**
 * Default values
 */
export const DEFAULT_SSH_PORT = 22;
export const DEFAULT_SSH_READY_TIMEOUT_MS = 10_000;
export const DEFAULT_BIND_ADDR = '127.0.0.1';
export const DEFAULT_BIND_PORT = 5700;

/** Seconds the run script waits before checking the started process */
export const DEFAULT_STARTUP_DELAY_SECONDS = 4;
export const MAX_STARTUP_DELAY_SECONDS = 300;

/**
 * File paths (relative to the working directory)
 */
export const CONFIG_PATH = '.nodepool/nodes.yml';
export const ENV_FILE_PATH = '.env.nodepool';

/**
 * Environment variables
 */
export const ENV_PREFIX = 'NODEPOOL_';
export const SECRETS_ENV_VAR = 'NODEPOOL_SECRETS';

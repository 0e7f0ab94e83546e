/**
 * Configuration utilities
 * Handles reading .nodepool/nodes.yml and applying NODEPOOL_* overrides
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { CONFIG_PATH, ENV_PREFIX, SECRETS_ENV_VAR } from '../constants';
import { WELL_KNOWN_PARAMS } from '../types';
import { formatValidationErrors, validateInventory } from '../schemas/validation';
import type { Inventory } from '../schemas/inventory.schema';
import { ConfigError, ErrorCode, ValidationError, toError } from './errors';
import { printDebug } from './output';

/**
 * Environment variable naming an alternative inventory file
 */
export const CONFIG_ENV_VAR = `${ENV_PREFIX}CONFIG`;

/**
 * Resolve the inventory path: explicit option > NODEPOOL_CONFIG > default
 */
export function resolveConfigPath(path?: string, env: NodeJS.ProcessEnv = process.env): string {
  return resolve(path ?? env[CONFIG_ENV_VAR] ?? CONFIG_PATH);
}

/**
 * Environment key fragment for a node name: upper case, `-` mapped to `_`
 */
export function nodeEnvKey(name: string): string {
  return name.toUpperCase().replace(/-/g, '_');
}

/**
 * Apply NODEPOOL_* overrides to a validated inventory.
 *
 * - NODEPOOL_<NODE>_<PARAM> overrides a node parameter
 * - NODEPOOL_<PARAM> overrides a pool default
 *
 * A well-known parameter name always targets the defaults, so a node called
 * `bind` cannot capture NODEPOOL_BIND_PORT. Returns a new inventory.
 */
export function applyEnvOverrides(inventory: Inventory, env: NodeJS.ProcessEnv = process.env): Inventory {
  const defaults = { ...inventory.defaults };
  const nodes: Inventory['nodes'] = {};
  for (const [name, node] of Object.entries(inventory.nodes)) {
    nodes[name] = { ...node, params: { ...node.params } };
  }

  // Longest names first so `web-1` wins over `web` for NODEPOOL_WEB_1_...
  const nodeNames = Object.keys(nodes).sort((a, b) => b.length - a.length);

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    if (key === SECRETS_ENV_VAR || key === CONFIG_ENV_VAR) continue;

    const rest = key.slice(ENV_PREFIX.length);
    if (!rest) continue;

    if (WELL_KNOWN_PARAMS.includes(rest.toLowerCase())) {
      defaults[rest.toLowerCase()] = value;
      printDebug(`Default overridden from ${key}`);
      continue;
    }

    const owner = nodeNames.find((name) => rest.startsWith(`${nodeEnvKey(name)}_`));
    const node = owner === undefined ? undefined : nodes[owner];
    if (owner !== undefined && node) {
      const param = rest.slice(nodeEnvKey(owner).length + 1).toLowerCase();
      if (param) {
        node.params[param] = value;
        printDebug(`Parameter ${param} of ${owner} overridden from ${key}`);
        continue;
      }
    }

    defaults[rest.toLowerCase()] = value;
    printDebug(`Default overridden from ${key}`);
  }

  return { ...inventory, defaults, nodes };
}

/**
 * Parse and validate inventory YAML. Overrides are not applied.
 */
export function parseInventory(content: string, fileName: string): Inventory {
  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${fileName}: ${toError(error).message}`, 'Check the YAML syntax');
  }

  const result = validateInventory(data);
  if (!result.success) {
    throw new ValidationError(formatValidationErrors(result.error, fileName), 'Fix the fields listed above');
  }
  return result.data;
}

/**
 * Load the node inventory and apply environment overrides
 */
export function loadInventory(path?: string, env: NodeJS.ProcessEnv = process.env): Inventory {
  const configPath = resolveConfigPath(path, env);

  if (!existsSync(configPath)) {
    throw new ConfigError(
      `Inventory not found: ${configPath}`,
      `Create ${CONFIG_PATH} or pass --config <path>`,
      ErrorCode.CONFIG_NOT_FOUND
    );
  }

  const inventory = parseInventory(readFileSync(configPath, 'utf-8'), configPath);
  printDebug('Inventory loaded', { path: configPath, nodes: Object.keys(inventory.nodes).length });

  return applyEnvOverrides(inventory, env);
}

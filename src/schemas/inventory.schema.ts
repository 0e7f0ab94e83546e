/**
 * Schema validation for .nodepool/nodes.yml
 * Uses Zod for runtime type checking and validation
 */

import { z } from 'zod';
import {
  DEFAULT_REMOTE_ROOT,
  DEFAULT_SSH_READY_TIMEOUT_MS,
  DEFAULT_STARTUP_DELAY_SECONDS,
  MAX_STARTUP_DELAY_SECONDS,
} from '../constants';

/**
 * Node name - lowercase alphanumeric with hyphens or underscores
 */
const NODE_NAME_REGEX = /^[a-z0-9][a-z0-9_-]*[a-z0-9]$|^[a-z0-9]$/;

/**
 * Parameter keys - lowercase snake case (username, bind_addr, ...)
 */
const PARAM_KEY_REGEX = /^[a-z][a-z0-9_]*$/;

/**
 * Parameter values are strings; YAML scalars such as `bind_port: 5700` are accepted and stringified
 */
export const ParamsSchema = z.record(
  z.string().regex(PARAM_KEY_REGEX, 'Parameter names must be lowercase snake_case (e.g. bind_addr)'),
  z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value))
).describe('Node parameters (username, password, distr, bind_addr, bind_port, ...)');

/**
 * Single node schema
 */
export const NodeSchema = z.object({
  address: z.string()
    .min(1, 'Address cannot be empty')
    .describe('host or host:port of the SSH server'),

  params: ParamsSchema.optional().default({}).describe(
    'Node-local parameters, overriding defaults'
  ),
});

/**
 * Pool options schema
 */
export const PoolOptionsSchema = z.object({
  remote_root: z.string()
    .regex(/^\/[^'"]*$/, 'remote_root must be an absolute path without quotes')
    .default(DEFAULT_REMOTE_ROOT)
    .describe('Deployment directory on every node'),

  startup_delay_seconds: z.number()
    .int()
    .min(0)
    .max(MAX_STARTUP_DELAY_SECONDS)
    .default(DEFAULT_STARTUP_DELAY_SECONDS)
    .describe('Seconds to wait after start before checking the process'),

  ready_timeout_ms: z.number()
    .int()
    .positive()
    .default(DEFAULT_SSH_READY_TIMEOUT_MS)
    .describe('SSH handshake and authentication timeout'),
});

/**
 * Complete nodes.yml schema
 */
export const InventorySchema = z.object({
  defaults: ParamsSchema.optional().default({}).describe(
    'Pool-wide parameter defaults'
  ),

  nodes: z.record(
    z.string()
      .min(1, 'Node name cannot be empty')
      .max(63, 'Node name must be 63 characters or less')
      .regex(NODE_NAME_REGEX, 'Node name must be lowercase alphanumeric with hyphens or underscores'),
    NodeSchema
  )
    .refine(
      (nodes) => Object.keys(nodes).length > 0,
      { message: 'At least one node must be defined' }
    )
    .describe('Node definitions keyed by node name'),

  options: PoolOptionsSchema.optional().default({}).describe(
    'Pool behaviour'
  ),
});

export type Inventory = z.output<typeof InventorySchema>;

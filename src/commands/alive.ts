/**
 * Alive command - Probe the process recorded in a node's sentinel files
 */

import type { Command } from 'commander';
import { printKeyValue } from '../utils/output';
import { withErrorHandler } from '../utils/errors';
import {
  connectNode,
  createSpinner,
  notAliveError,
  printJson,
  usePool,
  withPoolOptions,
  type PoolCommandOptions,
} from './utils';

export function registerAliveCommand(program: Command): void {
  withPoolOptions(
    program
      .command('alive <node>')
      .description('Check whether the started process is still running')
  ).action(withErrorHandler(async (node: string, options: PoolCommandOptions) => {
    await usePool(options, async (pool) => {
      await connectNode(pool, node, options);

      const spinner = createSpinner(`Probing ${node}...`, options);
      const status = await pool.isAlive(node);

      if (options.json) {
        printJson({ node, ...status });
      }

      if (!status.alive) {
        spinner.fail(`Nothing running on ${node}`);
        throw notAliveError(node);
      }

      spinner.succeed(`Alive on ${node}`);
      if (!options.json) {
        printKeyValue('Endpoint', `tcp://${status.bindAddr}:${status.bindPort}`);
      }
    });
  }));
}

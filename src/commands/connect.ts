/**
 * Connect command - Check that a node accepts its credentials
 */

import type { Command } from 'commander';
import { printKeyValue } from '../utils/output';
import { withErrorHandler } from '../utils/errors';
import { connectNode, printJson, usePool, withPoolOptions, type PoolCommandOptions } from './utils';

export function registerConnectCommand(program: Command): void {
  withPoolOptions(
    program
      .command('connect <node>')
      .description('Open an SSH session to a node and print its platform')
  ).action(withErrorHandler(async (node: string, options: PoolCommandOptions) => {
    await usePool(options, async (pool) => {
      const status = await connectNode(pool, node, options);

      if (options.json) {
        printJson({ node, connected: status.connected, platform: status.platform });
        return;
      }

      printKeyValue('Platform', status.platform);
    });
  }));
}

/**
 * Nodes command - List the inventory with resolved parameters
 * Reads configuration only; no node is contacted.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { NodeParam } from '../types';
import { resolveBindEndpoint } from '../utils/bind-endpoint';
import { printBlank, printKeyValue, printSection } from '../utils/output';
import { withErrorHandler } from '../utils/errors';
import { loadPool, printJson, withPoolOptions, type PoolCommandOptions } from './utils';

export interface NodeSummary {
  name: string;
  address: string;
  username: string;
  distr: string;
  bindAddr: string;
  bindPort: number;
}

export function registerNodesCommand(program: Command): void {
  withPoolOptions(
    program
      .command('nodes')
      .description('List configured nodes')
  ).action(withErrorHandler(async (options: PoolCommandOptions) => {
    const { pool, inventory } = loadPool(options);

    const nodes: NodeSummary[] = pool.listNodes().map((node) => {
      // Sanitization warnings belong to `run`; listing stays quiet
      const endpoint = resolveBindEndpoint(
        pool.getParam(node.name, NodeParam.BindAddr),
        pool.getParam(node.name, NodeParam.BindPort)
      );
      return {
        name: node.name,
        address: node.address,
        username: pool.getParam(node.name, NodeParam.Username),
        distr: pool.getParam(node.name, NodeParam.Distr),
        bindAddr: endpoint.addr,
        bindPort: endpoint.port,
      };
    });

    if (options.json) {
      printJson({ remoteRoot: inventory.options.remote_root, nodes });
      return;
    }

    printSection(`Nodes (${nodes.length})`);
    for (const node of nodes) {
      printBlank();
      console.log(chalk.cyan.bold(node.name));
      printKeyValue('  Address ', node.address);
      printKeyValue('  Username', node.username || chalk.gray('(unset)'));
      printKeyValue('  Archive ', node.distr || chalk.gray('(unset)'));
      printKeyValue('  Bind    ', `${node.bindAddr}:${node.bindPort}`);
    }
    printBlank();
    printKeyValue('Remote root', inventory.options.remote_root);
  }));
}

#!/usr/bin/env tsx

/**
 * nodepool CLI - Main entry point
 * Deploys and runs an archive on a pool of SSH nodes
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { NODEPOOL_VERSION } from './constants';

// Commands
import { registerNodesCommand } from './commands/nodes';
import { registerConnectCommand } from './commands/connect';
import { registerDeployCommand } from './commands/deploy';
import { registerRunCommand } from './commands/run';
import { registerAliveCommand } from './commands/alive';
import { registerUpCommand } from './commands/up';

const program = new Command();

program
  .name('nodepool')
  .description('Deploy and run an archive on a pool of SSH nodes')
  .version(NODEPOOL_VERSION, '-v, --version', 'Show version information')
  .option('--no-color', 'Disable colored output');

// Register all commands
registerNodesCommand(program);
registerConnectCommand(program);
registerDeployCommand(program);
registerRunCommand(program);
registerAliveCommand(program);
registerUpCommand(program);

// Default action (no command) - short usage overview
program.action(() => {
  console.log(chalk.green(`nodepool v${NODEPOOL_VERSION}`));
  console.log('');
  console.log(chalk.yellow('Inventory:'));
  console.log('  nodepool nodes                  List configured nodes');
  console.log('  nodepool connect <node>         Check SSH access and platform');
  console.log('');
  console.log(chalk.yellow('Lifecycle:'));
  console.log('  nodepool deploy <node>          Upload, extract and test the archive');
  console.log('  nodepool run <node>             Restart the deployed binary');
  console.log('  nodepool alive <node>           Probe the running process');
  console.log('  nodepool up <node>              deploy + run + alive');
  console.log('');
  console.log(chalk.cyan('Run with --help to see all options'));
});

// Error handling
program.showHelpAfterError('(add --help for additional information)');

await program.parseAsync(process.argv);

/**
 * Run command - Restart the deployed binary on a node
 */

import type { Command } from 'commander';
import { PoolStatus } from '../types';
import { printKeyValue, formatFlag } from '../utils/output';
import { statusToError, withErrorHandler } from '../utils/errors';
import {
  connectNode,
  createSpinner,
  printJson,
  subjectStatusOf,
  usePool,
  withPoolOptions,
  withSubjectOption,
  type SubjectCommandOptions,
} from './utils';

export function registerRunCommand(program: Command): void {
  withSubjectOption(withPoolOptions(
    program
      .command('run <node>')
      .description('Stop the previous instance and start the deployed binary')
  )).action(withErrorHandler(async (node: string, options: SubjectCommandOptions) => {
    await usePool(options, async (pool) => {
      await connectNode(pool, node, options);

      const spinner = createSpinner(`Starting ${options.subject} on ${node}...`, options);
      const result = await pool.run(node, options.subject);
      const { running } = subjectStatusOf(pool, node, options.subject);

      if (options.json) {
        printJson({ node, subject: options.subject, result, running });
      }

      if (result !== PoolStatus.Ok) {
        spinner.fail(`${options.subject} did not start on ${node}`);
        throw statusToError(result, node);
      }

      spinner.succeed(`${options.subject} started on ${node}`);
      if (!options.json) {
        printKeyValue('Running', formatFlag(running));
      }
    });
  }));
}

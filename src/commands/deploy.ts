/**
 * Deploy command - Upload, extract and smoke-test an archive on a node
 */

import type { Command } from 'commander';
import { PoolStatus } from '../types';
import { printBlank } from '../utils/output';
import { statusToError, withErrorHandler } from '../utils/errors';
import {
  connectNode,
  createSpinner,
  printJson,
  printSubjectStatus,
  subjectStatusOf,
  usePool,
  withPoolOptions,
  withSubjectOption,
  type SubjectCommandOptions,
} from './utils';

export function registerDeployCommand(program: Command): void {
  withSubjectOption(withPoolOptions(
    program
      .command('deploy <node>')
      .description('Deploy the configured archive to a node')
  )).action(withErrorHandler(async (node: string, options: SubjectCommandOptions) => {
    await usePool(options, async (pool) => {
      await connectNode(pool, node, options);

      const spinner = createSpinner(`Deploying ${options.subject} to ${node}...`, options);
      const result = await pool.deploy(node, options.subject);
      const status = subjectStatusOf(pool, node, options.subject);

      if (options.json) {
        printJson({ node, subject: options.subject, result, status });
      }

      if (result !== PoolStatus.Ok) {
        spinner.fail(`Deploy of ${options.subject} to ${node} failed`);
        if (!options.json) printSubjectStatus(status);
        throw statusToError(result, node);
      }

      spinner.succeed(`Deployed ${options.subject} to ${node}`);
      if (!options.json) {
        printBlank();
        printSubjectStatus(status);
      }
    });
  }));
}

/**
 * Up command - Deploy, run and probe in one go
 */

import type { Command } from 'commander';
import { PoolStatus } from '../types';
import { printBlank, printKeyValue } from '../utils/output';
import { statusToError, withErrorHandler } from '../utils/errors';
import {
  connectNode,
  createSpinner,
  notAliveError,
  printJson,
  printSubjectStatus,
  subjectStatusOf,
  usePool,
  withPoolOptions,
  withSubjectOption,
  type SubjectCommandOptions,
} from './utils';

export function registerUpCommand(program: Command): void {
  withSubjectOption(withPoolOptions(
    program
      .command('up <node>')
      .description('Deploy and start a subject, then confirm it is alive')
  )).action(withErrorHandler(async (node: string, options: SubjectCommandOptions) => {
    await usePool(options, async (pool) => {
      const { subject } = options;
      const connection = await connectNode(pool, node, options);

      const deploySpinner = createSpinner(`Deploying ${subject}...`, options);
      const deployed = await pool.deploy(node, subject);
      if (deployed !== PoolStatus.Ok) {
        deploySpinner.fail(`Deploy of ${subject} failed`);
        if (!options.json) printSubjectStatus(subjectStatusOf(pool, node, subject));
        throw statusToError(deployed, node);
      }
      deploySpinner.succeed(`Deployed ${subject}`);

      const runSpinner = createSpinner(`Starting ${subject}...`, options);
      const started = await pool.run(node, subject);
      if (started !== PoolStatus.Ok) {
        runSpinner.fail(`${subject} did not start`);
        throw statusToError(started, node);
      }
      runSpinner.succeed(`Started ${subject}`);

      const alive = await pool.isAlive(node);

      if (options.json) {
        printJson({
          node,
          subject,
          platform: connection.platform,
          status: subjectStatusOf(pool, node, subject),
          alive,
        });
      }

      if (!alive.alive) {
        throw notAliveError(node);
      }

      if (!options.json) {
        printBlank();
        printKeyValue('Platform', connection.platform);
        printKeyValue('Endpoint', `tcp://${alive.bindAddr}:${alive.bindPort}`);
      }
    });
  }));
}

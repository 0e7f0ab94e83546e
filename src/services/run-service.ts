/**
 * Run Service
 *
 * Stops the previous remote instance (best effort), starts the subject's
 * binary on the resolved bind endpoint and confirms it stayed up.
 */

import { PoolStatus, type DeploySubject, type RemoteSession, type SubjectStatus } from '../types';
import type { BindEndpoint } from '../utils/bind-endpoint';
import { toError } from '../utils/errors';
import type { Logger } from '../utils/output';
import { RUN_MARKER, startCommands, stopPreviousCommand, type RemoteLayout } from '../utils/remote-commands';

export interface RunOutcome {
  result: PoolStatus.Ok | PoolStatus.RunFailed;
  status: SubjectStatus;
}

export class RunService {
  constructor(
    private readonly session: RemoteSession,
    private readonly layout: RemoteLayout,
    private readonly logger: Logger
  ) {}

  async run(
    subject: DeploySubject,
    endpoint: BindEndpoint,
    startupDelaySeconds: number,
    previous: SubjectStatus
  ): Promise<RunOutcome> {
    const status: SubjectStatus = { ...previous, running: false };

    await this.stopPrevious();

    let output: string;
    try {
      output = await this.session.execInteractive(
        startCommands(this.layout, subject, endpoint, startupDelaySeconds)
      );
    } catch (error) {
      this.logger.error(`Failed to start ${subject}: ${toError(error).message}`);
      return { result: PoolStatus.RunFailed, status };
    }

    if (!output.includes(RUN_MARKER)) {
      this.logger.error(`${subject} did not stay up on ${endpoint.addr}:${endpoint.port}`);
      return { result: PoolStatus.RunFailed, status };
    }

    status.running = true;
    return { result: PoolStatus.Ok, status };
  }

  /**
   * Kill whatever the pid sentinel points at. A missing sentinel or a failed kill is not fatal.
   */
  private async stopPrevious(): Promise<void> {
    try {
      await this.session.exec(stopPreviousCommand(this.layout));
    } catch (error) {
      this.logger.warn(`Could not stop previous instance: ${toError(error).message}`);
    }
  }
}

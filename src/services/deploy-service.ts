/**
 * Deploy Service
 *
 * Drives the copy → extract → test pipeline for one subject over a live
 * session. Stage flags are set strictly in order and the status reached so
 * far is always returned, whatever the outcome.
 */

import { PoolStatus, type DeploySubject, type DeployStageResult, type RemoteSession, type SubjectStatus } from '../types';
import { toError } from '../utils/errors';
import type { Logger } from '../utils/output';
import { extractArchiveCommand, versionCommand, type RemoteLayout } from '../utils/remote-commands';
import { resetDeployFlags } from './status-tracker';

export interface DeployOutcome {
  result: DeployStageResult;
  status: SubjectStatus;
}

export class DeployService {
  constructor(
    private readonly session: RemoteSession,
    private readonly layout: RemoteLayout,
    private readonly logger: Logger
  ) {}

  /**
   * Run the pipeline. `previous` is the subject's status before this attempt.
   */
  async deploy(subject: DeploySubject, archivePath: string, previous: SubjectStatus): Promise<DeployOutcome> {
    const status = resetDeployFlags(previous);

    if (!(await this.copyArchive(archivePath))) {
      return { result: PoolStatus.DeployCopyFailed, status };
    }
    status.deployArchiveCopied = true;

    if (!(await this.run(extractArchiveCommand(this.layout), 'extract archive'))) {
      return { result: PoolStatus.DeployExtractionFailed, status };
    }
    status.deployArchiveExtracted = true;

    if (!(await this.run(versionCommand(this.layout, subject), 'test deployed binary'))) {
      return { result: PoolStatus.DeployTestFailed, status };
    }
    status.deployArchiveTested = true;
    status.deployed = true;

    return { result: PoolStatus.Ok, status };
  }

  private async copyArchive(archivePath: string): Promise<boolean> {
    if (archivePath === '') {
      this.logger.error('No archive configured (distr parameter is empty)');
      return false;
    }

    try {
      await this.session.upload(archivePath, this.layout.archivePath);
      this.logger.debug('Archive uploaded', { from: archivePath, to: this.layout.archivePath });
      return true;
    } catch (error) {
      this.logger.error(`Failed to upload ${archivePath}: ${toError(error).message}`);
      return false;
    }
  }

  /**
   * A stage passes when its command prints anything on stdout
   */
  private async run(command: string, stage: string): Promise<boolean> {
    try {
      const output = await this.session.exec(command);
      this.logger.debug(`Stage ${stage}`, { command, output: output.trim() });
      return output !== '';
    } catch (error) {
      this.logger.error(`Failed to ${stage}: ${toError(error).message}`);
      return false;
    }
  }
}

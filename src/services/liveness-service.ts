/**
 * Liveness Service
 *
 * Reads the sentinel files written by the run script and checks the recorded
 * process. Read-only; results are never cached.
 */

import type { RemoteSession, SubjectAliveStatus } from '../types';
import { parsePid, parsePort } from '../utils/bind-endpoint';
import { toError } from '../utils/errors';
import type { Logger } from '../utils/output';
import { PROBE_MARKER, probeProcessCommand, readSentinelCommand, type RemoteLayout } from '../utils/remote-commands';

export function createAliveStatus(): SubjectAliveStatus {
  return { alive: false, bindAddr: '', bindPort: 0 };
}

export class LivenessService {
  constructor(
    private readonly session: RemoteSession,
    private readonly layout: RemoteLayout,
    private readonly logger: Logger
  ) {}

  async probe(): Promise<SubjectAliveStatus> {
    try {
      return await this.readStatus();
    } catch (error) {
      this.logger.warn(`Liveness probe failed: ${toError(error).message}`);
      return createAliveStatus();
    }
  }

  private async readStatus(): Promise<SubjectAliveStatus> {
    const pid = parsePid(await this.session.exec(readSentinelCommand(this.layout.pidFile)));
    if (pid === null) {
      return createAliveStatus();
    }

    const probe = await this.session.exec(probeProcessCommand(pid));
    if (!probe.includes(PROBE_MARKER)) {
      return createAliveStatus();
    }

    const bindAddr = (await this.session.exec(readSentinelCommand(this.layout.bindAddrFile))).trim();
    const bindPort = parsePort((await this.session.exec(readSentinelCommand(this.layout.bindPortFile))).trim());

    // A running process without a usable port has no endpoint to report
    if (bindPort === null) {
      return createAliveStatus();
    }

    return { alive: true, bindAddr, bindPort };
  }
}

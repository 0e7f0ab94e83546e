/**
 * Deployment status tracking
 *
 * Per-node ConnStatus with lazily created per-subject SubjectStatus records.
 * Records are replaced wholesale, never patched in place, so a status handed
 * out to a caller cannot change under it.
 */

import { DEPLOY_SUBJECTS, type ConnStatus, type DeploySubject, type SubjectStatus } from '../types';

export function createSubjectStatus(): SubjectStatus {
  return {
    deployArchiveCopied: false,
    deployArchiveExtracted: false,
    deployArchiveTested: false,
    deployed: false,
    running: false,
  };
}

export function createConnStatus(connected: boolean, platform = ''): ConnStatus {
  return { connected, platform, subjects: {} };
}

/**
 * Copy of the subject's status, all false if the subject was never touched
 */
export function getSubjectStatus(status: ConnStatus, subject: DeploySubject): SubjectStatus {
  const current = status.subjects[subject];
  return current ? { ...current } : createSubjectStatus();
}

/**
 * New ConnStatus with the subject's status replaced
 */
export function withSubjectStatus(
  status: ConnStatus,
  subject: DeploySubject,
  subjectStatus: SubjectStatus
): ConnStatus {
  return {
    ...status,
    subjects: { ...status.subjects, [subject]: { ...subjectStatus } },
  };
}

/**
 * Deep copy handed out to callers
 */
export function cloneConnStatus(status: ConnStatus): ConnStatus {
  const subjects: ConnStatus['subjects'] = {};
  for (const subject of DEPLOY_SUBJECTS) {
    const subjectStatus = status.subjects[subject];
    if (subjectStatus) {
      subjects[subject] = { ...subjectStatus };
    }
  }
  return { connected: status.connected, platform: status.platform, subjects };
}

/**
 * Clear the deploy flags at the start of a deploy attempt. `running` is left alone.
 */
export function resetDeployFlags(subjectStatus: SubjectStatus): SubjectStatus {
  return {
    ...subjectStatus,
    deployArchiveCopied: false,
    deployArchiveExtracted: false,
    deployArchiveTested: false,
    deployed: false,
  };
}

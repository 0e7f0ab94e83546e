/**
 * Node pool data model
 *
 * A node is a named SSH-reachable machine with free-form string parameters.
 * Live session state is tracked separately, per node name, as a ConnStatus.
 */

/**
 * Node parameters the pool itself reads.
 * Values are the keys used in nodes.yml and in NODEPOOL_* overrides.
 */
export enum NodeParam {
  Username = 'username',
  Password = 'password',
  /** Local path of the archive uploaded by deploy */
  Distr = 'distr',
  BindAddr = 'bind_addr',
  BindPort = 'bind_port',
}

export const WELL_KNOWN_PARAMS: readonly string[] = Object.values(NodeParam);

/**
 * Free-form node parameters keyed by name
 */
export type NodeParams = Record<string, string>;

/**
 * Registered node
 */
export interface NodeConfig {
  /** Unique name within the pool */
  name: string;
  /** host or host:port */
  address: string;
  /** Node-local parameter overrides */
  params: NodeParams;
}

/**
 * What is deployed or run on a node.
 * `self` stands for the orchestrator itself and is never a valid deploy target.
 */
export enum DeploySubject {
  Self = 'self',
  Agent = 'agent',
}

export const DEPLOY_SUBJECTS: readonly DeploySubject[] = Object.values(DeploySubject);

export function isDeploySubject(value: string): value is DeploySubject {
  return DEPLOY_SUBJECTS.some((subject) => subject === value);
}

/**
 * Pipeline progress for one subject on one node
 */
export interface SubjectStatus {
  deployArchiveCopied: boolean;
  deployArchiveExtracted: boolean;
  deployArchiveTested: boolean;
  /** True only once copy, extract and test all succeeded */
  deployed: boolean;
  /** Set by the run pipeline */
  running: boolean;
}

/**
 * Connection state of one node
 */
export interface ConnStatus {
  connected: boolean;
  /** `uname -a` output captured at connect time */
  platform: string;
  subjects: Partial<Record<DeploySubject, SubjectStatus>>;
}

/**
 * Result of a liveness probe. Never cached.
 */
export interface SubjectAliveStatus {
  alive: boolean;
  bindAddr: string;
  /** 0 when no endpoint could be read */
  bindPort: number;
}

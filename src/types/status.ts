/**
 * Pool operation outcomes
 *
 * Every pool operation resolves to one of these values; nothing the transport
 * throws crosses the pool boundary. Each operation narrows the enum to the
 * variants it can actually produce.
 */

export enum PoolStatus {
  Ok = 'ok',
  NodeNotFound = 'node_not_found',
  NodeAlreadyExists = 'node_already_exists',
  NodeNotConnected = 'node_not_connected',
  NotAuthenticated = 'not_authenticated',
  ConnectFailed = 'connect_failed',
  InvalidArgument = 'invalid_argument',
  DeployCopyFailed = 'deploy_copy_failed',
  DeployExtractionFailed = 'deploy_extraction_failed',
  DeployTestFailed = 'deploy_test_failed',
  RunFailed = 'run_failed',
}

export type AddResult = PoolStatus.Ok | PoolStatus.NodeAlreadyExists;

export type RemoveResult = PoolStatus.Ok | PoolStatus.NodeNotFound;

export type ConnectResult =
  | PoolStatus.Ok
  | PoolStatus.NodeNotFound
  | PoolStatus.NotAuthenticated
  | PoolStatus.ConnectFailed;

export type DisconnectResult = PoolStatus.Ok | PoolStatus.NodeNotFound;

/** Outcomes of the deploy stages themselves, once preconditions hold */
export type DeployStageResult =
  | PoolStatus.Ok
  | PoolStatus.DeployCopyFailed
  | PoolStatus.DeployExtractionFailed
  | PoolStatus.DeployTestFailed;

export type DeployResult =
  | DeployStageResult
  | PoolStatus.InvalidArgument
  | PoolStatus.NodeNotFound
  | PoolStatus.NodeNotConnected;

export type RunResult =
  | PoolStatus.Ok
  | PoolStatus.NodeNotFound
  | PoolStatus.NodeNotConnected
  | PoolStatus.RunFailed;

const STATUS_MESSAGES: Record<PoolStatus, string> = {
  [PoolStatus.Ok]: 'ok',
  [PoolStatus.NodeNotFound]: 'node not found',
  [PoolStatus.NodeAlreadyExists]: 'node already exists',
  [PoolStatus.NodeNotConnected]: 'node not connected',
  [PoolStatus.NotAuthenticated]: 'credentials were rejected',
  [PoolStatus.ConnectFailed]: 'could not open an SSH session',
  [PoolStatus.InvalidArgument]: 'invalid argument',
  [PoolStatus.DeployCopyFailed]: 'archive upload failed',
  [PoolStatus.DeployExtractionFailed]: 'archive extraction failed',
  [PoolStatus.DeployTestFailed]: 'deployed binary did not answer --version',
  [PoolStatus.RunFailed]: 'process did not stay up after start',
};

export function describeStatus(status: PoolStatus): string {
  return STATUS_MESSAGES[status];
}

/**
 * Remote session capability consumed by the node pool.
 * The SSH implementation lives in utils/ssh.ts; tests use testing/fake-transport.ts.
 */

import type { SSHCredentials, SSHTarget } from './connection';

/**
 * An authenticated session, exclusively owned by one node's Instance
 */
export interface RemoteSession {
  /** Run one command on an exec channel and return its stdout */
  exec(command: string): Promise<string>;
  /** Feed commands, one per line, to a single shell channel and return its stdout */
  execInteractive(commands: readonly string[]): Promise<string>;
  /** Copy a local file to the remote path */
  upload(localPath: string, remotePath: string): Promise<void>;
  /** Close channels and the session. Safe to call twice. */
  close(): Promise<void>;
}

/**
 * Opens sessions. Rejects with AuthenticationError when credentials are
 * refused and with ConnectionError for any other failure.
 */
export interface RemoteTransport {
  open(target: SSHTarget, credentials: SSHCredentials): Promise<RemoteSession>;
}

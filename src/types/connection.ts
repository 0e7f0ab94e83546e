/**
 * SSH connection type definitions
 */

/**
 * Where to reach a node
 */
export interface SSHTarget {
  host: string;
  port: number;
}

/**
 * Password credentials resolved from node parameters
 */
export interface SSHCredentials {
  username: string;
  password: string;
}

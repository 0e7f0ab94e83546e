/**
 * Bind endpoint resolution for the run pipeline.
 *
 * The bind address and port end up inside a remote shell command, so values
 * that cannot be used safely are replaced by the defaults.
 */

import { DEFAULT_BIND_ADDR, DEFAULT_BIND_PORT } from '../constants';
import type { Logger } from './output';

export interface BindEndpoint {
  addr: string;
  port: number;
}

/**
 * Parse an unsigned 16-bit port. No sign, no whitespace, no fraction.
 */
export function parsePort(value: string): number | null {
  if (!/^\d+$/.test(value)) {
    return null;
  }
  const port = Number(value);
  return port <= 65535 ? port : null;
}

/**
 * Parse a process id read from a sentinel file. Only positive integers count.
 */
export function parsePid(value: string): number | null {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  const pid = Number(trimmed);
  return Number.isSafeInteger(pid) && pid > 0 ? pid : null;
}

/**
 * Sanitize configured bind parameters, falling back to 127.0.0.1:5700
 */
export function resolveBindEndpoint(rawAddr: string, rawPort: string, logger?: Logger): BindEndpoint {
  let addr = rawAddr;
  if (addr.includes("'") || addr.includes('"')) {
    logger?.error(`Reset bind address due to bad symbols: ${addr}`);
    addr = '';
  }
  if (addr === '') {
    addr = DEFAULT_BIND_ADDR;
  }

  let port = DEFAULT_BIND_PORT;
  if (rawPort !== '') {
    const parsed = parsePort(rawPort);
    if (parsed === null) {
      logger?.error(`Reset bind port due to bad symbols: ${rawPort}`);
    } else {
      port = parsed;
    }
  }

  return { addr, port };
}

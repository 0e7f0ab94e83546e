/**
 * Node Address Parser
 *
 * Turns the address given to `add` (host, host:port or [ipv6]:port)
 * into an SSH target.
 */

import { DEFAULT_SSH_PORT } from '../constants';
import type { SSHTarget, Result } from '../types';
import { ok, err } from '../types';
import { parsePort } from './bind-endpoint';

/**
 * Error types for address parsing
 */
export class AddressParseError extends Error {
  constructor(message: string, public readonly code: AddressParseErrorCode) {
    super(message);
    this.name = 'AddressParseError';
  }
}

export enum AddressParseErrorCode {
  EMPTY = 'EMPTY',
  INVALID_HOST = 'INVALID_HOST',
  INVALID_PORT = 'INVALID_PORT',
}

const HOST_REGEX = /^[A-Za-z0-9._-]+$/;
const IPV6_REGEX = /^[0-9A-Fa-f:.%]+$/;

function resolvePort(raw: string, address: string): Result<number, AddressParseError> {
  const port = parsePort(raw);
  if (port === null || port === 0) {
    return err(new AddressParseError(
      `Invalid port in address: ${address}`,
      AddressParseErrorCode.INVALID_PORT
    ));
  }
  return ok(port);
}

/**
 * Parse a node address.
 * Returns a Result type for explicit error handling.
 */
export function parseAddress(address: string): Result<SSHTarget, AddressParseError> {
  const trimmed = address.trim();
  if (!trimmed) {
    return err(new AddressParseError('Address is empty', AddressParseErrorCode.EMPTY));
  }

  // [ipv6]:port or [ipv6]
  const bracketed = trimmed.match(/^\[([^\]]+)\](?::(.*))?$/);
  if (bracketed) {
    const host = bracketed[1];
    if (!IPV6_REGEX.test(host)) {
      return err(new AddressParseError(`Invalid host in address: ${address}`, AddressParseErrorCode.INVALID_HOST));
    }
    if (bracketed[2] === undefined) {
      return ok({ host, port: DEFAULT_SSH_PORT });
    }
    const port = resolvePort(bracketed[2], address);
    return port.success ? ok({ host, port: port.data }) : port;
  }

  // A bare IPv6 address has several colons and no port
  if (trimmed.split(':').length > 2) {
    if (!IPV6_REGEX.test(trimmed)) {
      return err(new AddressParseError(`Invalid host in address: ${address}`, AddressParseErrorCode.INVALID_HOST));
    }
    return ok({ host: trimmed, port: DEFAULT_SSH_PORT });
  }

  const separator = trimmed.lastIndexOf(':');
  const host = separator === -1 ? trimmed : trimmed.slice(0, separator);
  if (!HOST_REGEX.test(host)) {
    return err(new AddressParseError(`Invalid host in address: ${address}`, AddressParseErrorCode.INVALID_HOST));
  }
  if (separator === -1) {
    return ok({ host, port: DEFAULT_SSH_PORT });
  }

  const port = resolvePort(trimmed.slice(separator + 1), address);
  return port.success ? ok({ host, port: port.data }) : port;
}

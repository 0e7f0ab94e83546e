/**
 * Remote command builders
 *
 * Every command the pool sends to a node is built here. Each interpolated
 * value goes through shellQuote, numbers excepted.
 */

import { DEFAULT_REMOTE_ROOT } from '../constants';
import type { DeploySubject } from '../types';
import type { BindEndpoint } from './bind-endpoint';
import { shellQuote } from './shell';

/**
 * Paths used on every node
 */
export interface RemoteLayout {
  /** Deployment directory the archive is extracted into */
  root: string;
  /** Staging path for the uploaded archive */
  archivePath: string;
  pidFile: string;
  bindAddrFile: string;
  bindPortFile: string;
}

export function createRemoteLayout(root: string = DEFAULT_REMOTE_ROOT): RemoteLayout {
  const base = root.length > 1 ? root.replace(/\/+$/, '') : root;
  return {
    root: base,
    archivePath: `${base}-archive.tar.xz`,
    pidFile: `${base}/pid`,
    bindAddrFile: `${base}/bind_addr`,
    bindPortFile: `${base}/bind_port`,
  };
}

export const PLATFORM_COMMAND = 'uname -a';

/** Echoed by the run script only when the started process is alive */
export const RUN_MARKER = 'nodepool-running';

/** Echoed by the liveness probe when kill -0 succeeds */
export const PROBE_MARKER = 'runs';

export function binaryPath(layout: RemoteLayout, subject: DeploySubject): string {
  return `${layout.root}/bin/${subject}`;
}

export function extractArchiveCommand(layout: RemoteLayout): string {
  const root = shellQuote(layout.root);
  return `mkdir -p ${root} && tar xf ${shellQuote(layout.archivePath)} -C ${root} > /dev/null 2> /dev/null && echo ok`;
}

export function versionCommand(layout: RemoteLayout, subject: DeploySubject): string {
  return `${shellQuote(binaryPath(layout, subject))} --version`;
}

/**
 * Kill the process recorded in the pid sentinel, if it holds a positive number
 */
export function stopPreviousCommand(layout: RemoteLayout): string {
  const pid = shellQuote(layout.pidFile);
  const script = `test -f ${pid} && test "$(cat ${pid})" -gt 0 && kill "$(cat ${pid})"`;
  return `/bin/sh -c ${shellQuote(script)}`;
}

export function readSentinelCommand(path: string): string {
  return `cat ${shellQuote(path)} 2> /dev/null`;
}

export function probeProcessCommand(pid: number): string {
  return `kill -0 ${pid} && echo ${PROBE_MARKER}`;
}

/**
 * Shell script that starts the binary in the background, records its pid and
 * endpoint, waits, then echoes RUN_MARKER if the process is still alive.
 */
export function startCommands(
  layout: RemoteLayout,
  subject: DeploySubject,
  endpoint: BindEndpoint,
  startupDelaySeconds: number
): string[] {
  const pid = shellQuote(layout.pidFile);
  const server = shellQuote(`tcp://${endpoint.addr}:${endpoint.port}`);

  return [
    `${shellQuote(binaryPath(layout, subject))} --server ${server} < /dev/null > /dev/null 2> /dev/null &`,
    `echo $! > ${pid}`,
    `echo ${shellQuote(endpoint.addr)} > ${shellQuote(layout.bindAddrFile)}`,
    `echo ${endpoint.port} > ${shellQuote(layout.bindPortFile)}`,
    `sleep ${startupDelaySeconds}`,
    `kill -0 "$(cat ${pid})" && echo ${RUN_MARKER} "$(cat ${pid})"`,
  ];
}

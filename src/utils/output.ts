/**
 * Output formatting utilities
 */

import chalk from 'chalk';

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
};

let debugEnabled = Boolean(process.env.DEBUG);

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebug(): boolean {
  return debugEnabled;
}

export function printDebug(message: string, context?: Record<string, unknown>): void {
  if (!debugEnabled) return;
  const suffix = context ? ` ${JSON.stringify(context)}` : '';
  console.error(colors.dim(`[debug] ${message}${suffix}`));
}

export function printBlank(): void {
  console.log('');
}

export function printRaw(text: string): void {
  console.log(text);
}

export function printSection(title: string): void {
  console.log('');
  console.log(colors.info(`=== ${title} ===`));
}

export function printKeyValue(key: string, value: string): void {
  console.log(`${colors.dim(key + ':')} ${value}`);
}

/**
 * Render a boolean pipeline flag
 */
export function formatFlag(value: boolean): string {
  return value ? colors.success('✓ yes') : colors.error('✗ no');
}

/**
 * Log side channel used by the node pool.
 * Emitting a line never changes what an operation returns.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Logger printing through the CLI output helpers.
 * Pool messages are informational, so they go out dimmed to keep command output readable.
 */
export function createConsoleLogger(): Logger {
  return {
    debug: printDebug,
    info: (message) => {
      if (debugEnabled) console.error(colors.dim(`[info] ${message}`));
    },
    warn: (message) => console.error(colors.warning(`⚠ ${message}`)),
    error: (message) => console.error(colors.error(`✗ ${message}`)),
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Shell quoting for commands sent to remote nodes.
 */

/**
 * Quote a value as a single POSIX shell word.
 * Embedded single quotes are closed, escaped and reopened.
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

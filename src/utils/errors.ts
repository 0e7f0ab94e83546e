/**
 * Command Error Handling
 *
 * Provides centralized error handling for CLI commands.
 * This module ensures consistent error messages and exit behavior
 * across all commands.
 */

import { PoolStatus, describeStatus } from '../types';
import { colors, isDebug, printBlank, printRaw } from './output';

/**
 * CLI Error codes for different failure scenarios
 */
export enum ErrorCode {
  // General errors (1-9)
  UNKNOWN = 1,
  COMMAND_FAILED = 3,

  // Configuration errors (10-19)
  CONFIG_NOT_FOUND = 10,
  CONFIG_INVALID = 11,
  NODE_NOT_FOUND = 12,
  NODE_ALREADY_EXISTS = 13,

  // Connection errors (30-39)
  CONNECTION_FAILED = 30,
  NODE_NOT_CONNECTED = 31,
  SSH_AUTH_FAILED = 32,

  // Deployment errors (50-59)
  DEPLOY_COPY_FAILED = 50,
  DEPLOY_EXTRACTION_FAILED = 51,
  DEPLOY_TEST_FAILED = 52,
  RUN_FAILED = 53,
  NOT_ALIVE = 54,

  // Validation errors (60-69)
  VALIDATION_FAILED = 60,
  INVALID_ARGUMENT = 61,
}

/**
 * Base CLI error class with structured information
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN,
    public readonly suggestion?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CLIError';
  }

  /**
   * Create error from unknown thrown value
   */
  static from(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): CLIError {
    if (error instanceof CLIError) {
      return error;
    }
    if (error instanceof Error) {
      return new CLIError(error.message, code, undefined, error);
    }
    return new CLIError(String(error), code);
  }
}

/**
 * Specific error types for common scenarios
 */
export class ConfigError extends CLIError {
  constructor(message: string, suggestion?: string, code: ErrorCode = ErrorCode.CONFIG_INVALID) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
  }
}

export class ConnectionError extends CLIError {
  constructor(message: string, suggestion?: string, cause?: Error) {
    super(message, ErrorCode.CONNECTION_FAILED, suggestion, cause);
    this.name = 'ConnectionError';
  }
}

export class AuthenticationError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, ErrorCode.SSH_AUTH_FAILED, 'Check the username and password parameters for this node', cause);
    this.name = 'AuthenticationError';
  }
}

export class DeployError extends CLIError {
  constructor(message: string, code: ErrorCode = ErrorCode.DEPLOY_COPY_FAILED, suggestion?: string) {
    super(message, code, suggestion);
    this.name = 'DeployError';
  }
}

export class ValidationError extends CLIError {
  constructor(message: string, suggestion?: string) {
    super(message, ErrorCode.VALIDATION_FAILED, suggestion);
    this.name = 'ValidationError';
  }
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Map a failed pool status to the error the CLI reports for it
 */
export function statusToError(status: Exclude<PoolStatus, PoolStatus.Ok>, node: string): CLIError {
  const message = `${node}: ${describeStatus(status)}`;

  switch (status) {
    case PoolStatus.NodeNotFound:
      return new ConfigError(message, `Add "${node}" under nodes: in the inventory`, ErrorCode.NODE_NOT_FOUND);
    case PoolStatus.NodeAlreadyExists:
      return new ConfigError(message, undefined, ErrorCode.NODE_ALREADY_EXISTS);
    case PoolStatus.NodeNotConnected:
      return new CLIError(message, ErrorCode.NODE_NOT_CONNECTED);
    case PoolStatus.NotAuthenticated:
      return new AuthenticationError(message);
    case PoolStatus.ConnectFailed:
      return new ConnectionError(message, 'Check the node address and that sshd is reachable');
    case PoolStatus.InvalidArgument:
      return new CLIError(message, ErrorCode.INVALID_ARGUMENT);
    case PoolStatus.DeployCopyFailed:
      return new DeployError(message, ErrorCode.DEPLOY_COPY_FAILED, 'Check the distr parameter points to a readable archive');
    case PoolStatus.DeployExtractionFailed:
      return new DeployError(message, ErrorCode.DEPLOY_EXTRACTION_FAILED, 'The node needs tar with xz support');
    case PoolStatus.DeployTestFailed:
      return new DeployError(message, ErrorCode.DEPLOY_TEST_FAILED);
    case PoolStatus.RunFailed:
      return new DeployError(message, ErrorCode.RUN_FAILED, 'Check that the bind endpoint is free on the node');
  }
}

/**
 * Format error for display
 */
export function formatError(error: CLIError): string {
  const lines: string[] = [];

  lines.push(colors.error(`Error: ${error.message}`));

  if (error.suggestion) {
    lines.push(colors.dim(`  → ${error.suggestion}`));
  }

  if (isDebug() && error.cause) {
    lines.push(colors.dim(`  Caused by: ${error.cause.message}`));
    if (error.cause.stack) {
      lines.push(colors.dim(error.cause.stack));
    }
  }

  return lines.join('\n');
}

/**
 * Handle error and exit process
 * This is the ONLY place that should call process.exit for errors
 */
export function handleError(error: unknown): never {
  const cliError = CLIError.from(error);

  printBlank();
  printRaw(formatError(cliError));
  printBlank();

  process.exit(cliError.code);
}

/**
 * Type for async command action handlers
 */
export type CommandAction<T extends unknown[] = unknown[]> = (...args: T) => Promise<void>;

/**
 * Wrap a command action with error handling
 *
 * Usage:
 * ```typescript
 * .action(withErrorHandler(async (node, options) => {
 *   // Command logic - just throw errors, don't call process.exit
 *   if (!valid) throw new ValidationError('Invalid input');
 * }))
 * ```
 */
export function withErrorHandler<T extends unknown[]>(
  action: CommandAction<T>
): CommandAction<T> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

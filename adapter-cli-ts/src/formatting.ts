/**
 * Output formatting utilities
 */

import {
  BrokerRpcError,
  CallResult,
  PoolExhaustedError,
  RemoteError,
  TimeoutError,
  TransportError,
  ValidationError as ConfigValidationError,
} from 'broker-rpc';
import { OperationError, ValidationError } from './errors';

/**
 * Format the outcome of a call for display
 *
 * Success prints the response data as indented JSON; every other outcome
 * prints an `Error:` line, followed by the backend messages of a remote error.
 */
export function formatCallResult(result: CallResult): string {
  switch (result.kind) {
    case 'success':
      return JSON.stringify(result.data, null, 2);
    case 'remoteError':
      return [
        `Error: ${result.errorCode} - ${result.errorMessage}`,
        ...result.backendMessages.map((m) => `  [${m.type}] ${m.source}: ${m.message}`),
      ].join('\n');
    case 'timeout':
      return `Error: Call timed out after ${result.timeoutMs}ms`;
    case 'transportError':
      return `Error: Could not reach broker - ${result.error.message}`;
    case 'decodeError':
      return `Error: Invalid response - ${result.error.message}`;
  }
}

/**
 * Exit code for a call outcome
 *
 * Exit codes follow Unix conventions:
 * - 0: Success
 * - 2: Connection/timeout error (network issues)
 * - 3: Operational error (remote business error, undecodable response)
 */
export function exitCodeFor(result: CallResult): number {
  switch (result.kind) {
    case 'success':
      return 0;
    case 'timeout':
    case 'transportError':
      return 2;
    case 'remoteError':
    case 'decodeError':
      return 3;
  }
}

/**
 * Format an error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    if (error.actual !== undefined && error.expected !== undefined) {
      return `Error: ${error.message} (actual: ${error.actual}, expected: ${error.expected})`;
    }
    return `Error: ${error.message}`;
  }

  if (error instanceof ConfigValidationError) {
    return `Error: Invalid configuration - ${error.message}`;
  }

  if (error instanceof TransportError || error instanceof PoolExhaustedError) {
    return `Error: Could not reach broker - ${error.message}`;
  }

  if (error instanceof RemoteError) {
    return `Error: ${error.errorCode} - ${error.message}`;
  }

  if (error instanceof OperationError || error instanceof BrokerRpcError) {
    return `Error: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Error: ${String(error)}`;
}

/**
 * Get appropriate exit code for error
 *
 * - 1: Validation error (bad user input or configuration)
 * - 2: Connection/timeout error (network issues)
 * - 3: Operational error (remote errors, protocol errors, unexpected failures)
 * - 130: SIGINT (handled by the serve command directly)
 */
export function getExitCode(error: unknown): number {
  // Exit 1: User validation errors only (bad input)
  if (error instanceof ValidationError || error instanceof ConfigValidationError) {
    return 1;
  }

  // Exit 2: Network-related errors (connection, timeout)
  if (error instanceof TransportError || error instanceof PoolExhaustedError || error instanceof TimeoutError) {
    return 2;
  }
  if (error instanceof OperationError) {
    return error.reason === 'connection' || error.reason === 'timeout' ? 2 : 3;
  }

  // Exit 3: remote, protocol and unexpected errors are operational, not validation
  return 3;
}

/**
 * Unit tests for output formatting
 */

import { describe, it, expect } from 'vitest';
import {
  BrokerUnavailableError,
  CallResult,
  DecodeError,
  PoolExhaustedError,
  RemoteError,
  TimeoutError,
  TransportError,
  ValidationError as ConfigValidationError,
} from 'broker-rpc';
import { exitCodeFor, formatCallResult, formatError, getExitCode } from '../../src/formatting';
import { OperationError, ValidationError } from '../../src/errors';

const remoteError: CallResult = {
  kind: 'remoteError',
  correlationId: 'c-1',
  errorCode: 'NOT_FOUND',
  errorMessage: 'Widget w-9 not found',
  backendMessages: [
    { source: 'widget-adapter', message: 'Widget w-9 not found', type: 'ERROR' },
    { source: 'inventory', message: 'lookup took 3ms', type: 'INFO' },
  ],
};

describe('Call Result Formatting', () => {
  it('should print success data as indented JSON', () => {
    const result: CallResult = {
      kind: 'success',
      correlationId: 'c-1',
      data: { id: 'w-1', stock: 12 },
      backendMessages: [],
    };

    expect(formatCallResult(result)).toBe('{\n  "id": "w-1",\n  "stock": 12\n}');
    expect(exitCodeFor(result)).toBe(0);
  });

  it('should print null data', () => {
    const result: CallResult = { kind: 'success', correlationId: 'c-1', data: null, backendMessages: [] };
    expect(formatCallResult(result)).toBe('null');
  });

  it('should print a remote error with its backend messages', () => {
    expect(formatCallResult(remoteError)).toBe(
      [
        'Error: NOT_FOUND - Widget w-9 not found',
        '  [ERROR] widget-adapter: Widget w-9 not found',
        '  [INFO] inventory: lookup took 3ms',
      ].join('\n')
    );
    expect(exitCodeFor(remoteError)).toBe(3);
  });

  it('should print a timeout', () => {
    const result: CallResult = { kind: 'timeout', correlationId: 'c-1', timeoutMs: 250 };
    expect(formatCallResult(result)).toBe('Error: Call timed out after 250ms');
    expect(exitCodeFor(result)).toBe(2);
  });

  it('should print a transport error', () => {
    const result: CallResult = { kind: 'transportError', error: new TransportError('Failed to publish to rpc.requests') };
    expect(formatCallResult(result)).toBe('Error: Could not reach broker - Failed to publish to rpc.requests');
    expect(exitCodeFor(result)).toBe(2);
  });

  it('should print a decode error', () => {
    const result: CallResult = {
      kind: 'decodeError',
      correlationId: 'c-1',
      error: new DecodeError('response body is not JSON'),
    };
    expect(formatCallResult(result)).toBe('Error: Invalid response - Decode error: response body is not JSON');
    expect(exitCodeFor(result)).toBe(3);
  });
});

describe('Error Formatting', () => {
  it('should format validation error with actual/expected values', () => {
    const error = new ValidationError('timeout', 'Timeout too large', 900000, 600000);
    expect(formatError(error)).toBe('Error: Timeout too large (actual: 900000, expected: 600000)');
  });

  it('should format validation error without actual/expected', () => {
    expect(formatError(new ValidationError('operation', 'Operation name cannot be empty'))).toBe(
      'Error: Operation name cannot be empty'
    );
  });

  it('should format configuration errors', () => {
    expect(formatError(new ConfigValidationError('queues.requestQueue cannot be empty'))).toBe(
      'Error: Invalid configuration - queues.requestQueue cannot be empty'
    );
  });

  it('should format connection failures', () => {
    expect(formatError(new BrokerUnavailableError('amqp://localhost:5672/'))).toBe(
      'Error: Could not reach broker - Broker unavailable at amqp://localhost:5672/'
    );
    expect(formatError(new PoolExhaustedError(5000))).toBe(
      'Error: Could not reach broker - No broker connection available after 5000ms'
    );
  });

  it('should format remote errors with their code', () => {
    expect(formatError(new RemoteError('NOT_FOUND', 'Widget w-9 not found'))).toBe('Error: NOT_FOUND - Widget w-9 not found');
  });

  it('should format operation errors and unknown values', () => {
    expect(formatError(new OperationError('serve', 'connection', 'Could not start serving rpc.requests'))).toBe(
      'Error: Could not start serving rpc.requests'
    );
    expect(formatError(new Error('boom'))).toBe('Error: boom');
    expect(formatError('boom')).toBe('Error: boom');
  });
});

describe('Exit Codes', () => {
  it('should return 1 for validation errors', () => {
    expect(getExitCode(new ValidationError('url', 'Invalid broker URL: x'))).toBe(1);
    expect(getExitCode(new ConfigValidationError('pool.maxTotal must be a positive integer'))).toBe(1);
  });

  it('should return 2 for connection and timeout errors', () => {
    expect(getExitCode(new TransportError('Failed to open channel'))).toBe(2);
    expect(getExitCode(new BrokerUnavailableError('amqp://localhost:5672/'))).toBe(2);
    expect(getExitCode(new PoolExhaustedError(5000))).toBe(2);
    expect(getExitCode(new TimeoutError('c-1', 250))).toBe(2);
    expect(getExitCode(new OperationError('serve', 'connection', 'Could not start'))).toBe(2);
    expect(getExitCode(new OperationError('call', 'timeout', 'Timed out'))).toBe(2);
  });

  it('should return 3 for operational errors', () => {
    expect(getExitCode(new RemoteError('NOT_FOUND', 'missing'))).toBe(3);
    expect(getExitCode(new DecodeError('bad body'))).toBe(3);
    expect(getExitCode(new OperationError('call', 'protocol', 'Unexpected reply'))).toBe(3);
    expect(getExitCode(new Error('boom'))).toBe(3);
  });
});

// Unit tests for custom error classes

import { describe, it, expect } from 'vitest';
import {
  BrokerRpcError,
  BrokerUnavailableError,
  DecodeError,
  PoolExhaustedError,
  RemoteError,
  TimeoutError,
  TransportError,
  ValidationError,
  toError,
} from '../../src/errors';
import { unwrapCallResult } from '../../src/results';

describe('Error Classes', () => {
  describe('BrokerRpcError', () => {
    it('should maintain instanceof chain through Object.setPrototypeOf', () => {
      const error = new BrokerRpcError('test error');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(BrokerRpcError);
      expect(error.name).toBe('BrokerRpcError');
      expect(error.message).toBe('test error');
    });

    it('should keep subclasses distinguishable', () => {
      const error = new ValidationError('bad input');

      expect(error).toBeInstanceOf(BrokerRpcError);
      expect(error).not.toBeInstanceOf(TransportError);
      expect(error.name).toBe('ValidationError');
    });
  });

  describe('BrokerUnavailableError', () => {
    it('should be a TransportError carrying endpoint and cause', () => {
      const cause = new Error('ECONNREFUSED');
      const error = new BrokerUnavailableError('amqp://localhost:5672/', cause);

      expect(error).toBeInstanceOf(TransportError);
      expect(error.endpoint).toBe('amqp://localhost:5672/');
      expect(error.cause).toBe(cause);
      expect(error.message).toBe('Broker unavailable at amqp://localhost:5672/: ECONNREFUSED');
    });

    it('should omit the cause from the message when absent', () => {
      expect(new BrokerUnavailableError('memory://broker').message).toBe('Broker unavailable at memory://broker');
    });
  });

  describe('PoolExhaustedError', () => {
    it('should report how long the caller waited', () => {
      const error = new PoolExhaustedError(250);

      expect(error.waitedMs).toBe(250);
      expect(error.message).toBe('No broker connection available after 250ms');
    });
  });

  describe('TimeoutError', () => {
    it('should store correlation id and timeout', () => {
      const error = new TimeoutError('corr-123', 50);

      expect(error.correlationId).toBe('corr-123');
      expect(error.timeoutMs).toBe(50);
      expect(error.message).toBe('Call corr-123 timed out after 50ms');
    });
  });

  describe('RemoteError', () => {
    it('should carry the error code and backend messages', () => {
      const messages = [{ source: 'widgets', message: 'Widget w-9 not found', type: 'ERROR' }];
      const error = new RemoteError('NOT_FOUND', 'Widget w-9 not found', messages, 'corr-1');

      expect(error.errorCode).toBe('NOT_FOUND');
      expect(error.message).toBe('Widget w-9 not found');
      expect(error.backendMessages).toEqual(messages);
      expect(error.correlationId).toBe('corr-1');
    });
  });

  describe('DecodeError', () => {
    it('should prefix the message and keep details', () => {
      const error = new DecodeError('body is not valid JSON', 'Unexpected token');

      expect(error.message).toBe('Decode error: body is not valid JSON');
      expect(error.details).toBe('Unexpected token');
    });
  });

  describe('toError', () => {
    it('should pass errors through and wrap other values', () => {
      const original = new Error('boom');

      expect(toError(original)).toBe(original);
      expect(toError('boom').message).toBe('boom');
    });
  });

  describe('unwrapCallResult', () => {
    it('should return data of a success', () => {
      expect(
        unwrapCallResult({ kind: 'success', correlationId: 'c1', data: { id: 'w-1' }, backendMessages: [] })
      ).toEqual({ id: 'w-1' });
    });

    it('should throw RemoteError for a remote error', () => {
      const result = {
        kind: 'remoteError' as const,
        correlationId: 'c1',
        errorCode: 'NOT_FOUND',
        errorMessage: 'missing',
        backendMessages: [],
      };

      expect(() => unwrapCallResult(result)).toThrow(RemoteError);
      expect(() => unwrapCallResult(result)).toThrow('missing');
    });

    it('should throw TimeoutError for a timeout', () => {
      expect(() => unwrapCallResult({ kind: 'timeout', correlationId: 'c1', timeoutMs: 50 })).toThrow(
        'Call c1 timed out after 50ms'
      );
    });

    it('should rethrow the transport error itself', () => {
      const error = new TransportError('channel closed');

      expect(() => unwrapCallResult({ kind: 'transportError', error })).toThrow(error);
    });
  });
});

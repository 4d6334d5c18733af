// Custom error classes for broker RPC
// Extends Error with type-safe error hierarchy

import type { BackendMessage } from './protocol/messages';

/**
 * Base error class for all broker RPC errors
 */
export class BrokerRpcError extends Error {
  public readonly name: string = 'BrokerRpcError';

  constructor(message: string) {
    super(message);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Validation error - thrown synchronously for invalid input or configuration
 */
export class ValidationError extends BrokerRpcError {
  public readonly name: string = 'ValidationError';

  constructor(message: string) {
    super(message);
  }
}

/**
 * Transport error - connect, channel, declare or publish failure
 */
export class TransportError extends BrokerRpcError {
  public readonly name: string = 'TransportError';
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.cause = cause;
  }
}

/**
 * The broker could not be reached within the pool's wait bound
 */
export class BrokerUnavailableError extends TransportError {
  public readonly name: string = 'BrokerUnavailableError';
  public readonly endpoint: string;

  constructor(endpoint: string, cause?: Error) {
    super(`Broker unavailable at ${endpoint}${cause ? `: ${cause.message}` : ''}`, cause);
    this.endpoint = endpoint;
  }
}

/**
 * Every pooled connection stayed borrowed for the whole wait bound
 */
export class PoolExhaustedError extends BrokerRpcError {
  public readonly name: string = 'PoolExhaustedError';
  public readonly waitedMs: number;

  constructor(waitedMs: number) {
    super(`No broker connection available after ${waitedMs}ms`);
    this.waitedMs = waitedMs;
  }
}

/**
 * No matching response arrived before the call's deadline
 */
export class TimeoutError extends BrokerRpcError {
  public readonly name: string = 'TimeoutError';
  public readonly correlationId: string;
  public readonly timeoutMs: number;

  constructor(correlationId: string, timeoutMs: number) {
    super(`Call ${correlationId} timed out after ${timeoutMs}ms`);
    this.correlationId = correlationId;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The remote handler reported a business failure
 */
export class RemoteError extends BrokerRpcError {
  public readonly name: string = 'RemoteError';
  public readonly errorCode: string;
  public readonly backendMessages: ReadonlyArray<BackendMessage>;
  public readonly correlationId?: string;

  constructor(
    errorCode: string,
    message: string,
    backendMessages: ReadonlyArray<BackendMessage> = [],
    correlationId?: string
  ) {
    super(message);
    this.errorCode = errorCode;
    this.backendMessages = backendMessages;
    this.correlationId = correlationId;
  }
}

/**
 * Malformed envelope on either side of the wire
 */
export class DecodeError extends BrokerRpcError {
  public readonly name: string = 'DecodeError';
  public readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(`Decode error: ${message}`);
    this.details = details;
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

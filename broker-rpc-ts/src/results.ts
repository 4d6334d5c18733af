// Call outcomes returned to callers of RpcClient.call()
// Discriminated union; unwrapCallResult() turns failures into typed errors

import { DecodeError, RemoteError, TimeoutError } from './errors';
import type { BackendMessage, JsonObject } from './protocol/messages';

export interface CallSuccess {
  readonly kind: 'success';
  readonly correlationId: string;
  readonly data: JsonObject | null;
  readonly backendMessages: ReadonlyArray<BackendMessage>;
}

export interface CallRemoteError {
  readonly kind: 'remoteError';
  readonly correlationId: string;
  readonly errorCode: string;
  readonly errorMessage: string;
  readonly backendMessages: ReadonlyArray<BackendMessage>;
}

export interface CallTimeout {
  readonly kind: 'timeout';
  readonly correlationId: string;
  readonly timeoutMs: number;
}

/**
 * Connect, pool, channel, declare or publish failure
 * `correlationId` is absent when the call failed before one was assigned.
 */
export interface CallTransportError {
  readonly kind: 'transportError';
  readonly correlationId?: string;
  readonly error: Error;
}

export interface CallDecodeError {
  readonly kind: 'decodeError';
  readonly correlationId: string;
  readonly error: DecodeError;
}

export type CallResult = CallSuccess | CallRemoteError | CallTimeout | CallTransportError | CallDecodeError;

/**
 * Data of a successful call; every other outcome is thrown as its error class
 */
export function unwrapCallResult(result: CallResult): JsonObject | null {
  switch (result.kind) {
    case 'success':
      return result.data;
    case 'remoteError':
      throw new RemoteError(result.errorCode, result.errorMessage, result.backendMessages, result.correlationId);
    case 'timeout':
      throw new TimeoutError(result.correlationId, result.timeoutMs);
    case 'transportError':
    case 'decodeError':
      throw result.error;
  }
}

// Handler contract: the pluggable business logic behind the dispatcher

import type { BackendMessage, CallContext, JsonObject } from './protocol/messages';

export interface HandlerSuccess {
  readonly kind: 'success';
  readonly data: JsonObject;
  readonly backendMessages: ReadonlyArray<BackendMessage>;
}

export interface HandlerError {
  readonly kind: 'error';
  readonly errorCode: string;
  readonly errorMessage: string;
  readonly backendMessages: ReadonlyArray<BackendMessage>;
}

/**
 * Result of handling one request
 * An `error` result is a processed request, answered and acknowledged;
 * only a thrown exception counts as a fault.
 */
export type HandlerResult = HandlerSuccess | HandlerError;

export const HandlerResult = {
  success: (data: JsonObject, backendMessages: ReadonlyArray<BackendMessage> = []): HandlerSuccess => ({
    kind: 'success',
    data,
    backendMessages,
  }),
  error: (
    errorCode: string,
    errorMessage: string,
    backendMessages: ReadonlyArray<BackendMessage> = []
  ): HandlerError => ({
    kind: 'error',
    errorCode,
    errorMessage,
    backendMessages,
  }),
};

/**
 * Maps a request payload to a result; implemented by the integrator
 */
export interface AdapterHandler {
  handle(operationName: string, payload: JsonObject, callContext: CallContext): Promise<HandlerResult>;
}

export type HandlerFunction = AdapterHandler['handle'];

/**
 * Adapt a plain function to the handler contract
 */
export function handlerFrom(fn: HandlerFunction): AdapterHandler {
  return { handle: fn };
}

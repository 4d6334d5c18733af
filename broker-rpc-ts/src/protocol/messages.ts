// Envelope types exchanged over the broker
// Discriminated unions and readonly records, decoded by ./codecs

import type { CorrelationId, QueueName } from '../types';

// ============================================================================
// JSON documents
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// ============================================================================
// Shared structures
// ============================================================================

/**
 * Structured diagnostic note attached to a response, distinct from the error code
 */
export interface BackendMessage {
  readonly source: string;
  readonly message: string;
  readonly type: string;
}

/**
 * Caller metadata decoded from `outboundAdapterCallContext`
 */
export interface CallContext {
  readonly correlationId: string;
  readonly sessionId: string;
  readonly userId?: string;
  readonly username?: string;
  readonly consumerId?: string;
  readonly generalContext: JsonObject;
}

/**
 * Optional caller metadata for an outbound call (the correlation id is always generated)
 */
export type CallContextInput = Partial<Omit<CallContext, 'correlationId'>>;

/**
 * AMQP basic properties this protocol reads and writes
 */
export interface MessageProperties {
  readonly messageId?: string;
  readonly correlationId?: string;
  readonly replyTo?: string;
  readonly contentType?: string;
}

// ============================================================================
// Envelopes
// ============================================================================

/**
 * A request: operation, routing metadata and the operation-specific payload
 */
export interface OutboundEnvelope {
  readonly operationName: string;
  readonly correlationId: CorrelationId;
  readonly replyTo?: QueueName;
  readonly contentType: string;
  readonly callContext: CallContext;
  readonly payload: JsonObject;
}

/**
 * Response status; an empty errorCode means success
 */
export interface ResponseStatus {
  readonly errorCode: string;
  readonly backendMessages: ReadonlyArray<BackendMessage>;
}

/**
 * A response to one request
 */
export interface InboundEnvelope {
  readonly correlationId: CorrelationId;
  readonly sessionId: string;
  readonly generalContext: JsonObject;
  readonly status: ResponseStatus;
  readonly data: JsonObject | null;
}

/**
 * Encoded message ready to hand to a broker channel
 */
export interface EncodedMessage {
  readonly content: Buffer;
  readonly properties: MessageProperties;
}

// JSON codecs for request and response envelopes
// Encoders produce a body plus AMQP properties; decoders throw DecodeError

import { CorrelationId, QueueName } from '../types';
import { DecodeError, ValidationError, toError } from '../errors';
import { CONTENT_TYPE_JSON, INBOUND_CONTEXT_KEY, OUTBOUND_CONTEXT_KEY } from './constants';
import {
  CallContext,
  EncodedMessage,
  InboundEnvelope,
  JsonObject,
  MessageProperties,
  OutboundEnvelope,
} from './messages';
import { formatIssues, inboundBodySchema, jsonObjectSchema, outboundContextSchema } from './schemas';

// ============================================================================
// Helpers
// ============================================================================

function toBuffer(body: JsonObject): Buffer {
  return Buffer.from(JSON.stringify(body), 'utf8');
}

function assertJsonContentType(properties: MessageProperties): void {
  const contentType = properties.contentType;
  if (contentType !== undefined && contentType !== CONTENT_TYPE_JSON) {
    throw new DecodeError(`unsupported content type ${contentType}`);
  }
}

/**
 * Parse a message body into a JSON object
 */
export function parseJsonObject(content: Buffer): JsonObject {
  let raw: unknown;
  try {
    raw = JSON.parse(content.toString('utf8'));
  } catch (err) {
    throw new DecodeError('body is not valid JSON', toError(err).message);
  }

  const parsed = jsonObjectSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DecodeError('body must be a JSON object', parsed.error.issues);
  }
  return parsed.data;
}

function contextToJson(context: CallContext): JsonObject {
  const json: JsonObject = {
    correlationId: context.correlationId,
    sessionId: context.sessionId,
  };
  if (context.userId !== undefined) {
    json.userId = context.userId;
  }
  if (context.username !== undefined) {
    json.username = context.username;
  }
  if (context.consumerId !== undefined) {
    json.consumerId = context.consumerId;
  }
  json.generalContext = context.generalContext;
  return json;
}

// ============================================================================
// Outbound (requests)
// ============================================================================

/**
 * Encode a request. Payload fields sit beside `outboundAdapterCallContext`.
 */
export function encodeOutbound(envelope: OutboundEnvelope): EncodedMessage {
  if (OUTBOUND_CONTEXT_KEY in envelope.payload) {
    throw new ValidationError(`Payload must not contain reserved key ${OUTBOUND_CONTEXT_KEY}`);
  }

  const body: JsonObject = {
    [OUTBOUND_CONTEXT_KEY]: contextToJson(envelope.callContext),
    ...envelope.payload,
  };

  return {
    content: toBuffer(body),
    properties: {
      messageId: envelope.operationName,
      correlationId: CorrelationId.unwrap(envelope.correlationId),
      replyTo: envelope.replyTo !== undefined ? QueueName.unwrap(envelope.replyTo) : undefined,
      contentType: envelope.contentType,
    },
  };
}

/**
 * Decode a request delivered to the dispatcher
 * The operation name travels in the `messageId` property.
 */
export function decodeOutbound(content: Buffer, properties: MessageProperties): OutboundEnvelope {
  assertJsonContentType(properties);

  const operationName = properties.messageId;
  if (operationName === undefined || operationName.length === 0) {
    throw new DecodeError('missing messageId (operation name)');
  }

  const body = parseJsonObject(content);
  const parsedContext = outboundContextSchema.safeParse(body[OUTBOUND_CONTEXT_KEY]);
  if (!parsedContext.success) {
    throw new DecodeError(
      `invalid ${OUTBOUND_CONTEXT_KEY}: ${formatIssues(parsedContext.error)}`,
      parsedContext.error.issues
    );
  }

  const payload: JsonObject = { ...body };
  delete payload[OUTBOUND_CONTEXT_KEY];

  const callContext: CallContext = parsedContext.data;
  const correlationId = properties.correlationId || callContext.correlationId;

  return {
    operationName,
    correlationId: CorrelationId.fromString(correlationId),
    replyTo: properties.replyTo ? QueueName.fromString(properties.replyTo) : undefined,
    contentType: properties.contentType ?? CONTENT_TYPE_JSON,
    callContext,
    payload,
  };
}

// ============================================================================
// Inbound (responses)
// ============================================================================

/**
 * Encode a response for the request identified by `operationName`
 */
export function encodeInbound(envelope: InboundEnvelope, operationName: string): EncodedMessage {
  const body: JsonObject = {
    [INBOUND_CONTEXT_KEY]: {
      correlationId: CorrelationId.unwrap(envelope.correlationId),
      sessionId: envelope.sessionId,
      generalContext: envelope.generalContext,
    },
    status: {
      errorCode: envelope.status.errorCode,
      backendMessages: envelope.status.backendMessages.map((m) => ({
        source: m.source,
        message: m.message,
        type: m.type,
      })),
    },
    data: envelope.data,
  };

  return {
    content: toBuffer(body),
    properties: {
      messageId: operationName,
      correlationId: CorrelationId.unwrap(envelope.correlationId),
      contentType: CONTENT_TYPE_JSON,
    },
  };
}

/**
 * Correlation id of a response: the message property, else the one in the body
 * Returns undefined when neither is present or the body does not parse.
 */
export function responseCorrelationId(content: Buffer, properties: MessageProperties): string | undefined {
  if (properties.correlationId) {
    return properties.correlationId;
  }

  let body: JsonObject;
  try {
    body = parseJsonObject(content);
  } catch {
    return undefined;
  }
  const context = body[INBOUND_CONTEXT_KEY];
  if (typeof context !== 'object' || context === null || Array.isArray(context)) {
    return undefined;
  }
  const correlationId = context.correlationId;
  return typeof correlationId === 'string' ? correlationId : undefined;
}

/**
 * Decode a response delivered to a reply queue
 */
export function decodeInbound(content: Buffer, properties: MessageProperties = {}): InboundEnvelope {
  assertJsonContentType(properties);

  const body = parseJsonObject(content);
  const parsed = inboundBodySchema.safeParse(body);
  if (!parsed.success) {
    throw new DecodeError(`invalid response envelope: ${formatIssues(parsed.error)}`, parsed.error.issues);
  }

  const { inboundAdapterCallContext: context, status, data } = parsed.data;
  return {
    correlationId: CorrelationId.fromString(context.correlationId),
    sessionId: context.sessionId,
    generalContext: context.generalContext,
    status: {
      errorCode: status.errorCode,
      backendMessages: status.backendMessages,
    },
    data,
  };
}

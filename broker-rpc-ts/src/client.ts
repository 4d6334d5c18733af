// RpcClient - outbound request/response calls over the broker
// One channel and one server-named reply queue per call

import type { AdapterConfig } from './config';
import { DecodeError, TransportError, ValidationError, toError } from './errors';
import { CONTENT_TYPE_JSON, ERROR_MESSAGE_TYPE, OUTBOUND_CONTEXT_KEY } from './protocol/constants';
import { decodeInbound, encodeOutbound, responseCorrelationId } from './protocol/codecs';
import type { CallContext, CallContextInput, InboundEnvelope, JsonObject } from './protocol/messages';
import { formatIssues, jsonObjectSchema } from './protocol/schemas';
import type { ConnectionPool } from './pool/connectionPool';
import { CallResult, unwrapCallResult } from './results';
import { CorrelationRegistry, PendingCallHandle } from './state/correlationRegistry';
import { NoopTelemetry, Telemetry } from './telemetry/telemetry';
import type { BrokerChannel, BrokerConnection, BrokerMessage } from './transport/transport';
import { CorrelationId, QueueName, SessionId } from './types';
import { Logger, createLogger } from './utils/logger';

export interface RpcClientOptions {
  readonly requestQueue: string;
  /** Message TTL and idle expiry of each reply queue (ms) */
  readonly replyQueueTtl: number;
  /** Default per-call deadline (ms) */
  readonly callTimeout: number;
  readonly logger?: Logger;
  readonly telemetry?: Telemetry;
  readonly registry?: CorrelationRegistry;
}

export interface CallOptions {
  /** Overrides the client's default deadline (ms) */
  readonly timeout?: number;
  readonly callContext?: CallContextInput;
}

/**
 * Resources opened for one call, released in reverse order
 */
interface CallResources {
  channel?: BrokerChannel;
  replyQueue?: string;
  consumerTag?: string;
}

/**
 * Client options taken from an adapter configuration
 */
export function rpcClientOptions(config: AdapterConfig): RpcClientOptions {
  return {
    requestQueue: config.queues.requestQueue,
    replyQueueTtl: config.queues.replyQueueTtl,
    callTimeout: config.callTimeout,
  };
}

/**
 * Request/response client
 *
 * Every call gets a fresh correlation id, a dedicated channel and its own
 * reply queue. The call resolves with the first of the matching response or
 * its deadline; the reply queue is deleted on every exit path.
 *
 * Usage:
 * ```typescript
 * const client = new RpcClient(pool, rpcClientOptions(config));
 * const result = await client.call('getWidget', { id: 'w-1' });
 * if (result.kind === 'success') {
 *   console.log(result.data);
 * }
 * ```
 */
export class RpcClient {
  private readonly logger: Logger;
  private readonly telemetry: Telemetry;
  private readonly registry: CorrelationRegistry;
  private closed = false;

  constructor(
    private readonly pool: ConnectionPool,
    private readonly options: RpcClientOptions
  ) {
    if (options.requestQueue.trim().length === 0) {
      throw new ValidationError('requestQueue cannot be empty');
    }
    if (!(options.replyQueueTtl > 0)) {
      throw new ValidationError('replyQueueTtl must be positive');
    }
    if (!(options.callTimeout > 0)) {
      throw new ValidationError('callTimeout must be positive');
    }

    this.logger = options.logger ?? createLogger('rpc-client');
    this.telemetry = options.telemetry ?? new NoopTelemetry();
    this.registry = options.registry ?? new CorrelationRegistry();
  }

  /**
   * Call a remote operation
   *
   * Every outcome is returned as a CallResult value.
   * @throws ValidationError for an empty operation name, a non-positive timeout or an invalid payload
   */
  async call(operationName: string, payload: JsonObject = {}, options: CallOptions = {}): Promise<CallResult> {
    const timeoutMs = options.timeout ?? this.options.callTimeout;
    this.validateCall(operationName, payload, timeoutMs);

    if (this.closed) {
      return { kind: 'transportError', error: new TransportError('RpcClient is closed') };
    }

    const startedAt = Date.now();
    const result = await this.execute(operationName, payload, timeoutMs, options.callContext ?? {});
    const durationMs = Date.now() - startedAt;

    this.telemetry.recordCallCompleted(operationName, result.correlationId ?? '', result.kind, durationMs);
    this.logger.debug(
      { operation: operationName, correlationId: result.correlationId, outcome: result.kind, durationMs },
      'Call completed'
    );
    return result;
  }

  /**
   * Call a remote operation and return the data of its success
   *
   * @throws RemoteError, TimeoutError, TransportError or DecodeError for the other outcomes
   */
  async request(operationName: string, payload: JsonObject = {}, options: CallOptions = {}): Promise<JsonObject | null> {
    return unwrapCallResult(await this.call(operationName, payload, options));
  }

  /**
   * Number of calls awaiting a response
   */
  pendingCalls(): number {
    return this.registry.size();
  }

  /**
   * Resolve pending calls as transport errors and refuse new ones
   * The pool is owned by the caller and stays open.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const resolved = this.registry.dispose(new TransportError('RpcClient is closed'));
    if (resolved > 0) {
      this.logger.info({ resolved }, 'Pending calls aborted on close');
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private validateCall(operationName: string, payload: JsonObject, timeoutMs: number): void {
    if (operationName.trim().length === 0) {
      throw new ValidationError('operationName cannot be empty');
    }
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new ValidationError(`timeout must be positive, got ${timeoutMs}`);
    }

    const parsed = jsonObjectSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ValidationError(`payload must be a JSON object: ${formatIssues(parsed.error)}`);
    }
    if (OUTBOUND_CONTEXT_KEY in payload) {
      throw new ValidationError(`Payload must not contain reserved key ${OUTBOUND_CONTEXT_KEY}`);
    }
  }

  private async execute(
    operationName: string,
    payload: JsonObject,
    timeoutMs: number,
    context: CallContextInput
  ): Promise<CallResult> {
    let connection: BrokerConnection;
    try {
      connection = await this.pool.acquire();
    } catch (err) {
      this.logger.warn({ err, operation: operationName }, 'No broker connection for call');
      return { kind: 'transportError', error: toError(err) };
    }

    const resources: CallResources = {};
    let pending: PendingCallHandle | undefined;
    try {
      const channel = await connection.createChannel();
      resources.channel = channel;

      const replyQueue = await channel.assertQueue('', {
        durable: false,
        exclusive: true,
        autoDelete: true,
        messageTtl: this.options.replyQueueTtl,
        expires: this.options.replyQueueTtl,
      });
      resources.replyQueue = replyQueue;

      const correlationId = CorrelationId.generate();
      const handle = this.registry.register(correlationId, {
        replyQueue: QueueName.fromString(replyQueue),
        timeoutMs,
      });
      pending = handle;

      channel.onClose((cause) => {
        this.registry.resolve(correlationId, {
          kind: 'transportError',
          correlationId: CorrelationId.unwrap(correlationId),
          error: new TransportError('Channel closed during call', cause),
        });
      });

      resources.consumerTag = await channel.consume(replyQueue, (message) => this.onReply(handle, message), {
        noAck: true,
      });

      const encoded = encodeOutbound({
        operationName,
        correlationId,
        replyTo: QueueName.fromString(replyQueue),
        contentType: CONTENT_TYPE_JSON,
        callContext: buildCallContext(correlationId, context),
        payload,
      });
      // A publish held up by back-pressure never outlasts the call's deadline
      const published = channel.publish(this.options.requestQueue, encoded.content, encoded.properties);
      const early = await Promise.race([published.then(() => undefined), handle.result]);
      if (early !== undefined) {
        return early;
      }
      this.logger.debug(
        { operation: operationName, correlationId, queue: this.options.requestQueue, replyQueue },
        'Request published'
      );

      return await handle.result;
    } catch (err) {
      const error = err instanceof TransportError ? err : new TransportError(toError(err).message, toError(err));
      this.logger.warn({ err: error, operation: operationName }, 'Call failed before a response');

      if (pending === undefined) {
        return { kind: 'transportError', error };
      }
      // No effect if a response or the deadline got there first
      this.registry.resolve(pending.correlationId, {
        kind: 'transportError',
        correlationId: CorrelationId.unwrap(pending.correlationId),
        error,
      });
      return await pending.result;
    } finally {
      await this.releaseResources(connection, resources);
    }
  }

  private onReply(pending: PendingCallHandle, message: BrokerMessage): void {
    const expected = CorrelationId.unwrap(pending.correlationId);
    const received = responseCorrelationId(message.content, message.properties);
    if (received !== expected) {
      this.logger.debug({ correlationId: expected, received }, 'Discarding response for another call');
      return;
    }

    let result: CallResult;
    try {
      result = toCallResult(expected, decodeInbound(message.content, message.properties));
    } catch (err) {
      const error = err instanceof DecodeError ? err : new DecodeError(toError(err).message);
      this.logger.warn({ err: error, correlationId: expected }, 'Undecodable response');
      result = { kind: 'decodeError', correlationId: expected, error };
    }

    if (!this.registry.resolve(pending.correlationId, result)) {
      this.logger.debug({ correlationId: expected }, 'Late response ignored');
    }
  }

  /**
   * Cancel the consumer, delete the reply queue, close the channel, return the connection
   * Failures are logged; they never replace the call's result.
   */
  private async releaseResources(connection: BrokerConnection, resources: CallResources): Promise<void> {
    const { channel, replyQueue, consumerTag } = resources;

    if (channel !== undefined && channel.isOpen()) {
      if (consumerTag !== undefined) {
        await this.attempt('cancel reply consumer', () => channel.cancel(consumerTag));
      }
      if (replyQueue !== undefined && channel.isOpen()) {
        await this.attempt('delete reply queue', () => channel.deleteQueue(replyQueue));
      }
      if (channel.isOpen()) {
        await this.attempt('close channel', () => channel.close());
      }
    }

    if (connection.isOpen()) {
      this.pool.release(connection);
    } else {
      await this.pool.invalidate(connection);
    }
  }

  private async attempt(step: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.logger.warn({ err, step }, 'Call cleanup step failed');
    }
  }
}

function buildCallContext(correlationId: CorrelationId, input: CallContextInput): CallContext {
  return {
    correlationId: CorrelationId.unwrap(correlationId),
    sessionId: input.sessionId ?? SessionId.unwrap(SessionId.generate()),
    userId: input.userId,
    username: input.username,
    consumerId: input.consumerId,
    generalContext: input.generalContext ?? {},
  };
}

/**
 * Map a decoded response onto a call outcome
 * An empty error code is a success; the error text is the first ERROR backend message.
 */
function toCallResult(correlationId: string, envelope: InboundEnvelope): CallResult {
  const { errorCode, backendMessages } = envelope.status;
  if (errorCode.length === 0) {
    return { kind: 'success', correlationId, data: envelope.data, backendMessages };
  }

  const errorMessage = backendMessages.find((m) => m.type === ERROR_MESSAGE_TYPE)?.message ?? errorCode;
  return { kind: 'remoteError', correlationId, errorCode, errorMessage, backendMessages };
}

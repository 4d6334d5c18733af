// RequestDispatcher - consumes the request queue and answers through a handler
// One long-lived channel per session; the session is reopened after connection loss

import type { AdapterConfig } from './config';
import { DecodeError, TransportError, ValidationError, toError } from './errors';
import { AdapterHandler, HandlerResult } from './handler';
import { ERROR_MESSAGE_TYPE, ReservedOperations } from './protocol/constants';
import { decodeOutbound, encodeInbound } from './protocol/codecs';
import type { InboundEnvelope, OutboundEnvelope, ResponseStatus } from './protocol/messages';
import type { ConnectionPool } from './pool/connectionPool';
import { DeliveryOutcome, NoopTelemetry, Telemetry } from './telemetry/telemetry';
import type { BrokerChannel, BrokerConnection, BrokerMessage } from './transport/transport';
import { CorrelationId, QueueName } from './types';
import { Logger, createLogger } from './utils/logger';

/**
 * Identity reported by the `getAdapterInfo` operation and used as the
 * source of error backend messages
 */
export interface AdapterInfo {
  readonly name: string;
  readonly version: string;
}

export interface DispatcherOptions {
  readonly requestQueue: string;
  readonly responseQueue: string;
  readonly prefetchCount: number;
  /** Delay between attempts to reopen a lost session (ms) */
  readonly restartDelay: number;
  readonly deadLetterExchange?: string;
  readonly adapterInfo: AdapterInfo;
  readonly logger?: Logger;
  readonly telemetry?: Telemetry;
}

export type DispatcherState = 'idle' | 'starting' | 'consuming' | 'restarting' | 'stopping' | 'stopped';

export interface DispatcherStats {
  readonly state: DispatcherState;
  /** Deliveries received and not yet settled */
  readonly inFlight: number;
  readonly peakInFlight: number;
  /** Deliveries finished, whatever the outcome */
  readonly processed: number;
  readonly businessErrors: number;
  readonly faults: number;
}

/**
 * Connection, channel and consumer serving the request queue
 */
interface Session {
  readonly connection: BrokerConnection;
  readonly channel: BrokerChannel;
  readonly handler: AdapterHandler;
  consumerTag?: string;
}

/**
 * Dispatcher options taken from an adapter configuration
 */
export function dispatcherOptions(config: AdapterConfig, adapterInfo: AdapterInfo): DispatcherOptions {
  return {
    requestQueue: config.queues.requestQueue,
    responseQueue: config.queues.responseQueue,
    prefetchCount: config.queues.prefetchCount,
    restartDelay: config.restartDelay,
    deadLetterExchange: config.queues.deadLetterExchange,
    adapterInfo,
  };
}

/**
 * Inbound side of the adapter
 *
 * Each delivery is decoded, handed to the handler and settled exactly once:
 * acked after its response is published (success or business error), or
 * rejected without requeue on a fault (undecodable request, handler throw,
 * failed publish). At most `prefetchCount` deliveries are processed at once.
 *
 * Usage:
 * ```typescript
 * const dispatcher = new RequestDispatcher(pool, dispatcherOptions(config, { name: 'widgets', version: '1.0.0' }));
 * await dispatcher.start(handlerFrom(async (operation, payload) => HandlerResult.success({ operation })));
 * // ...
 * await dispatcher.stop();
 * ```
 */
export class RequestDispatcher {
  private readonly logger: Logger;
  private readonly telemetry: Telemetry;

  private state: DispatcherState = 'idle';
  private session: Session | undefined;
  private restartTimer: NodeJS.Timeout | undefined;
  private restartInFlight: Promise<void> | undefined;
  private readonly tasks = new Set<Promise<void>>();

  private inFlight = 0;
  private peakInFlight = 0;
  private processed = 0;
  private businessErrors = 0;
  private faults = 0;

  private readonly stopped: Promise<void>;
  private markStopped: () => void = () => {};

  constructor(
    private readonly pool: ConnectionPool,
    private readonly options: DispatcherOptions
  ) {
    if (options.requestQueue.trim().length === 0 || options.responseQueue.trim().length === 0) {
      throw new ValidationError('requestQueue and responseQueue cannot be empty');
    }
    if (!Number.isInteger(options.prefetchCount) || options.prefetchCount < 1) {
      throw new ValidationError('prefetchCount must be a positive integer');
    }
    if (!(options.restartDelay > 0)) {
      throw new ValidationError('restartDelay must be positive');
    }

    this.logger = options.logger ?? createLogger('request-dispatcher');
    this.telemetry = options.telemetry ?? new NoopTelemetry();
    this.stopped = new Promise<void>((resolve) => {
      this.markStopped = resolve;
    });
  }

  /**
   * Declare the queues and start consuming requests
   * Resolves once the consumer is attached.
   *
   * @throws BrokerUnavailableError or TransportError if the first session cannot be opened
   */
  async start(handler: AdapterHandler): Promise<void> {
    if (this.state !== 'idle') {
      throw new ValidationError(`Dispatcher cannot start from state ${this.state}`);
    }

    this.state = 'starting';
    try {
      await this.openSession(handler);
    } catch (err) {
      if (this.state === 'starting') {
        this.state = 'idle';
      }
      throw err;
    }

    if (this.state !== 'starting') {
      // stop() ran while the session was opening
      const session = this.session;
      this.session = undefined;
      if (session !== undefined) {
        await this.teardown(session);
      }
      return;
    }

    this.state = 'consuming';
    this.logger.info(
      { queue: this.options.requestQueue, prefetch: this.options.prefetchCount },
      'Dispatcher consuming requests'
    );
  }

  /**
   * Start, then resolve once stop() has completed
   */
  async run(handler: AdapterHandler): Promise<void> {
    await this.start(handler);
    await this.stopped;
  }

  /**
   * Cancel the consumer, let in-flight deliveries settle, then release the session
   */
  async stop(): Promise<void> {
    if (this.state === 'stopping' || this.state === 'stopped') {
      return this.stopped;
    }
    this.state = 'stopping';

    if (this.restartTimer !== undefined) {
      clearTimeout(this.restartTimer);
      this.restartTimer = undefined;
    }
    if (this.restartInFlight !== undefined) {
      await this.restartInFlight;
    }

    const session = this.session;
    this.session = undefined;
    if (session !== undefined) {
      const consumerTag = session.consumerTag;
      if (consumerTag !== undefined && session.channel.isOpen()) {
        await this.attempt('cancel consumer', () => session.channel.cancel(consumerTag));
      }
      this.telemetry.recordConsumptionStopped(this.options.requestQueue, 'stopped');
    }

    await Promise.all(Array.from(this.tasks));

    if (session !== undefined) {
      await this.teardown(session);
    }

    this.state = 'stopped';
    this.logger.info({ processed: this.processed, faults: this.faults }, 'Dispatcher stopped');
    this.markStopped();
  }

  stats(): DispatcherStats {
    return {
      state: this.state,
      inFlight: this.inFlight,
      peakInFlight: this.peakInFlight,
      processed: this.processed,
      businessErrors: this.businessErrors,
      faults: this.faults,
    };
  }

  // ==========================================================================
  // Session lifecycle
  // ==========================================================================

  private async openSession(handler: AdapterHandler): Promise<void> {
    const { requestQueue, responseQueue, prefetchCount, deadLetterExchange } = this.options;
    const connection = await this.pool.acquire();

    let channel: BrokerChannel | undefined;
    try {
      channel = await connection.createChannel();
      const session: Session = { connection, channel, handler };
      this.session = session;
      channel.onClose((error) => this.onSessionLost(session, error ?? new Error('Channel closed')));

      await channel.assertQueue(requestQueue, {
        durable: true,
        exclusive: false,
        autoDelete: false,
        deadLetterExchange,
      });
      await channel.assertQueue(responseQueue, { durable: true, exclusive: false, autoDelete: false });
      await channel.prefetch(prefetchCount);

      session.consumerTag = await channel.consume(requestQueue, (message) => this.onDelivery(session, message), {
        noAck: false,
        onCancel: () => this.onSessionLost(session, new Error('Consumer cancelled by broker')),
      });
      this.telemetry.recordConsumptionStarted(requestQueue);
    } catch (err) {
      this.session = undefined;
      if (channel !== undefined && channel.isOpen()) {
        const opened = channel;
        await this.attempt('close channel', () => opened.close());
      }
      if (connection.isOpen()) {
        this.pool.release(connection);
      } else {
        await this.pool.invalidate(connection);
      }
      throw err;
    }
  }

  private onSessionLost(session: Session, error: Error): void {
    if (this.session !== session || this.state === 'stopping' || this.state === 'stopped') {
      return;
    }

    this.session = undefined;
    this.state = 'restarting';
    this.logger.warn({ err: error, queue: this.options.requestQueue }, 'Consumer session lost, restarting');
    this.telemetry.recordConsumptionStopped(this.options.requestQueue, error.message);

    // teardown() never rejects
    void this.teardown(session);
    this.scheduleRestart(session.handler);
  }

  private scheduleRestart(handler: AdapterHandler): void {
    this.restartTimer = setTimeout(() => {
      this.restartTimer = undefined;
      this.restartInFlight = this.restart(handler).finally(() => {
        this.restartInFlight = undefined;
      });
    }, this.options.restartDelay);
  }

  private async restart(handler: AdapterHandler): Promise<void> {
    if (this.state !== 'restarting') {
      return;
    }

    try {
      await this.openSession(handler);
      if (this.state === 'restarting') {
        this.state = 'consuming';
      }
      this.logger.info({ queue: this.options.requestQueue }, 'Consumer session restored');
    } catch (err) {
      const error = toError(err);
      this.logger.warn({ err: error, retryInMs: this.options.restartDelay }, 'Could not reopen consumer session');
      this.telemetry.recordBrokerError(error.message);
      if (this.state === 'restarting') {
        this.scheduleRestart(handler);
      }
    }
  }

  private async teardown(session: Session): Promise<void> {
    if (session.channel.isOpen()) {
      await this.attempt('close channel', () => session.channel.close());
    }
    if (session.connection.isOpen()) {
      this.pool.release(session.connection);
    } else {
      await this.pool.invalidate(session.connection);
    }
  }

  // ==========================================================================
  // Deliveries
  // ==========================================================================

  private onDelivery(session: Session, message: BrokerMessage): void {
    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    const task = this.process(session, message).finally(() => {
      this.tasks.delete(task);
    });
    this.tasks.add(task);
  }

  private async process(session: Session, message: BrokerMessage): Promise<void> {
    const startedAt = Date.now();
    // Captured before decoding so faults stay attributable
    let correlationId = message.properties.correlationId ?? '';
    let operation = message.properties.messageId ?? '';
    this.telemetry.recordMessageReceived(operation, correlationId, this.options.requestQueue);

    let settled = false;
    const settle = (action: 'ack' | 'nack'): void => {
      if (settled) {
        return;
      }
      settled = true;
      this.inFlight--;
      try {
        if (action === 'ack') {
          session.channel.ack(message);
        } else {
          session.channel.nack(message, false);
        }
      } catch (err) {
        this.logger.warn({ err, correlationId, operation }, 'Could not settle delivery');
      }
    };

    try {
      const request = decodeOutbound(message.content, message.properties);
      operation = request.operationName;
      correlationId = CorrelationId.unwrap(request.correlationId);

      const result = await this.invoke(session.handler, request);
      const replyTo = request.replyTo !== undefined ? QueueName.unwrap(request.replyTo) : this.options.responseQueue;
      const encoded = encodeInbound(this.buildResponse(request, result), operation);
      await session.channel.publish(replyTo, encoded.content, encoded.properties);
      this.telemetry.recordResponseSent(operation, correlationId, result.kind === 'success');

      settle('ack');
      const outcome: DeliveryOutcome = result.kind === 'success' ? 'acked-success' : 'acked-business-error';
      if (result.kind === 'error') {
        this.businessErrors++;
      }
      this.processed++;
      this.telemetry.recordMessageProcessed(operation, correlationId, outcome, Date.now() - startedAt);
    } catch (err) {
      const error = toError(err);
      settle('nack');
      this.faults++;
      this.processed++;

      const durationMs = Date.now() - startedAt;
      this.logger.error({ err: error, correlationId, operation }, 'Request rejected');
      this.telemetry.recordMessageFailed(operation, correlationId, faultCode(err), error.message, durationMs);
      this.telemetry.recordMessageProcessed(operation, correlationId, 'nacked-fault', durationMs);
    }
  }

  private async invoke(handler: AdapterHandler, request: OutboundEnvelope): Promise<HandlerResult> {
    switch (request.operationName) {
      case ReservedOperations.HEALTH_CHECK:
        return HandlerResult.success({ status: 'ok' });
      case ReservedOperations.ADAPTER_INFO:
        return HandlerResult.success({
          name: this.options.adapterInfo.name,
          version: this.options.adapterInfo.version,
        });
      default:
        return handler.handle(request.operationName, request.payload, request.callContext);
    }
  }

  private buildResponse(request: OutboundEnvelope, result: HandlerResult): InboundEnvelope {
    const status: ResponseStatus =
      result.kind === 'success'
        ? { errorCode: '', backendMessages: result.backendMessages }
        : {
            errorCode: result.errorCode,
            backendMessages: [
              { source: this.options.adapterInfo.name, message: result.errorMessage, type: ERROR_MESSAGE_TYPE },
              ...result.backendMessages,
            ],
          };

    return {
      correlationId: request.correlationId,
      sessionId: request.callContext.sessionId,
      generalContext: request.callContext.generalContext,
      status,
      data: result.kind === 'success' ? result.data : null,
    };
  }

  private async attempt(step: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.logger.warn({ err, step }, 'Dispatcher cleanup step failed');
    }
  }
}

function faultCode(err: unknown): string {
  if (err instanceof DecodeError) {
    return 'DECODE_ERROR';
  }
  if (err instanceof TransportError) {
    return 'TRANSPORT_ERROR';
  }
  return 'HANDLER_ERROR';
}

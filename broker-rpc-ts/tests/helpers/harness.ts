/**
 * Test harness wiring a client and a dispatcher to one InMemoryBroker
 *
 * Queue names and the adapter identity are fixed so tests can assert on
 * them; generated reply queues are named `amq.gen-1`, `amq.gen-2`, ... in
 * declaration order.
 */

import { RpcClient } from '../../src/client';
import { AdapterInfo, RequestDispatcher } from '../../src/dispatcher';
import { AdapterHandler, HandlerResult, handlerFrom } from '../../src/handler';
import { encodeOutbound } from '../../src/protocol/codecs';
import type { JsonObject, MessageProperties } from '../../src/protocol/messages';
import { ConnectionPool } from '../../src/pool/connectionPool';
import { NoopTelemetry, Telemetry } from '../../src/telemetry/telemetry';
import { InMemoryBroker } from '../../src/testing/InMemoryBroker';
import { CorrelationId } from '../../src/types';
import { silentLogger } from '../../src/utils/logger';

export const REQUEST_QUEUE = 'rpc.requests';
export const RESPONSE_QUEUE = 'rpc.responses';
export const ADAPTER_INFO: AdapterInfo = { name: 'widget-adapter', version: '1.2.3' };

export interface HarnessOptions {
  /** Starts the dispatcher with this handler; without one nothing consumes requests */
  readonly handler?: AdapterHandler;
  readonly prefetchCount?: number;
  readonly callTimeout?: number;
  readonly restartDelay?: number;
  readonly deadLetterExchange?: string;
  readonly maxTotal?: number;
  readonly clientTelemetry?: Telemetry;
  readonly dispatcherTelemetry?: Telemetry;
}

export interface Harness {
  readonly broker: InMemoryBroker;
  readonly pool: ConnectionPool;
  readonly client: RpcClient;
  readonly dispatcher: RequestDispatcher;
  stop(): Promise<void>;
}

export async function createHarness(options: HarnessOptions = {}): Promise<Harness> {
  const broker = new InMemoryBroker();
  const logger = silentLogger();
  const pool = new ConnectionPool(
    broker.connector(),
    { minIdle: 0, maxTotal: options.maxTotal ?? 8, acquireTimeout: 2000 },
    { logger }
  );
  const client = new RpcClient(pool, {
    requestQueue: REQUEST_QUEUE,
    replyQueueTtl: 60000,
    callTimeout: options.callTimeout ?? 1000,
    logger,
    telemetry: options.clientTelemetry ?? new NoopTelemetry(),
  });
  const dispatcher = new RequestDispatcher(pool, {
    requestQueue: REQUEST_QUEUE,
    responseQueue: RESPONSE_QUEUE,
    prefetchCount: options.prefetchCount ?? 4,
    restartDelay: options.restartDelay ?? 20,
    deadLetterExchange: options.deadLetterExchange,
    adapterInfo: ADAPTER_INFO,
    logger,
    telemetry: options.dispatcherTelemetry ?? new NoopTelemetry(),
  });

  if (options.handler !== undefined) {
    await dispatcher.start(options.handler);
  }

  return {
    broker,
    pool,
    client,
    dispatcher,
    async stop() {
      client.close();
      await dispatcher.stop();
      await pool.shutdown();
    },
  };
}

/**
 * Widget lookup: `w-1` exists, every other id is NOT_FOUND
 */
export const widgetHandler = handlerFrom(async (operation, payload) => {
  if (operation !== 'getWidget') {
    return HandlerResult.error('UNSUPPORTED_OPERATION', `Unknown operation ${operation}`);
  }
  if (payload.id === 'w-1') {
    return HandlerResult.success({ id: 'w-1', name: 'Sprocket', stock: 12 });
  }
  return HandlerResult.error('NOT_FOUND', `Widget ${String(payload.id)} not found`);
});

/**
 * Gate that holds handlers until opened
 */
export function createGate(): { readonly wait: Promise<void>; open(): void } {
  let open: () => void = () => {};
  const wait = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { wait, open: () => open() };
}

/**
 * Publish a message from a separate connection, bypassing the client
 */
export async function publishRaw(
  broker: InMemoryBroker,
  queue: string,
  content: Buffer,
  properties: MessageProperties
): Promise<void> {
  const connection = await broker.connector().connect();
  const channel = await connection.createChannel();
  await channel.publish(queue, content, properties);
  await connection.close();
}

/**
 * Publish a well-formed request without a reply queue
 */
export async function publishRequest(
  broker: InMemoryBroker,
  operationName: string,
  payload: JsonObject,
  correlationId: string
): Promise<void> {
  const id = CorrelationId.fromString(correlationId);
  const encoded = encodeOutbound({
    operationName,
    correlationId: id,
    contentType: 'application/json',
    callContext: { correlationId, sessionId: 'raw-session', generalContext: {} },
    payload,
  });
  await publishRaw(broker, REQUEST_QUEUE, encoded.content, encoded.properties);
}

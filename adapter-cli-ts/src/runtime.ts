/**
 * Broker runtime shared by the CLI commands
 *
 * Owns the connection pool and everything built on it, so a command only
 * has to ask for a client or a dispatcher and shut the runtime down at the end.
 */

import pino from 'pino';
import {
  AdapterConfig,
  AdapterInfo,
  AmqpConnector,
  BrokerConfig,
  BrokerConnector,
  ConnectionPool,
  LoggingTelemetry,
  Logger,
  RequestDispatcher,
  RpcClient,
  TlsConfig,
  createConfig,
  dispatcherOptions,
  rpcClientOptions,
} from 'broker-rpc';
import type { BrokerOptions } from './types';
import { parseBrokerUrl } from './validation';

export interface RuntimeOptions extends BrokerOptions {
  readonly callTimeout?: number;
  readonly prefetchCount?: number;
  /** Replaces the amqplib connector (tests) */
  readonly connector?: BrokerConnector;
  readonly logger?: Logger;
}

/**
 * Builds the adapter configuration from command line options
 * @throws ValidationError (CLI) for a bad URL, ValidationError (config) for bad values
 */
export function buildConfig(options: RuntimeOptions): AdapterConfig {
  const broker = parseBrokerUrl(options.url);

  return createConfig({
    broker: { ...broker, ...tlsOverrides(broker, options) },
    // The CLI opens connections on demand
    pool: { minIdle: 0 },
    queues: {
      requestQueue: options.requestQueue,
      responseQueue: options.responseQueue,
      ...(options.prefetchCount !== undefined ? { prefetchCount: options.prefetchCount } : {}),
    },
    ...(options.callTimeout !== undefined ? { callTimeout: options.callTimeout } : {}),
  });
}

function tlsOverrides(broker: Partial<BrokerConfig>, options: RuntimeOptions): { tls?: TlsConfig } {
  const files = options.ca !== undefined || options.cert !== undefined || options.key !== undefined;
  if (broker.tls === undefined && !files && options.insecure !== true) {
    return {};
  }
  return {
    tls: {
      rejectUnauthorized: options.insecure !== true,
      ...(options.ca !== undefined ? { caFile: options.ca } : {}),
      ...(options.cert !== undefined ? { certFile: options.cert } : {}),
      ...(options.key !== undefined ? { keyFile: options.key } : {}),
    },
  };
}

/**
 * CLI logger: JSON lines on stderr, stdout is kept for command output
 */
export function createCliLogger(level: string): Logger {
  return pino({ name: 'broker-adapter', level }, pino.destination(2));
}

export class AdapterRuntime {
  readonly config: AdapterConfig;
  readonly logger: Logger;
  readonly pool: ConnectionPool;

  private readonly telemetry: LoggingTelemetry;
  private readonly clients: RpcClient[] = [];
  private readonly dispatchers: RequestDispatcher[] = [];

  constructor(options: RuntimeOptions) {
    this.config = buildConfig(options);
    this.logger = options.logger ?? createCliLogger(options.logLevel);
    this.telemetry = new LoggingTelemetry(this.logger);

    const connector = options.connector ?? new AmqpConnector(this.config.broker, this.logger);
    this.pool = new ConnectionPool(connector, this.config.pool, {
      logger: this.logger,
      telemetry: this.telemetry,
    });
  }

  createClient(): RpcClient {
    const client = new RpcClient(this.pool, {
      ...rpcClientOptions(this.config),
      logger: this.logger,
      telemetry: this.telemetry,
    });
    this.clients.push(client);
    return client;
  }

  createDispatcher(info: AdapterInfo): RequestDispatcher {
    const dispatcher = new RequestDispatcher(this.pool, {
      ...dispatcherOptions(this.config, info),
      logger: this.logger,
      telemetry: this.telemetry,
    });
    this.dispatchers.push(dispatcher);
    return dispatcher;
  }

  /**
   * Stop dispatchers, fail outstanding calls, then close every connection
   */
  async shutdown(): Promise<void> {
    await Promise.all(this.dispatchers.map((dispatcher) => dispatcher.stop()));
    for (const client of this.clients) {
      client.close();
    }
    await this.pool.shutdown();
  }
}

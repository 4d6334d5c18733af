// Adapter configuration with validation and defaults
// Plain object configuration, NOT builder pattern

import { ValidationError } from './errors';

/**
 * TLS settings for amqps:// connections; cert and key enable mutual authentication
 */
export interface TlsConfig {
  readonly caFile?: string;
  readonly certFile?: string;
  readonly keyFile?: string;
  readonly passphrase?: string;
  readonly rejectUnauthorized: boolean;
}

export interface BrokerConfig {
  readonly host: string;
  readonly port: number;
  readonly virtualHost: string;
  readonly username: string;
  readonly password: string;
  readonly heartbeat: number; // seconds
  readonly connectionTimeout: number; // milliseconds
  readonly tls?: TlsConfig;
}

export interface PoolConfig {
  readonly minIdle: number;
  readonly maxTotal: number;
  readonly acquireTimeout: number; // milliseconds
}

export interface QueueConfig {
  readonly requestQueue: string;
  readonly responseQueue: string;
  readonly prefetchCount: number;
  readonly replyQueueTtl: number; // milliseconds, message TTL and queue expiry of reply queues
  readonly deadLetterExchange?: string;
}

/**
 * Complete configuration consumed by the pool, the RPC client and the dispatcher
 */
export interface AdapterConfig {
  readonly broker: BrokerConfig;
  readonly pool: PoolConfig;
  readonly queues: QueueConfig;
  readonly callTimeout: number; // milliseconds
  readonly restartDelay: number; // milliseconds between dispatcher reconnect attempts
}

/**
 * Default configuration values
 */
export const DEFAULT_BROKER: BrokerConfig = {
  host: 'localhost',
  port: 5672,
  virtualHost: '/',
  username: 'guest',
  password: 'guest',
  heartbeat: 30,
  connectionTimeout: 5000,
};

export const DEFAULT_POOL: PoolConfig = {
  minIdle: 1,
  maxTotal: 10,
  acquireTimeout: 5000,
};

export const DEFAULT_QUEUES: QueueConfig = {
  requestQueue: 'rpc.requests',
  responseQueue: 'rpc.responses',
  prefetchCount: 10,
  replyQueueTtl: 60000, // 60 seconds
};

export const DEFAULT_CALL_TIMEOUT = 10000; // 10 seconds
export const DEFAULT_RESTART_DELAY = 1000; // 1 second

/**
 * Partial configuration (user-provided)
 * Every field is optional; missing values fall back to the defaults above
 */
export interface AdapterConfigInput {
  readonly broker?: Partial<BrokerConfig>;
  readonly pool?: Partial<PoolConfig>;
  readonly queues?: Partial<QueueConfig>;
  readonly callTimeout?: number;
  readonly restartDelay?: number;
}

function requirePositive(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${field} must be positive`);
  }
}

function requireNonEmpty(value: string, field: string): void {
  if (value.trim().length === 0) {
    throw new ValidationError(`${field} cannot be empty`);
  }
}

/**
 * Validate adapter configuration
 * Throws ValidationError if invalid
 */
export function validateConfig(config: AdapterConfig): void {
  const { broker, pool, queues } = config;

  requireNonEmpty(broker.host, 'broker.host');
  if (!Number.isInteger(broker.port) || broker.port < 1 || broker.port > 65535) {
    throw new ValidationError(`broker.port must be 1-65535, got ${broker.port}`);
  }
  requireNonEmpty(broker.virtualHost, 'broker.virtualHost');
  if (broker.heartbeat < 0) {
    throw new ValidationError('broker.heartbeat cannot be negative');
  }
  requirePositive(broker.connectionTimeout, 'broker.connectionTimeout');
  if (broker.tls && (broker.tls.certFile === undefined) !== (broker.tls.keyFile === undefined)) {
    throw new ValidationError('broker.tls.certFile and broker.tls.keyFile must be set together');
  }

  if (!Number.isInteger(pool.minIdle) || pool.minIdle < 0) {
    throw new ValidationError('pool.minIdle must be a non-negative integer');
  }
  if (!Number.isInteger(pool.maxTotal) || pool.maxTotal < 1) {
    throw new ValidationError('pool.maxTotal must be a positive integer');
  }
  if (pool.minIdle > pool.maxTotal) {
    throw new ValidationError(`pool.minIdle (${pool.minIdle}) cannot exceed pool.maxTotal (${pool.maxTotal})`);
  }
  requirePositive(pool.acquireTimeout, 'pool.acquireTimeout');

  requireNonEmpty(queues.requestQueue, 'queues.requestQueue');
  requireNonEmpty(queues.responseQueue, 'queues.responseQueue');
  if (queues.requestQueue === queues.responseQueue) {
    throw new ValidationError('queues.requestQueue and queues.responseQueue must differ');
  }
  if (!Number.isInteger(queues.prefetchCount) || queues.prefetchCount < 1) {
    throw new ValidationError('queues.prefetchCount must be a positive integer');
  }
  requirePositive(queues.replyQueueTtl, 'queues.replyQueueTtl');

  requirePositive(config.callTimeout, 'callTimeout');
  requirePositive(config.restartDelay, 'restartDelay');
}

/**
 * Create a complete AdapterConfig from partial input
 * Applies defaults for missing values
 */
export function createConfig(input: AdapterConfigInput = {}): AdapterConfig {
  const config: AdapterConfig = {
    broker: { ...DEFAULT_BROKER, ...input.broker },
    pool: { ...DEFAULT_POOL, ...input.pool },
    queues: { ...DEFAULT_QUEUES, ...input.queues },
    callTimeout: input.callTimeout ?? DEFAULT_CALL_TIMEOUT,
    restartDelay: input.restartDelay ?? DEFAULT_RESTART_DELAY,
  };

  // Validate before returning
  validateConfig(config);

  return config;
}

/**
 * Endpoint description without credentials, e.g. `amqps://mq.internal:5671/payments`
 */
export function brokerDescription(broker: BrokerConfig): string {
  const scheme = broker.tls ? 'amqps' : 'amqp';
  const vhost = broker.virtualHost === '/' ? '' : broker.virtualHost;
  return `${scheme}://${broker.host}:${broker.port}/${vhost}`;
}

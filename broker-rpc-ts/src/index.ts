// Public API exports for broker-rpc
// Main entry point for the library

// Outbound calls
export { RpcClient, rpcClientOptions } from './client';
export type { RpcClientOptions, CallOptions } from './client';
export { unwrapCallResult } from './results';
export type {
  CallResult,
  CallSuccess,
  CallRemoteError,
  CallTimeout,
  CallTransportError,
  CallDecodeError,
} from './results';

// Inbound dispatch
export { RequestDispatcher, dispatcherOptions } from './dispatcher';
export type { AdapterInfo, DispatcherOptions, DispatcherState, DispatcherStats } from './dispatcher';
export { HandlerResult, handlerFrom } from './handler';
export type { AdapterHandler, HandlerFunction, HandlerSuccess, HandlerError } from './handler';

// Connections
export { ConnectionPool } from './pool/connectionPool';
export type { ConnectionPoolOptions, PoolStats } from './pool/connectionPool';
export { AmqpConnector } from './transport/amqpTransport';
export type {
  BrokerConnector,
  BrokerConnection,
  BrokerChannel,
  BrokerMessage,
  QueueOptions,
  ConsumeOptions,
} from './transport/transport';

// Configuration
export type {
  AdapterConfig,
  AdapterConfigInput,
  BrokerConfig,
  PoolConfig,
  QueueConfig,
  TlsConfig,
} from './config';
export {
  createConfig,
  validateConfig,
  brokerDescription,
  DEFAULT_BROKER,
  DEFAULT_POOL,
  DEFAULT_QUEUES,
  DEFAULT_CALL_TIMEOUT,
  DEFAULT_RESTART_DELAY,
} from './config';

// Error types
export {
  BrokerRpcError,
  ValidationError,
  TransportError,
  BrokerUnavailableError,
  PoolExhaustedError,
  TimeoutError,
  RemoteError,
  DecodeError,
  toError,
} from './errors';

// Correlation (for advanced usage)
export { CorrelationRegistry } from './state/correlationRegistry';
export type { PendingCallHandle, RegisterOptions } from './state/correlationRegistry';
export { CorrelationId, SessionId, QueueName } from './types';

// Protocol (for advanced usage / testing)
export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  BackendMessage,
  CallContext,
  CallContextInput,
  MessageProperties,
  OutboundEnvelope,
  InboundEnvelope,
  ResponseStatus,
} from './protocol/messages';
export { encodeOutbound, decodeOutbound, encodeInbound, decodeInbound } from './protocol/codecs';
export { jsonObjectSchema, formatIssues } from './protocol/schemas';
export { ReservedOperations, OUTBOUND_CONTEXT_KEY, INBOUND_CONTEXT_KEY, CONTENT_TYPE_JSON } from './protocol/constants';

// Observability
export type { Telemetry, DeliveryOutcome } from './telemetry/telemetry';
export { NoopTelemetry } from './telemetry/telemetry';
export { LoggingTelemetry } from './telemetry/loggingTelemetry';
export { createLogger, silentLogger } from './utils/logger';
export type { Logger } from './utils/logger';

// In-process broker for tests
export { InMemoryBroker } from './testing/InMemoryBroker';
export type { PublishRecord, SettleRecord } from './testing/InMemoryBroker';

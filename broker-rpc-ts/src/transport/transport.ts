// Broker transport interfaces shared by the AMQP and in-memory implementations

import type { MessageProperties } from '../protocol/messages';

/**
 * A message delivered to a consumer
 */
export interface BrokerMessage {
  readonly content: Buffer;
  readonly properties: MessageProperties;
  readonly deliveryTag: number;
  readonly redelivered: boolean;
}

/**
 * Queue declaration options
 */
export interface QueueOptions {
  readonly durable: boolean;
  readonly exclusive: boolean;
  readonly autoDelete: boolean;
  /** Per-message time-to-live in milliseconds */
  readonly messageTtl?: number;
  /** Delete the queue after this many milliseconds without use */
  readonly expires?: number;
  /** Exchange that receives messages rejected without requeue */
  readonly deadLetterExchange?: string;
}

export interface ConsumeOptions {
  /** Deliveries are settled by the broker on send; ack/nack must not be called */
  readonly noAck: boolean;
  /** Called when the broker cancels the consumer (queue deleted, channel closed) */
  readonly onCancel?: () => void;
}

/**
 * Single-owner session multiplexed over a connection
 * Must only be used by one logical task at a time.
 */
export interface BrokerChannel {
  /**
   * Declare a queue; an empty name asks the broker to generate one
   * @returns the queue name
   */
  assertQueue(name: string, options: QueueOptions): Promise<string>;

  deleteQueue(name: string): Promise<void>;

  /**
   * Limit unacknowledged deliveries held by consumers on this channel
   */
  prefetch(count: number): Promise<void>;

  /**
   * Publish to a queue through the default exchange
   */
  publish(queue: string, content: Buffer, properties: MessageProperties): Promise<void>;

  /**
   * Start a consumer
   * @returns the consumer tag
   */
  consume(queue: string, onMessage: (message: BrokerMessage) => void, options: ConsumeOptions): Promise<string>;

  cancel(consumerTag: string): Promise<void>;

  ack(message: BrokerMessage): void;

  nack(message: BrokerMessage, requeue: boolean): void;

  isOpen(): boolean;

  onClose(listener: (error?: Error) => void): void;

  close(): Promise<void>;
}

/**
 * A live broker connection, owned by the connection pool
 */
export interface BrokerConnection {
  readonly id: string;
  readonly createdAt: Date;

  isOpen(): boolean;

  createChannel(): Promise<BrokerChannel>;

  onClose(listener: (error?: Error) => void): void;

  close(): Promise<void>;
}

/**
 * Opens broker connections for the pool
 */
export interface BrokerConnector {
  connect(): Promise<BrokerConnection>;

  /**
   * Human-readable endpoint without credentials (for logs and errors)
   */
  describe(): string;
}

// In-process broker for tests
// Implements the transport interfaces without a network: queues, consumers,
// prefetch, ack/nack, exclusive and auto-delete queues, connection loss

import { randomUUID } from 'crypto';
import { TransportError } from '../errors';
import type { MessageProperties } from '../protocol/messages';
import { delay } from '../utils/timeout';
import {
  BrokerChannel,
  BrokerConnection,
  BrokerConnector,
  BrokerMessage,
  ConsumeOptions,
  QueueOptions,
} from '../transport/transport';

type CloseListener = (error?: Error) => void;

interface StoredMessage {
  readonly content: Buffer;
  readonly properties: MessageProperties;
  readonly redelivered: boolean;
}

interface MemoryConsumer {
  readonly tag: string;
  readonly queue: string;
  readonly channel: MemoryChannel;
  readonly noAck: boolean;
  readonly onMessage: (message: BrokerMessage) => void;
  readonly onCancel?: () => void;
  unacked: number;
}

interface MemoryQueue {
  readonly name: string;
  readonly options: QueueOptions;
  readonly owner: MemoryConnection | null;
  readonly messages: StoredMessage[];
  consumers: MemoryConsumer[];
  nextConsumer: number;
}

interface Unsettled {
  readonly queue: string;
  readonly consumer: MemoryConsumer;
  readonly message: StoredMessage;
}

/**
 * Record of a message handed to the broker
 */
export interface PublishRecord {
  readonly queue: string;
  readonly content: Buffer;
  readonly properties: MessageProperties;
}

/**
 * Record of an ack or nack
 */
export interface SettleRecord {
  readonly queue: string;
  readonly correlationId?: string;
  readonly action: 'ack' | 'nack';
  readonly requeue: boolean;
}

/**
 * Broker state shared by every connection opened through `connector()`
 */
export class InMemoryBroker {
  readonly published: PublishRecord[] = [];
  readonly settlements: SettleRecord[] = [];
  readonly deadLettered: PublishRecord[] = [];
  readonly deletedQueues: string[] = [];
  connectionsOpened = 0;

  private readonly queues = new Map<string, MemoryQueue>();
  private readonly connections = new Set<MemoryConnection>();
  private readonly failingQueues = new Set<string>();
  private readonly stalledQueues = new Set<string>();
  private unavailable = false;
  private connectDelayMs = 0;
  private generatedNames = 0;

  /**
   * Connector that opens connections to this broker
   */
  connector(endpoint = 'memory://broker'): BrokerConnector {
    return {
      connect: () => this.connect(endpoint),
      describe: () => endpoint,
    };
  }

  /** Refuse new connections until reset */
  setUnavailable(unavailable: boolean): void {
    this.unavailable = unavailable;
  }

  /** Delay every connection attempt */
  setConnectDelay(ms: number): void {
    this.connectDelayMs = ms;
  }

  /** Make publishing to `queue` fail with a TransportError */
  failPublishesTo(queue: string): void {
    this.failingQueues.add(queue);
  }

  /**
   * Make publishing to `queue` block as if the write buffer never drained
   * The publish rejects once its channel closes.
   */
  stallPublishesTo(queue: string): void {
    this.stalledQueues.add(queue);
  }

  isStalled(queue: string): boolean {
    return this.stalledQueues.has(queue);
  }

  /** Close every open connection as if the network dropped */
  dropConnections(): void {
    for (const connection of Array.from(this.connections)) {
      connection.terminate(new Error('Connection lost'));
    }
  }

  queueExists(name: string): boolean {
    return this.queues.has(name);
  }

  queueOptions(name: string): QueueOptions | undefined {
    return this.queues.get(name)?.options;
  }

  messageCount(name: string): number {
    return this.queues.get(name)?.messages.length ?? 0;
  }

  consumerCount(name: string): number {
    return this.queues.get(name)?.consumers.length ?? 0;
  }

  openConnectionCount(): number {
    return this.connections.size;
  }

  /** Messages published to `queue`, in order */
  publishedTo(queue: string): PublishRecord[] {
    return this.published.filter((record) => record.queue === queue);
  }

  // ==========================================================================
  // Operations used by MemoryConnection / MemoryChannel
  // ==========================================================================

  private async connect(endpoint: string): Promise<BrokerConnection> {
    if (this.connectDelayMs > 0) {
      await delay(this.connectDelayMs);
    }
    if (this.unavailable) {
      throw new TransportError(`Failed to connect to ${endpoint}`, new Error('ECONNREFUSED'));
    }

    const connection = new MemoryConnection(this);
    this.connections.add(connection);
    this.connectionsOpened++;
    return connection;
  }

  connectionClosed(connection: MemoryConnection): void {
    this.connections.delete(connection);
    for (const queue of Array.from(this.queues.values())) {
      if (queue.owner === connection) {
        this.deleteQueue(queue.name);
      }
    }
  }

  declareQueue(name: string, options: QueueOptions, owner: MemoryConnection): string {
    const queueName = name.length > 0 ? name : `amq.gen-${++this.generatedNames}`;
    const existing = this.queues.get(queueName);
    if (existing !== undefined) {
      if (existing.owner !== null && existing.owner !== owner) {
        throw new TransportError(`RESOURCE_LOCKED - queue ${queueName} is exclusive to another connection`);
      }
      return queueName;
    }

    this.queues.set(queueName, {
      name: queueName,
      options,
      owner: options.exclusive ? owner : null,
      messages: [],
      consumers: [],
      nextConsumer: 0,
    });
    return queueName;
  }

  deleteQueue(name: string): void {
    const queue = this.queues.get(name);
    if (queue === undefined) {
      return;
    }

    this.queues.delete(name);
    this.deletedQueues.push(name);
    for (const consumer of queue.consumers) {
      consumer.channel.forgetConsumer(consumer.tag);
      consumer.onCancel?.();
    }
    queue.consumers = [];
  }

  publish(queue: string, content: Buffer, properties: MessageProperties): void {
    if (this.failingQueues.has(queue)) {
      throw new TransportError(`Failed to publish to ${queue}`, new Error('channel closed'));
    }

    this.published.push({ queue, content, properties });
    const target = this.queues.get(queue);
    if (target === undefined) {
      // Unroutable through the default exchange: dropped
      return;
    }
    target.messages.push({ content, properties, redelivered: false });
    this.pump(target);
  }

  addConsumer(consumer: MemoryConsumer, connection: MemoryConnection): void {
    const queue = this.queues.get(consumer.queue);
    if (queue === undefined) {
      throw new TransportError(`NOT_FOUND - no queue '${consumer.queue}'`);
    }
    if (queue.owner !== null && queue.owner !== connection) {
      throw new TransportError(`RESOURCE_LOCKED - queue ${consumer.queue} is exclusive to another connection`);
    }

    queue.consumers.push(consumer);
    this.pump(queue);
  }

  removeConsumer(consumer: MemoryConsumer): void {
    const queue = this.queues.get(consumer.queue);
    if (queue === undefined) {
      return;
    }

    queue.consumers = queue.consumers.filter((c) => c.tag !== consumer.tag);
    if (queue.options.autoDelete && queue.consumers.length === 0) {
      this.deleteQueue(queue.name);
    }
  }

  settle(entry: Unsettled, action: 'ack' | 'nack', requeue: boolean): void {
    entry.consumer.unacked--;
    this.settlements.push({
      queue: entry.queue,
      correlationId: entry.message.properties.correlationId,
      action,
      requeue,
    });

    const queue = this.queues.get(entry.queue);
    if (action === 'nack') {
      if (requeue && queue !== undefined) {
        queue.messages.unshift({ ...entry.message, redelivered: true });
      } else if (queue?.options.deadLetterExchange !== undefined) {
        this.deadLettered.push({ queue: entry.queue, content: entry.message.content, properties: entry.message.properties });
      }
    }

    if (queue !== undefined) {
      this.pump(queue);
    }
  }

  requeue(entry: Unsettled): void {
    const queue = this.queues.get(entry.queue);
    if (queue === undefined) {
      return;
    }
    queue.messages.unshift({ ...entry.message, redelivered: true });
    this.pump(queue);
  }

  /**
   * Deliver queued messages to consumers with spare prefetch capacity (round robin)
   */
  private pump(queue: MemoryQueue): void {
    while (queue.messages.length > 0) {
      const consumer = this.nextReadyConsumer(queue);
      if (consumer === undefined) {
        return;
      }

      const message = queue.messages.shift();
      if (message === undefined) {
        return;
      }
      consumer.channel.deliver(consumer, message);
    }
  }

  private nextReadyConsumer(queue: MemoryQueue): MemoryConsumer | undefined {
    const count = queue.consumers.length;
    for (let i = 0; i < count; i++) {
      const index = (queue.nextConsumer + i) % count;
      const consumer = queue.consumers[index];
      if (consumer !== undefined && consumer.channel.hasCapacity(consumer)) {
        queue.nextConsumer = (index + 1) % count;
        return consumer;
      }
    }
    return undefined;
  }
}

class MemoryConnection implements BrokerConnection {
  readonly id = randomUUID();
  readonly createdAt = new Date();

  private open = true;
  private readonly channels = new Set<MemoryChannel>();
  private readonly closeListeners: CloseListener[] = [];

  constructor(private readonly broker: InMemoryBroker) {}

  isOpen(): boolean {
    return this.open;
  }

  async createChannel(): Promise<BrokerChannel> {
    if (!this.open) {
      throw new TransportError('Failed to open channel', new Error('connection closed'));
    }
    const channel = new MemoryChannel(this.broker, this);
    this.channels.add(channel);
    return channel;
  }

  onClose(listener: CloseListener): void {
    this.closeListeners.push(listener);
  }

  async close(): Promise<void> {
    this.terminate();
  }

  channelClosed(channel: MemoryChannel): void {
    this.channels.delete(channel);
  }

  terminate(error?: Error): void {
    if (!this.open) {
      return;
    }
    this.open = false;

    for (const channel of Array.from(this.channels)) {
      channel.terminate(error);
    }
    this.broker.connectionClosed(this);
    for (const listener of this.closeListeners) {
      listener(error);
    }
  }
}

class MemoryChannel implements BrokerChannel {
  private open = true;
  private prefetchCount = 0;
  private nextDeliveryTag = 0;
  private readonly consumers = new Map<string, MemoryConsumer>();
  private readonly unsettled = new Map<number, Unsettled>();
  private readonly closeListeners: CloseListener[] = [];

  constructor(
    private readonly broker: InMemoryBroker,
    private readonly connection: MemoryConnection
  ) {}

  async assertQueue(name: string, options: QueueOptions): Promise<string> {
    this.ensureOpen();
    return this.broker.declareQueue(name, options, this.connection);
  }

  async deleteQueue(name: string): Promise<void> {
    this.ensureOpen();
    this.broker.deleteQueue(name);
  }

  async prefetch(count: number): Promise<void> {
    this.ensureOpen();
    this.prefetchCount = count;
  }

  async publish(queue: string, content: Buffer, properties: MessageProperties): Promise<void> {
    if (!this.open) {
      throw new TransportError(`Failed to publish to ${queue}`, new Error('channel closed'));
    }
    if (this.broker.isStalled(queue)) {
      return new Promise<void>((_, reject) => {
        this.closeListeners.push(() => reject(new TransportError(`Channel closed before ${queue} drained`)));
      });
    }
    this.broker.publish(queue, content, properties);
  }

  async consume(
    queue: string,
    onMessage: (message: BrokerMessage) => void,
    options: ConsumeOptions
  ): Promise<string> {
    this.ensureOpen();
    const consumer: MemoryConsumer = {
      tag: `ctag-${randomUUID()}`,
      queue,
      channel: this,
      noAck: options.noAck,
      onMessage,
      onCancel: options.onCancel,
      unacked: 0,
    };
    this.consumers.set(consumer.tag, consumer);
    try {
      this.broker.addConsumer(consumer, this.connection);
    } catch (err) {
      this.consumers.delete(consumer.tag);
      throw err;
    }
    return consumer.tag;
  }

  async cancel(consumerTag: string): Promise<void> {
    this.ensureOpen();
    const consumer = this.consumers.get(consumerTag);
    if (consumer === undefined) {
      return;
    }
    this.consumers.delete(consumerTag);
    this.broker.removeConsumer(consumer);
  }

  ack(message: BrokerMessage): void {
    this.broker.settle(this.takeUnsettled(message), 'ack', false);
  }

  nack(message: BrokerMessage, requeue: boolean): void {
    this.broker.settle(this.takeUnsettled(message), 'nack', requeue);
  }

  isOpen(): boolean {
    return this.open;
  }

  onClose(listener: CloseListener): void {
    this.closeListeners.push(listener);
  }

  async close(): Promise<void> {
    this.terminate();
  }

  hasCapacity(consumer: MemoryConsumer): boolean {
    return this.open && (consumer.noAck || this.prefetchCount === 0 || consumer.unacked < this.prefetchCount);
  }

  deliver(consumer: MemoryConsumer, message: StoredMessage): void {
    const deliveryTag = ++this.nextDeliveryTag;
    if (!consumer.noAck) {
      consumer.unacked++;
      this.unsettled.set(deliveryTag, { queue: consumer.queue, consumer, message });
    }

    const delivery: BrokerMessage = {
      content: message.content,
      properties: message.properties,
      deliveryTag,
      redelivered: message.redelivered,
    };
    // Deliver asynchronously, like a socket read
    queueMicrotask(() => {
      if (this.open) {
        consumer.onMessage(delivery);
      }
    });
  }

  forgetConsumer(consumerTag: string): void {
    this.consumers.delete(consumerTag);
  }

  terminate(error?: Error): void {
    if (!this.open) {
      return;
    }
    this.open = false;

    for (const consumer of Array.from(this.consumers.values())) {
      this.broker.removeConsumer(consumer);
    }
    this.consumers.clear();

    // Unacknowledged deliveries go back to their queues
    const pending = Array.from(this.unsettled.values()).reverse();
    this.unsettled.clear();
    for (const entry of pending) {
      this.broker.requeue(entry);
    }

    this.connection.channelClosed(this);
    for (const listener of this.closeListeners) {
      listener(error);
    }
  }

  private ensureOpen(): void {
    if (!this.open) {
      throw new TransportError('Channel is closed');
    }
  }

  private takeUnsettled(message: BrokerMessage): Unsettled {
    if (!this.open) {
      throw new TransportError(`Cannot settle delivery ${message.deliveryTag}: channel is closed`);
    }
    const entry = this.unsettled.get(message.deliveryTag);
    if (entry === undefined) {
      throw new TransportError(`PRECONDITION_FAILED - unknown delivery tag ${message.deliveryTag}`);
    }
    this.unsettled.delete(message.deliveryTag);
    return entry;
  }
}

// AMQP 0-9-1 transport backed by amqplib

import * as amqp from 'amqplib';
import { readFileSync } from 'fs';
import { randomUUID } from 'crypto';
import { BrokerConfig, brokerDescription } from '../config';
import { TransportError, toError } from '../errors';
import type { MessageProperties } from '../protocol/messages';
import { Logger, createLogger } from '../utils/logger';
import {
  BrokerChannel,
  BrokerConnection,
  BrokerConnector,
  BrokerMessage,
  ConsumeOptions,
  QueueOptions,
} from './transport';

type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;

type CloseListener = (error?: Error) => void;

interface SocketOptions {
  timeout: number;
  ca?: Buffer[];
  cert?: Buffer;
  key?: Buffer;
  passphrase?: string;
  rejectUnauthorized?: boolean;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function toBrokerMessage(message: amqp.ConsumeMessage): BrokerMessage {
  const properties: MessageProperties = {
    messageId: optionalString(message.properties.messageId),
    correlationId: optionalString(message.properties.correlationId),
    replyTo: optionalString(message.properties.replyTo),
    contentType: optionalString(message.properties.contentType),
  };
  return {
    content: message.content,
    properties,
    deliveryTag: message.fields.deliveryTag,
    redelivered: message.fields.redelivered,
  };
}

/**
 * Opens amqplib connections from a BrokerConfig
 *
 * `amqps` is used when `tls` is configured; a client certificate and key
 * make the connection mutually authenticated.
 */
export class AmqpConnector implements BrokerConnector {
  private readonly logger: Logger;

  constructor(
    private readonly config: BrokerConfig,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('amqp-transport');
  }

  describe(): string {
    return brokerDescription(this.config);
  }

  async connect(): Promise<BrokerConnection> {
    const { config } = this;

    try {
      const connection = await amqp.connect(
        {
          protocol: config.tls ? 'amqps' : 'amqp',
          hostname: config.host,
          port: config.port,
          username: config.username,
          password: config.password,
          vhost: config.virtualHost,
          heartbeat: config.heartbeat,
        },
        this.socketOptions()
      );
      return new AmqpBrokerConnection(connection, this.logger);
    } catch (err) {
      throw new TransportError(`Failed to connect to ${this.describe()}`, toError(err));
    }
  }

  private socketOptions(): SocketOptions {
    const options: SocketOptions = { timeout: this.config.connectionTimeout };
    const tls = this.config.tls;
    if (tls === undefined) {
      return options;
    }

    if (tls.caFile !== undefined) {
      options.ca = [readFileSync(tls.caFile)];
    }
    if (tls.certFile !== undefined) {
      options.cert = readFileSync(tls.certFile);
    }
    if (tls.keyFile !== undefined) {
      options.key = readFileSync(tls.keyFile);
    }
    options.passphrase = tls.passphrase;
    options.rejectUnauthorized = tls.rejectUnauthorized;
    return options;
  }
}

class AmqpBrokerConnection implements BrokerConnection {
  readonly id = randomUUID();
  readonly createdAt = new Date();

  private open = true;
  private readonly closeListeners: CloseListener[] = [];

  constructor(
    private readonly connection: AmqpConnection,
    private readonly logger: Logger
  ) {
    // Without an error listener amqplib's emitter would throw
    connection.on('error', (err: Error) => {
      this.logger.warn({ err, connectionId: this.id }, 'Connection error');
    });
    connection.on('close', (err?: Error) => {
      this.open = false;
      for (const listener of this.closeListeners) {
        listener(err);
      }
    });
  }

  isOpen(): boolean {
    return this.open;
  }

  async createChannel(): Promise<BrokerChannel> {
    try {
      const channel = await this.connection.createChannel();
      return new AmqpBrokerChannel(channel, this.logger);
    } catch (err) {
      throw new TransportError('Failed to open channel', toError(err));
    }
  }

  onClose(listener: CloseListener): void {
    this.closeListeners.push(listener);
  }

  async close(): Promise<void> {
    if (!this.open) {
      return;
    }
    this.open = false;

    try {
      await this.connection.close();
    } catch (err) {
      this.logger.debug({ err, connectionId: this.id }, 'Connection already closed');
    }
  }
}

class AmqpBrokerChannel implements BrokerChannel {
  private open = true;
  // Deliveries awaiting ack/nack, keyed by delivery tag
  private readonly unsettled = new Map<number, amqp.ConsumeMessage>();
  private readonly closeListeners: CloseListener[] = [];

  constructor(
    private readonly channel: amqp.Channel,
    private readonly logger: Logger
  ) {
    channel.on('error', (err: Error) => {
      this.logger.warn({ err }, 'Channel error');
    });
    channel.on('close', () => {
      this.open = false;
      this.unsettled.clear();
      for (const listener of this.closeListeners) {
        listener();
      }
    });
  }

  async assertQueue(name: string, options: QueueOptions): Promise<string> {
    const reply = await this.channel.assertQueue(name, {
      durable: options.durable,
      exclusive: options.exclusive,
      autoDelete: options.autoDelete,
      messageTtl: options.messageTtl,
      expires: options.expires,
      deadLetterExchange: options.deadLetterExchange,
    });
    return reply.queue;
  }

  async deleteQueue(name: string): Promise<void> {
    await this.channel.deleteQueue(name);
  }

  async prefetch(count: number): Promise<void> {
    await this.channel.prefetch(count);
  }

  async publish(queue: string, content: Buffer, properties: MessageProperties): Promise<void> {
    let accepted: boolean;
    try {
      accepted = this.channel.sendToQueue(queue, content, {
        messageId: properties.messageId,
        correlationId: properties.correlationId,
        replyTo: properties.replyTo,
        contentType: properties.contentType,
      });
    } catch (err) {
      throw new TransportError(`Failed to publish to ${queue}`, toError(err));
    }

    // Write buffer full: wait for it to drain before the next publish
    if (!accepted) {
      await this.drained(queue);
    }
  }

  async consume(
    queue: string,
    onMessage: (message: BrokerMessage) => void,
    options: ConsumeOptions
  ): Promise<string> {
    const reply = await this.channel.consume(
      queue,
      (message) => {
        if (message === null) {
          options.onCancel?.();
          return;
        }
        if (!options.noAck) {
          this.unsettled.set(message.fields.deliveryTag, message);
        }
        onMessage(toBrokerMessage(message));
      },
      { noAck: options.noAck }
    );
    return reply.consumerTag;
  }

  async cancel(consumerTag: string): Promise<void> {
    await this.channel.cancel(consumerTag);
  }

  ack(message: BrokerMessage): void {
    this.channel.ack(this.takeUnsettled(message));
  }

  nack(message: BrokerMessage, requeue: boolean): void {
    this.channel.nack(this.takeUnsettled(message), false, requeue);
  }

  isOpen(): boolean {
    return this.open;
  }

  onClose(listener: CloseListener): void {
    this.closeListeners.push(listener);
  }

  async close(): Promise<void> {
    if (!this.open) {
      return;
    }
    this.open = false;

    try {
      await this.channel.close();
    } catch (err) {
      this.logger.debug({ err }, 'Channel already closed');
    }
  }

  /**
   * Resolves on `drain`, rejects if the channel closes first
   */
  private drained(queue: string): Promise<void> {
    if (!this.open) {
      return Promise.reject(new TransportError(`Failed to publish to ${queue}`, new Error('channel closed')));
    }
    return new Promise<void>((resolve, reject) => {
      const onDrain = (): void => {
        this.channel.off('close', onClose);
        resolve();
      };
      const onClose = (): void => {
        this.channel.off('drain', onDrain);
        reject(new TransportError(`Channel closed before ${queue} drained`));
      };
      this.channel.once('drain', onDrain);
      this.channel.once('close', onClose);
    });
  }

  private takeUnsettled(message: BrokerMessage): amqp.ConsumeMessage {
    const raw = this.unsettled.get(message.deliveryTag);
    if (raw === undefined) {
      throw new TransportError(`Delivery ${message.deliveryTag} is not pending on this channel`);
    }
    this.unsettled.delete(message.deliveryTag);
    return raw;
  }
}

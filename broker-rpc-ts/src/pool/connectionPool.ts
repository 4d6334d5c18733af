// Bounded pool of broker connections shared by the RPC client and the dispatcher

import type { PoolConfig } from '../config';
import { BrokerUnavailableError, PoolExhaustedError, TransportError, toError } from '../errors';
import { NoopTelemetry, Telemetry } from '../telemetry/telemetry';
import type { BrokerConnection, BrokerConnector } from '../transport/transport';
import { Logger, createLogger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';

export interface ConnectionPoolOptions {
  readonly logger?: Logger;
  readonly telemetry?: Telemetry;
}

export interface PoolStats {
  readonly total: number;
  readonly idle: number;
  readonly borrowed: number;
  /** Connections being opened */
  readonly pending: number;
  /** Callers blocked in acquire() */
  readonly waiting: number;
}

interface Waiter {
  readonly deadline: number;
  readonly resolve: (connection: BrokerConnection) => void;
  readonly reject: (error: Error) => void;
  readonly timer: NodeJS.Timeout;
  settled: boolean;
}

/**
 * Connection pool with lazy creation up to `maxTotal`
 *
 * `total` counts connections still being opened, so concurrent acquires
 * never overcommit. Dead connections are discarded and replaced on demand;
 * the pool never retries a failed connect on its own.
 *
 * Usage:
 * ```typescript
 * const pool = new ConnectionPool(new AmqpConnector(config.broker), config.pool);
 * await pool.start();
 * const result = await pool.withConnection(async (connection) => ...);
 * await pool.shutdown();
 * ```
 */
export class ConnectionPool {
  private readonly logger: Logger;
  private readonly telemetry: Telemetry;

  private readonly idle: BrokerConnection[] = [];
  private readonly borrowed = new Set<BrokerConnection>();
  private readonly waiters: Waiter[] = [];
  private pendingCreates = 0;
  private closed = false;

  constructor(
    private readonly connector: BrokerConnector,
    private readonly config: PoolConfig,
    options: ConnectionPoolOptions = {}
  ) {
    this.logger = options.logger ?? createLogger('connection-pool');
    this.telemetry = options.telemetry ?? new NoopTelemetry();
  }

  /**
   * Open connections until `minIdle` are idle
   * @throws BrokerUnavailableError if the broker cannot be reached
   */
  async start(): Promise<void> {
    this.ensureOpen();
    const deadline = Date.now() + this.config.acquireTimeout;
    while (this.idle.length + this.pendingCreates < this.config.minIdle && this.total() < this.config.maxTotal) {
      const connection = await this.create(deadline);
      this.borrowed.delete(connection);
      this.idle.push(connection);
      this.reportGauge();
    }
  }

  /**
   * Borrow a live connection
   *
   * @throws PoolExhaustedError if every connection stays borrowed for the wait bound
   * @throws BrokerUnavailableError if a new connection cannot be opened in time
   */
  async acquire(): Promise<BrokerConnection> {
    this.ensureOpen();
    const deadline = Date.now() + this.config.acquireTimeout;

    const idle = this.takeIdle();
    if (idle !== undefined) {
      return this.lend(idle);
    }

    if (this.total() < this.config.maxTotal) {
      const connection = await this.create(deadline);
      if (this.closed) {
        this.borrowed.delete(connection);
        await this.dispose(connection);
        throw new TransportError('Connection pool is shut down');
      }
      return connection;
    }

    return this.enqueueWaiter(deadline);
  }

  /**
   * Return a borrowed connection
   * Unknown or already-released connections are ignored.
   */
  release(connection: BrokerConnection): void {
    if (!this.borrowed.delete(connection)) {
      this.logger.warn({ connectionId: connection.id }, 'Release of a connection the pool did not lend');
      return;
    }

    if (this.closed) {
      this.disposeInBackground(connection);
      return;
    }

    if (!connection.isOpen()) {
      this.logger.info({ connectionId: connection.id }, 'Discarding closed connection on release');
      this.reportGauge();
      this.serveWaiters();
      this.topUp();
      return;
    }

    this.handOver(connection);
  }

  /**
   * Close and forget a borrowed connection after a detected failure
   */
  async invalidate(connection: BrokerConnection): Promise<void> {
    if (!this.borrowed.delete(connection)) {
      return;
    }

    this.logger.info({ connectionId: connection.id }, 'Invalidating connection');
    this.reportGauge();
    await this.dispose(connection);

    if (!this.closed) {
      this.serveWaiters();
      this.topUp();
    }
  }

  /**
   * Run `fn` with a borrowed connection, releasing it afterwards
   * The connection is invalidated instead if it closed while in use.
   */
  async withConnection<T>(fn: (connection: BrokerConnection) => Promise<T>): Promise<T> {
    const connection = await this.acquire();
    try {
      return await fn(connection);
    } finally {
      if (connection.isOpen()) {
        this.release(connection);
      } else {
        await this.invalidate(connection);
      }
    }
  }

  /**
   * Reject waiters and close every connection; later acquires fail
   */
  async shutdown(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const error = new TransportError('Connection pool is shut down');
    for (const waiter of this.waiters.splice(0)) {
      this.settleWaiter(waiter, error);
    }

    const connections = [...this.idle.splice(0), ...this.borrowed];
    this.borrowed.clear();
    await Promise.all(connections.map((connection) => this.dispose(connection)));
    this.reportGauge();
    this.logger.info({ closed: connections.length }, 'Connection pool shut down');
  }

  stats(): PoolStats {
    return {
      total: this.total(),
      idle: this.idle.length,
      borrowed: this.borrowed.size,
      pending: this.pendingCreates,
      waiting: this.waiters.length,
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private total(): number {
    return this.idle.length + this.borrowed.size + this.pendingCreates;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new TransportError('Connection pool is shut down');
    }
  }

  private takeIdle(): BrokerConnection | undefined {
    let connection = this.idle.shift();
    while (connection !== undefined && !connection.isOpen()) {
      this.logger.info({ connectionId: connection.id }, 'Discarding dead idle connection');
      connection = this.idle.shift();
    }
    this.reportGauge();
    return connection;
  }

  private lend(connection: BrokerConnection): BrokerConnection {
    this.borrowed.add(connection);
    this.reportGauge();
    return connection;
  }

  /**
   * Open a connection, counting it against maxTotal while it is pending
   * The new connection is returned already marked as borrowed.
   */
  private async create(deadline: number): Promise<BrokerConnection> {
    this.pendingCreates++;
    this.reportGauge();

    const endpoint = this.connector.describe();
    const attempt = this.connector.connect();
    let failed = false;
    try {
      const connection = await withTimeout(
        attempt,
        deadline - Date.now(),
        () => new BrokerUnavailableError(endpoint, new Error('connect timed out'))
      );
      connection.onClose(() => this.handleClosed(connection));
      this.borrowed.add(connection);
      this.telemetry.recordBrokerConnected(endpoint);
      return connection;
    } catch (err) {
      // A connect that finishes after the deadline is closed, never pooled
      attempt.then(
        (late) => this.disposeInBackground(late),
        (lateErr: unknown) => this.logger.debug({ err: lateErr }, 'Connect attempt failed')
      );
      const error = err instanceof BrokerUnavailableError ? err : new BrokerUnavailableError(endpoint, toError(err));
      this.telemetry.recordBrokerError(error.message);
      failed = true;
      throw error;
    } finally {
      this.pendingCreates--;
      this.reportGauge();
      // The failed attempt held a slot that queued callers can now use
      if (failed && !this.closed) {
        this.serveWaiters();
      }
    }
  }

  private handleClosed(connection: BrokerConnection): void {
    const index = this.idle.indexOf(connection);
    if (index >= 0) {
      this.idle.splice(index, 1);
      this.logger.warn({ connectionId: connection.id }, 'Idle connection closed by broker');
      this.reportGauge();
      this.topUp();
    }
  }

  private handOver(connection: BrokerConnection): void {
    const waiter = this.waiters.shift();
    if (waiter !== undefined) {
      this.borrowed.add(connection);
      this.reportGauge();
      clearTimeout(waiter.timer);
      waiter.settled = true;
      waiter.resolve(connection);
      return;
    }

    this.idle.push(connection);
    this.reportGauge();
  }

  private enqueueWaiter(deadline: number): Promise<BrokerConnection> {
    return new Promise<BrokerConnection>((resolve, reject) => {
      const waiter: Waiter = {
        deadline,
        resolve,
        reject,
        settled: false,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) {
            this.waiters.splice(index, 1);
          }
          this.settleWaiter(waiter, new PoolExhaustedError(this.config.acquireTimeout));
        }, Math.max(0, deadline - Date.now())),
      };
      this.waiters.push(waiter);
    });
  }

  private settleWaiter(waiter: Waiter, error: Error): void {
    if (waiter.settled) {
      return;
    }
    waiter.settled = true;
    clearTimeout(waiter.timer);
    waiter.reject(error);
  }

  /**
   * Open replacement connections for queued waiters while capacity allows
   */
  private serveWaiters(): void {
    while (this.waiters.length > 0 && this.total() < this.config.maxTotal) {
      const waiter = this.waiters.shift();
      if (waiter === undefined) {
        return;
      }

      this.create(waiter.deadline).then(
        (connection) => {
          if (this.closed) {
            this.borrowed.delete(connection);
            this.disposeInBackground(connection);
          } else if (waiter.settled) {
            this.borrowed.delete(connection);
            this.handOver(connection);
          } else {
            waiter.settled = true;
            clearTimeout(waiter.timer);
            waiter.resolve(connection);
          }
        },
        (err: unknown) => this.settleWaiter(waiter, toError(err))
      );
    }
  }

  /**
   * Bring idle connections back up to minIdle in the background
   */
  private topUp(): void {
    const missing = this.config.minIdle - (this.idle.length + this.pendingCreates);
    for (let i = 0; i < missing && this.total() < this.config.maxTotal; i++) {
      this.create(Date.now() + this.config.acquireTimeout).then(
        (connection) => {
          this.borrowed.delete(connection);
          if (this.closed) {
            this.disposeInBackground(connection);
          } else {
            this.handOver(connection);
          }
        },
        (err: unknown) => {
          this.logger.warn({ err }, 'Could not replenish idle connection');
        }
      );
    }
  }

  private async dispose(connection: BrokerConnection): Promise<void> {
    try {
      await connection.close();
    } catch (err) {
      this.logger.debug({ err, connectionId: connection.id }, 'Error closing connection');
    }
  }

  private disposeInBackground(connection: BrokerConnection): void {
    // dispose() never rejects
    void this.dispose(connection);
  }

  private reportGauge(): void {
    this.telemetry.recordConnectionCount(this.total(), this.idle.length);
  }
}

// Telemetry backed by structured log lines

import type { Logger } from '../utils/logger';
import type { CallResult } from '../results';
import type { DeliveryOutcome, Telemetry } from './telemetry';

export class LoggingTelemetry implements Telemetry {
  constructor(private readonly logger: Logger) {}

  recordMessageReceived(operation: string, correlationId: string, queue: string): void {
    this.logger.debug({ operation, correlationId, queue }, 'Message received');
  }

  recordMessageProcessed(operation: string, correlationId: string, outcome: DeliveryOutcome, durationMs: number): void {
    this.logger.info({ operation, correlationId, outcome, durationMs }, 'Message processed');
  }

  recordMessageFailed(
    operation: string,
    correlationId: string,
    errorCode: string,
    errorMessage: string,
    durationMs: number
  ): void {
    this.logger.error({ operation, correlationId, errorCode, errorMessage, durationMs }, 'Message failed');
  }

  recordResponseSent(operation: string, correlationId: string, success: boolean): void {
    this.logger.debug({ operation, correlationId, success }, 'Response sent');
  }

  recordCallCompleted(operation: string, correlationId: string, outcome: CallResult['kind'], durationMs: number): void {
    const level = outcome === 'success' || outcome === 'remoteError' ? 'info' : 'warn';
    this.logger[level]({ operation, correlationId, outcome, durationMs }, 'Call completed');
  }

  recordConnectionCount(total: number, idle: number): void {
    this.logger.debug({ total, idle }, 'Connection count');
  }

  recordBrokerConnected(endpoint: string): void {
    this.logger.info({ endpoint }, 'Connected to broker');
  }

  recordBrokerError(message: string): void {
    this.logger.error({ errorMessage: message }, 'Broker error');
  }

  recordConsumptionStarted(queue: string): void {
    this.logger.info({ queue }, 'Consumption started');
  }

  recordConsumptionStopped(queue: string, reason: string): void {
    this.logger.info({ queue, reason }, 'Consumption stopped');
  }
}

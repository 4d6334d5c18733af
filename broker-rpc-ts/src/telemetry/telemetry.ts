// Telemetry interface for observability
// Keeps metrics and tracing out of the RPC engine and dispatcher

import type { CallResult } from '../results';

/**
 * Outcome of one inbound delivery
 */
export type DeliveryOutcome = 'acked-success' | 'acked-business-error' | 'nacked-fault';

/**
 * Observation hooks called by the pool, the RPC client and the dispatcher
 * Implementations must not throw.
 */
export interface Telemetry {
  // ==================== Inbound dispatch ====================

  recordMessageReceived(operation: string, correlationId: string, queue: string): void;

  recordMessageProcessed(operation: string, correlationId: string, outcome: DeliveryOutcome, durationMs: number): void;

  recordMessageFailed(
    operation: string,
    correlationId: string,
    errorCode: string,
    errorMessage: string,
    durationMs: number
  ): void;

  recordResponseSent(operation: string, correlationId: string, success: boolean): void;

  // ==================== Outbound calls ====================

  recordCallCompleted(operation: string, correlationId: string, outcome: CallResult['kind'], durationMs: number): void;

  // ==================== Broker ====================

  recordConnectionCount(total: number, idle: number): void;

  recordBrokerConnected(endpoint: string): void;

  recordBrokerError(message: string): void;

  recordConsumptionStarted(queue: string): void;

  recordConsumptionStopped(queue: string, reason: string): void;
}

/**
 * Telemetry that records nothing
 */
export class NoopTelemetry implements Telemetry {
  recordMessageReceived(): void {}
  recordMessageProcessed(): void {}
  recordMessageFailed(): void {}
  recordResponseSent(): void {}
  recordCallCompleted(): void {}
  recordConnectionCount(): void {}
  recordBrokerConnected(): void {}
  recordBrokerError(): void {}
  recordConsumptionStarted(): void {}
  recordConsumptionStopped(): void {}
}

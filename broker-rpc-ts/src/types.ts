// Branded types for type-safe identifiers

import { randomUUID } from 'crypto';

/**
 * Correlation identifier carried on a request and its response
 * Generated as a random UUID so ids never repeat across in-flight calls
 */
export type CorrelationId = string & { readonly __brand: 'CorrelationId' };

export const CorrelationId = {
  generate: (): CorrelationId => randomUUID() as CorrelationId,
  fromString: (value: string): CorrelationId => {
    if (!value || value.length === 0) {
      throw new Error('CorrelationId cannot be empty');
    }
    return value as CorrelationId;
  },
  unwrap: (id: CorrelationId): string => id as string,
};

/**
 * Session identifier forwarded in the adapter call context
 */
export type SessionId = string & { readonly __brand: 'SessionId' };

export const SessionId = {
  generate: (): SessionId => randomUUID() as SessionId,
  fromString: (value: string): SessionId => value as SessionId,
  unwrap: (id: SessionId): string => id as string,
};

/**
 * Name of a broker queue (request, response or a per-call reply queue)
 */
export type QueueName = string & { readonly __brand: 'QueueName' };

export const QueueName = {
  fromString: (value: string): QueueName => {
    if (!value || value.length === 0) {
      throw new Error('QueueName cannot be empty');
    }
    return value as QueueName;
  },
  unwrap: (name: QueueName): string => name as string,
};

// Correlation registry for in-flight outbound calls
// Maps correlation id -> pending call; every entry resolves exactly once

import { CorrelationId, QueueName } from '../types';
import { ValidationError } from '../errors';
import type { CallResult } from '../results';

/**
 * Handle returned to the caller that registered a pending call
 */
export interface PendingCallHandle {
  readonly correlationId: CorrelationId;
  readonly replyQueue: QueueName;
  readonly createdAt: Date;
  readonly deadline: Date;
  /** Settles with whichever of response or deadline came first */
  readonly result: Promise<CallResult>;
}

export interface RegisterOptions {
  readonly replyQueue: QueueName;
  readonly timeoutMs: number;
}

interface PendingCallData {
  readonly handle: PendingCallHandle;
  readonly timeoutMs: number;
  readonly settle: (result: CallResult) => void;
  readonly timer: NodeJS.Timeout;
}

/**
 * Tracker for pending calls
 *
 * Entries are removed at the moment they resolve, so a late resolve or an
 * expiry racing a response finds nothing and reports `false`.
 */
export class CorrelationRegistry {
  private readonly calls: Map<CorrelationId, PendingCallData> = new Map();

  /**
   * Register a pending call and arm its deadline
   * @throws ValidationError if the id is already pending
   */
  register(correlationId: CorrelationId, options: RegisterOptions): PendingCallHandle {
    if (this.calls.has(correlationId)) {
      throw new ValidationError(`Correlation id already pending: ${correlationId}`);
    }
    if (!(options.timeoutMs > 0)) {
      throw new ValidationError('timeoutMs must be positive');
    }

    const createdAt = new Date();
    const deadline = new Date(createdAt.getTime() + options.timeoutMs);

    let settle: (result: CallResult) => void = () => {};
    const result = new Promise<CallResult>((resolve) => {
      settle = resolve;
    });

    const handle: PendingCallHandle = {
      correlationId,
      replyQueue: options.replyQueue,
      createdAt,
      deadline,
      result,
    };

    const timer = setTimeout(() => {
      this.expire(correlationId);
    }, options.timeoutMs);

    this.calls.set(correlationId, { handle, timeoutMs: options.timeoutMs, settle, timer });
    return handle;
  }

  /**
   * Resolve a pending call
   * @returns true only if this call transitioned the entry from pending to resolved
   */
  resolve(correlationId: CorrelationId, result: CallResult): boolean {
    const data = this.calls.get(correlationId);
    if (data === undefined) {
      return false;
    }

    this.calls.delete(correlationId);
    clearTimeout(data.timer);
    data.settle(result);
    return true;
  }

  /**
   * Resolve a pending call as timed out (invoked by its deadline timer)
   */
  expire(correlationId: CorrelationId): boolean {
    const data = this.calls.get(correlationId);
    if (data === undefined) {
      return false;
    }

    return this.resolve(correlationId, {
      kind: 'timeout',
      correlationId: CorrelationId.unwrap(correlationId),
      timeoutMs: data.timeoutMs,
    });
  }

  /**
   * Check if a correlation id is pending
   */
  contains(correlationId: CorrelationId): boolean {
    return this.calls.has(correlationId);
  }

  get(correlationId: CorrelationId): PendingCallHandle | undefined {
    return this.calls.get(correlationId)?.handle;
  }

  /**
   * Get all pending correlation ids
   */
  pendingIds(): CorrelationId[] {
    return Array.from(this.calls.keys());
  }

  size(): number {
    return this.calls.size;
  }

  /**
   * Resolve every pending call as a transport error (used on shutdown)
   * @returns the number of calls resolved
   */
  dispose(error: Error): number {
    let count = 0;
    for (const correlationId of this.pendingIds()) {
      const resolved = this.resolve(correlationId, {
        kind: 'transportError',
        correlationId: CorrelationId.unwrap(correlationId),
        error,
      });
      if (resolved) {
        count++;
      }
    }
    return count;
  }
}

/**
 * Error classes for the adapter CLI
 */

/**
 * Validation error - for command line input the CLI rejects before touching the broker
 */
export class ValidationError extends Error {
  public readonly name = 'ValidationError';

  constructor(
    public readonly field: 'url' | 'payload' | 'operation' | 'handler' | 'timeout' | 'prefetch',
    message: string,
    public readonly actual?: string | number,
    public readonly expected?: string | number
  ) {
    super(message);
  }
}

/**
 * Operation error - for runtime failures while a command runs
 */
export class OperationError extends Error {
  public readonly name = 'OperationError';

  constructor(
    public readonly operation: 'call' | 'serve' | 'connect',
    public readonly reason: 'timeout' | 'connection' | 'remote' | 'protocol',
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
  }
}

/**
 * Serve command implementation
 */

import { Command } from 'commander';
import { RequestDispatcher, toError } from 'broker-rpc';
import { OperationError } from '../errors';
import { formatError, getExitCode } from '../formatting';
import { createHandler } from '../handlers';
import { AdapterRuntime } from '../runtime';
import { CLI_ADAPTER_INFO, CommandDeps, ServeCommandOptions } from '../types';
import { parseHandlerName, parsePositiveInteger } from '../validation';
import { addBrokerOptions } from './options';

export interface ServeSession {
  readonly dispatcher: RequestDispatcher;
  /** Drain in-flight deliveries and close every connection */
  stop(): Promise<void>;
}

/**
 * Start consuming the request queue with a built-in handler
 *
 * @throws ValidationError for an unknown handler or a bad prefetch
 * @throws OperationError if the queues cannot be declared and consumed
 */
export async function startServe(options: ServeCommandOptions, deps: CommandDeps = {}): Promise<ServeSession> {
  const handler = createHandler(parseHandlerName(options.handler));
  const prefetchCount = parsePositiveInteger('prefetch', options.prefetch);

  const runtime = new AdapterRuntime({ ...options, ...deps, prefetchCount });
  const dispatcher = runtime.createDispatcher(CLI_ADAPTER_INFO);

  try {
    await dispatcher.start(handler);
  } catch (error) {
    await runtime.shutdown();
    throw new OperationError(
      'serve',
      'connection',
      `Could not start serving ${options.requestQueue}: ${toError(error).message}`,
      error
    );
  }

  return { dispatcher, stop: () => runtime.shutdown() };
}

/**
 * Create the serve command
 */
export function createServeCommand(): Command {
  const cmd = new Command('serve');

  addBrokerOptions(cmd)
    .description('Answer requests from the request queue until interrupted')
    .option('--handler <name>', 'Built-in handler: mock or echo', 'mock')
    .option('-p, --prefetch <count>', 'Deliveries processed at once', '10')
    .action(async (options: ServeCommandOptions) => {
      try {
        const session = await startServe(options);
        stopOnSignal(session);
        console.error(`serving ${options.requestQueue} with the ${options.handler} handler - press Ctrl+C to stop`);
      } catch (error) {
        console.error(formatError(error));
        process.exit(getExitCode(error));
      }
    });

  return cmd;
}

function stopOnSignal(session: ServeSession): void {
  let isShuttingDown = false;

  // Signal handler for graceful shutdown
  const shutdownHandler = async (exitCode: number): Promise<void> => {
    if (isShuttingDown) {
      return;
    }
    isShuttingDown = true;
    console.error('\nShutting down...');

    try {
      await session.stop();
    } catch (cleanupError) {
      console.error('Warning: Failed to stop cleanly:', cleanupError);
    }

    const stats = session.dispatcher.stats();
    console.error(`Processed ${stats.processed} requests (${stats.faults} faults)`);
    process.exit(exitCode);
  };

  process.on('SIGINT', () => void shutdownHandler(130)); // Standard SIGINT exit code
  process.on('SIGTERM', () => void shutdownHandler(0));
}

/**
 * Call command implementation
 */

import { Command } from 'commander';
import type { CallContextInput } from 'broker-rpc';
import { exitCodeFor, formatCallResult, formatError, getExitCode } from '../formatting';
import { AdapterRuntime } from '../runtime';
import type { CallCommandOptions, CommandDeps, CommandOutcome } from '../types';
import { parseJsonPayload, parsePositiveInteger, validateOperationName } from '../validation';
import { addBrokerOptions } from './options';

/**
 * Issue one call and describe its outcome
 * @throws ValidationError for bad input, before any connection is opened
 */
export async function runCall(
  operation: string,
  payloadText: string,
  options: CallCommandOptions,
  deps: CommandDeps = {}
): Promise<CommandOutcome> {
  // 1. Validate input
  validateOperationName(operation);
  const payload = parseJsonPayload(payloadText);
  const timeout = parsePositiveInteger('timeout', options.timeout);

  // 2. Open the runtime; connections are made by the call itself
  const runtime = new AdapterRuntime({ ...options, ...deps, callTimeout: timeout });

  try {
    // 3. Execute and describe the result
    const result = await runtime.createClient().call(operation, payload, { callContext: callContextFrom(options) });
    return { output: formatCallResult(result), exitCode: exitCodeFor(result) };
  } finally {
    await runtime.shutdown();
  }
}

function callContextFrom(options: CallCommandOptions): CallContextInput {
  return {
    ...(options.user !== undefined ? { userId: options.user } : {}),
    ...(options.session !== undefined ? { sessionId: options.session } : {}),
  };
}

/**
 * Print an outcome and exit with its code
 */
export async function reportOutcome(outcome: Promise<CommandOutcome>): Promise<void> {
  try {
    const { output, exitCode } = await outcome;
    if (exitCode === 0) {
      console.log(output);
    } else {
      console.error(output);
    }
    process.exit(exitCode);
  } catch (error) {
    console.error(formatError(error));
    process.exit(getExitCode(error));
  }
}

/**
 * Create the call command
 */
export function createCallCommand(): Command {
  const cmd = new Command('call');

  addBrokerOptions(cmd)
    .description('Call an operation and print its response')
    .argument('<operation>', 'Operation name')
    .argument('[payload]', 'Request payload as a JSON object', '{}')
    .option('-t, --timeout <ms>', 'Response deadline in milliseconds', '10000')
    .option('--user <id>', 'User id sent in the call context')
    .option('--session <id>', 'Session id sent in the call context (generated when absent)')
    .action(async (operation: string, payload: string, options: CallCommandOptions) => {
      await reportOutcome(runCall(operation, payload, options));
    });

  return cmd;
}

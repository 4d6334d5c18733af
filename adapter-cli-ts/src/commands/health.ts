/**
 * Health command implementation
 */

import { Command } from 'commander';
import { ReservedOperations } from 'broker-rpc';
import type { CallCommandOptions, CommandDeps, CommandOutcome } from '../types';
import { reportOutcome, runCall } from './call';
import { addBrokerOptions } from './options';

/**
 * Ask the adapter serving the request queue whether it is up
 */
export function runHealth(options: CallCommandOptions, deps: CommandDeps = {}): Promise<CommandOutcome> {
  return runCall(ReservedOperations.HEALTH_CHECK, '{}', options, deps);
}

export function createHealthCommand(): Command {
  const cmd = new Command('health');

  addBrokerOptions(cmd)
    .description('Check that an adapter is answering on the request queue')
    .option('-t, --timeout <ms>', 'Response deadline in milliseconds', '5000')
    .action(async (options: CallCommandOptions) => {
      await reportOutcome(runHealth(options));
    });

  return cmd;
}

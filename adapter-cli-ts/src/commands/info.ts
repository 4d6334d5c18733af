/**
 * Info command implementation
 */

import { Command } from 'commander';
import { ReservedOperations } from 'broker-rpc';
import type { CallCommandOptions, CommandDeps, CommandOutcome } from '../types';
import { reportOutcome, runCall } from './call';
import { addBrokerOptions } from './options';

export function runInfo(options: CallCommandOptions, deps: CommandDeps = {}): Promise<CommandOutcome> {
  return runCall(ReservedOperations.ADAPTER_INFO, '{}', options, deps);
}

export function createInfoCommand(): Command {
  const cmd = new Command('info');

  addBrokerOptions(cmd)
    .description('Print the name and version of the adapter serving the request queue')
    .option('-t, --timeout <ms>', 'Response deadline in milliseconds', '5000')
    .action(async (options: CallCommandOptions) => {
      await reportOutcome(runInfo(options));
    });

  return cmd;
}

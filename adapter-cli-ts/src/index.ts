#!/usr/bin/env node

/**
 * Broker adapter CLI - Main entry point
 */

import { Command } from 'commander';
import { createCallCommand } from './commands/call';
import { createHealthCommand } from './commands/health';
import { createInfoCommand } from './commands/info';
import { createServeCommand } from './commands/serve';
import { CLI_ADAPTER_INFO } from './types';

/**
 * Main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_ADAPTER_INFO.name)
    .version(CLI_ADAPTER_INFO.version)
    .description('Broker adapter CLI - serve a handler over the broker or call one');

  // Register commands
  program.addCommand(createServeCommand());
  program.addCommand(createCallCommand());
  program.addCommand(createHealthCommand());
  program.addCommand(createInfoCommand());

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  // Show help if no command provided
  if (process.argv.slice(2).length === 0) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(process.argv);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}

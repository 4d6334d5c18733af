/**
 * Broker options shared by every command
 */

import { Command } from 'commander';
import { DEFAULT_QUEUES } from 'broker-rpc';
import { DEFAULT_BROKER_URL } from '../types';

export function addBrokerOptions(cmd: Command): Command {
  return cmd
    .option('-u, --url <url>', 'Broker URL (amqp:// or amqps://)', process.env.BROKER_URL ?? DEFAULT_BROKER_URL)
    .option('--request-queue <name>', 'Queue requests are published to', DEFAULT_QUEUES.requestQueue)
    .option('--response-queue <name>', 'Queue for responses without a reply address', DEFAULT_QUEUES.responseQueue)
    .option('--ca <file>', 'CA certificate (PEM) for amqps://')
    .option('--cert <file>', 'Client certificate (PEM) for mutual TLS')
    .option('--key <file>', 'Client private key (PEM) for mutual TLS')
    .option('--insecure', 'Skip verification of the broker certificate')
    .option('--log-level <level>', 'Log level written to stderr', process.env.LOG_LEVEL ?? 'warn');
}

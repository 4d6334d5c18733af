/**
 * Input validation functions
 */

import { BrokerConfig, JsonObject, formatIssues, jsonObjectSchema } from 'broker-rpc';
import { ValidationError } from './errors';
import { HANDLER_NAMES, HandlerName } from './types';

const AMQP_PORT = 5672;
const AMQPS_PORT = 5671;

/**
 * Broker settings carried by a URL; absent parts fall back to config defaults
 */
export type BrokerUrlSettings = Partial<BrokerConfig>;

/**
 * Parses a broker URL
 * Format: "amqp[s]://user:pass@host:port/vhost"; user, password, port and vhost are optional
 * @throws ValidationError if parsing fails
 */
export function parseBrokerUrl(input: string): BrokerUrlSettings {
  let url: URL;
  try {
    url = new URL(input.trim());
  } catch {
    throw new ValidationError('url', `Invalid broker URL: ${input}`);
  }

  if (url.protocol !== 'amqp:' && url.protocol !== 'amqps:') {
    throw new ValidationError(
      'url',
      `Unsupported scheme ${url.protocol} in broker URL. Expected: amqp:// or amqps://`
    );
  }
  if (url.hostname.length === 0) {
    throw new ValidationError('url', 'Broker URL must include a host');
  }

  const secure = url.protocol === 'amqps:';
  const port = url.port.length > 0 ? parseInt(url.port, 10) : secure ? AMQPS_PORT : AMQP_PORT;
  if (port < 1 || port > 65535) {
    throw new ValidationError('url', `Invalid port: ${port}. Must be 1-65535`);
  }

  // An empty path and "/" both mean the default vhost; "%2F" spells it out
  const path = url.pathname.replace(/^\//, '');
  const virtualHost = path.length > 0 ? decodeURIComponent(path) : '/';

  return {
    host: url.hostname,
    port,
    virtualHost,
    ...(url.username.length > 0 ? { username: decodeURIComponent(url.username) } : {}),
    ...(url.password.length > 0 ? { password: decodeURIComponent(url.password) } : {}),
    ...(secure ? { tls: { rejectUnauthorized: true } } : {}),
  };
}

/**
 * Parses a request payload given on the command line
 * @throws ValidationError if the text is not a JSON object
 */
export function parseJsonPayload(input: string): JsonObject {
  let raw: unknown;
  try {
    raw = JSON.parse(input);
  } catch (error) {
    throw new ValidationError('payload', `Payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = jsonObjectSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError('payload', `Payload must be a JSON object (${formatIssues(parsed.error)})`);
  }
  return parsed.data;
}

/**
 * Validates an operation name
 * @throws ValidationError if it is empty or contains whitespace
 */
export function validateOperationName(operation: string): void {
  if (operation.length === 0) {
    throw new ValidationError('operation', 'Operation name cannot be empty');
  }
  if (/\s/.test(operation)) {
    throw new ValidationError('operation', `Operation name cannot contain whitespace: "${operation}"`);
  }
}

/**
 * Parses a strictly positive integer option
 * @throws ValidationError if the text is not one
 */
export function parsePositiveInteger(field: 'timeout' | 'prefetch', input: string): number {
  const value = Number(input);
  if (!/^\d+$/.test(input.trim()) || !Number.isSafeInteger(value) || value < 1) {
    throw new ValidationError(field, `Invalid ${field}: ${input}. Expected a positive integer`);
  }
  return value;
}

/**
 * Validates a --handler value
 * @throws ValidationError for an unknown handler
 */
export function parseHandlerName(input: string): HandlerName {
  const name = HANDLER_NAMES.find((candidate) => candidate === input);
  if (name === undefined) {
    throw new ValidationError('handler', `Unknown handler: ${input}. Expected one of: ${HANDLER_NAMES.join(', ')}`);
  }
  return name;
}

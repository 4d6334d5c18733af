/**
 * Handler selection by name (--handler)
 */

import type { AdapterHandler } from 'broker-rpc';
import type { HandlerName } from '../types';
import { createEchoHandler } from './echoHandler';
import { createMockHandler } from './mockHandler';

export function createHandler(name: HandlerName): AdapterHandler {
  switch (name) {
    case 'mock':
      return createMockHandler();
    case 'echo':
      return createEchoHandler();
  }
}

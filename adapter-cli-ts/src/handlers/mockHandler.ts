/**
 * Mock handler serving a fixed widget catalogue
 * Useful for exercising callers against a running broker without a backend.
 */

import { AdapterHandler, HandlerResult, JsonObject } from 'broker-rpc';

const WIDGETS: ReadonlyArray<JsonObject> = [
  { id: 'w-1', name: 'Sprocket', stock: 12 },
  { id: 'w-2', name: 'Flange', stock: 0 },
  { id: 'w-3', name: 'Gasket', stock: 140 },
];

export function createMockHandler(): AdapterHandler {
  return {
    async handle(operation, payload) {
      switch (operation) {
        case 'listWidgets':
          return HandlerResult.success({ widgets: [...WIDGETS] });

        case 'getWidget': {
          const id = payload.id;
          if (typeof id !== 'string' || id.length === 0) {
            return HandlerResult.error('INVALID_REQUEST', 'Field id is required');
          }
          const widget = WIDGETS.find((w) => w.id === id);
          return widget !== undefined
            ? HandlerResult.success(widget)
            : HandlerResult.error('NOT_FOUND', `Widget ${id} not found`);
        }

        default:
          return HandlerResult.error('UNSUPPORTED_OPERATION', `Unknown operation ${operation}`);
      }
    },
  };
}

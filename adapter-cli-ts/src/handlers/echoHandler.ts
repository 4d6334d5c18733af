/**
 * Echo handler: answers every operation with what it received
 */

import { AdapterHandler, HandlerResult, handlerFrom } from 'broker-rpc';

export function createEchoHandler(): AdapterHandler {
  return handlerFrom(async (operation, payload, callContext) =>
    HandlerResult.success({
      operation,
      payload,
      correlationId: callContext.correlationId,
      sessionId: callContext.sessionId,
    })
  );
}

// Protocol constants shared by the outbound engine and the dispatcher

/** Content type of every envelope body */
export const CONTENT_TYPE_JSON = 'application/json';

/** Body key holding the caller's context on requests */
export const OUTBOUND_CONTEXT_KEY = 'outboundAdapterCallContext';

/** Body key holding the call context echoed on responses */
export const INBOUND_CONTEXT_KEY = 'inboundAdapterCallContext';

/**
 * Operations answered by the dispatcher itself, never by the handler
 */
export const ReservedOperations = {
  HEALTH_CHECK: 'checkHealth',
  ADAPTER_INFO: 'getAdapterInfo',
} as const;

/** Backend message type used for the primary error text of a business error */
export const ERROR_MESSAGE_TYPE = 'ERROR';


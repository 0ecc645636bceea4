export { SessionClient } from './sessionClient.js';
export { StreamClient } from './streamClient.js';
export { fetchHealth, fetchVersion } from './proxyInfo.js';
export {
  DEFAULT_EVENT_NAME,
  decodeEvents,
  takeUntilEvent,
} from './eventStream.js';
export {
  buildFetchRequest,
  buildInitializeRequest,
  buildInitializedNotification,
  buildToolCallRequest,
  buildToolsListRequest,
  FETCH_TOOL_NAME,
  MCP_SESSION_ID_HEADER,
  PROTOCOL_VERSION,
  RequestIds,
} from './protocol.js';

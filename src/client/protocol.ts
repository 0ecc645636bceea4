import type {
  ClientInfo,
  JsonRpcNotification,
  JsonRpcRequest,
} from '../types/index.js';

export const JSON_RPC_VERSION = '2.0';
export const PROTOCOL_VERSION = '2024-11-05';
export const MCP_SESSION_ID_HEADER = 'Mcp-Session-Id';
export const FETCH_TOOL_NAME = 'fetch';

/**
 * Each convenience call uses its own fixed id so a response can be matched
 * to the call that produced it
 */
export const RequestIds = {
  INITIALIZE: 1,
  TOOLS_LIST: 2,
  TOOLS_CALL: 3,
} as const;

export function buildInitializeRequest(
  clientInfo: ClientInfo,
  protocolVersion: string = PROTOCOL_VERSION
): JsonRpcRequest {
  return {
    jsonrpc: JSON_RPC_VERSION,
    method: 'initialize',
    params: {
      protocolVersion,
      capabilities: {},
      clientInfo: { name: clientInfo.name, version: clientInfo.version },
    },
    id: RequestIds.INITIALIZE,
  };
}

export function buildInitializedNotification(): JsonRpcNotification {
  return {
    jsonrpc: JSON_RPC_VERSION,
    method: 'notifications/initialized',
  };
}

export function buildToolsListRequest(): JsonRpcRequest {
  return {
    jsonrpc: JSON_RPC_VERSION,
    method: 'tools/list',
    params: {},
    id: RequestIds.TOOLS_LIST,
  };
}

export function buildToolCallRequest(
  name: string,
  args: Record<string, unknown>
): JsonRpcRequest {
  return {
    jsonrpc: JSON_RPC_VERSION,
    method: 'tools/call',
    params: {
      name,
      arguments: args,
    },
    id: RequestIds.TOOLS_CALL,
  };
}

export function buildFetchRequest(url: string): JsonRpcRequest {
  return buildToolCallRequest(FETCH_TOOL_NAME, { url });
}

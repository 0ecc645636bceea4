import { z } from 'zod';

/**
 * Shared JSON-RPC 2.0 type definitions for MCP communication
 */

export type JsonRpcId = string | number;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  method: string;
  params?: Record<string, unknown>;
  id: JsonRpcId;
}

export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcResponse {
  jsonrpc: '2.0';
  /** Any JSON value, null included */
  result?: unknown;
  error?: JsonRpcErrorObject | undefined;
  id: JsonRpcId | null;
}

export type JsonRpcMessage =
  | JsonRpcRequest
  | JsonRpcNotification
  | JsonRpcResponse;

export const JsonRpcResponseSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    id: z.union([z.string(), z.number(), z.null()]),
    result: z.unknown().optional(),
    error: z
      .object({
        code: z.number(),
        message: z.string(),
        data: z.unknown().optional(),
      })
      .optional(),
  })
  .refine(
    (message) => 'result' in message || message.error !== undefined,
    'JSON-RPC response must carry either result or error'
  );

/**
 * Narrow an arbitrary decoded value to a JSON-RPC response
 */
export function parseJsonRpcResponse(value: unknown): JsonRpcResponse | null {
  const parsed = JsonRpcResponseSchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }
  const { jsonrpc, id, result, error } = parsed.data;
  return { jsonrpc, id, result, error };
}

import { TransportError } from '../types/index.js';
import type {
  ClientAuth,
  JsonRpcId,
  JsonRpcResponse,
} from '../types/index.js';
import { parseJsonRpcResponse } from '../types/jsonrpc.js';
import { createChildLogger } from '../utils/logger.js';
import { decodeEvents } from './eventStream.js';

const logger = createChildLogger('http-transport');

const MAX_ERROR_BODY_LENGTH = 500;

export const SESSION_COOKIE_NAME = 'session_id';

/**
 * Join a base URL and an absolute path without doubling or dropping slashes
 */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export function buildHeaders(
  auth: ClientAuth | undefined,
  extra: Record<string, string> = {}
): Record<string, string> {
  const headers: Record<string, string> = { ...extra };

  if (auth?.bearerToken) {
    headers.Authorization = `Bearer ${auth.bearerToken}`;
  }
  if (auth?.sessionCookie) {
    headers.Cookie = `${SESSION_COOKIE_NAME}=${auth.sessionCookie}`;
  }

  return headers;
}

function truncate(text: string): string {
  return text.length > MAX_ERROR_BODY_LENGTH
    ? `${text.substring(0, MAX_ERROR_BODY_LENGTH)}...`
    : text;
}

/**
 * fetch() wrapper: network failures and non-2xx statuses become TransportError
 */
export async function send(url: string, init: RequestInit): Promise<Response> {
  const method = init.method ?? 'GET';
  logger.debug(`${method} ${url}`);

  let response: Response;
  try {
    response = await fetch(url, init);
  } catch (error) {
    throw new TransportError(
      error instanceof Error ? error.message : String(error),
      { method, url, cause: error }
    );
  }

  logger.debug(`${method} ${url} -> ${response.status}`, {
    contentType: response.headers.get('content-type'),
  });

  if (!response.ok) {
    const body = truncate(await response.text().catch(() => ''));
    throw new TransportError(
      `HTTP ${response.status}: ${response.statusText}`,
      { method, url, status: response.status, body }
    );
  }

  return response;
}

/**
 * Read and decode a JSON body from a successful response
 */
export async function readJson(
  response: Response,
  method: string,
  url: string
): Promise<unknown> {
  const text = await response.text();
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw new TransportError('Response body is not valid JSON', {
      method,
      url,
      status: response.status,
      body: truncate(text),
    });
  }
}

/**
 * Extract the JSON-RPC response correlated with `id` from a reply that is
 * either plain JSON or a text/event-stream carrying it
 */
export async function readJsonRpcResponse(
  response: Response,
  id: JsonRpcId,
  method: string,
  url: string
): Promise<JsonRpcResponse> {
  const contentType = response.headers.get('content-type') ?? '';

  if (contentType.includes('text/event-stream') && response.body) {
    for await (const event of decodeEvents(response.body)) {
      const candidate = parseJsonRpcResponse(event.json);
      if (candidate && candidate.id === id) {
        return candidate;
      }
    }
    throw new TransportError(
      `Event stream ended without a response for request ${id}`,
      { method, url, status: response.status }
    );
  }

  const body = await readJson(response, method, url);
  const message = parseJsonRpcResponse(body);
  if (!message) {
    throw new TransportError('Response body is not a JSON-RPC 2.0 response', {
      method,
      url,
      status: response.status,
      body: truncate(JSON.stringify(body)),
    });
  }
  return message;
}

/**
 * Drain a body that carries nothing of interest so the connection can be reused
 */
export async function discardBody(response: Response): Promise<void> {
  if (response.body) {
    await response.body.cancel();
  }
}

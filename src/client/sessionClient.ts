import { z } from 'zod';
import { NoSessionError, SessionCreationError } from '../types/index.js';
import type {
  ClientInfo,
  ClientOptions,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
  SessionId,
} from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { getPackageInfo } from '../utils/packageInfo.js';
import {
  buildHeaders,
  discardBody,
  joinUrl,
  readJsonRpcResponse,
  send,
} from './httpTransport.js';
import {
  buildFetchRequest,
  buildInitializeRequest,
  buildToolCallRequest,
  buildToolsListRequest,
  PROTOCOL_VERSION,
} from './protocol.js';

const logger = createChildLogger('session-client');

const SessionResponseSchema = z.object({
  sessionId: z.string().min(1),
});

/**
 * JSON-RPC client for the proxy's `/sse/sessions` surface.
 *
 * The session id lives on the instance, so independent clients never share
 * a session.
 */
export class SessionClient {
  private readonly baseUrl: string;
  private readonly options: ClientOptions;
  private readonly clientInfo: ClientInfo;
  private sessionId: SessionId | null = null;

  constructor(options: ClientOptions) {
    this.options = options;
    this.baseUrl = options.baseUrl;
    this.clientInfo = options.clientInfo ?? getPackageInfo();
  }

  getSessionId(): SessionId | null {
    return this.sessionId;
  }

  async createSession(): Promise<SessionId> {
    const url = joinUrl(this.baseUrl, '/sse/sessions');
    const response = await send(url, {
      method: 'POST',
      headers: buildHeaders(this.options.auth),
    });

    // A login page in place of JSON still means no session was created
    const text = await response.text();
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new SessionCreationError('server response is not JSON');
    }

    const parsed = SessionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SessionCreationError(
        'server response did not include a sessionId'
      );
    }

    this.sessionId = parsed.data.sessionId;
    logger.info(`Created session: ${this.sessionId}`);
    return this.sessionId;
  }

  async sendMessage(message: JsonRpcRequest): Promise<JsonRpcResponse> {
    const url = this.messagesUrl();
    logger.debug(`Sending ${message.method}`, { id: message.id });

    const response = await send(url, {
      method: 'POST',
      headers: buildHeaders(this.options.auth, {
        'Content-Type': 'application/json',
      }),
      body: JSON.stringify(message),
    });

    return readJsonRpcResponse(response, message.id, 'POST', url);
  }

  async notify(notification: JsonRpcNotification): Promise<void> {
    const url = this.messagesUrl();
    logger.debug(`Sending notification ${notification.method}`);

    const response = await send(url, {
      method: 'POST',
      headers: buildHeaders(this.options.auth, {
        'Content-Type': 'application/json',
      }),
      body: JSON.stringify(notification),
    });
    await discardBody(response);
  }

  async initialize(): Promise<JsonRpcResponse> {
    return this.sendMessage(
      buildInitializeRequest(
        this.clientInfo,
        this.options.protocolVersion ?? PROTOCOL_VERSION
      )
    );
  }

  async listTools(): Promise<JsonRpcResponse> {
    return this.sendMessage(buildToolsListRequest());
  }

  async callTool(
    name: string,
    args: Record<string, unknown>
  ): Promise<JsonRpcResponse> {
    return this.sendMessage(buildToolCallRequest(name, args));
  }

  async fetchUrl(url: string): Promise<JsonRpcResponse> {
    return this.sendMessage(buildFetchRequest(url));
  }

  private messagesUrl(): string {
    if (!this.sessionId) {
      throw new NoSessionError();
    }
    return joinUrl(
      this.baseUrl,
      `/sse/sessions/${encodeURIComponent(this.sessionId)}/messages`
    );
  }
}

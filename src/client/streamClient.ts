import {
  MissingSessionIdError,
  NoSessionError,
  TransportError,
} from '../types/index.js';
import type {
  ClientInfo,
  ClientOptions,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
  SessionId,
  SseEvent,
} from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { getPackageInfo } from '../utils/packageInfo.js';
import {
  DEFAULT_EVENT_NAME,
  decodeEvents,
  takeUntilEvent,
} from './eventStream.js';
import {
  buildHeaders,
  discardBody,
  joinUrl,
  readJsonRpcResponse,
  send,
} from './httpTransport.js';
import {
  buildInitializeRequest,
  buildToolCallRequest,
  buildToolsListRequest,
  MCP_SESSION_ID_HEADER,
  PROTOCOL_VERSION,
} from './protocol.js';

const logger = createChildLogger('stream-client');

const MCP_PATH = '/mcp/';

/**
 * Client for the proxy's `/mcp/` surface: a long-lived SSE stream that hands
 * out the session id, plus JSON-RPC POSTs tagged with `Mcp-Session-Id`
 */
export class StreamClient {
  private readonly url: string;
  private readonly options: ClientOptions;
  private readonly clientInfo: ClientInfo;
  private sessionId: SessionId | null;
  private body: ReadableStream<Uint8Array> | null = null;
  private abortController: AbortController | null = null;
  private consumed = false;

  constructor(options: ClientOptions & { sessionId?: SessionId | undefined }) {
    this.options = options;
    this.url = joinUrl(options.baseUrl, MCP_PATH);
    this.clientInfo = options.clientInfo ?? getPackageInfo();
    this.sessionId = options.sessionId ?? null;
  }

  getSessionId(): SessionId | null {
    return this.sessionId;
  }

  isStreamOpen(): boolean {
    return this.body !== null;
  }

  /**
   * Open the event stream and learn the session id. A stream this client
   * already holds is closed first.
   */
  async openStream(): Promise<SessionId> {
    await this.close();

    const headers = buildHeaders(this.options.auth, {
      Accept: 'text/event-stream',
    });
    if (this.sessionId) {
      headers[MCP_SESSION_ID_HEADER] = this.sessionId;
    }

    const controller = new AbortController();
    const response = await send(this.url, {
      method: 'GET',
      headers,
      signal: controller.signal,
    });

    const sessionId = response.headers.get(MCP_SESSION_ID_HEADER) ?? this.sessionId;
    if (!sessionId) {
      await discardBody(response);
      throw new MissingSessionIdError(this.url);
    }

    if (!response.body) {
      throw new TransportError('Stream response has no body', {
        method: 'GET',
        url: this.url,
        status: response.status,
      });
    }

    this.sessionId = sessionId;
    this.body = response.body;
    this.abortController = controller;
    this.consumed = false;
    logger.info(`Got session ID: ${sessionId}`);
    return sessionId;
  }

  /**
   * Events from the open stream, in arrival order. Can be iterated once;
   * breaking out of the loop or calling close() ends the connection.
   */
  async *consumeEvents(): AsyncGenerator<SseEvent, void, undefined> {
    const body = this.body;
    const controller = this.abortController;
    if (!body || !controller || this.consumed) {
      throw new TransportError('No open event stream to consume', {
        method: 'GET',
        url: this.url,
      });
    }
    this.consumed = true;

    try {
      for await (const event of decodeEvents(body)) {
        logger.debug(`Event: ${event.event}`, { id: event.id });
        yield event;
      }
    } catch (error) {
      if (!controller.signal.aborted) {
        throw error;
      }
      logger.debug('Event stream closed by client');
    } finally {
      if (this.body === body) {
        this.body = null;
        this.abortController = null;
      }
    }
  }

  /**
   * Events up to and including the first one named `eventName`
   */
  consumeUntil(
    eventName: string = DEFAULT_EVENT_NAME
  ): AsyncGenerator<SseEvent, void, undefined> {
    return takeUntilEvent(this.consumeEvents(), eventName);
  }

  async sendMessage(message: JsonRpcRequest): Promise<JsonRpcResponse> {
    logger.debug(`Sending ${message.method}`, { id: message.id });

    const response = await send(this.url, {
      method: 'POST',
      headers: this.postHeaders(),
      body: JSON.stringify(message),
    });

    return readJsonRpcResponse(response, message.id, 'POST', this.url);
  }

  async notify(notification: JsonRpcNotification): Promise<void> {
    logger.debug(`Sending notification ${notification.method}`);

    const response = await send(this.url, {
      method: 'POST',
      headers: this.postHeaders(),
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

  /**
   * End the open stream, whether or not a consumer is reading it
   */
  async close(): Promise<void> {
    const body = this.body;
    const controller = this.abortController;
    this.body = null;
    this.abortController = null;

    // A consumer holds the reader lock; aborting the request ends its read
    if (body && !this.consumed) {
      await body.cancel();
    }
    controller?.abort();
  }

  private postHeaders(): Record<string, string> {
    if (!this.sessionId) {
      throw new NoSessionError();
    }
    return buildHeaders(this.options.auth, {
      'Content-Type': 'application/json',
      Accept: 'application/json, text/event-stream',
      [MCP_SESSION_ID_HEADER]: this.sessionId,
    });
  }
}

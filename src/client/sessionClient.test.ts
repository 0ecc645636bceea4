import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ProxyStub } from '../../test/proxyStub.js';
import {
  NoSessionError,
  SessionCreationError,
  TransportError,
} from '../types/index.js';
import { buildInitializedNotification } from './protocol.js';
import { SessionClient } from './sessionClient.js';

const clientInfo = { name: 'test-client', version: '0.0.1' };

describe('SessionClient', () => {
  let stub: ProxyStub;
  let baseUrl: string;

  beforeEach(async () => {
    stub = new ProxyStub();
    baseUrl = await stub.start();
  });

  afterEach(async () => {
    await stub.stop();
  });

  describe('createSession', () => {
    it('stores the session id returned by the proxy', async () => {
      const client = new SessionClient({ baseUrl, clientInfo });

      expect(client.getSessionId()).toBeNull();
      await expect(client.createSession()).resolves.toBe('stub-session-1');
      expect(client.getSessionId()).toBe('stub-session-1');
      expect(stub.requestsTo('POST', '/sse/sessions')).toHaveLength(1);
    });

    it('sends the configured credentials', async () => {
      const client = new SessionClient({
        baseUrl,
        clientInfo,
        auth: { bearerToken: 'test-token', sessionCookie: 'test-cookie' },
      });
      await client.createSession();

      const [request] = stub.requestsTo('POST', '/sse/sessions');
      expect(request?.headers.authorization).toBe('Bearer test-token');
      expect(request?.headers.cookie).toBe('session_id=test-cookie');
    });

    it('fails when the response has no session id', async () => {
      stub.sessionResponse = { status: 'ok' };
      const client = new SessionClient({ baseUrl, clientInfo });

      await expect(client.createSession()).rejects.toThrow(
        new SessionCreationError('server response did not include a sessionId')
      );
      expect(client.getSessionId()).toBeNull();
    });

    it('fails when the proxy answers with a login page', async () => {
      stub.sessionResponse = '<html><body>Sign in</body></html>';
      const client = new SessionClient({ baseUrl, clientInfo });

      const error = await client.createSession().catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(SessionCreationError);
      expect(error).toMatchObject({
        code: 'SESSION_CREATION_FAILED',
        message: 'Failed to create session: server response is not JSON',
      });
      expect(client.getSessionId()).toBeNull();
    });

    it('fails when the session id is empty', async () => {
      stub.sessionResponse = { sessionId: '' };
      const client = new SessionClient({ baseUrl, clientInfo });

      await expect(client.createSession()).rejects.toBeInstanceOf(
        SessionCreationError
      );
    });

    it('maps an HTTP failure to a TransportError with status and body', async () => {
      stub.failures.set('/sse/sessions', 401);
      const client = new SessionClient({ baseUrl, clientInfo });

      const error = await client.createSession().catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({
        message: `POST ${baseUrl}/sse/sessions failed: HTTP 401: Unauthorized`,
        status: 401,
        body: 'stub failure',
      });
    });

    it('maps a refused connection to a TransportError without status', async () => {
      await stub.stop();
      const client = new SessionClient({ baseUrl, clientInfo });

      const error = await client.createSession().catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ method: 'POST', status: undefined });
    });

    it('keeps sessions separate between client instances', async () => {
      const first = new SessionClient({ baseUrl, clientInfo });
      await first.createSession();
      stub.sessionId = 'stub-session-2';
      const second = new SessionClient({ baseUrl, clientInfo });
      await second.createSession();

      expect(first.getSessionId()).toBe('stub-session-1');
      expect(second.getSessionId()).toBe('stub-session-2');
    });
  });

  describe('messages', () => {
    it('refuses to send before a session exists', async () => {
      const client = new SessionClient({ baseUrl, clientInfo });

      await expect(client.initialize()).rejects.toBeInstanceOf(NoSessionError);
      await expect(
        client.notify(buildInitializedNotification())
      ).rejects.toBeInstanceOf(NoSessionError);
      expect(stub.requests).toHaveLength(0);
    });

    it('posts initialize to the session messages endpoint', async () => {
      const client = new SessionClient({ baseUrl, clientInfo });
      await client.createSession();

      const response = await client.initialize();

      expect(response.id).toBe(1);
      expect(response.result).toMatchObject({
        serverInfo: { name: 'stub-proxy', version: '1.0.0' },
      });
      const [request] = stub.requestsTo(
        'POST',
        '/sse/sessions/stub-session-1/messages'
      );
      expect(request?.headers['content-type']).toBe('application/json');
      expect(request?.body).toEqual({
        jsonrpc: '2.0',
        method: 'initialize',
        params: {
          protocolVersion: '2024-11-05',
          capabilities: {},
          clientInfo: { name: 'test-client', version: '0.0.1' },
        },
        id: 1,
      });
    });

    it('lists tools', async () => {
      const client = new SessionClient({ baseUrl, clientInfo });
      await client.createSession();

      const response = await client.listTools();

      expect(response.result).toEqual({
        tools: [{ name: 'fetch', description: 'Fetch a URL' }, { name: 'echo' }],
      });
    });

    it('calls the fetch tool with the URL', async () => {
      const client = new SessionClient({ baseUrl, clientInfo });
      await client.createSession();

      const response = await client.fetchUrl('https://example.com/page');

      expect(response.result).toEqual({
        content: [{ type: 'text', text: 'stub page' }],
      });
      const requests = stub.requestsTo(
        'POST',
        '/sse/sessions/stub-session-1/messages'
      );
      expect(requests.at(-1)?.body).toEqual({
        jsonrpc: '2.0',
        method: 'tools/call',
        params: { name: 'fetch', arguments: { url: 'https://example.com/page' } },
        id: 3,
      });
    });

    it('returns a JSON-RPC error response without throwing', async () => {
      const client = new SessionClient({ baseUrl, clientInfo });
      await client.createSession();

      const response = await client.sendMessage({
        jsonrpc: '2.0',
        method: 'resources/list',
        id: 5,
      });

      expect(response.id).toBe(5);
      expect(response.error).toEqual({ code: -32601, message: 'Method not found' });
    });

    it('sends a notification and ignores the empty reply', async () => {
      const client = new SessionClient({ baseUrl, clientInfo });
      await client.createSession();

      await expect(
        client.notify(buildInitializedNotification())
      ).resolves.toBeUndefined();
      expect(stub.requests.at(-1)?.body).toEqual({
        jsonrpc: '2.0',
        method: 'notifications/initialized',
      });
    });

    it('surfaces an unknown session as a 404 TransportError', async () => {
      const client = new SessionClient({ baseUrl, clientInfo });
      await client.createSession();
      stub.sessionId = 'someone-else';

      await expect(client.listTools()).rejects.toMatchObject({
        code: 'TRANSPORT_ERROR',
        status: 404,
      });
    });
  });
});

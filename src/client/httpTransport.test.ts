import { describe, it, expect } from 'vitest';
import { TransportError } from '../types/index.js';
import {
  buildHeaders,
  joinUrl,
  readJson,
  readJsonRpcResponse,
} from './httpTransport.js';

const URL_UNDER_TEST = 'http://proxy.test/mcp/';

function sseResponse(text: string): Response {
  return new Response(text, {
    headers: { 'Content-Type': 'text/event-stream' },
  });
}

describe('joinUrl', () => {
  it('joins without doubling slashes', () => {
    expect(joinUrl('http://proxy.test/', '/mcp/')).toBe('http://proxy.test/mcp/');
  });

  it('adds a missing slash', () => {
    expect(joinUrl('http://proxy.test', 'health')).toBe('http://proxy.test/health');
  });

  it('keeps a path prefix on the base URL', () => {
    expect(joinUrl('http://proxy.test/gateway/', '/sse/sessions')).toBe(
      'http://proxy.test/gateway/sse/sessions'
    );
  });
});

describe('buildHeaders', () => {
  it('returns only the extra headers without credentials', () => {
    expect(buildHeaders(undefined, { Accept: 'application/json' })).toEqual({
      Accept: 'application/json',
    });
  });

  it('adds a bearer token and the session cookie', () => {
    expect(
      buildHeaders({ bearerToken: 'test-token', sessionCookie: 'test-cookie' })
    ).toEqual({
      Authorization: 'Bearer test-token',
      Cookie: 'session_id=test-cookie',
    });
  });

  it('ignores empty credentials', () => {
    expect(buildHeaders({ bearerToken: '', sessionCookie: '' })).toEqual({});
  });
});

describe('readJson', () => {
  it('rejects a body that is not JSON', async () => {
    const error = await readJson(
      new Response('<html>', { status: 200 }),
      'GET',
      URL_UNDER_TEST
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: `GET ${URL_UNDER_TEST} failed: Response body is not valid JSON`,
      status: 200,
      body: '<html>',
    });
  });
});

describe('readJsonRpcResponse', () => {
  it('reads a plain JSON response', async () => {
    const response = Response.json({ jsonrpc: '2.0', id: 2, result: { tools: [] } });

    await expect(
      readJsonRpcResponse(response, 2, 'POST', URL_UNDER_TEST)
    ).resolves.toEqual({
      jsonrpc: '2.0',
      id: 2,
      result: { tools: [] },
      error: undefined,
    });
  });

  it('reads a JSON-RPC error response', async () => {
    const response = Response.json({
      jsonrpc: '2.0',
      id: 1,
      error: { code: -32601, message: 'Method not found' },
    });

    const message = await readJsonRpcResponse(response, 1, 'POST', URL_UNDER_TEST);
    expect(message.error).toEqual({ code: -32601, message: 'Method not found' });
    expect(message.result).toBeUndefined();
  });

  it('accepts a null result', async () => {
    const message = await readJsonRpcResponse(
      Response.json({ jsonrpc: '2.0', id: 5, result: null }),
      5,
      'POST',
      URL_UNDER_TEST
    );

    expect(message.id).toBe(5);
    expect(message.result).toBeNull();
  });

  it('accepts an array result delivered in an event stream', async () => {
    const response = sseResponse(
      'event: message\ndata: {"jsonrpc":"2.0","id":4,"result":[1,2]}\n\n'
    );

    const message = await readJsonRpcResponse(response, 4, 'POST', URL_UNDER_TEST);
    expect(message.result).toEqual([1, 2]);
  });

  it('rejects a response with neither result nor error', async () => {
    await expect(
      readJsonRpcResponse(
        Response.json({ jsonrpc: '2.0', id: 1 }),
        1,
        'POST',
        URL_UNDER_TEST
      )
    ).rejects.toThrow('Response body is not a JSON-RPC 2.0 response');
  });

  it('rejects JSON that is not a JSON-RPC response', async () => {
    await expect(
      readJsonRpcResponse(Response.json({ ok: true }), 1, 'POST', URL_UNDER_TEST)
    ).rejects.toThrow(
      `POST ${URL_UNDER_TEST} failed: Response body is not a JSON-RPC 2.0 response`
    );
  });

  it('picks the matching response out of an event stream', async () => {
    const response = sseResponse(
      [
        'event: message\ndata: {"jsonrpc":"2.0","method":"notifications/progress"}\n\n',
        'event: message\ndata: {"jsonrpc":"2.0","id":9,"result":{"other":true}}\n\n',
        'event: message\ndata: {"jsonrpc":"2.0","id":1,"result":{"ok":true}}\n\n',
      ].join('')
    );

    const message = await readJsonRpcResponse(response, 1, 'POST', URL_UNDER_TEST);
    expect(message.id).toBe(1);
    expect(message.result).toEqual({ ok: true });
  });

  it('rejects an event stream that ends without the response', async () => {
    const response = sseResponse('data: {"jsonrpc":"2.0","method":"ping"}\n\n');

    await expect(
      readJsonRpcResponse(response, 3, 'POST', URL_UNDER_TEST)
    ).rejects.toThrow(
      `POST ${URL_UNDER_TEST} failed: Event stream ended without a response for request 3`
    );
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ProxyStub } from '../../test/proxyStub.js';
import { TransportError } from '../types/index.js';
import { fetchHealth, fetchVersion } from './proxyInfo.js';

describe('proxy info endpoints', () => {
  let stub: ProxyStub;
  let baseUrl: string;

  beforeEach(async () => {
    stub = new ProxyStub();
    baseUrl = await stub.start();
  });

  afterEach(async () => {
    await stub.stop();
  });

  it('reads the health check', async () => {
    await expect(fetchHealth({ baseUrl })).resolves.toEqual({
      status: 'ok',
      version: '1.2.3',
      uptime: 42,
      backend_status: 'healthy',
    });
  });

  it('reads the build information', async () => {
    await expect(fetchVersion({ baseUrl })).resolves.toEqual({
      version: '1.2.3',
      git_commit: 'abc1234',
      build_date: '2024-01-01T00:00:00Z',
      go_version: 'go1.22.0',
      platform: 'linux/amd64',
    });
  });

  it('sends credentials', async () => {
    await fetchHealth({ baseUrl, auth: { bearerToken: 'test-token' } });

    expect(stub.requestsTo('GET', '/health')[0]?.headers.authorization).toBe(
      'Bearer test-token'
    );
  });

  it('rejects a response with the wrong shape', async () => {
    stub.health = {
      status: 'ok',
      version: '1.2.3',
      uptime: 'long',
      backend_status: 'healthy',
    };

    await expect(fetchHealth({ baseUrl })).rejects.toThrow(
      `GET ${baseUrl}/health failed: Unexpected response shape: uptime: Expected number, received string`
    );
  });

  it('maps an unhealthy proxy to a TransportError', async () => {
    stub.failures.set('/health', 503);

    const error = await fetchHealth({ baseUrl }).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ status: 503, body: 'stub failure' });
  });
});

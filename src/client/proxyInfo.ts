import { z } from 'zod';
import { TransportError } from '../types/index.js';
import type { ClientOptions, HealthStatus, VersionInfo } from '../types/index.js';
import { buildHeaders, joinUrl, readJson, send } from './httpTransport.js';

const HealthStatusSchema = z.object({
  status: z.string(),
  version: z.string(),
  uptime: z.number(),
  backend_status: z.string(),
});

const VersionInfoSchema = z.object({
  version: z.string(),
  git_commit: z.string(),
  build_date: z.string(),
  go_version: z.string(),
  platform: z.string(),
});

async function getValidated<T>(
  options: ClientOptions,
  path: string,
  schema: z.ZodType<T>
): Promise<T> {
  const url = joinUrl(options.baseUrl, path);
  const response = await send(url, {
    method: 'GET',
    headers: buildHeaders(options.auth, { Accept: 'application/json' }),
  });

  const body = await readJson(response, 'GET', url);
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new TransportError(
      `Unexpected response shape: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
      { method: 'GET', url, status: response.status }
    );
  }
  return parsed.data;
}

/**
 * Proxy liveness, from `GET /health`
 */
export async function fetchHealth(
  options: ClientOptions
): Promise<HealthStatus> {
  return getValidated(options, '/health', HealthStatusSchema);
}

/**
 * Proxy build information, from `GET /version`
 */
export async function fetchVersion(
  options: ClientOptions
): Promise<VersionInfo> {
  return getValidated(options, '/version', VersionInfoSchema);
}

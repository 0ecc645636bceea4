import { ValidationError } from '../types/index.js';
import type { ClientOptions } from '../types/index.js';
import { DEFAULT_BASE_URL, getEnvClientConfig } from '../utils/env.js';
import { loadProfile } from '../utils/profile.js';
import type { ClientProfile } from '../utils/profile.js';

/**
 * Connection flags shared by every command
 */
export interface ConnectionFlags {
  baseUrl?: string | undefined;
  token?: string | undefined;
  cookie?: string | undefined;
  config?: string | undefined;
}

function validateBaseUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ValidationError(`Invalid base URL: ${value}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ValidationError(
      `Base URL must use http or https, got ${url.protocol}`
    );
  }
  return value;
}

/**
 * Resolve client options: flags win over the environment, which wins over
 * the profile file, which wins over defaults
 */
export async function resolveClientOptions(
  flags: ConnectionFlags
): Promise<ClientOptions> {
  const env = getEnvClientConfig();

  const profilePath = flags.config ?? env.configFile;
  const profile: ClientProfile = profilePath
    ? await loadProfile(profilePath)
    : {};

  const baseUrl = validateBaseUrl(
    flags.baseUrl ?? env.baseUrl ?? profile.baseUrl ?? DEFAULT_BASE_URL
  );

  return {
    baseUrl,
    auth: {
      bearerToken: flags.token ?? env.bearerToken ?? profile.bearerToken,
      sessionCookie: flags.cookie ?? env.sessionCookie ?? profile.sessionCookie,
    },
    clientInfo: profile.clientInfo,
  };
}

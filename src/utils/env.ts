import { z } from 'zod';
import { createChildLogger } from './logger.js';

const logger = createChildLogger('env-validation');

export const DEFAULT_BASE_URL = 'http://localhost:8090';

/**
 * An optional variable whose invalid value is dropped with a warning, so one
 * bad setting does not discard the others
 */
function optionalVar<T extends z.ZodTypeAny>(
  name: string,
  schema: T
): z.ZodCatch<z.ZodOptional<T>> {
  return schema.optional().catch(({ error }) => {
    logger.warn(`Ignoring invalid ${name}`, {
      error: error.issues.map((issue) => issue.message).join('; '),
    });
    return undefined;
  });
}

/**
 * Environment variable schema with validation
 */
const EnvSchema = z.object({
  // Proxy connection
  MCP_PROXY_CLIENT_BASE_URL: optionalVar(
    'MCP_PROXY_CLIENT_BASE_URL',
    z.string().url()
  ),
  MCP_PROXY_CLIENT_TOKEN: optionalVar('MCP_PROXY_CLIENT_TOKEN', z.string().min(1)),
  MCP_PROXY_CLIENT_SESSION_COOKIE: optionalVar(
    'MCP_PROXY_CLIENT_SESSION_COOKIE',
    z.string().min(1)
  ),
  MCP_PROXY_CLIENT_CONFIG: optionalVar(
    'MCP_PROXY_CLIENT_CONFIG',
    z.string().min(1)
  ),

  // Logging
  MCP_PROXY_CLIENT_LOG_LEVEL: optionalVar(
    'MCP_PROXY_CLIENT_LOG_LEVEL',
    z.enum(['error', 'warn', 'info', 'debug'])
  ),
  MCP_PROXY_CLIENT_LOG_TARGET: optionalVar(
    'MCP_PROXY_CLIENT_LOG_TARGET',
    z.enum(['console', 'file', 'both'])
  ),
  MCP_PROXY_CLIENT_LOG_DIR: optionalVar('MCP_PROXY_CLIENT_LOG_DIR', z.string()),

  NODE_ENV: optionalVar(
    'NODE_ENV',
    z.enum(['development', 'test', 'production'])
  ),
});

export type ValidatedEnv = z.infer<typeof EnvSchema>;

let validatedEnv: ValidatedEnv | null = null;

/**
 * Validates and caches environment variables
 */
export function getValidatedEnv(): ValidatedEnv {
  if (validatedEnv === null) {
    const parsed = EnvSchema.safeParse(process.env);
    if (parsed.success) {
      validatedEnv = parsed.data;
      logger.debug('Environment variables validated successfully');
    } else {
      logger.warn('Environment validation failed, using defaults', {
        error: parsed.error.message,
      });
      validatedEnv = {};
    }
  }
  return validatedEnv;
}

/**
 * Drop the cached environment (tests mutate process.env between cases)
 */
export function resetValidatedEnv(): void {
  validatedEnv = null;
}

export interface EnvClientConfig {
  baseUrl: string | undefined;
  bearerToken: string | undefined;
  sessionCookie: string | undefined;
  configFile: string | undefined;
}

/**
 * Connection settings taken from the environment; unset values stay undefined
 * so that profile files and defaults can fill them in
 */
export function getEnvClientConfig(): EnvClientConfig {
  const env = getValidatedEnv();

  return {
    baseUrl: env.MCP_PROXY_CLIENT_BASE_URL,
    bearerToken: env.MCP_PROXY_CLIENT_TOKEN,
    sessionCookie: env.MCP_PROXY_CLIENT_SESSION_COOKIE,
    configFile: env.MCP_PROXY_CLIENT_CONFIG,
  };
}

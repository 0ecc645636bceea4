import { readFile } from 'fs/promises';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ValidationError } from '../types/index.js';
import type { ClientInfo } from '../types/index.js';
import { createChildLogger } from './logger.js';

const logger = createChildLogger('profile');

const ProfileSchema = z
  .object({
    base_url: z.string().url().optional(),
    token: z.string().min(1).optional(),
    session_cookie: z.string().min(1).optional(),
    client_info: z
      .object({
        name: z.string().min(1),
        version: z.string().min(1),
      })
      .optional(),
  })
  .strict();

export interface ClientProfile {
  baseUrl?: string | undefined;
  bearerToken?: string | undefined;
  sessionCookie?: string | undefined;
  clientInfo?: ClientInfo | undefined;
}

/**
 * Parse a YAML connection profile:
 *
 * ```yaml
 * base_url: https://proxy.example.com
 * token: test-token
 * client_info:
 *   name: my-agent
 *   version: 2.0.0
 * ```
 */
export function parseProfile(source: string, origin = 'profile'): ClientProfile {
  let document: unknown;
  try {
    document = yaml.load(source, { schema: yaml.CORE_SCHEMA });
  } catch (error) {
    throw new ValidationError(
      `${origin} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // An empty file is an empty profile
  if (document === undefined || document === null) {
    return {};
  }

  const parsed = ProfileSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`${origin} is invalid: ${issues}`);
  }

  return {
    baseUrl: parsed.data.base_url,
    bearerToken: parsed.data.token,
    sessionCookie: parsed.data.session_cookie,
    clientInfo: parsed.data.client_info,
  };
}

export async function loadProfile(filePath: string): Promise<ClientProfile> {
  let source: string;
  try {
    source = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ValidationError(
      `Cannot read profile ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  logger.debug(`Loaded profile from ${filePath}`);
  return parseProfile(source, filePath);
}

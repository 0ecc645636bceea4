import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import type { ClientInfo } from '../types/index.js';

const PackageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
});

// Cache for package.json data to avoid repeated file reads
let packageJsonCache: z.infer<typeof PackageJsonSchema> | null = null;

/**
 * Client identity advertised during `initialize`, read from package.json.
 * Resolves the same from `src/utils` and `dist/utils`.
 */
export function getPackageInfo(): ClientInfo {
  if (!packageJsonCache) {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = dirname(__filename);
    const packageJsonPath = join(__dirname, '../../package.json');

    try {
      const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
      packageJsonCache = PackageJsonSchema.parse(parsed);
    } catch (error) {
      throw new Error(
        `Failed to read package.json: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  return {
    name: packageJsonCache.name ?? 'mcp-proxy-client',
    version: packageJsonCache.version ?? 'dev',
  };
}

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { config } from './config/index.js';

const PackageJson = z.object({ version: z.string() }).passthrough();

/**
 * package.json sits one level above src/ when running from sources (tsx)
 * and two levels above dist/src/ when running the build.
 */
const PACKAGE_JSON_CANDIDATES = ['../package.json', '../../package.json'];

function readPackageVersion(): string {
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    try {
      const text = readFileSync(fileURLToPath(new URL(candidate, import.meta.url)), 'utf-8');
      const parsed = PackageJson.safeParse(JSON.parse(text));
      if (parsed.success) return parsed.data.version;
    } catch {
      continue;
    }
  }
  return '0.0.0';
}

/**
 * Service version reported by /healthz.
 * SERVICE_VERSION (config.server.version) overrides package.json.
 */
export const SERVICE_VERSION = config.server.version ?? readPackageVersion();

import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { envConfigSchema, fileConfigSchema } from '../schema/config.js';
import type { EnvConfig, FileConfig } from '../schema/config.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.tabrace.yaml` (or JSON) config file.
 * Throws a descriptive error if the file is invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  const raw = await readFile(configPath, 'utf-8');

  const parsed: unknown = configPath.endsWith('.json')
    ? JSON.parse(raw)
    : parseYaml(raw);

  return fileConfigSchema.parse(parsed ?? {});
}

/**
 * Like `loadConfigFile`, but a missing file yields the defaults.
 * Any other read or validation error still throws.
 */
export async function loadOptionalConfigFile(
  configPath: string,
): Promise<FileConfig> {
  try {
    return await loadConfigFile(configPath);
  } catch (err) {
    if (isMissingFile(err)) {
      return fileConfigSchema.parse({});
    }
    throw err;
  }
}

/** Read TABRACE_* variables (populated from `.env` by dotenv). */
export function loadEnvConfig(
  env: NodeJS.ProcessEnv = process.env,
): EnvConfig {
  return envConfigSchema.parse({
    headless: env['TABRACE_HEADLESS'],
    timeout: env['TABRACE_TIMEOUT'],
  });
}

function isMissingFile(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    err.code === 'ENOENT'
  );
}

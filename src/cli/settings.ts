import { ZodError } from 'zod';

import { EXIT_CODES } from '../config/defaults.js';
import { MisuseError, ScopeCancelledError } from '../core/errors.js';
import type { EnvConfig, FileConfig } from '../schema/config.js';

// ── Shared flags ────────────────────────────────────────────

export interface CommonFlags {
  config: string;
  headless?: true;
  headed?: true;
  timeout?: string;
  stealth?: true;
  cookie?: string;
  cookiesIn?: string;
  json?: true;
}

export interface Settings {
  headless: boolean;
  timeoutMs: number;
  pollTickMs: number;
  watchIntervalMs: number;
  stealth: boolean;
  cookie: string | undefined;
  cookiesIn: string | undefined;
  json: boolean;
}

// ── Merge ───────────────────────────────────────────────────

/**
 * Merge settings. CLI flags win over the environment, which wins over
 * the config file (already filled with defaults by its schema).
 */
export function mergeSettings(
  flags: CommonFlags,
  env: EnvConfig,
  file: FileConfig,
): Settings {
  const headless = flags.headed
    ? false
    : flags.headless ?? env.headless ?? file.headless;

  const flagTimeout =
    flags.timeout !== undefined ? Number(flags.timeout) : Number.NaN;
  if (flags.timeout !== undefined && !(flagTimeout > 0)) {
    throw new MisuseError(`--timeout must be a positive number of seconds, got "${flags.timeout}"`);
  }
  const timeoutSec = flags.timeout !== undefined
    ? flagTimeout
    : env.timeout ?? file.timeout;

  return {
    headless,
    timeoutMs: timeoutSec * 1000,
    pollTickMs: file.pollTickMs,
    watchIntervalMs: file.watchIntervalMs,
    stealth: flags.stealth ?? file.stealth,
    cookie: flags.cookie ?? file.cookie,
    cookiesIn: flags.cookiesIn,
    json: flags.json ?? false,
  };
}

/** `--interval` in milliseconds; undefined when the flag is absent. */
export function parseIntervalFlag(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const intervalMs = Number(raw);
  if (!(intervalMs > 0)) {
    throw new MisuseError(`--interval must be a positive number of milliseconds, got "${raw}"`);
  }
  return intervalMs;
}

// ── Exit codes ──────────────────────────────────────────────

export function exitCodeFor(err: unknown): number {
  if (err instanceof ScopeCancelledError) return EXIT_CODES.CANCELLED;
  if (err instanceof MisuseError || err instanceof ZodError) {
    return EXIT_CODES.USAGE;
  }
  return EXIT_CODES.ACTION_FAILED;
}

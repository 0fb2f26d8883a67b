import { z } from 'zod';

import { TIMING } from '../config/defaults.js';

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  headless: z.boolean().optional().default(true),
  timeout: z
    .number()
    .positive()
    .optional()
    .default(TIMING.RUN_TIMEOUT_MS / 1000),
  pollTickMs: z
    .number()
    .int()
    .positive()
    .optional()
    .default(TIMING.POLL_TICK_MS),
  watchIntervalMs: z
    .number()
    .int()
    .positive()
    .optional()
    .default(TIMING.WATCH_INTERVAL_MS),
  stealth: z.boolean().optional().default(false),
  cookie: z.string().optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

// ── Environment ─────────────────────────────────────────────

const booleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const envConfigSchema = z.object({
  headless: booleanFlagSchema.optional(),
  timeout: z.coerce.number().positive().optional(),
});

export type EnvConfig = z.infer<typeof envConfigSchema>;

// ── CLI wait mode ───────────────────────────────────────────

export const navigationWaitModeSchema = z.enum(['load', 'navigated', 'none']);

export type NavigationWaitMode = z.infer<typeof navigationWaitModeSchema>;

import { z } from 'zod';

// ── Cookie ──────────────────────────────────────────────────

export const sameSiteSchema = z.enum(['Strict', 'Lax', 'None']);

/** Cookie as read from a browser context (and written by `--cookies-out`). */
export const cookieSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
  domain: z.string(),
  path: z.string(),
  /** Unix time in seconds; -1 for session cookies. */
  expires: z.number(),
  httpOnly: z.boolean(),
  secure: z.boolean(),
  sameSite: sameSiteSchema,
});

export type Cookie = z.infer<typeof cookieSchema>;

export const cookieListSchema = z.array(cookieSchema);

// ── Parser ──────────────────────────────────────────────────

export function parseCookieJSON(raw: string): Cookie[] {
  const parsed: unknown = JSON.parse(raw);
  return cookieListSchema.parse(parsed);
}

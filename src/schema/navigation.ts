import { z } from 'zod';

// ── History entry ───────────────────────────────────────────

export const navigationEntrySchema = z.object({
  id: z.number().int(),
  url: z.string(),
  userTypedURL: z.string(),
  title: z.string(),
  transitionType: z.string(),
});

export type NavigationEntry = z.infer<typeof navigationEntrySchema>;

export const navigationHistorySchema = z.object({
  currentIndex: z.number().int(),
  entries: z.array(navigationEntrySchema),
});

export type NavigationHistory = z.infer<typeof navigationHistorySchema>;

import { z } from 'zod';

// ── Console entry ────────────────────────────────────────────

export const consoleLevelSchema = z.enum(['error', 'warn', 'info', 'log', 'debug']);

export type ConsoleLevel = z.infer<typeof consoleLevelSchema>;

export const consoleEntrySchema = z.object({
  level: consoleLevelSchema,
  text: z.string(),
  timestamp: z.number().int().nonnegative(),
});

export type ConsoleEntry = z.infer<typeof consoleEntrySchema>;

// ── Cookie ───────────────────────────────────────────────────

export const browserCookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string(),
  path: z.string(),
});

export type BrowserCookie = z.infer<typeof browserCookieSchema>;

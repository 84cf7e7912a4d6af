import { z } from 'zod';

// ── LocatorStrategy ───────────────────────────────────────────

export const locatorKindSchema = z.enum([
  'name',
  'id',
  'css',
  'xpath',
  'text',
  'testid',
  'role',
]);

export type LocatorKind = z.infer<typeof locatorKindSchema>;

export const locatorStrategySchema = z
  .object({
    strategy: locatorKindSchema,
    value: z.string().min(1),
    /** Accessible name, only meaningful for `role`. */
    name: z.string().optional(),
  })
  .readonly();

export type LocatorStrategy = z.infer<typeof locatorStrategySchema>;

// ── ElementLocator ────────────────────────────────────────────

export const elementLocatorSchema = z
  .object({
    description: z.string().min(1),
    strategies: z.array(locatorStrategySchema).nonempty().readonly(),
  })
  .readonly();

export type ElementLocator = z.infer<typeof elementLocatorSchema>;

/**
 * Build an immutable locator for one logical element.
 * Strategies are tried in the order given; earlier entries win.
 */
export function defineLocator(
  description: string,
  ...strategies: [LocatorStrategy, ...LocatorStrategy[]]
): ElementLocator {
  const parsed = elementLocatorSchema.parse({ description, strategies });
  Object.freeze(parsed.strategies);
  return Object.freeze(parsed);
}

// ── Strategy shorthands ───────────────────────────────────────

export const by = {
  name: (value: string): LocatorStrategy => ({ strategy: 'name', value }),
  id: (value: string): LocatorStrategy => ({ strategy: 'id', value }),
  css: (value: string): LocatorStrategy => ({ strategy: 'css', value }),
  xpath: (value: string): LocatorStrategy => ({ strategy: 'xpath', value }),
  text: (value: string): LocatorStrategy => ({ strategy: 'text', value }),
  testId: (value: string): LocatorStrategy => ({ strategy: 'testid', value }),
  role: (value: string, name?: string): LocatorStrategy =>
    name === undefined ? { strategy: 'role', value } : { strategy: 'role', value, name },
} as const;

import type { ElementLocator, LocatorStrategy } from '../schema/index.js';

// ── Resolver ──────────────────────────────────────────────────

/**
 * Maps one LocatorStrategy to a Playwright selector string.
 *
 *   name   → [name="value"]
 *   id     → id=value
 *   css    → css=value
 *   xpath  → xpath=value
 *   text   → text=value   (case-insensitive substring match)
 *   testid → data-testid=value
 *   role   → role=value[name="..."]
 *
 * Ordering and fallback live in ElementResolver, not here.
 */
export function toPlaywrightSelector(locator: LocatorStrategy): string {
  switch (locator.strategy) {
    case 'name':
      return `css=[name=${quote(locator.value)}]`;

    case 'id':
      return `id=${locator.value}`;

    case 'css':
      return `css=${locator.value}`;

    case 'xpath':
      return `xpath=${locator.value}`;

    case 'text':
      return `text=${locator.value}`;

    case 'testid':
      return `data-testid=${locator.value}`;

    case 'role':
      return locator.name
        ? `role=${locator.value}[name=${quote(locator.name)}]`
        : `role=${locator.value}`;
  }
}

function quote(value: string): string {
  return JSON.stringify(value);
}

// ── Description helpers ───────────────────────────────────────

/** Human-readable one-liner describing a strategy for logs and reports. */
export function describeStrategy(locator: LocatorStrategy): string {
  switch (locator.strategy) {
    case 'name':
      return `[name="${locator.value}"]`;
    case 'id':
      return `#${locator.value}`;
    case 'css':
      return locator.value;
    case 'xpath':
      return `xpath=${locator.value}`;
    case 'text':
      return `text~="${locator.value}"`;
    case 'testid':
      return `[data-testid="${locator.value}"]`;
    case 'role':
      return locator.name
        ? `role=${locator.value}[name="${locator.name}"]`
        : `role=${locator.value}`;
  }
}

export function describeLocator(locator: ElementLocator): string {
  return `${locator.description} (${locator.strategies.map(describeStrategy).join(' | ')})`;
}

import type { Page } from 'playwright-core';

import type { ConsoleEntry, ConsoleLevel } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';

// ── Public interface ─────────────────────────────────────────

export interface ConsoleCollector {
  /** Entries gathered since the page was opened, oldest first. */
  entries(): ConsoleEntry[];
}

// ── Factory ──────────────────────────────────────────────────

/**
 * Attach console and page-error listeners to a Playwright page.
 * Call once at page creation; listeners live as long as the session.
 * Only the newest `MAX_CONSOLE_ENTRIES` entries are kept.
 */
export function attachConsoleCapture(page: Page): ConsoleCollector {
  const buffer: ConsoleEntry[] = [];

  function push(level: ConsoleLevel, text: string): void {
    buffer.push({ level, text, timestamp: Date.now() });
    if (buffer.length > LIMITS.MAX_CONSOLE_ENTRIES) {
      buffer.shift();
    }
  }

  page.on('console', (msg) => {
    push(toLevel(msg.type()), msg.text());
  });

  page.on('pageerror', (error) => {
    push('error', `Uncaught ${error.name}: ${error.message}`);
  });

  page.on('requestfailed', (request) => {
    const failure = request.failure();
    if (failure) {
      push('error', `FAILED ${request.method()} ${request.url()} ${failure.errorText}`);
    }
  });

  return {
    entries(): ConsoleEntry[] {
      return [...buffer];
    },
  };
}

function toLevel(type: string): ConsoleLevel {
  switch (type) {
    case 'error':
      return 'error';
    case 'warning':
      return 'warn';
    case 'info':
      return 'info';
    case 'debug':
      return 'debug';
    default:
      return 'log';
  }
}

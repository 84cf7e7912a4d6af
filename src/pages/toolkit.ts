import type { Settings } from '../schema/index.js';
import type { RemoteBrowserSession } from '../browser/session.js';
import { WaitEngine } from '../core/wait.js';
import { ElementResolver } from '../core/resolver.js';
import { InteractionExecutor } from '../core/interactions.js';
import type { StaleRetryPolicy } from '../core/interactions.js';

/**
 * The capability set every page model holds. One toolkit per session;
 * page models never build their own resolver or executor.
 */
export interface PageToolkit {
  readonly session: RemoteBrowserSession;
  readonly settings: Settings;
  readonly wait: WaitEngine;
  readonly resolver: ElementResolver;
  readonly interactions: InteractionExecutor;
}

export function createToolkit(
  session: RemoteBrowserSession,
  settings: Settings,
  retry?: StaleRetryPolicy,
): PageToolkit {
  const wait = new WaitEngine(session, {
    timeout: settings.timeouts.explicitWait,
    pollInterval: settings.timeouts.pollInterval,
  });
  const resolver = new ElementResolver(wait, settings.timeouts.fallbackStrategy);
  const interactions = new InteractionExecutor(resolver, retry);

  return { session, settings, wait, resolver, interactions };
}

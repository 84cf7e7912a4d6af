import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { ArtifactKind, FailureArtifact } from '../schema/index.js';
import type { RemoteBrowserSession } from '../browser/session.js';
import { LIMITS } from '../config/defaults.js';
import { errorMessage } from '../core/errors.js';

// ── Naming ───────────────────────────────────────────────────

/** File-system safe form of a scenario or step name. */
export function sanitizeArtifactName(name: string): string {
  const cleaned = name
    .trim()
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, LIMITS.MAX_ARTIFACT_NAME_CHARS);
  return cleaned || 'unnamed';
}

/**
 * `<kind>_<scenario>_<unix-seconds>.<ext>`, or `<kind>_<scenario>_<step>_...`
 * for evidence tied to one step. Scenarios share step texts, so the
 * scenario name keeps concurrent workers from overwriting each other.
 */
export function artifactFileName(
  kind: ArtifactKind,
  target: ArtifactTarget,
  timestampMs: number,
  ext: string,
): string {
  const parts = [kind, sanitizeArtifactName(target.scenario)];
  if (target.step !== undefined) {
    parts.push(sanitizeArtifactName(target.step));
  }
  parts.push(String(Math.floor(timestampMs / 1000)));
  return `${parts.join('_')}.${ext}`;
}

// ── Sink ─────────────────────────────────────────────────────

export interface ArtifactTarget {
  scenario: string;
  step?: string;
}

/** Where failure evidence goes. Every method needs a live session. */
export interface ArtifactSink {
  screenshot(session: RemoteBrowserSession, target: ArtifactTarget): Promise<FailureArtifact>;
  pageSource(session: RemoteBrowserSession, target: ArtifactTarget): Promise<FailureArtifact>;
  consoleLogs(session: RemoteBrowserSession, target: ArtifactTarget): Promise<FailureArtifact>;
  errorDetails(
    session: RemoteBrowserSession,
    target: ArtifactTarget,
    error: unknown,
  ): Promise<FailureArtifact>;
}

export class FileArtifactSink implements ArtifactSink {
  constructor(
    private readonly reportsDir: string,
    private readonly now: () => number = Date.now,
  ) {}

  async screenshot(session: RemoteBrowserSession, target: ArtifactTarget): Promise<FailureArtifact> {
    return this.produce('failure', target, 'png', (filePath) => session.screenshot(filePath));
  }

  /** Keyed to the step when one is given, otherwise to the scenario. */
  async pageSource(session: RemoteBrowserSession, target: ArtifactTarget): Promise<FailureArtifact> {
    const kind: ArtifactKind = target.step === undefined ? 'page_source' : 'step_failure';
    const html = await session.pageSource();
    return this.produce(kind, target, 'html', (filePath) => writeFile(filePath, html, 'utf-8'));
  }

  async consoleLogs(session: RemoteBrowserSession, target: ArtifactTarget): Promise<FailureArtifact> {
    const entries = await session.consoleLogs();
    const body = entries
      .map((e) => `[${new Date(e.timestamp).toISOString()}] ${e.level.toUpperCase()} ${e.text}`)
      .join('\n');
    return this.produce('console_logs', target, 'log', (filePath) =>
      writeFile(filePath, body ? `${body}\n` : '', 'utf-8'),
    );
  }

  async errorDetails(
    session: RemoteBrowserSession,
    target: ArtifactTarget,
    error: unknown,
  ): Promise<FailureArtifact> {
    const size = await session.windowSize();
    const lines = [
      `Error: ${errorMessage(error)}`,
      `Scenario: ${target.scenario}`,
      `Step: ${target.step ?? '-'}`,
      `URL: ${await session.currentUrl()}`,
      `Title: ${await session.title()}`,
      `Window: ${String(size.width)}x${String(size.height)}`,
      `Timestamp: ${new Date(this.now()).toISOString()}`,
    ];
    return this.produce('error_details', target, 'txt', (filePath) =>
      writeFile(filePath, `${lines.join('\n')}\n`, 'utf-8'),
    );
  }

  private async produce(
    kind: ArtifactKind,
    target: ArtifactTarget,
    ext: string,
    write: (filePath: string) => Promise<void>,
  ): Promise<FailureArtifact> {
    const timestamp = this.now();
    await mkdir(this.reportsDir, { recursive: true });
    const filePath = path.join(
      this.reportsDir,
      artifactFileName(kind, target, timestamp, ext),
    );
    await write(filePath);

    const artifact: FailureArtifact = { kind, scenario: target.scenario, path: filePath, timestamp };
    if (target.step !== undefined) {
      artifact.step = target.step;
    }
    return artifact;
  }
}

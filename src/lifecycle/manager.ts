import { randomUUID } from 'node:crypto';

import type {
  FailureArtifact,
  RunSummary,
  ScenarioResult,
  ScenarioStatus,
  Settings,
  StepResult,
  TestData,
} from '../schema/index.js';
import type { RemoteBrowserSession, SessionFactory } from '../browser/session.js';
import { ScenarioSkipped, errorMessage } from '../core/errors.js';
import type { StaleRetryPolicy } from '../core/interactions.js';
import { createPageModels } from '../pages/index.js';
import type { ScenarioDefinition } from '../scenarios/types.js';
import * as log from '../utils/logger.js';
import { FileArtifactSink } from './artifacts.js';
import type { ArtifactSink, ArtifactTarget } from './artifacts.js';
import { ScenarioContext } from './context.js';
import { TestMetrics } from './metrics.js';

export interface LifecycleOptions {
  settings: Settings;
  testData: TestData;
  sessionFactory: SessionFactory;
  /** Defaults to files under `settings.reporting.reportsDir`. */
  artifacts?: ArtifactSink;
  metrics?: TestMetrics;
  retry?: StaleRetryPolicy;
}

/**
 * Owns session creation and teardown around every scenario.
 *
 * Order at the end of a scenario is fixed: evidence is captured while the
 * session is still live, then the session is closed, then scenario data
 * is dropped. A close failure is logged and never changes the result.
 */
export class ScenarioLifecycleManager {
  readonly metrics: TestMetrics;
  private readonly settings: Settings;
  private readonly testData: TestData;
  private readonly factory: SessionFactory;
  private readonly artifacts: ArtifactSink;
  private readonly retry: StaleRetryPolicy | undefined;

  constructor(options: LifecycleOptions) {
    this.settings = options.settings;
    this.testData = options.testData;
    this.factory = options.sessionFactory;
    this.artifacts = options.artifacts ?? new FileArtifactSink(options.settings.reporting.reportsDir);
    this.metrics = options.metrics ?? new TestMetrics();
    this.retry = options.retry;
  }

  // ── Suite ───────────────────────────────────────────────

  /**
   * Run every scenario and summarise. With more than one worker, scenarios
   * are pulled from a shared queue; each still gets its own session.
   */
  async runSuite(
    scenarios: readonly ScenarioDefinition[],
    workers: number = this.settings.workers,
  ): Promise<RunSummary> {
    const startedAt = new Date();
    const results: ScenarioResult[] = [];
    const queue = scenarios.map((definition, index) => ({ definition, index }));

    const worker = async (): Promise<void> => {
      for (let item = queue.shift(); item; item = queue.shift()) {
        results[item.index] = await this.runScenario(item.definition);
      }
    };

    const slots = Math.max(1, Math.min(workers, scenarios.length));
    await Promise.all(Array.from({ length: slots }, () => worker()));

    const finishedAt = new Date();
    return {
      runId: randomUUID(),
      browser: this.settings.browser.kind,
      baseUrl: this.settings.baseUrl,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      metrics: this.metrics.summary(),
      scenarios: results,
    };
  }

  // ── Scenario ────────────────────────────────────────────

  async runScenario(definition: ScenarioDefinition): Promise<ScenarioResult> {
    log.scenario(definition.name);
    const startedAt = Date.now();

    if (definition.skip !== undefined) {
      log.warn(`Skipped: ${definition.skip}`);
      const steps = skippedSteps(definition, 0);
      return this.finish(definition, startedAt, 'skipped', steps, [], definition.skip);
    }

    let session: RemoteBrowserSession;
    try {
      session = await this.factory.create(this.settings);
    } catch (err) {
      const message = errorMessage(err);
      log.error(`Session could not start: ${message}`);
      return this.finish(definition, startedAt, 'failed', skippedSteps(definition, 0), [], message);
    }

    const ctx = new ScenarioContext(
      definition.name,
      session,
      createPageModels(session, this.settings, this.retry),
      this.settings,
      this.testData,
    );
    const steps: StepResult[] = [];
    const artifacts: FailureArtifact[] = [];
    let status: ScenarioStatus = 'passed';
    let error: string | undefined;

    try {
      const total = definition.steps.length;
      for (const [index, step] of definition.steps.entries()) {
        log.step(index, total, step.text);
        const stepStart = Date.now();
        try {
          await step.run(ctx);
          steps.push({ index, text: step.text, status: 'passed', durationMs: Date.now() - stepStart });
          log.stepResult(index, total, true, step.text);
        } catch (err) {
          const message = errorMessage(err);
          const stepStatus: ScenarioStatus = err instanceof ScenarioSkipped ? 'skipped' : 'failed';
          steps.push({
            index,
            text: step.text,
            status: stepStatus,
            durationMs: Date.now() - stepStart,
            error: message,
          });
          status = stepStatus;
          error = message;

          if (stepStatus === 'failed') {
            log.stepResult(index, total, false, step.text);
            log.error(message);
            const target = { scenario: definition.name, step: step.text };
            artifacts.push(...(await this.captureStepFailure(session, target, err)));
          } else {
            log.warn(`Skipped at step ${String(index + 1)}: ${message}`);
          }
          steps.push(...skippedSteps(definition, index + 1));
          break;
        }
      }
    } finally {
      if (status === 'failed') {
        artifacts.push(...(await this.captureScenarioFailure(session, { scenario: definition.name })));
      }
      await this.closeQuietly(session);
      ctx.clear();
    }

    return this.finish(definition, startedAt, status, steps, artifacts, error);
  }

  // ── Internals ───────────────────────────────────────────

  private async finish(
    definition: ScenarioDefinition,
    startedAt: number,
    status: ScenarioStatus,
    steps: StepResult[],
    artifacts: FailureArtifact[],
    error: string | undefined,
  ): Promise<ScenarioResult> {
    await this.metrics.record(status);

    const icon = status === 'passed' ? '✅' : status === 'failed' ? '❌' : '⏭️';
    log.info(`${icon} ${definition.name}: ${status}`);

    const result: ScenarioResult = {
      name: definition.name,
      tags: [...definition.tags],
      status,
      durationMs: Date.now() - startedAt,
      steps,
      artifacts,
    };
    if (error !== undefined) {
      result.error = error;
    }
    return result;
  }

  private async captureStepFailure(
    session: RemoteBrowserSession,
    target: ArtifactTarget,
    err: unknown,
  ): Promise<FailureArtifact[]> {
    const captured: FailureArtifact[] = [];
    await this.capture(captured, 'step page source', () => this.artifacts.pageSource(session, target));
    await this.capture(captured, 'error details', () => this.artifacts.errorDetails(session, target, err));
    return captured;
  }

  private async captureScenarioFailure(
    session: RemoteBrowserSession,
    target: ArtifactTarget,
  ): Promise<FailureArtifact[]> {
    const { reporting } = this.settings;
    const captured: FailureArtifact[] = [];
    if (reporting.screenshotOnFailure) {
      await this.capture(captured, 'screenshot', () => this.artifacts.screenshot(session, target));
    }
    if (reporting.pageSourceOnFailure) {
      await this.capture(captured, 'page source', () => this.artifacts.pageSource(session, target));
    }
    if (reporting.consoleLogsOnFailure) {
      await this.capture(captured, 'console logs', () => this.artifacts.consoleLogs(session, target));
    }
    return captured;
  }

  /** A failed capture is reported and otherwise ignored. */
  private async capture(
    into: FailureArtifact[],
    label: string,
    produce: () => Promise<FailureArtifact>,
  ): Promise<void> {
    try {
      const artifact = await produce();
      into.push(artifact);
      log.artifact(label, artifact.path);
    } catch (err) {
      log.warn(`Could not save ${label}: ${errorMessage(err)}`);
    }
  }

  private async closeQuietly(session: RemoteBrowserSession): Promise<void> {
    try {
      await session.close();
    } catch (err) {
      log.warn(`Session ${session.id} did not close cleanly: ${errorMessage(err)}`);
    }
  }
}

function skippedSteps(definition: ScenarioDefinition, from: number): StepResult[] {
  return definition.steps.slice(from).map((step, offset): StepResult => ({
    index: from + offset,
    text: step.text,
    status: 'skipped',
    durationMs: 0,
  }));
}

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { FailureArtifact } from '../src/schema/index.js';
import { AssertionFailure, ScenarioSkipped } from '../src/core/errors.js';
import { FileArtifactSink } from '../src/lifecycle/artifacts.js';
import type { ArtifactSink } from '../src/lifecycle/artifacts.js';
import type { ScenarioContext } from '../src/lifecycle/context.js';
import { ScenarioLifecycleManager } from '../src/lifecycle/manager.js';
import type { ScenarioDefinition } from '../src/scenarios/types.js';
import { FakeSessionFactory } from './support/fake-session.js';
import { TEST_DATA, testSettings } from './support/settings.js';

const FIXED_NOW = 1_700_000_000_000;

let reportsDir: string;

beforeEach(async () => {
  reportsDir = await mkdtemp(path.join(tmpdir(), 'authprobe-manager-'));
});

afterEach(async () => {
  await rm(reportsDir, { recursive: true, force: true });
});

function managerWith(factory: FakeSessionFactory, artifacts?: ArtifactSink): ScenarioLifecycleManager {
  return new ScenarioLifecycleManager({
    settings: testSettings(reportsDir),
    testData: TEST_DATA,
    sessionFactory: factory,
    artifacts: artifacts ?? new FileArtifactSink(reportsDir, () => FIXED_NOW),
    retry: { attempts: 3, pause: 1 },
  });
}

const passing = (name: string): ScenarioDefinition => ({
  name,
  tags: ['smoke'],
  steps: [{ text: 'nothing happens', run: async () => {} }],
});

const broken: ScenarioDefinition = {
  name: 'Broken flow',
  tags: ['login'],
  steps: [
    { text: 'I open the page', run: async () => {} },
    {
      text: 'I click the broken button',
      run: async () => {
        throw new AssertionFailure('Button missing', '', 'a button');
      },
    },
    { text: 'I never get here', run: async () => {} },
  ],
};

describe('ScenarioLifecycleManager', () => {
  it('gives every scenario its own session and closes each one', async () => {
    const factory = new FakeSessionFactory();
    const manager = managerWith(factory);

    const summary = await manager.runSuite([passing('first'), passing('second')]);

    expect(factory.created.map((s) => s.id)).toEqual(['fake-1', 'fake-2']);
    expect(factory.created.every((s) => s.closed)).toBe(true);
    expect(summary.scenarios.map((s) => s.status)).toEqual(['passed', 'passed']);
    expect(summary.metrics).toEqual({ total: 2, passed: 2, failed: 0, skipped: 0, passRate: 100 });
    expect(summary.browser).toBe('chrome');
    expect(summary.baseUrl).toBe('https://app.example.com');
  });

  it('clears scenario data once the scenario ends', async () => {
    const seen: { ctx?: ScenarioContext } = {};
    const scenario: ScenarioDefinition = {
      name: 'remembers things',
      tags: [],
      steps: [
        {
          text: 'I remember a value',
          run: async (ctx) => {
            ctx.remember('token', 'abc');
          },
        },
        {
          text: 'a later step can read it back',
          run: async (ctx) => {
            expect(ctx.recall('token')).toBe('abc');
            seen.ctx = ctx;
          },
        },
      ],
    };

    const result = await managerWith(new FakeSessionFactory()).runScenario(scenario);

    expect(result.status).toBe('passed');
    expect(seen.ctx?.keys()).toEqual([]);
    expect(seen.ctx?.recall('token')).toBeUndefined();
  });

  it('marks later steps skipped and captures evidence when a step fails', async () => {
    const factory = new FakeSessionFactory((session) => {
      session.consoleEntries = [{ level: 'error', text: 'Uncaught TypeError', timestamp: FIXED_NOW }];
    });

    const result = await managerWith(factory).runScenario(broken);

    expect(result.status).toBe('failed');
    expect(result.error).toBe('Button missing');
    expect(result.steps.map((s) => s.status)).toEqual(['passed', 'failed', 'skipped']);
    expect(result.steps[1]?.error).toBe('Button missing');
    expect(result.artifacts.map((a) => path.basename(a.path))).toEqual([
      'step_failure_Broken_flow_I_click_the_broken_button_1700000000.html',
      'error_details_Broken_flow_I_click_the_broken_button_1700000000.txt',
      'failure_Broken_flow_1700000000.png',
      'page_source_Broken_flow_1700000000.html',
      'console_logs_Broken_flow_1700000000.log',
    ]);
    expect(factory.created[0]?.closed).toBe(true);

    const details = await readFile(
      path.join(reportsDir, 'error_details_Broken_flow_I_click_the_broken_button_1700000000.txt'),
      'utf-8',
    );
    expect(details).toBe(
      [
        'Error: Button missing',
        'Scenario: Broken flow',
        'Step: I click the broken button',
        'URL: about:blank',
        'Title: Fake page',
        'Window: 1280x720',
        'Timestamp: 2023-11-14T22:13:20.000Z',
        '',
      ].join('\n'),
    );

    const logs = await readFile(path.join(reportsDir, 'console_logs_Broken_flow_1700000000.log'), 'utf-8');
    expect(logs).toBe('[2023-11-14T22:13:20.000Z] ERROR Uncaught TypeError\n');
  });

  it('keeps the result when the session fails to close', async () => {
    const factory = new FakeSessionFactory((session) => {
      session.closeError = new Error('browser already gone');
    });

    const result = await managerWith(factory).runScenario(passing('teardown trouble'));

    expect(result.status).toBe('passed');
    expect(factory.created[0]?.closed).toBe(true);
  });

  it('ignores artifact capture failures', async () => {
    const failing: ArtifactSink = {
      screenshot: (): Promise<FailureArtifact> => Promise.reject(new Error('disk full')),
      pageSource: (): Promise<FailureArtifact> => Promise.reject(new Error('disk full')),
      consoleLogs: (): Promise<FailureArtifact> => Promise.reject(new Error('disk full')),
      errorDetails: (): Promise<FailureArtifact> => Promise.reject(new Error('disk full')),
    };
    const factory = new FakeSessionFactory();

    const result = await managerWith(factory, failing).runScenario(broken);

    expect(result.status).toBe('failed');
    expect(result.artifacts).toEqual([]);
    expect(factory.created[0]?.closed).toBe(true);
  });

  it('fails the scenario when no session can be started', async () => {
    const factory = new FakeSessionFactory();
    factory.failWith = new Error('no browser binary');

    const result = await managerWith(factory).runScenario(broken);

    expect(result.status).toBe('failed');
    expect(result.error).toBe('no browser binary');
    expect(result.steps.map((s) => s.status)).toEqual(['skipped', 'skipped', 'skipped']);
  });

  it('ends a scenario as skipped when a step asks for it', async () => {
    const scenario: ScenarioDefinition = {
      name: 'needs a feature flag',
      tags: [],
      steps: [
        {
          text: 'the feature is enabled',
          run: async () => {
            throw new ScenarioSkipped('feature disabled');
          },
        },
        { text: 'I use the feature', run: async () => {} },
      ],
    };
    const manager = managerWith(new FakeSessionFactory());

    const result = await manager.runScenario(scenario);

    expect(result.status).toBe('skipped');
    expect(result.artifacts).toEqual([]);
    expect(result.steps.map((s) => s.status)).toEqual(['skipped', 'skipped']);
    expect(manager.metrics.summary().skipped).toBe(1);
  });

  it('does not start a session for a scenario marked skip', async () => {
    const factory = new FakeSessionFactory();

    const result = await managerWith(factory).runScenario({ ...passing('later'), skip: 'not ready' });

    expect(result.status).toBe('skipped');
    expect(result.error).toBe('not ready');
    expect(factory.created).toEqual([]);
  });

  it('keeps results in definition order with several workers', async () => {
    const factory = new FakeSessionFactory();
    const scenarios = [passing('a'), broken, passing('c'), passing('d')];

    const summary = await managerWith(factory, {
      screenshot: (): Promise<FailureArtifact> => Promise.reject(new Error('off')),
      pageSource: (): Promise<FailureArtifact> => Promise.reject(new Error('off')),
      consoleLogs: (): Promise<FailureArtifact> => Promise.reject(new Error('off')),
      errorDetails: (): Promise<FailureArtifact> => Promise.reject(new Error('off')),
    }).runSuite(scenarios, 3);

    expect(summary.scenarios.map((s) => s.name)).toEqual(['a', 'Broken flow', 'c', 'd']);
    expect(summary.metrics).toEqual({ total: 4, passed: 3, failed: 1, skipped: 0, passRate: 75 });
    expect(factory.created).toHaveLength(4);
  });
});

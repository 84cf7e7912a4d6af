import { describe, expect, it } from 'vitest';

import { TestMetrics, computePassRate } from '../src/lifecycle/metrics.js';
import { computeExitCode } from '../src/schema/index.js';
import type { ScenarioStatus } from '../src/schema/index.js';

describe('computePassRate', () => {
  it('rounds to two decimals', () => {
    expect(computePassRate(2, 3)).toBe(66.67);
    expect(computePassRate(1, 3)).toBe(33.33);
    expect(computePassRate(3, 3)).toBe(100);
  });

  it('is zero for an empty run', () => {
    expect(computePassRate(0, 0)).toBe(0);
  });
});

describe('TestMetrics', () => {
  it('counts a run where the second of three scenarios fails', async () => {
    const metrics = new TestMetrics();

    await metrics.record('passed');
    await metrics.record('failed');
    await metrics.record('passed');

    expect(metrics.summary()).toEqual({ total: 3, passed: 2, failed: 1, skipped: 0, passRate: 66.67 });
  });

  it('keeps every update from concurrent recorders', async () => {
    const metrics = new TestMetrics();
    const statuses: ScenarioStatus[] = Array.from({ length: 50 }, (_, i) =>
      i % 5 === 0 ? 'skipped' : 'passed',
    );

    await Promise.all(statuses.map((status) => metrics.record(status)));

    expect(metrics.summary()).toEqual({ total: 50, passed: 40, failed: 0, skipped: 10, passRate: 80 });
  });
});

describe('computeExitCode', () => {
  it('fails the run only when a scenario failed', () => {
    expect(computeExitCode({ total: 2, passed: 1, failed: 0, skipped: 1, passRate: 50 })).toBe(0);
    expect(computeExitCode({ total: 2, passed: 1, failed: 1, skipped: 0, passRate: 50 })).toBe(1);
  });
});

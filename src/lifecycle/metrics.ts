import type { MetricsSummary, ScenarioStatus } from '../schema/index.js';

/** Percentage of passed scenarios, two decimals; 0 for an empty run. */
export function computePassRate(passed: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((passed / total) * 10_000) / 100;
}

/**
 * Run-wide scenario counters. `record` is the single write path and is
 * serialised through a promise chain, so concurrent workers each get one
 * critical section per completed scenario.
 */
export class TestMetrics {
  private total = 0;
  private passed = 0;
  private failed = 0;
  private skipped = 0;
  private queue: Promise<void> = Promise.resolve();

  record(status: ScenarioStatus): Promise<void> {
    const update = this.queue.then(() => {
      this.total += 1;
      switch (status) {
        case 'passed':
          this.passed += 1;
          break;
        case 'failed':
          this.failed += 1;
          break;
        case 'skipped':
          this.skipped += 1;
          break;
      }
    });
    this.queue = update;
    return update;
  }

  summary(): MetricsSummary {
    return {
      total: this.total,
      passed: this.passed,
      failed: this.failed,
      skipped: this.skipped,
      passRate: computePassRate(this.passed, this.total),
    };
  }
}

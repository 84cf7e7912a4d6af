import { z } from 'zod';

// ── FailureArtifact ───────────────────────────────────────────

export const artifactKindSchema = z.enum([
  'failure',
  'page_source',
  'step_failure',
  'console_logs',
  'error_details',
]);

export type ArtifactKind = z.infer<typeof artifactKindSchema>;

export const failureArtifactSchema = z.object({
  kind: artifactKindSchema,
  scenario: z.string().min(1),
  step: z.string().optional(),
  path: z.string().min(1),
  timestamp: z.number().int().nonnegative(),
});

export type FailureArtifact = z.infer<typeof failureArtifactSchema>;

// ── StepResult ────────────────────────────────────────────────

export const stepStatusSchema = z.enum(['passed', 'failed', 'skipped']);

export type StepStatus = z.infer<typeof stepStatusSchema>;

export const stepResultSchema = z.object({
  index: z.number().int().nonnegative(),
  text: z.string().min(1),
  status: stepStatusSchema,
  durationMs: z.number().int().nonnegative(),
  error: z.string().optional(),
});

export type StepResult = z.infer<typeof stepResultSchema>;

// ── ScenarioResult ────────────────────────────────────────────

export const scenarioStatusSchema = z.enum(['passed', 'failed', 'skipped']);

export type ScenarioStatus = z.infer<typeof scenarioStatusSchema>;

export const scenarioResultSchema = z.object({
  name: z.string().min(1),
  tags: z.array(z.string()),
  status: scenarioStatusSchema,
  durationMs: z.number().int().nonnegative(),
  steps: z.array(stepResultSchema),
  error: z.string().optional(),
  artifacts: z.array(failureArtifactSchema),
});

export type ScenarioResult = z.infer<typeof scenarioResultSchema>;

// ── Metrics ───────────────────────────────────────────────────

export const metricsSummarySchema = z.object({
  total: z.number().int().nonnegative(),
  passed: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  skipped: z.number().int().nonnegative(),
  /** Percentage rounded to two decimals; 0 for an empty run. */
  passRate: z.number().min(0).max(100),
});

export type MetricsSummary = z.infer<typeof metricsSummarySchema>;

// ── RunSummary ────────────────────────────────────────────────

export const runSummarySchema = z.object({
  runId: z.string().min(1),
  browser: z.string().min(1),
  baseUrl: z.string().url(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  metrics: metricsSummarySchema,
  scenarios: z.array(scenarioResultSchema),
});

export type RunSummary = z.infer<typeof runSummarySchema>;

// ── Deterministic exit code ───────────────────────────────────
// Any failed scenario fails the run; skipped scenarios do not.

export function computeExitCode(metrics: MetricsSummary): number {
  return metrics.failed > 0 ? 1 : 0;
}

// ── Validators ────────────────────────────────────────────────

export function parseRunSummary(data: unknown): RunSummary {
  return runSummarySchema.parse(data);
}

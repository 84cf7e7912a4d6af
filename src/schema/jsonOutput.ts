import { z } from 'zod';

import { scenarioStatusSchema, stepStatusSchema } from './results.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Scenario output ─────────────────────────────────────────

export const jsonOutputStepSchema = z.object({
  index: z.number().int().nonnegative(),
  text: z.string().min(1),
  status: stepStatusSchema,
  error: z.string(),
});

export type JsonOutputStep = z.infer<typeof jsonOutputStepSchema>;

export const jsonOutputScenarioSchema = z.object({
  name: z.string().min(1),
  tags: z.array(z.string()),
  status: scenarioStatusSchema,
  durationMs: z.number().int().nonnegative(),
  error: z.string(),
  artifacts: z.array(z.string()),
  steps: z.array(jsonOutputStepSchema),
});

export type JsonOutputScenario = z.infer<typeof jsonOutputScenarioSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  runId: z.string().min(1),
  browser: z.string(),
  baseUrl: z.string(),
  durationMs: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
  passed: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  skipped: z.number().int().nonnegative(),
  passRate: z.number().min(0).max(100),
  scenarios: z.array(jsonOutputScenarioSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { RunSummary, ScenarioResult, ScenarioStatus, StepResult } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput, JsonOutputScenario, JsonOutputStep } from '../schema/jsonOutput.js';

export type { JsonOutput, JsonOutputScenario, JsonOutputStep };

export const SUMMARY_FILE = 'test_summary.txt';
export const MARKDOWN_FILE = 'report.md';
export const JSON_FILE = 'summary.json';

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(run: RunSummary, exitCode: number): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    runId: run.runId,
    browser: run.browser,
    baseUrl: run.baseUrl,
    durationMs: run.durationMs,
    exitCode,
    total: run.metrics.total,
    passed: run.metrics.passed,
    failed: run.metrics.failed,
    skipped: run.metrics.skipped,
    passRate: run.metrics.passRate,
    scenarios: run.scenarios.map(scenarioToJSON),
  };
}

function scenarioToJSON(scenario: ScenarioResult): JsonOutputScenario {
  return {
    name: scenario.name,
    tags: scenario.tags,
    status: scenario.status,
    durationMs: scenario.durationMs,
    error: scenario.error ?? '',
    artifacts: scenario.artifacts.map((a) => a.path),
    steps: scenario.steps.map(stepToJSON),
  };
}

function stepToJSON(step: StepResult): JsonOutputStep {
  return {
    index: step.index,
    text: step.text,
    status: step.status,
    error: step.error ?? '',
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}

// ── Plain-text summary ───────────────────────────────────────

export function formatSummaryText(run: RunSummary): string {
  const { metrics } = run;
  const lines = [
    'Test Execution Summary',
    '=====================',
    `Execution Date: ${run.startedAt}`,
    `Duration: ${formatDuration(run.durationMs)}`,
    `Browser: ${run.browser}`,
    `Base URL: ${run.baseUrl}`,
    `Total Tests: ${String(metrics.total)}`,
    `Passed: ${String(metrics.passed)}`,
    `Failed: ${String(metrics.failed)}`,
    `Skipped: ${String(metrics.skipped)}`,
  ];
  if (metrics.total > 0) {
    lines.push(`Pass Rate: ${metrics.passRate.toFixed(2)}%`);
  }
  return `${lines.join('\n')}\n`;
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(run: RunSummary): string {
  const lines: string[] = [];
  const { metrics } = run;

  lines.push(`# Authentication Test Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Base URL** | ${run.baseUrl} |`);
  lines.push(`| **Browser** | ${run.browser} |`);
  lines.push(`| **Run ID** | \`${run.runId}\` |`);
  lines.push(`| **Started** | ${run.startedAt} |`);
  lines.push(`| **Finished** | ${run.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(run.durationMs)} |`);
  lines.push(
    `| **Result** | ${String(metrics.passed)} passed, ${String(metrics.failed)} failed, ${String(metrics.skipped)} skipped (${metrics.passRate.toFixed(2)}%) |`,
  );
  lines.push('');

  lines.push(`## Scenarios`);
  lines.push('');
  lines.push(`| Scenario | Tags | Status | Duration | Error |`);
  lines.push(`|----------|------|--------|----------|-------|`);
  for (const s of run.scenarios) {
    lines.push(
      `| ${escapeMarkdownCell(s.name)} | ${s.tags.join(', ')} | ${statusIcon(s.status)} | ${formatDuration(s.durationMs)} | ${escapeMarkdownCell(s.error ?? '')} |`,
    );
  }
  lines.push('');

  const failed = run.scenarios.filter((s) => s.status === 'failed');
  if (failed.length > 0) {
    lines.push(`## Failures`);
    lines.push('');

    for (const s of failed) {
      lines.push(`### ${s.name}`);
      lines.push('');
      for (const step of s.steps) {
        const suffix = step.error ? `: ${step.error}` : '';
        lines.push(`${String(step.index + 1)}. ${statusIcon(step.status)} ${step.text}${suffix}`);
      }
      lines.push('');

      if (s.artifacts.length > 0) {
        lines.push(`**Artifacts:**`);
        lines.push('');
        for (const a of s.artifacts) {
          lines.push(`- ${a.kind}: \`${a.path}\``);
        }
        lines.push('');
      }
    }
  }

  return lines.join('\n');
}

// ── Writing ──────────────────────────────────────────────────

/** Write the text summary, markdown report and JSON into `dir`; returns the paths. */
export async function writeReports(run: RunSummary, exitCode: number, dir: string): Promise<string[]> {
  await mkdir(dir, { recursive: true });

  const files: [string, string][] = [
    [SUMMARY_FILE, formatSummaryText(run)],
    [MARKDOWN_FILE, generateMarkdown(run)],
    [JSON_FILE, `${serializeJSON(generateJSON(run, exitCode))}\n`],
  ];

  const written: string[] = [];
  for (const [name, body] of files) {
    const filePath = path.join(dir, name);
    await writeFile(filePath, body, 'utf-8');
    written.push(filePath);
  }
  return written;
}

// ── Helpers ──────────────────────────────────────────────────

function statusIcon(status: ScenarioStatus): string {
  switch (status) {
    case 'passed':
      return '[PASS]';
    case 'failed':
      return '[FAIL]';
    case 'skipped':
      return '[SKIP]';
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}

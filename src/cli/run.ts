import path from 'node:path';

import type { Command } from 'commander';
import { z } from 'zod';

import { browserKindSchema, computeExitCode } from '../schema/index.js';
import type { RunSummary, Settings, TestData } from '../schema/index.js';
import { playwrightSessionFactory } from '../browser/runner.js';
import { DEFAULT_CONFIG_PATH, DEFAULT_TEST_DATA_PATH } from '../config/defaults.js';
import { loadConfigFile, loadTestData, resolveSettings } from '../config/loader.js';
import { errorMessage } from '../core/errors.js';
import { ScenarioLifecycleManager } from '../lifecycle/manager.js';
import { generateJSON, serializeJSON, formatSummaryText, writeReports } from '../report/reporter.js';
import { buildAuthScenarios, selectScenarios } from '../scenarios/index.js';
import { configureLogger } from '../utils/logger.js';
import * as log from '../utils/logger.js';

// ── Option shapes ────────────────────────────────────────────

export interface RunOptions {
  config: string;
  data: string;
  tag: string[];
  scenario: string[];
  browser?: string;
  headless?: true;
  workers?: string;
  reportPath?: string;
  json?: true;
  verbose?: true;
}

interface ListOptions {
  data: string;
  tag: string[];
}

const workersSchema = z.coerce.number().int().positive();

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

// ── Settings overrides ───────────────────────────────────────

/** CLI flags win over the config file and environment. */
export function applyRunOptions(settings: Settings, opts: RunOptions): Settings {
  return {
    ...settings,
    browser: {
      ...settings.browser,
      kind: opts.browser !== undefined ? browserKindSchema.parse(opts.browser.toLowerCase()) : settings.browser.kind,
      headless: opts.headless ?? settings.browser.headless,
    },
    reporting: {
      ...settings.reporting,
      reportsDir: opts.reportPath !== undefined ? path.resolve(opts.reportPath) : settings.reporting.reportsDir,
    },
    workers: opts.workers !== undefined ? workersSchema.parse(opts.workers) : settings.workers,
    verbose: opts.verbose ?? settings.verbose,
  };
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(summary: RunSummary): void {
  log.section('Run summary');
  process.stderr.write(formatSummaryText(summary));
  process.stderr.write(`Run ID: ${summary.runId}\n\n`);
}

// ── Command registration ─────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the authentication scenarios against the configured site')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--data <path>', 'Path to test data file', DEFAULT_TEST_DATA_PATH)
    .option('--tag <tag>', 'Only scenarios with this tag (repeatable)', collect, [])
    .option('--scenario <name>', 'Only scenarios whose name contains this (repeatable)', collect, [])
    .option('--browser <kind>', 'chrome, edge, firefox or safari')
    .option('--headless', 'Run browser headless')
    .option('--workers <n>', 'Scenarios to run at once')
    .option('--report-path <dir>', 'Directory for reports and failure artifacts')
    .option('--json', 'Output JSON to stdout')
    .option('--verbose', 'Log resolution details')
    .action(async (opts: RunOptions) => {
      let settings: Settings;
      let testData: TestData;
      try {
        settings = applyRunOptions(resolveSettings(await loadConfigFile(opts.config)), opts);
        testData = await loadTestData(opts.data);
      } catch (err) {
        process.stderr.write(`Config error: ${errorMessage(err)}\n`);
        process.exitCode = 4;
        return;
      }

      configureLogger({ verbose: settings.verbose });

      const scenarios = selectScenarios(buildAuthScenarios(testData), {
        tags: opts.tag,
        names: opts.scenario,
      });
      if (scenarios.length === 0) {
        process.stderr.write('No scenarios match the given --tag/--scenario filters\n');
        process.exitCode = 4;
        return;
      }

      log.section(
        `${String(scenarios.length)} scenario(s) on ${settings.browser.kind} against ${settings.baseUrl}`,
      );

      try {
        const manager = new ScenarioLifecycleManager({
          settings,
          testData,
          sessionFactory: playwrightSessionFactory,
        });
        const summary = await manager.runSuite(scenarios);
        const exitCode = computeExitCode(summary.metrics);

        printSummary(summary);

        try {
          const written = await writeReports(summary, exitCode, settings.reporting.reportsDir);
          for (const file of written) log.artifact('report', file);
        } catch (err) {
          log.warn(`Could not write reports: ${errorMessage(err)}`);
        }

        if (opts.json) {
          process.stdout.write(serializeJSON(generateJSON(summary, exitCode)) + '\n');
        }

        process.exitCode = exitCode;
      } catch (err) {
        process.stderr.write(`Error: ${errorMessage(err)}\n`);
        process.exitCode = 4;
      }
    });
}

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List the available scenarios and their tags')
    .option('--data <path>', 'Path to test data file', DEFAULT_TEST_DATA_PATH)
    .option('--tag <tag>', 'Only scenarios with this tag (repeatable)', collect, [])
    .action(async (opts: ListOptions) => {
      try {
        const testData = await loadTestData(opts.data);
        const scenarios = selectScenarios(buildAuthScenarios(testData), { tags: opts.tag });
        for (const scenario of scenarios) {
          process.stdout.write(`${scenario.name}  [${scenario.tags.join(', ')}]\n`);
        }
      } catch (err) {
        process.stderr.write(`Config error: ${errorMessage(err)}\n`);
        process.exitCode = 4;
      }
    });
}

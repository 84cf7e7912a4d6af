import path from 'node:path';

import { Command } from 'commander';
import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { applyRunOptions, registerListCommand, registerRunCommand } from '../src/cli/run.js';
import type { RunOptions } from '../src/cli/run.js';
import { testSettings } from './support/settings.js';

const BASE: RunOptions = { config: 'config/authprobe.yaml', data: 'config/test-data.yaml', tag: [], scenario: [] };

describe('applyRunOptions', () => {
  it('leaves settings alone when no flags are given', () => {
    expect(applyRunOptions(testSettings(), BASE)).toEqual(testSettings());
  });

  it('lets flags override the resolved settings', () => {
    const settings = applyRunOptions(testSettings(), {
      ...BASE,
      browser: 'Firefox',
      headless: true,
      workers: '4',
      reportPath: 'out',
      verbose: true,
    });

    expect(settings.browser.kind).toBe('firefox');
    expect(settings.browser.headless).toBe(true);
    expect(settings.workers).toBe(4);
    expect(settings.reporting.reportsDir).toBe(path.resolve('out'));
    expect(settings.verbose).toBe(true);
  });

  it('rejects an unusable worker count', () => {
    expect(() => applyRunOptions(testSettings(), { ...BASE, workers: '0' })).toThrow(ZodError);
  });
});

describe('command registration', () => {
  it('collects repeated --tag flags', () => {
    const program = new Command();
    program.exitOverride();
    registerRunCommand(program);
    registerListCommand(program);

    const run = program.commands.find((c) => c.name() === 'run');
    expect(run).toBeDefined();
    run?.parseOptions(['--tag', 'smoke', '--tag', 'login', '--scenario', 'logout', '--headless']);

    expect(run?.opts()).toEqual({
      config: 'config/authprobe.yaml',
      data: 'config/test-data.yaml',
      tag: ['smoke', 'login'],
      scenario: ['logout'],
      headless: true,
    });
    expect(program.commands.map((c) => c.name())).toEqual(['run', 'list']);
  });
});

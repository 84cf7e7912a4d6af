#!/usr/bin/env node

/**
 * authprobe CLI entry point.
 * Thin wrapper: all logic lives in the lifecycle and page layers.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerListCommand, registerRunCommand } from './run.js';

const program = new Command();

program
  .name('authprobe')
  .description(
    'Browser-driven end-to-end checks for login, logout, registration and password-reset flows.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerListCommand(program);

await program.parseAsync();

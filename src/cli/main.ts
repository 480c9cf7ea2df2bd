#!/usr/bin/env node

/**
 * webpilot CLI entry point.
 * Thin wrapper — all logic delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerRunCommand, registerPlanCommand } from './run.js';
import { registerInteractiveCommand } from './interactive.js';

const program = new Command();

program
  .name('webpilot')
  .description(
    'Natural language browser automation. Plan steps from plain instructions, execute them with Playwright.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerPlanCommand(program);
registerInteractiveCommand(program);

await program.parseAsync();

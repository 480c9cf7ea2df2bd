import { createInterface } from 'node:readline/promises';

import type { Command } from 'commander';

import { runAutomation } from '../core/index.js';
import { checkSetup } from '../config/index.js';
import { modelClient, printSummary, printTraceIfQuiet, reportCliError, resolveSettings } from './run.js';
import type { SharedOptions } from './run.js';

const EXIT_WORDS = new Set(['quit', 'exit', 'q']);

const HELP_TEXT = `Examples:
  Go to YouTube and search for lofi beats
  Open google.com and search for weather
  Find wireless headphones on Amazon
Type quit, exit or q to leave.
`;

// ── Interactive command ──────────────────────────────────────

export function registerInteractiveCommand(program: Command): void {
  program
    .command('interactive')
    .description('Type instructions one at a time; each runs in a fresh browser session')
    .option('--headless', 'Run browser headless')
    .option('--no-model', 'Skip the language model and use the pattern planner')
    .option('--config <path>', 'Path to config file')
    .option('--timeout <seconds>', 'Total run timeout in seconds, per instruction')
    .option('--screenshot-dir <dir>', 'Directory for screenshots')
    .action(async (opts: SharedOptions) => {
      try {
        const settings = await resolveSettings(opts);
        checkSetup(settings.llm, { requireModel: opts.model, requireBrowser: true });
        const client = modelClient(settings, opts.model);

        const rl = createInterface({ input: process.stdin, output: process.stderr });
        const closed = new AbortController();
        rl.on('close', () => {
          closed.abort();
        });

        process.stderr.write('🤖 webpilot interactive mode. Type "help" for examples.\n');

        try {
          for (;;) {
            const instruction = await ask(rl, '\n🤖 What would you like me to do? ', closed.signal);
            if (instruction === undefined || EXIT_WORDS.has(instruction.toLowerCase())) break;
            if (instruction.length === 0) continue;
            if (instruction.toLowerCase() === 'help') {
              process.stderr.write(HELP_TEXT);
              continue;
            }

            const startUrl = await ask(rl, '🌐 Starting URL (optional, press Enter to skip): ', closed.signal);
            if (startUrl === undefined) break;

            const report = await runAutomation(instruction, startUrl || undefined, {
              config: settings.automation,
              client,
              totalTimeoutMs: settings.totalTimeoutMs,
            });
            printTraceIfQuiet(report, false);
            printSummary(report);
          }
        } finally {
          rl.close();
        }

        process.stderr.write('👋 Goodbye!\n');
      } catch (err) {
        process.exitCode = reportCliError(err);
      }
    });
}

/** One trimmed answer, or undefined once input has closed. */
async function ask(
  rl: ReturnType<typeof createInterface>,
  prompt: string,
  signal: AbortSignal,
): Promise<string | undefined> {
  if (signal.aborted) return undefined;
  try {
    return (await rl.question(prompt, { signal })).trim();
  } catch (err) {
    if (signal.aborted) return undefined;
    throw err;
  }
}

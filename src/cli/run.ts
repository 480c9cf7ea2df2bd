import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';
import { ZodError } from 'zod';

import type { AutomationConfigInput, PlanStep, RunReport } from '../schema/index.js';
import { describeStep, isRunSuccessful } from '../schema/index.js';
import { createLLMClient, loadLLMConfig } from '../llm/index.js';
import type { LLMClient, LLMConfig } from '../llm/index.js';
import { runAutomation, planAutomation } from '../core/index.js';
import {
  EXIT_CODES,
  PlanningError,
  SessionError,
  SetupError,
  describeError,
} from '../core/errors.js';
import {
  exitCodeFor,
  formatTrace,
  generateJSON,
  generateMarkdown,
  serializeJSON,
} from '../report/reporter.js';
import { DEFAULT_CONFIG_PATH, TIMEOUTS, checkSetup, loadOptionalConfigFile } from '../config/index.js';
import * as log from '../utils/logger.js';

// ── Settings ─────────────────────────────────────────────────

export interface SharedOptions {
  config?: string;
  model: boolean;
  headless?: true;
  timeout?: string;
  screenshotDir?: string;
}

export interface Settings {
  automation: AutomationConfigInput;
  llm: LLMConfig;
  totalTimeoutMs: number;
}

/** Merge defaults, the config file and CLI flags (highest wins). */
export async function resolveSettings(opts: SharedOptions): Promise<Settings> {
  const fileConfig = await loadOptionalConfigFile(
    opts.config ?? DEFAULT_CONFIG_PATH,
    opts.config !== undefined,
  );
  const { provider, model, timeout, ...automation } = fileConfig;

  // Config provider/model override env
  const llm = loadLLMConfig({
    ...process.env,
    ...(provider ? { LLM_PROVIDER: provider } : {}),
    ...(model ? { WEBPILOT_MODEL: model } : {}),
  });

  const timeoutSec =
    opts.timeout !== undefined
      ? parseSeconds(opts.timeout)
      : timeout ?? TIMEOUTS.TOTAL_RUN_TIMEOUT / 1000;

  return {
    automation: {
      ...automation,
      ...(opts.headless ? { headless: true } : {}),
      ...(opts.screenshotDir !== undefined ? { screenshotDir: opts.screenshotDir } : {}),
    },
    llm,
    totalTimeoutMs: timeoutSec * 1000,
  };
}

function parseSeconds(raw: string): number {
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new SetupError([`--timeout must be a positive number of seconds, got "${raw}"`]);
  }
  return seconds;
}

export function modelClient(settings: Settings, useModel: boolean): LLMClient | undefined {
  return useModel ? createLLMClient(settings.llm) : undefined;
}

// ── Error reporting ──────────────────────────────────────────

/** Print a command-level failure and return its exit code. */
export function reportCliError(err: unknown): number {
  if (err instanceof SetupError) {
    process.stderr.write('Setup issues found:\n');
    for (const issue of err.issues) {
      process.stderr.write(`  - ${issue}\n`);
    }
    return err.exitCode;
  }
  if (err instanceof ZodError) {
    process.stderr.write(`Config error: ${err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}\n`);
    return EXIT_CODES.SETUP;
  }
  if (err instanceof PlanningError || err instanceof SessionError) {
    process.stderr.write(`Error: ${err.message}\n`);
    return err.exitCode;
  }
  process.stderr.write(`Error: ${describeError(err)}\n`);
  return EXIT_CODES.SETUP;
}

// ── Stderr summary ───────────────────────────────────────────

export function printSummary(report: RunReport): void {
  const succeeded = report.steps.filter((s) => s.success && !s.skipped).length;
  const skipped = report.steps.filter((s) => s.skipped).length;
  const failed = report.steps.filter((s) => !s.success).length;
  const notStarted = report.plan.length - report.steps.length;

  process.stderr.write(`\n--- webpilot Result ---\n`);
  process.stderr.write(`Instruction: ${report.instruction}\n`);
  if (report.startUrl) {
    process.stderr.write(`Start URL:   ${report.startUrl}\n`);
  }
  process.stderr.write(`Result:      ${isRunSuccessful(report) ? 'SUCCESS' : 'FAILED'} (${report.finalState})\n`);
  process.stderr.write(`Planned by:  ${report.plannedBy}\n`);
  process.stderr.write(
    `Steps:       ${String(succeeded)} succeeded, ${String(skipped)} skipped, ${String(failed)} failed` +
      (notStarted > 0 ? `, ${String(notStarted)} not started` : '') +
      '\n',
  );
  if (report.error) {
    process.stderr.write(`Error:       ${report.error.message}\n`);
  }
  process.stderr.write(`Time:        ${(report.durationMs / 1000).toFixed(1)}s\n`);
  process.stderr.write(`Run ID:      ${report.runId}\n\n`);
}

function printPlan(steps: readonly PlanStep[]): void {
  steps.forEach((step, i) => {
    const detail = [
      'target' in step && step.target ? `target=${step.target}` : '',
      'value' in step && step.value ? `value=${step.value}` : '',
      step.optional ? 'optional' : '',
    ]
      .filter((part) => part.length > 0)
      .join(' ');
    process.stdout.write(
      `${String(i + 1)}. ${describeStep(step)}${detail ? `  (${detail})` : ''}\n`,
    );
  });
}

/**
 * With the logger silenced and no JSON requested, the trace would
 * otherwise never reach the user; print it to stdout.
 */
export function printTraceIfQuiet(report: RunReport, json: boolean): void {
  if (json || !log.isQuiet()) return;
  process.stdout.write(formatTrace(report) + '\n');
}

// ── Run command ──────────────────────────────────────────────

interface RunCommandOptions extends SharedOptions {
  url?: string;
  json?: true;
  report?: string;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Plan and execute a natural language instruction in a browser')
    .argument('<instruction>', 'What to do, in plain language')
    .option('--url <url>', 'Starting URL')
    .option('--headless', 'Run browser headless')
    .option('--no-model', 'Skip the language model and use the pattern planner')
    .option('--config <path>', 'Path to config file')
    .option('--timeout <seconds>', 'Total run timeout in seconds')
    .option('--screenshot-dir <dir>', 'Directory for screenshots')
    .option('--report <file>', 'Write a markdown report')
    .option('--json', 'Output JSON to stdout')
    .action(async (instruction: string, opts: RunCommandOptions) => {
      try {
        const settings = await resolveSettings(opts);
        checkSetup(settings.llm, { requireModel: opts.model, requireBrowser: true });

        const report = await runAutomation(instruction, opts.url, {
          config: settings.automation,
          client: modelClient(settings, opts.model),
          totalTimeoutMs: settings.totalTimeoutMs,
        });
        const exitCode = exitCodeFor(report);

        if (opts.report !== undefined) {
          await writeFile(path.resolve(opts.report), generateMarkdown(report), 'utf-8');
        }

        if (opts.json) {
          process.stdout.write(serializeJSON(generateJSON(report, exitCode)) + '\n');
        }

        printTraceIfQuiet(report, opts.json === true);
        printSummary(report);
        process.exitCode = exitCode;
      } catch (err) {
        process.exitCode = reportCliError(err);
      }
    });
}

// ── Plan command ─────────────────────────────────────────────

interface PlanCommandOptions {
  url?: string;
  model: boolean;
  config?: string;
  json?: true;
}

export function registerPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('Print the plan for an instruction without opening a browser')
    .argument('<instruction>', 'What to do, in plain language')
    .option('--url <url>', 'Starting URL')
    .option('--no-model', 'Skip the language model and use the pattern planner')
    .option('--config <path>', 'Path to config file')
    .option('--json', 'Output the plan as JSON')
    .action(async (instruction: string, opts: PlanCommandOptions) => {
      try {
        const settings = await resolveSettings(opts);
        checkSetup(settings.llm, { requireModel: opts.model, requireBrowser: false });

        const { steps, source } = await planAutomation(instruction, opts.url, {
          client: modelClient(settings, opts.model),
        });

        if (opts.json) {
          process.stdout.write(JSON.stringify({ source, steps }, null, 2) + '\n');
        } else {
          printPlan(steps);
        }
        process.exitCode = EXIT_CODES.SUCCESS;
      } catch (err) {
        process.exitCode = reportCliError(err);
      }
    });
}

import type { RunReport, StepOutcome } from '../schema/index.js';
import { JSON_OUTPUT_VERSION, isRunSuccessful } from '../schema/index.js';
import type { JsonOutput, JsonOutputStep } from '../schema/index.js';
import { EXIT_CODES } from '../core/errors.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputStep };

// ── Exit code ────────────────────────────────────────────────

/** Map a finished run to the shell exit code. */
export function exitCodeFor(report: RunReport): number {
  if (report.error) return EXIT_CODES.SESSION;
  if (report.plannedBy === 'none') return EXIT_CODES.PLANNING;
  return isRunSuccessful(report) ? EXIT_CODES.SUCCESS : EXIT_CODES.STEP_FAILURES;
}

// ── Trace ────────────────────────────────────────────────────

export function formatTrace(report: RunReport): string {
  return report.trace.join('\n');
}

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(
  report: RunReport,
  exitCode: number = exitCodeFor(report),
): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    runId: report.runId,
    instruction: report.instruction,
    ...(report.startUrl ? { startUrl: report.startUrl } : {}),
    success: isRunSuccessful(report),
    plannedBy: report.plannedBy,
    finalState: report.finalState,
    durationMs: report.durationMs,
    exitCode,
    ...(report.error ? { error: report.error.message } : {}),
    steps: report.steps.map(stepToJSON),
    obstaclesDismissed: report.obstacles.flatMap((o) => o.dismissed),
    challenges: [...new Set(report.obstacles.flatMap((o) => o.challenges))],
    trace: report.trace,
  };
}

function stepToJSON(outcome: StepOutcome): JsonOutputStep {
  return {
    index: outcome.index,
    action: outcome.step.action,
    description: outcome.step.description,
    result: outcomeResult(outcome),
    message: outcome.message,
    ...(outcome.extracted !== undefined ? { extracted: outcome.extracted } : {}),
  };
}

function outcomeResult(outcome: StepOutcome): JsonOutputStep['result'] {
  if (outcome.skipped) return 'skipped';
  return outcome.success ? 'success' : 'failed';
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
  const entries: Array<[string, unknown]> = Object.entries(value);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries);
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(report: RunReport): string {
  const lines: string[] = [];

  // Header + metadata
  lines.push(`# webpilot Run Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Instruction** | ${escapeMarkdownCell(report.instruction)} |`);
  if (report.startUrl) {
    lines.push(`| **Start URL** | ${report.startUrl} |`);
  }
  lines.push(`| **Run ID** | \`${report.runId}\` |`);
  lines.push(`| **Planned by** | ${report.plannedBy} |`);
  lines.push(`| **Started** | ${report.startedAt} |`);
  lines.push(`| **Finished** | ${report.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(report.durationMs)} |`);
  lines.push(`| **Result** | **${isRunSuccessful(report) ? 'SUCCESS' : 'FAILED'}** (${report.finalState}) |`);
  if (report.error) {
    lines.push(`| **Error** | ${escapeMarkdownCell(report.error.message)} |`);
  }
  lines.push('');

  // Step summary table
  lines.push(`## Steps`);
  lines.push('');
  lines.push(`| # | Action | Description | Result | Message |`);
  lines.push(`|---|--------|-------------|--------|---------|`);

  for (const outcome of report.steps) {
    lines.push(
      `| ${String(outcome.index + 1)} | ${outcome.step.action} | ${escapeMarkdownCell(outcome.step.description)} | ${resultIcon(outcome)} | ${escapeMarkdownCell(outcome.message)} |`,
    );
  }

  const notStarted = report.plan.length - report.steps.length;
  if (notStarted > 0) {
    lines.push('');
    lines.push(`_${String(notStarted)} planned steps were not started._`);
  }
  lines.push('');

  // Extracted text
  const extracted = report.steps.filter((o) => o.extracted !== undefined);
  if (extracted.length > 0) {
    lines.push(`## Extracted Text`);
    lines.push('');
    for (const outcome of extracted) {
      lines.push(`### Step ${String(outcome.index + 1)}: ${outcome.step.description}`);
      lines.push('');
      lines.push('```');
      lines.push(outcome.extracted ?? '');
      lines.push('```');
      lines.push('');
    }
  }

  // Obstacles
  const challenges = [...new Set(report.obstacles.flatMap((o) => o.challenges))];
  const dismissed = report.obstacles.flatMap((o) => o.dismissed);
  if (dismissed.length > 0 || challenges.length > 0) {
    lines.push(`## Obstacles`);
    lines.push('');
    for (const name of dismissed) {
      lines.push(`- Dismissed: ${name}`);
    }
    for (const provider of challenges) {
      lines.push(`- Challenge: ${provider}`);
    }
    lines.push('');
  }

  // Trace
  lines.push(`## Trace`);
  lines.push('');
  lines.push('```');
  lines.push(formatTrace(report));
  lines.push('```');

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function resultIcon(outcome: StepOutcome): string {
  switch (outcomeResult(outcome)) {
    case 'success':
      return '[OK]';
    case 'skipped':
      return '[SKIP]';
    case 'failed':
      return '[FAIL]';
  }
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}

import { z } from 'zod';

import type { SessionError } from '../core/errors.js';
import { planStepSchema } from './step.js';
import type { PlanStep } from './step.js';

// ── StepResult ────────────────────────────────────────────────
// What the executor hands back for one step. `skipped` marks an
// optional step that exhausted every strategy.

export interface StepResult {
  success: boolean;
  skipped: boolean;
  message: string;
  extracted?: string;
}

// ── StepOutcome ───────────────────────────────────────────────

export const stepOutcomeSchema = z.object({
  index: z.number().int().nonnegative(),
  step: planStepSchema,
  success: z.boolean(),
  skipped: z.boolean(),
  message: z.string(),
  extracted: z.string().optional(),
});

export type StepOutcome = z.infer<typeof stepOutcomeSchema>;

// ── ObstacleReport ────────────────────────────────────────────

export const obstacleReportSchema = z.object({
  dismissed: z.array(z.string()),
  challenges: z.array(z.string()),
  entries: z.array(z.string()),
});

export type ObstacleReport = z.infer<typeof obstacleReportSchema>;

// ── Session state ─────────────────────────────────────────────

export const sessionStateSchema = z.enum([
  'idle',
  'browser_starting',
  'planning',
  'executing',
  'draining',
  'closed',
  'failed',
]);

export type SessionState = z.infer<typeof sessionStateSchema>;

export const planSourceSchema = z.enum(['model', 'pattern', 'none']);

export type PlanSource = z.infer<typeof planSourceSchema>;

// ── RunReport ─────────────────────────────────────────────────

export interface RunReport {
  runId: string;
  instruction: string;
  startUrl?: string | undefined;
  plannedBy: PlanSource;
  plan: PlanStep[];
  finalState: SessionState;
  trace: string[];
  steps: StepOutcome[];
  obstacles: ObstacleReport[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  error?: SessionError | undefined;
}

// ── Deterministic run verdict ─────────────────────────────────

/**
 * A run succeeded when it closed normally, every planned step was
 * started and no mandatory step failed.
 */
export function isRunSuccessful(report: RunReport): boolean {
  if (report.finalState !== 'closed' || report.error) return false;
  if (report.plannedBy === 'none') return false;
  if (report.steps.length < report.plan.length) return false;
  return report.steps.every((outcome) => outcome.success);
}

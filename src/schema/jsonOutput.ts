import { z } from 'zod';

import { actionKindSchema } from './step.js';
import { planSourceSchema, sessionStateSchema } from './report.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Step output ─────────────────────────────────────────────

export const jsonOutputStepSchema = z.object({
  index: z.number().int().nonnegative(),
  action: actionKindSchema,
  description: z.string(),
  result: z.enum(['success', 'skipped', 'failed']),
  message: z.string(),
  extracted: z.string().optional(),
});

export type JsonOutputStep = z.infer<typeof jsonOutputStepSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  runId: z.string().min(1),
  instruction: z.string(),
  startUrl: z.string().optional(),
  success: z.boolean(),
  plannedBy: planSourceSchema,
  finalState: sessionStateSchema,
  durationMs: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  error: z.string().optional(),
  steps: z.array(jsonOutputStepSchema),
  obstaclesDismissed: z.array(z.string()),
  challenges: z.array(z.string()),
  trace: z.array(z.string()),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;

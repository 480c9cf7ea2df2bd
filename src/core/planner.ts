import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { LLMClient } from '../llm/index.js';
import type { PlanSource, PlanStep } from '../schema/index.js';
import { actionKindSchema, normalizeModelStep, planSchema } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { PlanningError, describeError } from './errors.js';
import { buildPatternPlan } from './patternPlanner.js';

// ── Public types ─────────────────────────────────────────────

export interface PlannerOptions {
  /** Model collaborator. Without one the pattern planner is used directly. */
  client?: LLMClient | undefined;
}

export interface PlanResult {
  steps: PlanStep[];
  source: Exclude<PlanSource, 'none'>;
}

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

// ── Main entry ───────────────────────────────────────────────

/**
 * Turn an instruction into an ordered plan. The model is asked first;
 * anything unusable from it falls through to the pattern planner.
 */
export async function planAutomation(
  instruction: string,
  startUrl?: string,
  options: PlannerOptions = {},
): Promise<PlanResult> {
  if (options.client) {
    const modelPlan = await planWithModel(options.client, instruction, startUrl);
    if (modelPlan.ok) {
      logPlannedSteps(modelPlan.steps, 'model');
      return { steps: modelPlan.steps, source: 'model' };
    }
    log.warn(`Model plan unusable, using pattern planner: ${modelPlan.error}`);
  }

  const steps = buildPatternPlan(instruction, startUrl);
  if (steps.length === 0) {
    throw new PlanningError(`No steps could be planned for: ${instruction}`);
  }

  logPlannedSteps(steps, 'pattern');
  return { steps, source: 'pattern' };
}

async function planWithModel(
  client: LLMClient,
  instruction: string,
  startUrl: string | undefined,
): Promise<ParseResult> {
  log.llm('Planner generating steps...');

  let raw: string;
  try {
    const systemPrompt = await buildSystemPrompt(instruction, startUrl);
    raw = await client.generate(systemPrompt, buildUserPrompt(instruction, startUrl));
  } catch (err) {
    return { ok: false, error: `Model request failed: ${describeError(err)}` };
  }

  return tryParse(raw);
}

function logPlannedSteps(steps: readonly PlanStep[], source: string): void {
  log.planned(steps.length, source);
  steps.forEach((step, i) => {
    log.detail(`${String(i + 1)}. [${step.action}] ${step.description}`);
  });
}

// ── Template rendering ───────────────────────────────────────

async function buildSystemPrompt(
  instruction: string,
  startUrl: string | undefined,
): Promise<string> {
  const template = await readFile(path.join(PROMPTS_DIR, 'planner.txt'), 'utf-8');

  return template
    .replace('{{actions}}', actionKindSchema.options.join(', '))
    .replace('{{instruction}}', () => instruction)
    .replace('{{url}}', () => startUrl ?? 'Not specified');
}

function buildUserPrompt(instruction: string, startUrl: string | undefined): string {
  return `Create automation plan for: '${instruction}'\nStarting URL: '${startUrl ?? 'Not specified'}'`;
}

// ── JSON extraction + validation ─────────────────────────────

type ParseResult =
  | { ok: true; steps: PlanStep[] }
  | { ok: false; error: string };

function tryParse(raw: string): ParseResult {
  const json = extractJSON(raw);

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    return { ok: false, error: `Invalid JSON: ${describeError(e)}` };
  }

  if (!Array.isArray(parsed)) {
    return { ok: false, error: 'Expected a JSON array of steps' };
  }

  let steps: PlanStep[];
  try {
    steps = parsed.map((record: unknown) => normalizeModelStep(record));
  } catch (e) {
    return { ok: false, error: `Invalid step: ${summarize(describeError(e))}` };
  }

  if (steps.length > LIMITS.MAX_PLAN_STEPS) {
    log.warn(
      `Model planned ${String(steps.length)} steps, keeping the first ${String(LIMITS.MAX_PLAN_STEPS)}`,
    );
    steps = steps.slice(0, LIMITS.MAX_PLAN_STEPS);
  }

  const result = planSchema.safeParse(steps);
  if (!result.success) {
    return { ok: false, error: 'Model returned no steps' };
  }

  return { ok: true, steps: result.data };
}

export function extractJSON(raw: string): string {
  // Strip markdown fences if present
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  if (fenced?.[1]) return fenced[1].trim();

  // Find outermost array brackets
  const start = raw.indexOf('[');
  const end = raw.lastIndexOf(']');
  if (start !== -1 && end > start) return raw.slice(start, end + 1);

  return raw.trim();
}

function summarize(message: string): string {
  return message.length > 200 ? `${message.slice(0, 200)}…` : message;
}

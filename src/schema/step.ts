import { z } from 'zod';

// ── Action kind discriminator ─────────────────────────────────

export const actionKindSchema = z.enum([
  'navigate',
  'click',
  'fill',
  'wait',
  'scroll',
  'screenshot',
  'extract_text',
  'hover',
]);

export type ActionKind = z.infer<typeof actionKindSchema>;

export const STEP_DEFAULTS = {
  TIMEOUT_MS: 15_000,
  WAIT_AFTER_MS: 1_000,
} as const;

// ── Individual step schemas ───────────────────────────────────

const baseFields = {
  description: z.string().min(1),
  timeoutMs: z.number().int().positive().default(STEP_DEFAULTS.TIMEOUT_MS),
  waitAfterMs: z.number().int().nonnegative().default(STEP_DEFAULTS.WAIT_AFTER_MS),
  optional: z.boolean().default(false),
};

export const navigateStepSchema = z.object({
  ...baseFields,
  action: z.literal('navigate'),
  target: z.string().min(1),
});

export const clickStepSchema = z.object({
  ...baseFields,
  action: z.literal('click'),
  target: z.string().min(1).optional(),
  selector: z.string().min(1).optional(),
});

export const fillStepSchema = z.object({
  ...baseFields,
  action: z.literal('fill'),
  target: z.string().min(1).optional(),
  value: z.string(),
  selector: z.string().min(1).optional(),
});

export const waitStepSchema = z.object({
  ...baseFields,
  action: z.literal('wait'),
});

export const scrollStepSchema = z.object({
  ...baseFields,
  action: z.literal('scroll'),
  value: z.string().min(1).optional(),
});

export const screenshotStepSchema = z.object({
  ...baseFields,
  action: z.literal('screenshot'),
});

export const extractTextStepSchema = z.object({
  ...baseFields,
  action: z.literal('extract_text'),
  target: z.string().min(1).optional(),
  selector: z.string().min(1).optional(),
});

export const hoverStepSchema = z.object({
  ...baseFields,
  action: z.literal('hover'),
  target: z.string().min(1).optional(),
  selector: z.string().min(1).optional(),
});

// ── Union schema ──────────────────────────────────────────────

export const planStepSchema = z.discriminatedUnion('action', [
  navigateStepSchema,
  clickStepSchema,
  fillStepSchema,
  waitStepSchema,
  scrollStepSchema,
  screenshotStepSchema,
  extractTextStepSchema,
  hoverStepSchema,
]);

export type PlanStep = z.infer<typeof planStepSchema>;
export type PlanStepInput = z.input<typeof planStepSchema>;

export type NavigateStep = z.infer<typeof navigateStepSchema>;
export type ClickStep = z.infer<typeof clickStepSchema>;
export type FillStep = z.infer<typeof fillStepSchema>;
export type WaitStep = z.infer<typeof waitStepSchema>;
export type ScrollStep = z.infer<typeof scrollStepSchema>;
export type ScreenshotStep = z.infer<typeof screenshotStepSchema>;
export type ExtractTextStep = z.infer<typeof extractTextStepSchema>;
export type HoverStep = z.infer<typeof hoverStepSchema>;

export const planSchema = z.array(planStepSchema).min(1);

// ── Builders ──────────────────────────────────────────────────

/** Build a step from its input shape, filling in the defaults. */
export function createStep(input: PlanStepInput): PlanStep {
  return planStepSchema.parse(input);
}

// ── Model output normalization ────────────────────────────────
// Models answer with snake_case keys, nulls for unused fields and
// the occasional extra key. Only the fields the action uses survive.

const modelStepSchema = z
  .object({
    action: z.string().min(1),
    description: z.string().nullish(),
    target: z.string().nullish(),
    value: z.union([z.string(), z.number()]).nullish(),
    selector: z.string().nullish(),
    timeout: z.number().nullish(),
    timeoutMs: z.number().nullish(),
    wait_after: z.number().nullish(),
    waitAfterMs: z.number().nullish(),
    optional: z.boolean().nullish(),
  })
  .passthrough();

export function normalizeModelStep(raw: unknown): PlanStep {
  const record = modelStepSchema.parse(raw);
  const action = actionKindSchema.parse(record.action.trim().toLowerCase());

  const target = nonEmpty(record.target);
  const selector = nonEmpty(record.selector);
  const value =
    typeof record.value === 'number'
      ? String(record.value)
      : record.value ?? undefined;

  const common = {
    description: nonEmpty(record.description) ?? `${action} step`,
    ...definedNumber('timeoutMs', record.timeoutMs ?? record.timeout),
    ...definedNumber('waitAfterMs', record.waitAfterMs ?? record.wait_after),
    ...(record.optional != null ? { optional: record.optional } : {}),
  };

  switch (action) {
    case 'navigate':
      return createStep({ ...common, action, target: target ?? '' });
    case 'fill':
      return createStep({
        ...common,
        action,
        value: value ?? '',
        ...(target ? { target } : {}),
        ...(selector ? { selector } : {}),
      });
    case 'scroll': {
      const distance = nonEmpty(value);
      return createStep({ ...common, action, ...(distance ? { value: distance } : {}) });
    }
    case 'wait':
    case 'screenshot':
      return createStep({ ...common, action });
    case 'click':
    case 'extract_text':
    case 'hover':
      return createStep({
        ...common,
        action,
        ...(target ? { target } : {}),
        ...(selector ? { selector } : {}),
      });
  }
}

function nonEmpty(value: string | null | undefined): string | undefined {
  if (value == null) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function definedNumber<K extends string>(
  key: K,
  value: number | null | undefined,
): Partial<Record<K, number>> {
  if (value == null) return {};
  const result: Partial<Record<K, number>> = {};
  result[key] = Math.round(value);
  return result;
}

// ── Labels ───────────────────────────────────────────────────

/** Short label for traces: `[fill] Search for 'cats'`. */
export function describeStep(step: PlanStep): string {
  return `[${step.action}] ${step.description}`;
}

import { z } from 'zod';

import { llmProviderSchema } from '../llm/client.js';

// ── Automation config ───────────────────────────────────────

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const viewportSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export type Viewport = z.infer<typeof viewportSchema>;

export const automationConfigSchema = z.object({
  headless: z.boolean().default(false),
  navigationTimeoutMs: z.number().int().positive().default(30_000),
  viewport: viewportSchema.default({ width: 1920, height: 1080 }),
  slowMoMs: z.number().int().nonnegative().default(300),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  retries: z.number().int().nonnegative().default(3),
  retryDelayMs: z.number().int().nonnegative().default(1_000),
  /** Multiplier applied to every pacing delay. 0 disables pacing. */
  paceScale: z.number().nonnegative().default(1),
  screenshotDir: z.string().min(1).default('.'),
  finalPauseMs: z.number().int().nonnegative().default(3_000),
});

export type AutomationConfig = z.infer<typeof automationConfigSchema>;
export type AutomationConfigInput = z.input<typeof automationConfigSchema>;

/**
 * Resolve a partial config against the defaults and freeze it.
 * Sessions only ever see the frozen result.
 */
export function resolveAutomationConfig(
  input: AutomationConfigInput = {},
): Readonly<AutomationConfig> {
  const config = automationConfigSchema.parse(input);
  Object.freeze(config.viewport);
  return Object.freeze(config);
}

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = automationConfigSchema
  .partial()
  .extend({
    provider: llmProviderSchema.optional(),
    model: z.string().min(1).optional(),
    timeout: z.number().positive().optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

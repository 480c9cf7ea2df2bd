import { z } from 'zod';

import { TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';

// ── LLMClient interface ──────────────────────────────────────

export interface LLMClient {
  generate(systemPrompt: string, userPrompt: string): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

export function loadLLMConfig(
  env: NodeJS.ProcessEnv = process.env,
): LLMConfig {
  const provider = llmProviderSchema.parse(env['LLM_PROVIDER'] ?? 'openai');

  const apiKey =
    provider === 'anthropic'
      ? env['ANTHROPIC_API_KEY']
      : provider === 'openai'
        ? env['OPENAI_API_KEY']
        : undefined;

  const model = env['WEBPILOT_MODEL'];

  return llmConfigSchema.parse({
    provider,
    ...(apiKey ? { apiKey } : {}),
    ...(model ? { model } : {}),
  });
}

/** Name of the environment variable holding the provider's key. */
export function apiKeyVariable(provider: LLMProvider): string | undefined {
  switch (provider) {
    case 'anthropic':
      return 'ANTHROPIC_API_KEY';
    case 'openai':
      return 'OPENAI_API_KEY';
    case 'mock':
      return undefined;
  }
}

// ── Rate-limit retry ─────────────────────────────────────────

export interface RetryPolicy {
  attempts: number;
  /** Backoff for the n-th retry (1-based), unless the provider names one. */
  backoffMs: (retry: number) => number;
  sleep: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  backoffMs: (retry) => retry * TIMEOUTS.RATE_LIMIT_BACKOFF,
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/** Thrown by a provider call to ask for another attempt after a pause. */
export class RateLimitedError extends Error {
  constructor(
    readonly provider: string,
    readonly retryAfterMs?: number,
  ) {
    super(`${provider} API: rate limited`);
    this.name = 'RateLimitedError';
  }
}

/**
 * Repeat a planner request while the provider answers with a rate
 * limit. Any other failure, or the last rate limit, propagates.
 */
export async function withRateLimitRetry<T>(
  request: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await request();
    } catch (err) {
      if (!(err instanceof RateLimitedError) || attempt >= policy.attempts) throw err;

      const waitMs = err.retryAfterMs ?? policy.backoffMs(attempt);
      log.warn(`${err.provider} rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await policy.sleep(waitMs);
    }
  }
}

import Anthropic from '@anthropic-ai/sdk';

import { TIMEOUTS } from '../config/defaults.js';
import { RateLimitedError, withRateLimitRetry } from './client.js';
import type { LLMClient, RetryPolicy } from './client.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';
// A plan is at most twenty short records.
const MAX_TOKENS = 2048;

// ── Provider factory ─────────────────────────────────────────

export function createAnthropicClient(
  apiKey: string,
  model?: string,
  retry?: RetryPolicy,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  // Retries are ours so that only rate limits are repeated.
  const client = new Anthropic({ apiKey, maxRetries: 0, timeout: TIMEOUTS.PLANNER_REQUEST });

  async function request(systemPrompt: string, userPrompt: string): Promise<string> {
    try {
      const response = await client.messages.create({
        model: resolvedModel,
        max_tokens: MAX_TOKENS,
        system: systemPrompt,
        messages: [{ role: 'user', content: userPrompt }],
        temperature: 0.1,
      });

      const text = response.content
        .flatMap((block) => (block.type === 'text' ? [block.text] : []))
        .join('');
      if (!text) {
        throw new Error('Anthropic API returned no text content');
      }
      return text;
    } catch (err) {
      if (err instanceof Anthropic.RateLimitError) {
        const retryAfter = Number(err.headers?.['retry-after']);
        throw new RateLimitedError(
          'Anthropic',
          Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter * 1000 : undefined,
        );
      }
      throw err;
    }
  }

  return {
    generate: (systemPrompt, userPrompt) =>
      withRateLimitRetry(() => request(systemPrompt, userPrompt), retry),
  };
}

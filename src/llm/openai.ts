import { z } from 'zod';

import { TIMEOUTS } from '../config/defaults.js';
import { RateLimitedError, withRateLimitRetry } from './client.js';
import type { LLMClient, RetryPolicy } from './client.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'gpt-4o';
const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

// ── Response validation ──────────────────────────────────────

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .nonempty(),
});

// ── Request ──────────────────────────────────────────────────

function retryAfterMs(response: Response): number | undefined {
  const seconds = Number(response.headers.get('retry-after'));
  return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : undefined;
}

async function postCompletion(apiKey: string, payload: string): Promise<string> {
  const response = await fetch(COMPLETIONS_URL, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${apiKey}`,
    },
    body: payload,
    signal: AbortSignal.timeout(TIMEOUTS.PLANNER_REQUEST),
  });

  if (response.status === 429) {
    throw new RateLimitedError('OpenAI', retryAfterMs(response));
  }

  if (!response.ok) {
    const body = await response.text();
    throw new Error(`OpenAI API error (${String(response.status)}): ${body}`);
  }

  const body: unknown = await response.json();
  return chatResponseSchema.parse(body).choices[0].message.content;
}

// ── Provider factory ─────────────────────────────────────────

export function createOpenAIClient(
  apiKey: string,
  model?: string,
  retry?: RetryPolicy,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;

  return {
    generate(systemPrompt: string, userPrompt: string): Promise<string> {
      const payload = JSON.stringify({
        model: resolvedModel,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        temperature: 0.1,
      });
      return withRateLimitRetry(() => postCompletion(apiKey, payload), retry);
    },
  };
}

/**
 * LLM abstraction module.
 * Provider-agnostic interface for the planner.
 * Only module allowed to make LLM API calls.
 */

import { apiKeyVariable } from './client.js';
import type { LLMClient, LLMConfig, RetryPolicy } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient } from './openai.js';
import { createMockClient } from './mock.js';
import { SetupError } from '../core/errors.js';

export * from './client.js';
export { createAnthropicClient } from './anthropic.js';
export { createOpenAIClient } from './openai.js';
export { createMockClient } from './mock.js';
export type { MockLLMClient, PromptRecord } from './mock.js';

// ── Provider factory ─────────────────────────────────────────

export function createLLMClient(config: LLMConfig, retry?: RetryPolicy): LLMClient {
  if (config.provider === 'mock') return createMockClient();

  const variable = apiKeyVariable(config.provider);
  if (!config.apiKey) {
    throw new SetupError([`${variable ?? 'API key'} not set`]);
  }

  return config.provider === 'anthropic'
    ? createAnthropicClient(config.apiKey, config.model, retry)
    : createOpenAIClient(config.apiKey, config.model, retry);
}

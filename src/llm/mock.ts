import type { LLMClient } from './client.js';

// An empty plan sends the planner to its pattern fallback.
const EMPTY_PLAN = '[]';

export interface PromptRecord {
  system: string;
  user: string;
}

export interface MockLLMClient extends LLMClient {
  /** Every prompt pair the client was asked to answer, in order. */
  readonly prompts: readonly PromptRecord[];
}

/**
 * Offline provider. Answers with the canned responses in order, then
 * with an empty plan; an Error in the list is thrown instead.
 */
export function createMockClient(
  responses: readonly (string | Error)[] = [],
): MockLLMClient {
  const prompts: PromptRecord[] = [];

  return {
    prompts,
    generate(system: string, user: string): Promise<string> {
      const response = responses[prompts.length] ?? EMPTY_PLAN;
      prompts.push({ system, user });
      return response instanceof Error ? Promise.reject(response) : Promise.resolve(response);
    },
  };
}

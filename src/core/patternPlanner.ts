import type { PlanStep } from '../schema/index.js';
import { createStep } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';

// ── Site detection ───────────────────────────────────────────

export type SiteIdentity = 'youtube' | 'google' | 'amazon' | 'generic';

const SITE_PRIORITY = ['youtube', 'google', 'amazon'] as const;

export const SITE_URLS = {
  youtube: 'https://youtube.com',
  google: 'https://google.com',
  amazon: 'https://amazon.com',
} as const;

/** First site keyword found in the instruction, in fixed priority. */
export function detectSite(instruction: string): SiteIdentity {
  const lowered = instruction.toLowerCase();
  return SITE_PRIORITY.find((site) => lowered.includes(site)) ?? 'generic';
}

// ── Search phrase extraction ─────────────────────────────────

export const DEFAULT_SEARCH_QUERY = 'cats';

// The phrase ends at a comma, a period, one of the action words, or the
// end of the instruction. Action words only count as whole words, so
// "thailand" is not cut at "and".
const PHRASE_END = String.raw`(?=\s*(?:[,.]|\b(?:and|then|play|click)\b|$))`;

const QUERY_PATTERNS: readonly RegExp[] = [
  new RegExp(String.raw`\bsearch for\s+["']?([^"']+?)["']?${PHRASE_END}`),
  new RegExp(String.raw`\bfind\s+["']?([^"']+?)["']?${PHRASE_END}`),
  new RegExp(String.raw`\blook for\s+["']?([^"']+?)["']?${PHRASE_END}`),
  new RegExp(String.raw`\babout\s+["']?([^"']+?)["']?${PHRASE_END}`),
];

const QUERY_STOP_WORDS = new Set(['and', 'then', 'play', 'click', 'first', 'video']);

const INSTRUCTION_SKIP_WORDS = new Set([
  'go',
  'to',
  'navigate',
  'open',
  'visit',
  'search',
  'find',
  'look',
  'for',
  'and',
  'then',
  'play',
  'click',
  'first',
  'video',
]);

/**
 * Pull the search phrase out of a free-text instruction. Pure: the
 * same instruction always yields the same phrase.
 */
export function extractSearchQuery(instruction: string): string {
  const lowered = instruction.toLowerCase();

  for (const pattern of QUERY_PATTERNS) {
    const match = pattern.exec(lowered);
    const phrase = match?.[1];
    if (!phrase) continue;

    const words = phrase
      .trim()
      .split(/\s+/)
      .filter((word) => word.length > 0 && !QUERY_STOP_WORDS.has(word));
    if (words.length > 0) return words.join(' ');
  }

  const meaningful = lowered
    .split(/\s+/)
    .filter(
      (word) =>
        word.length > 0 &&
        !INSTRUCTION_SKIP_WORDS.has(word) &&
        !word.endsWith('.com'),
    );

  return meaningful.length > 0
    ? meaningful.slice(0, LIMITS.MAX_SEARCH_WORDS).join(' ')
    : DEFAULT_SEARCH_QUERY;
}

// ── Plan construction ────────────────────────────────────────

/**
 * Deterministic fallback plan keyed on the detected site. Used when no
 * model is available or the model's answer cannot be used.
 */
export function buildPatternPlan(
  instruction: string,
  startUrl?: string,
): PlanStep[] {
  const query = extractSearchQuery(instruction);
  const site = detectSite(instruction);
  const lowered = instruction.toLowerCase();

  switch (site) {
    case 'youtube': {
      const steps = [
        createStep({ action: 'navigate', description: 'Navigate to YouTube', target: SITE_URLS.youtube }),
        createStep({ action: 'wait', description: 'Wait for YouTube to load', waitAfterMs: 3000 }),
        createStep({ action: 'fill', description: `Search for '${query}'`, target: 'search', value: query }),
        createStep({ action: 'wait', description: 'Wait after typing', waitAfterMs: 1500 }),
        createStep({ action: 'click', description: 'Submit search', target: 'search_submit', optional: true }),
      ];
      if (lowered.includes('play') && lowered.includes('first')) {
        steps.push(
          createStep({ action: 'wait', description: 'Wait for search results', waitAfterMs: 3000 }),
          createStep({ action: 'click', description: 'Click first video', target: 'first_video', optional: true }),
        );
      }
      return steps;
    }

    case 'google':
      return [
        createStep({ action: 'navigate', description: 'Navigate to Google', target: SITE_URLS.google }),
        createStep({ action: 'wait', description: 'Wait for Google to load', waitAfterMs: 2000 }),
        createStep({ action: 'fill', description: `Search for '${query}'`, target: 'search', value: query }),
        createStep({ action: 'wait', description: 'Wait after typing', waitAfterMs: 1000 }),
      ];

    case 'amazon':
      return [
        createStep({ action: 'navigate', description: 'Navigate to Amazon', target: SITE_URLS.amazon }),
        createStep({ action: 'wait', description: 'Wait for Amazon to load', waitAfterMs: 2000 }),
        createStep({ action: 'fill', description: `Search for '${query}'`, target: 'search', value: query }),
        createStep({ action: 'wait', description: 'Wait after typing', waitAfterMs: 1000 }),
        createStep({ action: 'click', description: 'Submit search', target: 'search_submit', optional: true }),
      ];

    case 'generic':
      if (startUrl) {
        return [
          createStep({ action: 'navigate', description: `Navigate to ${startUrl}`, target: startUrl }),
          createStep({ action: 'wait', description: 'Wait for page to load', waitAfterMs: 3000 }),
        ];
      }
      return [
        createStep({ action: 'navigate', description: 'Navigate to Google', target: SITE_URLS.google }),
        createStep({ action: 'wait', description: 'Wait for page load', waitAfterMs: 2000 }),
        createStep({ action: 'fill', description: `Search for '${query}'`, target: 'search', value: query }),
      ];
  }
}

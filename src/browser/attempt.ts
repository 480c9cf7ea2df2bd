import { describeError } from '../core/errors.js';

// ── Attempt results ──────────────────────────────────────────
// One locator, one try. Failure is a value, not an exception.

export type AttemptResult =
  | { ok: true; locator: string }
  | { ok: false; locator: string; reason: string };

export type FailedAttempt = Extract<AttemptResult, { ok: false }>;

export type SearchResult =
  | { found: true; locator: string; failures: FailedAttempt[] }
  | { found: false; failures: FailedAttempt[] };

/** Run one action against one locator and capture how it ended. */
export async function attempt(
  locator: string,
  action: () => Promise<void>,
): Promise<AttemptResult> {
  try {
    await action();
    return { ok: true, locator };
  } catch (err) {
    return { ok: false, locator, reason: describeError(err) };
  }
}

/**
 * Ordered first-match search: try each locator in turn, stop at the
 * first success. Candidates after the winner are never touched.
 */
export async function firstSuccess(
  locators: readonly string[],
  run: (locator: string) => Promise<AttemptResult>,
): Promise<SearchResult> {
  const failures: FailedAttempt[] = [];

  for (const locator of locators) {
    const result = await run(locator);
    if (result.ok) {
      return { found: true, locator: result.locator, failures };
    }
    failures.push(result);
  }

  return { found: false, failures };
}

/** First line of a failure reason; Playwright errors carry call logs. */
export function summarizeReason(reason: string): string {
  const newline = reason.indexOf('\n');
  return newline === -1 ? reason : reason.slice(0, newline);
}

// ── Error taxonomy ───────────────────────────────────────────
// Exit codes are what the CLI hands back to the shell.

export const EXIT_CODES = {
  SUCCESS: 0,
  STEP_FAILURES: 1,
  PLANNING: 3,
  SETUP: 4,
  SESSION: 5,
} as const;

/** Missing credential or browser driver. Raised before any session starts. */
export class SetupError extends Error {
  readonly exitCode = EXIT_CODES.SETUP;
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Setup issues found: ${issues.join('; ')}`);
    this.name = 'SetupError';
    this.issues = issues;
  }
}

export class PlanningError extends Error {
  readonly exitCode = EXIT_CODES.PLANNING;

  constructor(message: string) {
    super(message);
    this.name = 'PlanningError';
  }
}

/** A single step could not complete. Never escapes the step executor. */
export class StepError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StepError';
  }
}

/** Browser, context or page could not be created. */
export class SessionError extends Error {
  readonly exitCode = EXIT_CODES.SESSION;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

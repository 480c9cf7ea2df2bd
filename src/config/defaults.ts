/**
 * Default timing and size constants.
 * Per-run values live in AutomationConfig; these are the fixed bounds
 * the executor applies on top of them.
 */

export const TIMEOUTS = {
  NAVIGATION_MAX: 30_000,
  NETWORK_IDLE: 10_000,
  CLICK: 5_000,
  TEXT_CLICK: 3_000,
  HOVER: 3_000,
  EXTRACT: 5_000,
  TOTAL_RUN_TIMEOUT: 300_000,
  PLANNER_REQUEST: 60_000,
  RATE_LIMIT_BACKOFF: 5_000,
} as const;

/** Pacing delays, all scaled by AutomationConfig.paceScale. */
export const PACING = {
  NETWORK_IDLE_FALLBACK: 2_000,
  AFTER_ENTER: 1_000,
  SCROLL_SETTLE: 300,
  BEFORE_TYPING: 200,
  AFTER_TYPING: 300,
  KEYSTROKE: 50,
  DEFAULT_WAIT: 1_000,
  POPUP_SETTLE: 500,
  OVERLAY_SETTLE: 500,
  CHECKBOX_SETTLE: 2_000,
  PASSIVE_CHALLENGE_WAIT: 5_000,
} as const;

export const LIMITS = {
  MAX_PLAN_STEPS: 20,
  MAX_SEARCH_WORDS: 5,
  MAX_EXTRACT_CHARS: 2_000,
} as const;

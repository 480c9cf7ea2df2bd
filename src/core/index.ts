/**
 * Core orchestration module.
 * Planner → session → executor pipeline and the error taxonomy.
 */

export {
  EXIT_CODES,
  SetupError,
  PlanningError,
  StepError,
  SessionError,
  describeError,
} from './errors.js';
export { planAutomation, extractJSON } from './planner.js';
export type { PlannerOptions, PlanResult } from './planner.js';
export {
  buildPatternPlan,
  extractSearchQuery,
  detectSite,
  DEFAULT_SEARCH_QUERY,
  SITE_URLS,
} from './patternPlanner.js';
export type { SiteIdentity } from './patternPlanner.js';
export { AutomationSession, runAutomation } from './session.js';
export type { SessionOptions, Planner } from './session.js';

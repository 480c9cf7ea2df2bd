/**
 * Browser execution module.
 * Deterministic Playwright side of the pipeline — no LLM calls.
 * Receives plan steps, performs them, clears obstacles.
 */

export type { PageHandle, LocatorHandle, ResponseHandle } from './page.js';
export {
  selectorCandidates,
  detectSiteFromHost,
  loadSelectorCatalog,
  getSelectorCatalog,
} from './selectors.js';
export type { SelectorCatalog, LocatorAction } from './selectors.js';
export { attempt, firstSuccess } from './attempt.js';
export type { AttemptResult, SearchResult } from './attempt.js';
export { executeStep, normalizeUrl } from './executor.js';
export type { ExecutionContext } from './executor.js';
export {
  clearObstacles,
  dismissPopups,
  detectChallenges,
  handleChallenges,
  loadObstacleCatalog,
} from './obstacles.js';
export type { ObstacleCatalog, PopupReport } from './obstacles.js';
export { launchBrowser } from './runner.js';
export type { BrowserSession, BrowserLauncher } from './runner.js';

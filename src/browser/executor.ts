import path from 'node:path';

import type {
  AutomationConfig,
  ClickStep,
  ExtractTextStep,
  FillStep,
  HoverStep,
  NavigateStep,
  PlanStep,
  ScrollStep,
  StepResult,
} from '../schema/index.js';
import { LIMITS, PACING, TIMEOUTS } from '../config/defaults.js';
import { StepError, describeError } from '../core/errors.js';
import { formatTimestamp } from '../utils/pace.js';
import type { Pacer } from '../utils/pace.js';
import * as log from '../utils/logger.js';
import { attempt, firstSuccess, summarizeReason } from './attempt.js';
import type { AttemptResult, FailedAttempt } from './attempt.js';
import type { PageHandle } from './page.js';
import { selectorCandidates } from './selectors.js';
import type { LocatorAction, SelectorCatalog } from './selectors.js';

// ── Public types ─────────────────────────────────────────────

export interface ExecutionContext {
  config: Readonly<AutomationConfig>;
  pace: Pacer;
  catalog?: SelectorCatalog;
  /** Clock for screenshot names. */
  now?: () => Date;
}

const SUBMIT_HINT = /search|submit|enter/;

// ── Entry point ──────────────────────────────────────────────

/**
 * Perform one step against the page. Never throws: every failure
 * becomes a `StepResult`. A successful step is followed by its
 * `waitAfterMs` pause, which is how the run paces itself.
 */
export async function executeStep(
  step: PlanStep,
  page: PageHandle,
  ctx: ExecutionContext,
): Promise<StepResult> {
  let result: StepResult;
  try {
    result = await performAction(step, page, ctx);
  } catch (err) {
    const message = describeError(err);
    log.warn(`${step.action} failed: ${summarizeReason(message)}`);
    return { success: false, skipped: false, message };
  }

  // A wait step's pause is the step itself.
  if (result.success && step.action !== 'wait' && step.waitAfterMs > 0) {
    await ctx.pace(step.waitAfterMs);
  }

  return result;
}

// ── Step dispatch ────────────────────────────────────────────

async function performAction(
  step: PlanStep,
  page: PageHandle,
  ctx: ExecutionContext,
): Promise<StepResult> {
  switch (step.action) {
    case 'navigate':
      return navigate(step, page, ctx);

    case 'click':
      return click(step, page, ctx);

    case 'fill':
      return fill(step, page, ctx);

    case 'wait': {
      const ms = step.waitAfterMs > 0 ? step.waitAfterMs : PACING.DEFAULT_WAIT;
      await ctx.pace(ms);
      log.info(`⏳ Waited ${String(ms)}ms`);
      return succeeded(`Waited ${String(ms)}ms`);
    }

    case 'scroll':
      return scroll(step, page);

    case 'screenshot': {
      const now = ctx.now?.() ?? new Date();
      const filePath = path.join(
        ctx.config.screenshotDir,
        `screenshot_${formatTimestamp(now)}.png`,
      );
      await page.screenshot({ path: filePath, fullPage: true });
      log.info(`📸 Screenshot saved: ${filePath}`);
      return succeeded(`Screenshot saved: ${filePath}`);
    }

    case 'extract_text':
      return extractText(step, page, ctx);

    case 'hover':
      return hover(step, page, ctx);
  }
}

// ── Navigate ─────────────────────────────────────────────────

export function normalizeUrl(target: string): string {
  const trimmed = target.trim();
  if (/^[a-z][a-z\d+.-]*:\/\//i.test(trimmed) || trimmed.startsWith('about:')) {
    return trimmed;
  }
  return `https://${trimmed}`;
}

async function navigate(
  step: NavigateStep,
  page: PageHandle,
  ctx: ExecutionContext,
): Promise<StepResult> {
  const url = normalizeUrl(step.target);
  const attempts = ctx.config.retries + 1;
  let last: AttemptResult | undefined;

  for (let i = 0; i < attempts; i++) {
    if (i > 0) {
      log.detail(`Retrying navigation (${String(i)}/${String(ctx.config.retries)})`);
      await ctx.pace(ctx.config.retryDelayMs);
    }

    log.browser(`Navigating to: ${url}`);
    last = await attempt(url, async () => {
      const response = await page.goto(url, {
        waitUntil: 'domcontentloaded',
        timeout: TIMEOUTS.NAVIGATION_MAX,
      });
      if (!response) {
        throw new StepError('no response');
      }
      if (response.status() >= 400) {
        throw new StepError(`HTTP ${String(response.status())}`);
      }
    });

    if (last.ok) break;
  }

  if (last === undefined) {
    throw new StepError(`Navigation to ${url} was not attempted`);
  }
  if (!last.ok) {
    throw new StepError(`Navigation to ${url} failed: ${summarizeReason(last.reason)}`);
  }

  try {
    await page.waitForLoadState('networkidle', { timeout: TIMEOUTS.NETWORK_IDLE });
  } catch {
    await ctx.pace(PACING.NETWORK_IDLE_FALLBACK);
  }

  log.browser(`Navigated to ${url}`);
  return succeeded(`Navigated to ${url}`);
}

// ── Click ────────────────────────────────────────────────────

async function click(
  step: ClickStep,
  page: PageHandle,
  ctx: ExecutionContext,
): Promise<StepResult> {
  const target = step.target;

  if (target && SUBMIT_HINT.test(target.toLowerCase())) {
    const enter = await attempt('Enter', () => page.keyboard.press('Enter'));
    if (enter.ok) {
      await ctx.pace(PACING.AFTER_ENTER);
      log.info('⌨️ Pressed Enter');
      return succeeded('Pressed Enter');
    }
  }

  const candidates = candidatesFor(step, 'click', page, ctx);
  const search = await firstSuccess(candidates, (locator) =>
    attempt(locator, async () => {
      const element = page.locator(locator).first();
      await element.waitFor({ state: 'attached', timeout: step.timeoutMs });
      await element.scrollIntoViewIfNeeded();
      await ctx.pace(PACING.SCROLL_SETTLE);
      await element.click({ timeout: TIMEOUTS.CLICK });
    }),
  );
  logFailures(search.failures);

  if (search.found) {
    log.info(`🖱️ Clicked: ${search.locator}`);
    return succeeded(`Clicked ${search.locator}`);
  }

  if (target) {
    const byText = await attempt(`text=${target}`, () =>
      page.getByText(target).first().click({ timeout: TIMEOUTS.TEXT_CLICK }),
    );
    if (byText.ok) {
      log.info(`🖱️ Clicked by text: ${target}`);
      return succeeded(`Clicked by text: ${target}`);
    }
  }

  return exhausted(step, `Could not click ${target ?? 'element'}`);
}

// ── Fill ─────────────────────────────────────────────────────

async function fill(
  step: FillStep,
  page: PageHandle,
  ctx: ExecutionContext,
): Promise<StepResult> {
  const value = step.value;
  if (value.length === 0) {
    throw new StepError('No value to fill');
  }

  const candidates = candidatesFor(step, 'fill', page, ctx);
  const search = await firstSuccess(candidates, (locator) =>
    attempt(locator, async () => {
      const element = page.locator(locator).first();
      await element.waitFor({ state: 'attached', timeout: step.timeoutMs });
      await element.focus();
      await element.clear();
      await ctx.pace(PACING.BEFORE_TYPING);
      await element.pressSequentially(value, {
        delay: Math.round(PACING.KEYSTROKE * ctx.config.paceScale),
      });
      await ctx.pace(PACING.AFTER_TYPING);

      const current = await element.inputValue();
      if (!current.toLowerCase().includes(value.toLowerCase())) {
        throw new StepError(`field holds "${current}" instead of "${value}"`);
      }
    }),
  );
  logFailures(search.failures);

  if (search.found) {
    log.info(`✏️ Filled ${search.locator} with '${value}'`);
    return succeeded(`Filled ${search.locator} with '${value}'`);
  }

  return exhausted(step, `Could not fill ${step.target ?? 'field'}`);
}

// ── Scroll ───────────────────────────────────────────────────

async function scroll(step: ScrollStep, page: PageHandle): Promise<StepResult> {
  const distance = step.value?.trim();

  if (distance !== undefined && /^-?\d+$/.test(distance)) {
    await page.mouse.wheel(0, Number(distance));
    log.info(`📜 Scrolled ${distance}px`);
    return succeeded(`Scrolled ${distance}px`);
  }

  await page.keyboard.press('PageDown');
  log.info('📜 Scrolled one page');
  return succeeded('Scrolled one page');
}

// ── Best-effort actions ──────────────────────────────────────

async function extractText(
  step: ExtractTextStep,
  page: PageHandle,
  ctx: ExecutionContext,
): Promise<StepResult> {
  // Field locators, then clickable ones, then the whole page.
  const candidates = unique([
    ...(step.selector ? [step.selector] : []),
    ...selectorCandidates(step.target, 'fill', page.url(), ctx.catalog),
    ...selectorCandidates(step.target, 'click', page.url(), ctx.catalog),
    'body',
  ]);

  let extracted = '';
  const search = await firstSuccess(candidates, (locator) =>
    attempt(locator, async () => {
      const element = page.locator(locator).first();
      if ((await element.count()) === 0) {
        throw new StepError('no match on page');
      }
      const text = (await element.innerText({ timeout: TIMEOUTS.EXTRACT })).trim();
      if (text.length === 0) {
        throw new StepError('no text');
      }
      extracted = text.slice(0, LIMITS.MAX_EXTRACT_CHARS);
    }),
  );

  if (search.found) {
    log.info(`📄 Extracted ${String(extracted.length)} characters from ${search.locator}`);
    return { ...succeeded(`Extracted text from ${search.locator}`), extracted };
  }

  const first = search.failures[0];
  return succeeded(
    first
      ? `Nothing extracted from ${first.locator}: ${summarizeReason(first.reason)}`
      : 'Nothing extracted',
  );
}

async function hover(
  step: HoverStep,
  page: PageHandle,
  ctx: ExecutionContext,
): Promise<StepResult> {
  const candidates = candidatesFor(step, 'click', page, ctx);
  const search = await firstSuccess(candidates, (locator) =>
    attempt(locator, () =>
      page.locator(locator).first().hover({ timeout: TIMEOUTS.HOVER }),
    ),
  );

  return search.found
    ? succeeded(`Hovered ${search.locator}`)
    : succeeded(`Hover skipped: nothing matched ${step.target ?? 'element'}`);
}

// ── Helpers ──────────────────────────────────────────────────

function candidatesFor(
  step: ClickStep | FillStep | HoverStep,
  action: LocatorAction,
  page: PageHandle,
  ctx: ExecutionContext,
): string[] {
  const fromStrategy = selectorCandidates(step.target, action, page.url(), ctx.catalog);
  const explicit = step.selector ? [step.selector] : [];
  return unique([...explicit, ...fromStrategy]);
}

function unique(locators: readonly string[]): string[] {
  return [...new Set(locators)];
}

function logFailures(failures: readonly FailedAttempt[]): void {
  for (const failure of failures) {
    log.attempt(`${failure.locator}: ${summarizeReason(failure.reason)}`);
  }
}

function succeeded(message: string): StepResult {
  return { success: true, skipped: false, message };
}

/**
 * Every strategy failed. An optional step still reports success so it
 * never blocks the plan; a mandatory one reports the failure.
 */
function exhausted(step: PlanStep, message: string): StepResult {
  log.warn(message);
  return { success: step.optional, skipped: step.optional, message };
}

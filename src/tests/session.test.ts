import { describe, it, expect } from 'vitest';

import { AutomationSession, runAutomation } from '../core/session.js';
import type { Planner, SessionOptions } from '../core/session.js';
import { PlanningError, SessionError } from '../core/errors.js';
import type { BrowserLauncher } from '../browser/runner.js';
import { createMockClient } from '../llm/mock.js';
import { createStep, isRunSuccessful } from '../schema/index.js';
import { exitCodeFor } from '../report/reporter.js';
import { FakePage, recordingPacer } from './helpers/fakePage.js';
import type { FakePageOptions } from './helpers/fakePage.js';

const QUICK_CONFIG = { paceScale: 0, retries: 0, retryDelayMs: 0, finalPauseMs: 0 };

function fakeBrowser(pageOptions: FakePageOptions = {}, closeError?: Error) {
  const page = new FakePage(pageOptions);
  const counts = { launches: 0, closes: 0 };
  const launcher: BrowserLauncher = () => {
    counts.launches++;
    return Promise.resolve({
      page,
      close: () => {
        counts.closes++;
        return closeError ? Promise.reject(closeError) : Promise.resolve();
      },
    });
  };
  return { page, counts, launcher };
}

function session(options: SessionOptions): AutomationSession {
  return new AutomationSession({
    config: QUICK_CONFIG,
    pace: recordingPacer().pace,
    ...options,
  });
}

const GOOGLE_SEARCH_FIELD = { "textarea[name='q']": {} };

describe('AutomationSession', () => {
  it('runs a Google search end to end with the pattern planner', async () => {
    const { page, counts, launcher } = fakeBrowser({ elements: GOOGLE_SEARCH_FIELD });
    const s = session({ launcher });

    expect(s.state).toBe('idle');
    const report = await s.run('Go to Google and search for weather');

    expect(report.trace).toEqual([
      '🎯 Executing 4 steps for: Go to Google and search for weather',
      '🔄 Step 1 [navigate]: Navigate to Google',
      '✅ Step 1 [navigate] completed: Navigate to Google',
      '🔄 Step 2 [wait]: Wait for Google to load',
      '✅ Step 2 [wait] completed: Wait for Google to load',
      "🔄 Step 3 [fill]: Search for 'weather'",
      "✅ Step 3 [fill] completed: Search for 'weather'",
      '🔄 Step 4 [wait]: Wait after typing',
      '✅ Step 4 [wait] completed: Wait after typing',
      '🎉 Automation completed!',
    ]);
    expect(report.plan.map((step) => step.action)).toEqual(['navigate', 'wait', 'fill', 'wait']);
    expect(report.plannedBy).toBe('pattern');
    expect(report.finalState).toBe('closed');
    expect(s.state).toBe('closed');
    expect(report.startUrl).toBeUndefined();
    expect(report.error).toBeUndefined();
    expect(report.obstacles).toHaveLength(2);
    expect(isRunSuccessful(report)).toBe(true);
    expect(exitCodeFor(report)).toBe(0);
    expect(page.element("textarea[name='q']")?.value).toBe('weather');
    expect(counts).toEqual({ launches: 1, closes: 1 });
  });

  it('uses the model plan when the client answers', async () => {
    const { counts, launcher } = fakeBrowser();
    const client = createMockClient(['[{"action":"navigate","target":"example.org","description":"Open"}]']);

    const report = await session({ launcher, client }).run('open example.org');

    expect(report.plannedBy).toBe('model');
    expect(report.steps).toHaveLength(1);
    expect(report.steps[0]).toMatchObject({ index: 0, success: true, message: 'Navigated to https://example.org' });
    expect(counts.closes).toBe(1);
  });

  it('clears popups right after a navigation', async () => {
    const { launcher } = fakeBrowser({ elements: { '#L2AGLb': { removeOnClick: true } } });

    const report = await session({ launcher }).run('check the page', 'https://example.org');

    expect(report.trace.slice(1, 4)).toEqual([
      '🔄 Step 1 [navigate]: Navigate to https://example.org',
      '✅ Step 1 [navigate] completed: Navigate to https://example.org',
      '✅ Closed Cookie banner: #L2AGLb',
    ]);
    expect(report.startUrl).toBe('https://example.org');
    expect(report.obstacles.map((o) => o.dismissed)).toEqual([['Cookie banner'], []]);
  });

  it('keeps going after a failed step', async () => {
    const { counts, launcher } = fakeBrowser();

    const report = await session({ launcher }).run('Go to Google and search for weather');

    expect(report.trace).toContain('❌ Step 3 [fill] failed but continuing: Could not fill search');
    expect(report.trace).toContain('✅ Step 4 [wait] completed: Wait after typing');
    expect(report.finalState).toBe('closed');
    expect(isRunSuccessful(report)).toBe(false);
    expect(exitCodeFor(report)).toBe(1);
    expect(counts.closes).toBe(1);
  });

  it('reports skipped optional steps', async () => {
    const planner: Planner = () =>
      Promise.resolve({
        source: 'model',
        steps: [createStep({ action: 'click', description: 'Dismiss banner', target: 'Maybe later', optional: true })],
      });
    const { launcher } = fakeBrowser();

    const report = await session({ launcher, planner }).run('close the banner');

    expect(report.trace).toContain('⚠️ Step 1 [click] skipped (optional): Dismiss banner');
    expect(isRunSuccessful(report)).toBe(true);
  });

  it('stops starting steps once the deadline passes', async () => {
    let tick = 0;
    const clock = () => tick++ * 1000;
    const { counts, launcher } = fakeBrowser({ elements: GOOGLE_SEARCH_FIELD });

    const report = await session({ launcher, clock, totalTimeoutMs: 2500 }).run(
      'Go to Google and search for weather',
    );

    expect(report.steps).toHaveLength(2);
    expect(report.trace).toContain('⏱️ Run deadline reached, 2 steps not started');
    expect(report.finalState).toBe('closed');
    expect(report.durationMs).toBe(4000);
    expect(isRunSuccessful(report)).toBe(false);
    expect(counts.closes).toBe(1);
  });

  it('reports a browser that fails to start', async () => {
    const launcher: BrowserLauncher = () => Promise.reject(new Error('no display'));
    const s = session({ launcher });

    const report = await s.run('Go to Google and search for weather');

    expect(report.trace).toEqual(['❌ Session error: Browser failed to start: no display']);
    expect(report.error).toBeInstanceOf(SessionError);
    expect(report.finalState).toBe('failed');
    expect(s.state).toBe('failed');
    expect(report.steps).toEqual([]);
    expect(report.plannedBy).toBe('none');
    expect(exitCodeFor(report)).toBe(5);
  });

  it('closes the browser once when planning fails', async () => {
    const { counts, launcher } = fakeBrowser();
    const planner: Planner = () => Promise.reject(new PlanningError('nothing to do'));

    const report = await session({ launcher, planner }).run('hmm');

    expect(report.trace).toEqual(['❌ Planning failed: nothing to do']);
    expect(report.finalState).toBe('closed');
    expect(report.plannedBy).toBe('none');
    expect(report.error).toBeUndefined();
    expect(exitCodeFor(report)).toBe(3);
    expect(counts).toEqual({ launches: 1, closes: 1 });
  });

  it('runs the fallback search for a blank instruction', async () => {
    const { page, launcher } = fakeBrowser({ elements: GOOGLE_SEARCH_FIELD });

    const report = await session({ launcher }).run('  ');

    expect(report.plannedBy).toBe('pattern');
    expect(report.plan.map((step) => step.description)).toEqual([
      'Navigate to Google',
      'Wait for page load',
      "Search for 'cats'",
    ]);
    expect(report.finalState).toBe('closed');
    expect(page.element("textarea[name='q']")?.value).toBe('cats');
  });

  it('still closes the session when browser cleanup fails', async () => {
    const { counts, launcher } = fakeBrowser({}, new Error('already closed'));

    const report = await session({ launcher }).run('check the page', 'https://example.org');

    expect(report.finalState).toBe('closed');
    expect(counts.closes).toBe(1);
  });

  it('runs only once', async () => {
    const { launcher } = fakeBrowser();
    const s = session({ launcher });
    await s.run('check the page', 'https://example.org');

    await expect(s.run('check the page', 'https://example.org')).rejects.toBeInstanceOf(SessionError);
  });
});

describe('runAutomation', () => {
  it('uses a fresh session per call', async () => {
    const { counts, launcher } = fakeBrowser();
    const options: SessionOptions = { config: QUICK_CONFIG, pace: recordingPacer().pace, launcher };

    const first = await runAutomation('check the page', 'https://example.org', options);
    const second = await runAutomation('check the page', 'https://example.org', options);

    expect(first.finalState).toBe('closed');
    expect(second.finalState).toBe('closed');
    expect(first.runId).not.toBe(second.runId);
    expect(counts).toEqual({ launches: 2, closes: 2 });
  });
});

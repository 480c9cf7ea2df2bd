import { describe, it, expect } from 'vitest';

import {
  clearObstacles,
  detectChallenges,
  dismissPopups,
  getObstacleCatalog,
} from '../browser/obstacles.js';
import { FakePage, recordingPacer } from './helpers/fakePage.js';

describe('dismissPopups', () => {
  it('closes the first visible match of a category', async () => {
    const page = new FakePage({ elements: { '#L2AGLb': { removeOnClick: true } } });
    const { pace, pauses } = recordingPacer();

    const report = await dismissPopups(page, pace);

    expect(report).toEqual({
      dismissed: ['Cookie banner'],
      entries: ['✅ Closed Cookie banner: #L2AGLb'],
    });
    expect(page.calls).toContain('click #L2AGLb');
    expect(pauses).toEqual([500]);
  });

  it('leaves hidden popups alone', async () => {
    const page = new FakePage({ elements: { '.cookie-accept': { visible: false } } });
    const { pace } = recordingPacer();

    const report = await dismissPopups(page, pace);

    expect(report).toEqual({ dismissed: [], entries: [] });
    expect(page.calls).not.toContain('click .cookie-accept');
  });

  it('presses Escape once when an overlay remains', async () => {
    const page = new FakePage({
      elements: { '.modal-backdrop': {}, '.overlay': {} },
    });
    const { pace } = recordingPacer();

    const report = await dismissPopups(page, pace);

    expect(report.entries).toEqual(['⌨️ Pressed Escape for overlay']);
    expect(report.dismissed).toEqual(['Overlay']);
    expect(page.calls.filter((c) => c === 'press Escape')).toHaveLength(1);
  });
});

describe('detectChallenges', () => {
  it('finds providers by their markers', async () => {
    const page = new FakePage({ elements: { '.g-recaptcha': {}, '.h-captcha': {} } });

    expect(await detectChallenges(page)).toEqual(['reCAPTCHA', 'hCaptcha']);
  });

  it('finds a human-check phrase in the page text', async () => {
    const page = new FakePage({ bodyText: 'Please VERIFY YOU ARE HUMAN to continue' });

    expect(await detectChallenges(page)).toEqual(['Bot verification']);
  });

  it('reports a provider once even when marker and text both match', async () => {
    const page = new FakePage({
      elements: { '[aria-label*="not a robot"]': {} },
      bodyText: "I'm not a robot",
    });

    expect(await detectChallenges(page)).toEqual(['Bot verification']);
  });
});

describe('clearObstacles', () => {
  it('returns an empty report for a clean page', async () => {
    const { pace, pauses } = recordingPacer();

    const report = await clearObstacles(new FakePage(), pace);

    expect(report).toEqual({ dismissed: [], challenges: [], entries: [] });
    expect(pauses).toEqual([]);
  });

  it('finds nothing on a second pass once popups are closed', async () => {
    const page = new FakePage({
      elements: { '#onetrust-accept-btn-handler': { removeOnClick: true } },
    });
    const { pace } = recordingPacer();

    const first = await clearObstacles(page, pace);
    const second = await clearObstacles(page, pace);

    expect(first.dismissed).toEqual(['OneTrust cookie']);
    expect(second).toEqual({ dismissed: [], challenges: [], entries: [] });
  });

  it('ticks a checkbox challenge once', async () => {
    const page = new FakePage({
      elements: { '.g-recaptcha': {}, '#recaptcha-anchor': {} },
    });
    const { pace, pauses } = recordingPacer();

    const report = await clearObstacles(page, pace);

    expect(report.challenges).toEqual(['reCAPTCHA']);
    expect(report.entries).toEqual(['🚨 Detected: reCAPTCHA', '🤖 Clicked reCAPTCHA checkbox']);
    expect(page.calls.filter((c) => c === 'click #recaptcha-anchor')).toHaveLength(1);
    expect(pauses).toEqual([2000]);
  });

  it('waits out a passive challenge', async () => {
    const page = new FakePage({ elements: { '#cf-challenge-stage': {} } });
    const { pace, pauses } = recordingPacer();

    const report = await clearObstacles(page, pace);

    expect(report.entries).toEqual([
      '🚨 Detected: Cloudflare',
      '🛡️ Waiting for Cloudflare verification...',
    ]);
    expect(pauses).toEqual([5000]);
  });

  it('notes a checkbox challenge it cannot click', async () => {
    const page = new FakePage({ bodyText: 'Complete the security check' });
    const { pace } = recordingPacer();

    const report = await clearObstacles(page, pace);

    expect(report.entries).toEqual([
      '🚨 Detected: Bot verification',
      '⚠️ No clickable Bot verification checkbox found',
    ]);
  });
});

describe('obstacle catalog', () => {
  it('keeps cookie banners ahead of generic close buttons', () => {
    const categories = getObstacleCatalog().popups.map((p) => p.category);

    expect(categories.indexOf('Cookie banner')).toBeLessThan(categories.indexOf('Close button'));
  });

  it('is frozen all the way down', () => {
    const catalog = getObstacleCatalog();

    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog.popups[0]?.selectors)).toBe(true);
    expect(Object.isFrozen(catalog.challengeTexts.phrases)).toBe(true);
  });
});

import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import type { ObstacleReport } from '../schema/report.js';
import { PACING, TIMEOUTS } from '../config/defaults.js';
import { describeError } from '../core/errors.js';
import { deepFreeze } from '../utils/freeze.js';
import type { Pacer } from '../utils/pace.js';
import * as log from '../utils/logger.js';
import { attempt, firstSuccess } from './attempt.js';
import type { AttemptResult } from './attempt.js';
import type { PageHandle } from './page.js';

// ── Catalog schema ────────────────────────────────────────────

const challengeResponseSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('checkbox'),
    affordances: z.array(z.string().min(1)).min(1),
  }),
  z.object({ kind: z.literal('wait') }),
]);

export const obstacleCatalogSchema = z.object({
  popups: z.array(
    z.object({
      category: z.string().min(1),
      selectors: z.array(z.string().min(1)).min(1),
    }),
  ),
  overlays: z.array(z.string().min(1)),
  challenges: z.array(
    z.object({
      provider: z.string().min(1),
      markers: z.array(z.string().min(1)).min(1),
      response: challengeResponseSchema,
    }),
  ),
  challengeTexts: z.object({
    provider: z.string().min(1),
    phrases: z.array(z.string().min(1)),
  }),
});

export type ObstacleCatalog = z.infer<typeof obstacleCatalogSchema>;

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
export const DEFAULT_OBSTACLE_CATALOG_PATH = path.join(
  THIS_DIR,
  '..',
  '..',
  'data',
  'obstacles.json',
);

let defaultCatalog: ObstacleCatalog | undefined;

/** Parse, validate and freeze a catalog file. */
export function loadObstacleCatalog(
  catalogPath: string = DEFAULT_OBSTACLE_CATALOG_PATH,
): ObstacleCatalog {
  const raw: unknown = JSON.parse(readFileSync(catalogPath, 'utf-8'));
  return deepFreeze(obstacleCatalogSchema.parse(raw));
}

export function getObstacleCatalog(): ObstacleCatalog {
  defaultCatalog ??= loadObstacleCatalog();
  return defaultCatalog;
}

// ── Popups ────────────────────────────────────────────────────

export interface PopupReport {
  dismissed: string[];
  entries: string[];
}

/**
 * Click the first visible match of each popup category, then press
 * Escape once if an overlay is still on the page. Safe to repeat: a
 * clean page yields an empty report.
 */
export async function dismissPopups(
  page: PageHandle,
  pace: Pacer,
  catalog: ObstacleCatalog = getObstacleCatalog(),
): Promise<PopupReport> {
  const report: PopupReport = { dismissed: [], entries: [] };

  for (const popup of catalog.popups) {
    const search = await firstSuccess(popup.selectors, (selector) =>
      clickFirstVisible(page, selector),
    );
    if (!search.found) continue;

    report.dismissed.push(popup.category);
    report.entries.push(`✅ Closed ${popup.category}: ${search.locator}`);
    log.obstacle(`Closed ${popup.category} (${search.locator})`);
    await pace(PACING.POPUP_SETTLE);
  }

  for (const overlay of catalog.overlays) {
    const present = await countSafely(page, overlay);
    if (present === 0) continue;

    try {
      await page.keyboard.press('Escape');
    } catch (err) {
      log.warn(`Escape for overlay failed: ${describeError(err)}`);
      break;
    }
    report.dismissed.push('Overlay');
    report.entries.push('⌨️ Pressed Escape for overlay');
    await pace(PACING.OVERLAY_SETTLE);
    break;
  }

  return report;
}

// ── Challenges ────────────────────────────────────────────────

/** Providers whose markers are on the page, in catalog order. */
export async function detectChallenges(
  page: PageHandle,
  catalog: ObstacleCatalog = getObstacleCatalog(),
): Promise<string[]> {
  const found: string[] = [];

  for (const challenge of catalog.challenges) {
    for (const marker of challenge.markers) {
      if ((await countSafely(page, marker)) > 0) {
        found.push(challenge.provider);
        break;
      }
    }
  }

  let bodyText = '';
  try {
    bodyText = (await page.textContent('body', { timeout: TIMEOUTS.EXTRACT })) ?? '';
  } catch (err) {
    log.detail(`Challenge text scan skipped: ${describeError(err)}`);
  }

  const lowered = bodyText.toLowerCase();
  const { provider, phrases } = catalog.challengeTexts;
  if (phrases.some((phrase) => lowered.includes(phrase.toLowerCase()))) {
    found.push(provider);
  }

  return [...new Set(found)];
}

/**
 * Respond to detected challenges the way a person would: tick a
 * visible checkbox once, or wait for a passive check to clear.
 */
export async function handleChallenges(
  page: PageHandle,
  providers: readonly string[],
  pace: Pacer,
  catalog: ObstacleCatalog = getObstacleCatalog(),
): Promise<string[]> {
  const entries: string[] = [];

  for (const provider of providers) {
    const challenge = catalog.challenges.find((c) => c.provider === provider);
    if (!challenge) continue;

    const response = challenge.response;
    if (response.kind === 'wait') {
      entries.push(`🛡️ Waiting for ${provider} verification...`);
      log.obstacle(`Waiting for ${provider} verification`);
      await pace(PACING.PASSIVE_CHALLENGE_WAIT);
      continue;
    }

    const search = await firstSuccess(response.affordances, (selector) =>
      clickFirstVisible(page, selector),
    );
    if (search.found) {
      entries.push(`🤖 Clicked ${provider} checkbox`);
      log.obstacle(`Clicked ${provider} checkbox (${search.locator})`);
      await pace(PACING.CHECKBOX_SETTLE);
    } else {
      entries.push(`⚠️ No clickable ${provider} checkbox found`);
    }
  }

  return entries;
}

// ── Combined pass ─────────────────────────────────────────────

/** One housekeeping pass: popups first, then challenges. Never throws. */
export async function clearObstacles(
  page: PageHandle,
  pace: Pacer,
  catalog: ObstacleCatalog = getObstacleCatalog(),
): Promise<ObstacleReport> {
  const popups = await dismissPopups(page, pace, catalog);
  const challenges = await detectChallenges(page, catalog);

  const entries = [...popups.entries];
  if (challenges.length > 0) {
    entries.push(`🚨 Detected: ${challenges.join(', ')}`);
    entries.push(...(await handleChallenges(page, challenges, pace, catalog)));
  }

  return { dismissed: popups.dismissed, challenges, entries };
}

// ── Helpers ───────────────────────────────────────────────────

async function clickFirstVisible(
  page: PageHandle,
  selector: string,
): Promise<AttemptResult> {
  return attempt(selector, async () => {
    const matches = page.locator(selector);
    const count = await matches.count();

    for (let i = 0; i < count; i++) {
      const element = matches.nth(i);
      if (await element.isVisible()) {
        await element.click({ timeout: TIMEOUTS.CLICK });
        return;
      }
    }
    throw new Error('no visible match');
  });
}

async function countSafely(page: PageHandle, selector: string): Promise<number> {
  try {
    return await page.locator(selector).count();
  } catch {
    return 0;
  }
}

import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { deepFreeze } from '../utils/freeze.js';

// ── Catalog schema ────────────────────────────────────────────

export const locatorActionSchema = z.enum(['click', 'fill']);

export type LocatorAction = z.infer<typeof locatorActionSchema>;

const locatorListSchema = z.array(z.string().min(1));

const selectorRuleSchema = z.object({
  keywords: z.array(z.string().min(1)).min(1),
  sites: z.record(locatorListSchema),
  generic: locatorListSchema,
});

const actionCatalogSchema = z.object({
  rules: z.array(selectorRuleSchema),
  default: locatorListSchema,
});

export const selectorCatalogSchema = z.object({
  /** Site identity → host substrings, in priority order. */
  sites: z.record(z.array(z.string().min(1)).min(1)),
  actions: z.object({
    click: actionCatalogSchema,
    fill: actionCatalogSchema,
  }),
});

export type SelectorCatalog = z.infer<typeof selectorCatalogSchema>;
export type SelectorRule = z.infer<typeof selectorRuleSchema>;

// ── Loading ───────────────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
export const DEFAULT_CATALOG_PATH = path.join(
  THIS_DIR,
  '..',
  '..',
  'data',
  'selectors.json',
);

let defaultCatalog: SelectorCatalog | undefined;

/** Parse, validate and freeze a catalog file. */
export function loadSelectorCatalog(
  catalogPath: string = DEFAULT_CATALOG_PATH,
): SelectorCatalog {
  const raw: unknown = JSON.parse(readFileSync(catalogPath, 'utf-8'));
  return deepFreeze(selectorCatalogSchema.parse(raw));
}

/** The bundled catalog, read once per process. */
export function getSelectorCatalog(): SelectorCatalog {
  defaultCatalog ??= loadSelectorCatalog();
  return defaultCatalog;
}

// ── Site detection ────────────────────────────────────────────

/**
 * Map a page URL to a site identity from the catalog, or `undefined`
 * for hosts the catalog knows nothing about.
 */
export function detectSiteFromHost(
  url: string,
  catalog: SelectorCatalog = getSelectorCatalog(),
): string | undefined {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return undefined;
  }

  for (const [site, patterns] of Object.entries(catalog.sites)) {
    if (patterns.some((pattern) => host.includes(pattern))) return site;
  }
  return undefined;
}

// ── Candidate generation ──────────────────────────────────────

/**
 * Ordered locator candidates for an abstract target.
 *
 * Without `pageUrl`, site-specific locators of every known site come
 * first (in catalog priority), then the generic ones. With `pageUrl`, a
 * recognized site's own locators lead and other sites' are dropped;
 * an unrecognized host tries the generic locators before any
 * site-specific ones.
 *
 * No target means no strategy: the caller falls back to text matching.
 */
export function selectorCandidates(
  target: string | undefined,
  action: LocatorAction,
  pageUrl?: string,
  catalog: SelectorCatalog = getSelectorCatalog(),
): string[] {
  if (!target) return [];

  const needle = target.toLowerCase();
  const actionCatalog = catalog.actions[action];
  const rule = actionCatalog.rules.find((r) =>
    r.keywords.some((keyword) => needle.includes(keyword)),
  );

  if (!rule) return unique(actionCatalog.default);

  const siteOrder = Object.keys(catalog.sites);
  const siteSpecific = (sites: readonly string[]): string[] =>
    sites.flatMap((site) => rule.sites[site] ?? []);

  if (pageUrl === undefined) {
    return unique([...siteSpecific(siteOrder), ...rule.generic]);
  }

  const site = detectSiteFromHost(pageUrl, catalog);
  if (site) {
    return unique([...siteSpecific([site]), ...rule.generic]);
  }
  return unique([...rule.generic, ...siteSpecific(siteOrder)]);
}

function unique(locators: readonly string[]): string[] {
  return [...new Set(locators)];
}

import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  detectSiteFromHost,
  getSelectorCatalog,
  loadSelectorCatalog,
  selectorCandidates,
} from '../browser/selectors.js';

const GENERIC_SEARCH_FIELDS = [
  "[role='searchbox']",
  "input[type='search']",
  "input[placeholder*='Search']",
  "input[placeholder*='search']",
  '#search',
  '.search-input',
];

describe('detectSiteFromHost', () => {
  it('maps known hosts to their site', () => {
    expect(detectSiteFromHost('https://www.youtube.com/watch?v=abc')).toBe('youtube');
    expect(detectSiteFromHost('https://youtu.be/abc')).toBe('youtube');
    expect(detectSiteFromHost('https://www.google.co.uk/search?q=x')).toBe('google');
    expect(detectSiteFromHost('https://www.amazon.de/')).toBe('amazon');
  });

  it('returns undefined for unknown or unparsable URLs', () => {
    expect(detectSiteFromHost('https://example.org')).toBeUndefined();
    expect(detectSiteFromHost('not a url')).toBeUndefined();
  });
});

describe('selectorCandidates', () => {
  it('returns nothing without a target', () => {
    expect(selectorCandidates(undefined, 'click')).toEqual([]);
    expect(selectorCandidates('', 'fill')).toEqual([]);
  });

  it('leads with the current site and drops other sites', () => {
    expect(selectorCandidates('search', 'fill', 'https://www.google.com/')).toEqual([
      "input[name='q']",
      "textarea[name='q']",
      '#APjFqb',
      "input[title='Search']",
      ...GENERIC_SEARCH_FIELDS,
    ]);
  });

  it('tries generic locators first on an unknown host', () => {
    const candidates = selectorCandidates('search', 'fill', 'https://example.org');

    expect(candidates.slice(0, GENERIC_SEARCH_FIELDS.length)).toEqual(GENERIC_SEARCH_FIELDS);
    expect(candidates[GENERIC_SEARCH_FIELDS.length]).toBe("input[name='search_query']");
    expect(candidates).toHaveLength(GENERIC_SEARCH_FIELDS.length + 9);
  });

  it('lists every site in catalog order when no page is known', () => {
    expect(selectorCandidates('search_submit', 'click')).toEqual([
      'button#search-icon-legacy',
      '#search-icon-legacy',
      "input[name='btnK']",
      "input[value='Google Search']",
      'input#nav-search-submit-button',
      "button[type='submit']",
      "input[type='submit']",
      "button[aria-label*='Search']",
    ]);
  });

  it('matches keywords case-insensitively', () => {
    expect(selectorCandidates('First_Video', 'click', 'https://example.org')).toEqual([
      'a:first-of-type',
      'button:first-of-type',
      'a#video-title',
      '#contents a#video-title:first-of-type',
      '.ytd-video-renderer a:first-of-type',
      "a[href*='/watch']:first-of-type",
    ]);
  });

  it('falls back to the default list for unrecognized targets', () => {
    expect(selectorCandidates('username', 'fill', 'https://example.org')).toEqual([
      "input[type='text']",
      'input',
      'textarea',
    ]);
    expect(selectorCandidates('Sign in', 'click')).toEqual(['button', 'a', "input[type='button']"]);
  });

  it('never repeats a locator', () => {
    const candidates = selectorCandidates('search', 'click', 'https://www.youtube.com/');
    expect(new Set(candidates).size).toBe(candidates.length);
  });
});

describe('selector catalog', () => {
  it('loads the bundled catalog once and freezes it', () => {
    const catalog = getSelectorCatalog();

    expect(getSelectorCatalog()).toBe(catalog);
    expect(Object.isFrozen(catalog.actions.fill.default)).toBe(true);
  });

  it('validates the catalog file', () => {
    const here = path.dirname(fileURLToPath(import.meta.url));
    const catalog = loadSelectorCatalog(path.join(here, '..', '..', 'data', 'selectors.json'));

    expect(Object.keys(catalog.sites)).toEqual(['youtube', 'google', 'amazon']);
  });
});

import { describe, it, expect } from 'vitest';

import {
  exitCodeFor,
  formatTrace,
  generateJSON,
  generateMarkdown,
  serializeJSON,
} from '../report/reporter.js';
import { SessionError } from '../core/errors.js';
import { createStep, jsonOutputSchema } from '../schema/index.js';
import type { RunReport } from '../schema/index.js';

function buildReport(overrides: Partial<RunReport> = {}): RunReport {
  const navigate = createStep({ action: 'navigate', description: 'Open site', target: 'https://example.org' });
  const extract = createStep({ action: 'extract_text', description: 'Read heading', selector: 'h1' });
  const submit = createStep({ action: 'click', description: 'Submit', target: 'search_submit', optional: true });

  return {
    runId: 'run-1',
    instruction: 'read the heading',
    startUrl: 'https://example.org',
    plannedBy: 'model',
    plan: [navigate, extract, submit],
    finalState: 'closed',
    trace: ['🎯 Executing 3 steps for: read the heading', '🎉 Automation completed!'],
    steps: [
      { index: 0, step: navigate, success: true, skipped: false, message: 'Navigated to https://example.org' },
      {
        index: 1,
        step: extract,
        success: true,
        skipped: false,
        message: 'Extracted text from h1',
        extracted: 'Example Domain',
      },
      { index: 2, step: submit, success: true, skipped: true, message: 'Could not click search_submit' },
    ],
    obstacles: [
      { dismissed: ['Cookie banner'], challenges: ['Cloudflare'], entries: [] },
      { dismissed: [], challenges: ['Cloudflare'], entries: [] },
    ],
    startedAt: '2024-01-02T03:04:05.000Z',
    finishedAt: '2024-01-02T03:04:07.500Z',
    durationMs: 2500,
    ...overrides,
  };
}

describe('exitCodeFor', () => {
  it('maps run outcomes to exit codes', () => {
    expect(exitCodeFor(buildReport())).toBe(0);
    expect(exitCodeFor(buildReport({ steps: [] }))).toBe(1);
    expect(exitCodeFor(buildReport({ plannedBy: 'none', plan: [], steps: [] }))).toBe(3);
    expect(
      exitCodeFor(buildReport({ finalState: 'failed', error: new SessionError('Browser failed to start: x') })),
    ).toBe(5);
  });
});

describe('formatTrace', () => {
  it('joins trace entries with newlines', () => {
    expect(formatTrace(buildReport())).toBe(
      '🎯 Executing 3 steps for: read the heading\n🎉 Automation completed!',
    );
  });
});

describe('generateJSON', () => {
  it('produces output that matches the contract schema', () => {
    const output = generateJSON(buildReport());

    expect(jsonOutputSchema.safeParse(output).success).toBe(true);
    expect(output.success).toBe(true);
    expect(output.exitCode).toBe(0);
    expect(output.obstaclesDismissed).toEqual(['Cookie banner']);
    expect(output.challenges).toEqual(['Cloudflare']);
    expect(output.steps.map((s) => s.result)).toEqual(['success', 'success', 'skipped']);
    expect(output.steps[1]?.extracted).toBe('Example Domain');
    expect(output.error).toBeUndefined();
  });

  it('carries the session error message', () => {
    const output = generateJSON(
      buildReport({ finalState: 'failed', steps: [], error: new SessionError('Browser failed to start: x') }),
    );

    expect(output.error).toBe('Browser failed to start: x');
    expect(output.exitCode).toBe(5);
    expect(output.success).toBe(false);
  });
});

describe('serializeJSON', () => {
  it('sorts keys at every level', () => {
    const text = serializeJSON(generateJSON(buildReport()));
    const parsed: object = JSON.parse(text);
    const topKeys = Object.keys(parsed);

    expect(topKeys).toEqual([...topKeys].sort());
    expect(text).toContain('"action": "navigate",\n      "description": "Open site",\n      "index": 0,');
  });
});

describe('generateMarkdown', () => {
  it('renders the step table and extracted text', () => {
    const markdown = generateMarkdown(buildReport());

    expect(markdown).toContain('| 1 | navigate | Open site | [OK] | Navigated to https://example.org |');
    expect(markdown).toContain('| 3 | click | Submit | [SKIP] | Could not click search_submit |');
    expect(markdown).toContain('### Step 2: Read heading\n\n```\nExample Domain\n```');
    expect(markdown).toContain('| **Duration** | 2.5s |');
    expect(markdown).toContain('- Dismissed: Cookie banner');
  });

  it('notes planned steps that never started', () => {
    const report = buildReport();
    const markdown = generateMarkdown({ ...report, steps: report.steps.slice(0, 1) });

    expect(markdown).toContain('_2 planned steps were not started._');
  });
});

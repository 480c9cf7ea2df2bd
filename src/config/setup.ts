import { existsSync } from 'node:fs';

import { chromium } from 'playwright';

import { SetupError } from '../core/errors.js';
import { apiKeyVariable } from '../llm/client.js';
import type { LLMConfig } from '../llm/client.js';

// ── Public types ─────────────────────────────────────────────

export interface SetupOptions {
  /** False when model planning is switched off (`--no-model`). */
  requireModel: boolean;
  /** False for commands that never open a browser (`plan`). */
  requireBrowser: boolean;
  /** Override for tests; defaults to Playwright's bundled Chromium. */
  browserExecutable?: () => string;
  fileExists?: (path: string) => boolean;
}

// ── Environment validation ──────────────────────────────────

/**
 * Collect every setup problem up front and raise them together, so
 * nothing starts a browser or calls a model with a broken environment.
 */
export function checkSetup(llm: LLMConfig, options: SetupOptions): void {
  const issues: string[] = [];

  if (options.requireModel && !llm.apiKey) {
    const variable = apiKeyVariable(llm.provider);
    if (variable) issues.push(`${variable} not set`);
  }

  if (options.requireBrowser) {
    const resolveExecutable =
      options.browserExecutable ?? (() => chromium.executablePath());
    const fileExists = options.fileExists ?? existsSync;

    let executable = '';
    try {
      executable = resolveExecutable();
    } catch {
      executable = '';
    }

    if (!executable || !fileExists(executable)) {
      issues.push(
        'Chromium is not installed (run `npx playwright install chromium`)',
      );
    }
  }

  if (issues.length > 0) {
    throw new SetupError(issues);
  }
}

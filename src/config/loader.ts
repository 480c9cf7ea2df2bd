import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';

export const DEFAULT_CONFIG_PATH = '.webpilot.yaml';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.webpilot.yaml` (or JSON) config file.
 * Throws a descriptive error if the file is invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  const raw = await readFile(configPath, 'utf-8');

  const parsed: unknown = configPath.endsWith('.json')
    ? JSON.parse(raw)
    : parseYaml(raw);

  return fileConfigSchema.parse(parsed ?? {});
}

/**
 * Like `loadConfigFile`, but a missing file at the default path is
 * not an error. An explicitly named file must exist.
 */
export async function loadOptionalConfigFile(
  configPath: string,
  explicit: boolean,
): Promise<FileConfig> {
  try {
    return await loadConfigFile(configPath);
  } catch (err) {
    if (!explicit && isMissingFile(err)) return {};
    throw err;
  }
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'ENOENT'
  );
}

/**
 * Live execution logger for webpilot.
 *
 * All output goes to stderr so stdout stays clean for JSON output.
 * Emoji prefixes give instant visual context in the terminal.
 * Set WEBPILOT_QUIET=1 to silence it.
 */

// ── Core write ──────────────────────────────────────────────

export function isQuiet(): boolean {
  return process.env['WEBPILOT_QUIET'] === '1';
}

function write(message: string): void {
  if (isQuiet()) return;
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function planned(stepCount: number, source: string): void {
  write(`🧠 Planner (${source}): generated ${String(stepCount)} steps`);
}

export function llm(message: string): void {
  write(`🧠 ${message}`);
}

export function browser(message: string): void {
  write(`🌐 ${message}`);
}

export function obstacle(message: string): void {
  write(`🛡️  ${message}`);
}

export function attempt(message: string): void {
  write(`   ↳ ${message}`);
}

/** Session trace entries are printed as recorded. */
export function trace(entry: string): void {
  write(entry);
}

/**
 * Report generation module.
 * Deterministic — no LLM calls.
 * Turns a finished run into trace text, markdown and JSON.
 */

export {
  exitCodeFor,
  formatTrace,
  generateMarkdown,
  generateJSON,
  serializeJSON,
} from './reporter.js';
export type { JsonOutput, JsonOutputStep } from './reporter.js';

/**
 * CLI module — thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export {
  registerRunCommand,
  registerPlanCommand,
  resolveSettings,
  reportCliError,
  printTraceIfQuiet,
} from './run.js';
export { registerInteractiveCommand } from './interactive.js';

/**
 * CLI module: the run and set-pr-status commands.
 * Maps errors to exit codes; the work itself happens in core.
 */

export { registerRunCommand, registerStatusCommand, EXIT_CODES, exitCodeFor } from './run.js';

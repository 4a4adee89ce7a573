// @runcard/cli
// Command handlers behind the runcard launcher, usable without the CLI

export {
  validateRuncardSchema,
  runRuncardSchema,
  type ValidateRuncardArgs,
  type RunRuncardArgs,
} from './command-defs/runcard.js';
export { createCommandContext, type CommandContext } from './core/command-context.js';
export { EXIT_CODES, exitCodeForResult, exitCodeForError, type ExitCode } from './core/exit-codes.js';
export {
  detectRuncardFormat,
  parseRuncardText,
  loadRuncardFile,
  type RuncardFormat,
  type LoadedRuncard,
  type ReadFile,
} from './core/runcard-loader.js';
export { openStore, type StoreKind, type StoreOptions, type OpenStore } from './core/stores.js';
export { validateRuncardHandler, type ValidateRuncardResult } from './handlers/validate-runcard.js';
export {
  runRuncardHandler,
  type RunOutcome,
  type RunRuncardResult,
  type RunRuncardOptions,
} from './handlers/run-runcard.js';

// @runcard/protocol
// Declarative types, runcard schema and validation shared by every package

export * from './types/index.js';

export {
  parseRuncard,
  runcardDocumentSchema,
  type RuncardDocument,
  type RuncardIssue,
  type RuncardIssueCode,
  type RuncardWarning,
  type RuncardWarningCode,
  type RuncardParseResult,
} from './validation/schema.js';

export {
  validateRuncard,
  loadRuncard,
  checkRoutineShape,
  type RuncardValidationResult,
  type RuncardLoadResult,
} from './validation/runcard.js';

export { parseCondition, compareCondition, formatCondition } from './validation/conditions.js';

export * from './bundle/paths.js';
export * from './bundle/ndjson.js';

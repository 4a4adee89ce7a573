/**
 * Handler: Validate Runcard
 *
 * Runs every check that happens before an experiment starts (document shape,
 * cross-references, instrument types and endpoints, formulas, dependency
 * cycles) without connecting to any instrument.
 */

import { resolve } from 'node:path';
import {
  buildExperiment,
  createCapturingLogger,
  isValidationError,
  type ValidationError,
  type ValidationIssue,
} from '@runcard/runtime';
import type { ValidateRuncardArgs } from '../command-defs/runcard.js';
import type { CommandContext } from '../core/command-context.js';
import { EXIT_CODES, type ExitCode } from '../core/exit-codes.js';
import { loadRuncardFile } from '../core/runcard-loader.js';
import { formatIssue, formatValidationSummary } from './format.js';

export type ValidateRuncardResult = {
  path: string;
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  exitCode: ExitCode;
};

export function issuesOf(error: ValidationError): ValidationIssue[] {
  if (error.issues.length > 0) {
    return error.issues;
  }
  return [{ path: error.field ?? 'runcard', message: error.message, code: error.code }];
}

export async function validateRuncardHandler(
  args: ValidateRuncardArgs,
  ctx: CommandContext
): Promise<ValidateRuncardResult> {
  const path = resolve(args.file);
  const loaded = await loadRuncardFile(path, ctx.readFile);
  const errors: ValidationIssue[] = [...loaded.errors];
  const warnings: ValidationIssue[] = [...loaded.warnings];

  if (loaded.runcard) {
    const logger = createCapturingLogger();
    try {
      buildExperiment(loaded.runcard, { logger, instruments: ctx.instruments });
    } catch (error) {
      if (!isValidationError(error)) throw error;
      errors.push(...issuesOf(error));
    }

    // Cross-reference warnings are already in the load result
    for (const entry of logger.entries) {
      if (entry.level !== 'warn' || entry.message === 'Runcard warning') continue;
      const variable = entry.data?.variable;
      const detail = entry.data?.error;
      warnings.push({
        path: typeof variable === 'string' ? `Variables.${variable}` : 'runcard',
        message: typeof detail === 'string' ? `${entry.message}: ${detail}` : entry.message,
        code: 'DRY_RUN',
      });
    }
  }

  for (const issue of errors) {
    ctx.out(formatIssue('error', issue));
  }
  for (const issue of warnings) {
    ctx.out(formatIssue('warning', issue));
  }
  ctx.out(formatValidationSummary(args.file, errors, warnings));

  const valid = errors.length === 0;
  return {
    path,
    valid,
    errors,
    warnings,
    exitCode: valid ? EXIT_CODES.OK : EXIT_CODES.VALIDATION,
  };
}

// Runcard document schema
//
// Turns the raw document produced by a YAML/JSON parser into a typed Runcard.
// Shape errors (wrong types, missing fields, unparseable conditions, unknown
// protocols) are reported here; cross-references are checked by validateRuncard.

import { z } from 'zod';
import type {
  Runcard,
  RuncardDescription,
  RuncardSettings,
  InstrumentSpec,
  PlotDefinition,
} from '../types/runcard.js';
import { DEFAULT_SETTINGS } from '../types/runcard.js';
import type { VariableDefinition } from '../types/variables.js';
import type { AlarmDefinition, AlarmProtocol } from '../types/alarms.js';
import type { RoutineDefinition } from '../types/routines.js';
import { toRoutineType } from '../types/routines.js';
import { TIME_AXIS } from '../types/common.js';
import { parseCondition } from './conditions.js';

/**
 * Error codes for runcard problems that prevent an experiment from starting
 */
export type RuncardIssueCode =
  | 'MISSING_FIELD'
  | 'INVALID_TYPE'
  | 'INVALID_VALUE'
  | 'INVALID_CONDITION'
  | 'INVALID_SYMBOL'
  | 'INVALID_ROUTINE'
  | 'UNKNOWN_REFERENCE'
  | 'DUPLICATE_DEFINITION'
  | 'CONFLICTING_ROUTINE';

/**
 * Warning codes (the experiment can still run)
 */
export type RuncardWarningCode =
  | 'MISSING_DESCRIPTION'
  | 'EMPTY_SECTION'
  | 'UNUSED_INSTRUMENT'
  | 'UNKNOWN_SETTING';

export type RuncardIssue = {
  path: string;
  message: string;
  code: RuncardIssueCode;
};

export type RuncardWarning = {
  path: string;
  message: string;
  code: RuncardWarningCode;
};

export type RuncardParseResult =
  | { success: true; runcard: Runcard; warnings: RuncardWarning[] }
  | { success: false; errors: RuncardIssue[]; warnings: RuncardWarning[] };

// --- Schemas ---

const text = z.union([z.string(), z.number()]).transform((value) => String(value));

const numberList = z
  .union([z.number(), z.array(z.number())])
  .transform((value) => (Array.isArray(value) ? value : [value]));

function section<T extends z.ZodTypeAny>(entry: T) {
  return z.record(z.string(), entry).nullish();
}

const descriptionSchema = z.object({
  name: text.optional(),
  operator: text.optional(),
  platform: text.optional(),
  comments: text.optional(),
});

const settingsSchema = z.object({
  'follow-up': text.nullish(),
  'step interval': z.number().positive().optional(),
  'plot interval': z.number().int().positive().optional(),
  'save interval': z.number().int().positive().optional(),
  clock: z.enum(['wall', 'simulated']).optional(),
  'max ticks': z.number().int().positive().optional(),
  duration: z.number().positive().optional(),
  'retry limit': z.number().int().nonnegative().optional(),
  'queue capacity': z.number().int().positive().optional(),
});

const KNOWN_SETTINGS = new Set(Object.keys(settingsSchema.shape));

const settingsDocumentSchema = settingsSchema.passthrough();

const instrumentSchema = z
  .object({
    type: z.string().min(1),
    address: text.optional(),
  })
  .passthrough();

const variableSchema = z
  .object({
    instrument: z.string().min(1).optional(),
    knob: text.optional(),
    meter: text.optional(),
    preset: z.number().optional(),
    postset: z.number().optional(),
    expression: z.string().min(1).optional(),
    definitions: z.record(z.string(), z.string()).optional(),
  })
  .superRefine((variable, ctx) => {
    const sources = [variable.knob, variable.meter, variable.expression].filter(
      (source) => source !== undefined
    );

    if (sources.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Variable must declare exactly one of knob, meter or expression',
      });
      return;
    }

    if ((variable.knob !== undefined || variable.meter !== undefined) && !variable.instrument) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['instrument'],
        message: 'Knob and meter variables must name an instrument',
      });
    }

    if (variable.knob === undefined && (variable.preset !== undefined || variable.postset !== undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['preset'],
        message: 'Only knob variables can have presets or postsets',
      });
    }
  });

const alarmSchema = z.object({
  variable: z.string().min(1),
  condition: text,
  protocol: z.string().min(1),
});

const plotSchema = z
  .object({
    x: z.string().min(1).optional(),
    y: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
  })
  .passthrough();

const routineSchema = z.object({
  type: z.string().min(1).optional(),
  variable: z.string().min(1),
  times: numberList,
  values: numberList,
});

export const runcardDocumentSchema = z.object({
  Description: descriptionSchema.nullish(),
  Settings: settingsDocumentSchema.nullish(),
  Instruments: section(instrumentSchema),
  Variables: section(variableSchema),
  Alarms: section(alarmSchema),
  Plots: section(plotSchema),
  Routines: section(routineSchema),
});

export type RuncardDocument = z.infer<typeof runcardDocumentSchema>;

const PROTOCOLS: Record<string, AlarmProtocol> = {
  wait: 'wait',
  hold: 'hold',
  'hold-and-retry': 'hold',
  abort: 'abort',
};

// --- Parsing ---

/**
 * Parse a raw runcard document into a Runcard.
 *
 * @param document - Output of a YAML or JSON parser
 * @returns The typed runcard, or the shape errors found
 */
export function parseRuncard(document: unknown): RuncardParseResult {
  const errors: RuncardIssue[] = [];
  const warnings: RuncardWarning[] = [];

  const parsed = runcardDocumentSchema.safeParse(document ?? {});
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      errors.push(fromZodIssue(issue));
    }
    return { success: false, errors, warnings };
  }

  const doc = parsed.data;

  const description: RuncardDescription = { ...(doc.Description ?? {}) };
  const settings = toSettings(doc.Settings ?? {}, warnings);

  const instruments: InstrumentSpec[] = Object.entries(doc.Instruments ?? {}).map(
    ([name, entry]) => {
      const { type, address, ...options } = entry;
      return { name, type, address: address ?? '', options };
    }
  );

  const variables: VariableDefinition[] = Object.entries(doc.Variables ?? {}).map(
    ([name, entry]) => toVariable(name, entry)
  );

  const alarms: AlarmDefinition[] = [];
  for (const [name, entry] of Object.entries(doc.Alarms ?? {})) {
    const condition = parseCondition(entry.condition);
    if (!condition) {
      errors.push({
        path: `Alarms.${name}.condition`,
        message: `Invalid condition "${entry.condition}"; expected an operator and a threshold, e.g. ">1"`,
        code: 'INVALID_CONDITION',
      });
    }

    const protocol = PROTOCOLS[entry.protocol.trim().toLowerCase()];
    if (!protocol) {
      errors.push({
        path: `Alarms.${name}.protocol`,
        message: `Unknown protocol "${entry.protocol}"; expected wait, hold, hold-and-retry or abort`,
        code: 'INVALID_VALUE',
      });
    }

    if (condition && protocol) {
      alarms.push({ name, variable: entry.variable, condition, protocol });
    }
  }

  const plots: PlotDefinition[] = Object.entries(doc.Plots ?? {}).map(([name, entry]) => {
    const { x, y, ...hints } = entry;
    return { name, x: x ?? TIME_AXIS, y: Array.isArray(y) ? y : [y], hints };
  });

  const routines: RoutineDefinition[] = [];
  for (const [name, entry] of Object.entries(doc.Routines ?? {})) {
    const declaredType = entry.type ?? 'Timecourse';
    const type = toRoutineType(declaredType);
    if (!type) {
      errors.push({
        path: `Routines.${name}.type`,
        message: `Unknown routine type "${declaredType}"; expected Timecourse, Hold, Ramp, Sweep or Transit`,
        code: 'INVALID_VALUE',
      });
      continue;
    }
    routines.push({
      name,
      type,
      variable: entry.variable,
      times: entry.times,
      values: entry.values,
    });
  }

  if (errors.length > 0) {
    return { success: false, errors, warnings };
  }

  return {
    success: true,
    runcard: { description, settings, instruments, variables, alarms, plots, routines },
    warnings,
  };
}

function toSettings(
  raw: z.infer<typeof settingsDocumentSchema>,
  warnings: RuncardWarning[]
): RuncardSettings {
  for (const key of Object.keys(raw)) {
    if (!KNOWN_SETTINGS.has(key)) {
      warnings.push({
        path: `Settings.${key}`,
        message: `Unknown setting "${key}" is ignored`,
        code: 'UNKNOWN_SETTING',
      });
    }
  }

  return {
    stepInterval: raw['step interval'] ?? DEFAULT_SETTINGS.stepInterval,
    plotInterval: raw['plot interval'] ?? DEFAULT_SETTINGS.plotInterval,
    saveInterval: raw['save interval'] ?? DEFAULT_SETTINGS.saveInterval,
    followUp: toFollowUp(raw['follow-up']),
    clock: raw.clock ?? DEFAULT_SETTINGS.clock,
    maxTicks: raw['max ticks'],
    duration: raw.duration,
    retryLimit: raw['retry limit'] ?? DEFAULT_SETTINGS.retryLimit,
    queueCapacity: raw['queue capacity'] ?? DEFAULT_SETTINGS.queueCapacity,
  };
}

function toFollowUp(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed === '' || trimmed.toLowerCase() === 'none') {
    return null;
  }
  return trimmed;
}

function toVariable(name: string, entry: z.infer<typeof variableSchema>): VariableDefinition {
  if (entry.expression !== undefined) {
    return {
      kind: 'expression',
      name,
      expression: entry.expression,
      definitions: { ...(entry.definitions ?? {}) },
    };
  }

  if (entry.knob !== undefined) {
    return {
      kind: 'knob',
      name,
      instrument: entry.instrument ?? '',
      knob: entry.knob,
      preset: entry.preset,
      postset: entry.postset,
    };
  }

  return {
    kind: 'meter',
    name,
    instrument: entry.instrument ?? '',
    meter: entry.meter ?? '',
  };
}

function fromZodIssue(issue: z.ZodIssue): RuncardIssue {
  const path = issue.path.length > 0 ? issue.path.join('.') : 'runcard';

  if (issue.code === z.ZodIssueCode.invalid_type) {
    return {
      path,
      message: issue.received === 'undefined' ? `${path} is required` : issue.message,
      code: issue.received === 'undefined' ? 'MISSING_FIELD' : 'INVALID_TYPE',
    };
  }

  return { path, message: issue.message, code: 'INVALID_VALUE' };
}

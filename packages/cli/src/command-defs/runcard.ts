import { z } from 'zod';

/**
 * Schema for the validate command
 */
export const validateRuncardSchema = z.object({
  file: z.string().min(1),
});

export type ValidateRuncardArgs = z.infer<typeof validateRuncardSchema>;

/**
 * Schema for the run command
 */
export const runRuncardSchema = z.object({
  file: z.string().min(1),
  maxTicks: z.coerce.number().int().positive().optional(),
  clock: z.enum(['wall', 'simulated']).optional(),
  store: z.enum(['memory', 'bundle', 'postgres']).default('bundle'),
  output: z.string().min(1).default('results'),
  databaseUrl: z.string().min(1).optional(),
  followUp: z.boolean().default(true),
  quiet: z.boolean().default(false),
});

export type RunRuncardArgs = z.infer<typeof runRuncardSchema>;

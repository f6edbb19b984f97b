// Configuration fragments shared by the executor schemas
import { z } from 'zod';

import { durationSchema } from '../config/settings.js';

import type { LoadProfile } from './types.js';

export const loadFields = {
  concurrency: z.number().int().positive().optional(),
  'ramp-up': durationSchema.optional(),
  'hold-for': durationSchema.optional(),
  iterations: z.number().int().positive().optional()
};

/**
 * Object form of the load fields, for tools that honour only some of them:
 * `loadShape.pick({ concurrency: true }).extend({...}).strict()` rejects the rest.
 */
export const loadShape = z.object(loadFields);

export const envSchema = z.record(z.union([z.string(), z.number(), z.boolean()]).transform(String));

/**
 * Tool binary from `modules.<type>.path`.
 */
export const toolPath = (defaultPath: string) => z.string().min(1).default(defaultPath);

export function toLoadProfile(parsed: {
  concurrency?: number;
  'ramp-up'?: number;
  'hold-for'?: number;
  iterations?: number;
}): LoadProfile {
  return {
    concurrency: parsed.concurrency,
    rampUpMs: parsed['ramp-up'],
    holdForMs: parsed['hold-for'],
    iterations: parsed.iterations
  };
}

// RunSettings: the `settings:` section of a plan document
import { z } from 'zod';

import { parseDuration } from '../utils/duration.js';

export type ConcurrencyPolicy = 'sequential' | 'parallel';

export const durationSchema = z
  .union([z.number().nonnegative(), z.string()])
  .transform((value, ctx) => {
    try {
      return parseDuration(value);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err)
      });
      return z.NEVER;
    }
  });

export const DEFAULT_ARTIFACTS_DIR = '%Y-%m-%d_%H-%M-%S';

export const settingsSchema = z.object({
  'artifacts-dir': z.string().min(1).default(DEFAULT_ARTIFACTS_DIR),
  sequential: z.boolean().default(false),
  'max-concurrency': z.number().int().nonnegative().default(0),
  timeout: durationSchema.optional(),
  'check-interval': durationSchema.default('1s'),
  'stop-grace': durationSchema.default('5s'),
  'heartbeat-timeout': durationSchema.default(0),
  'best-effort': z.boolean().default(false),
  'default-executor': z.string().optional()
}).passthrough();

export interface RunSettings {
  artifactsDir: string;
  policy: ConcurrencyPolicy;
  /** 0 means unbounded */
  maxConcurrency: number;
  timeoutMs?: number;
  pollIntervalMs: number;
  stopGraceMs: number;
  /** 0 disables heartbeat checks */
  heartbeatTimeoutMs: number;
  bestEffort: boolean;
  defaultExecutor?: string;
}

export function toRunSettings(parsed: z.infer<typeof settingsSchema>): RunSettings {
  return {
    artifactsDir: parsed['artifacts-dir'],
    policy: parsed.sequential ? 'sequential' : 'parallel',
    maxConcurrency: parsed['max-concurrency'],
    timeoutMs: parsed.timeout,
    pollIntervalMs: Math.max(parsed['check-interval'], 1),
    stopGraceMs: parsed['stop-grace'],
    heartbeatTimeoutMs: parsed['heartbeat-timeout'],
    bestEffort: parsed['best-effort'],
    defaultExecutor: parsed['default-executor']
  };
}

/**
 * Expand strftime-style tokens in the artifacts directory name.
 */
export function expandArtifactsDir(pattern: string, now: Date): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  const tokens: Record<string, string> = {
    Y: String(now.getFullYear()),
    m: pad(now.getMonth() + 1),
    d: pad(now.getDate()),
    H: pad(now.getHours()),
    M: pad(now.getMinutes()),
    S: pad(now.getSeconds()),
    f: pad(now.getMilliseconds() * 1000, 6),
    '%': '%'
  };
  return pattern.replace(/%([YmdHMSf%])/g, (_match, token: string) => tokens[token]);
}

/**
 * ExternalDriver: runs an arbitrary command that writes JSON-lines samples
 * to stdout or to a file in its artifact directory.
 *
 * The load profile reaches the command through LOADPLAN_* environment
 * variables so any script can honour concurrency and duration settings.
 */

import * as path from 'path';

import { z } from 'zod';

import { JsonLinesDriver } from './JsonLinesDriver.js';
import type { CommandLine, ProcessDriverOptions } from './ProcessDriver.js';
import { envSchema, loadFields, toLoadProfile } from './schema.js';
import type { LoadProfile } from './types.js';

export const externalConfigSchema = z.object({
  ...loadFields,
  scenario: z.object({
    command: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
    samples: z.string().min(1).default('stdout'),
    env: envSchema.default({}),
    cwd: z.string().optional()
  }),
  settings: z.object({
    shell: z.string().min(1).default('/bin/sh')
  }).default({})
}).strict();

export type ExternalConfig = z.infer<typeof externalConfigSchema>;

export function loadProfileEnv(profile: LoadProfile, artifactDir: string): Record<string, string> {
  const env: Record<string, string> = { LOADPLAN_ARTIFACTS_DIR: artifactDir };
  if (profile.concurrency !== undefined) env.LOADPLAN_CONCURRENCY = String(profile.concurrency);
  if (profile.rampUpMs !== undefined) env.LOADPLAN_RAMP_UP_MS = String(profile.rampUpMs);
  if (profile.holdForMs !== undefined) env.LOADPLAN_HOLD_FOR_MS = String(profile.holdForMs);
  if (profile.iterations !== undefined) env.LOADPLAN_ITERATIONS = String(profile.iterations);
  return env;
}

export class ExternalDriver extends JsonLinesDriver {
  private readonly config: ExternalConfig;

  constructor(options: ProcessDriverOptions, config: ExternalConfig) {
    super(options);
    this.config = config;
  }

  protected samplesPath(): string {
    const target = this.config.scenario.samples;
    return target === 'stdout' ? this.stdoutPath : this.artifactPath(target);
  }

  protected buildCommand(artifactDir: string): CommandLine {
    const { scenario, settings } = this.config;
    const env = {
      ...loadProfileEnv(toLoadProfile(this.config), artifactDir),
      LOADPLAN_SAMPLES_FILE: this.samplesPath(),
      ...scenario.env
    };
    const cwd = scenario.cwd ? path.resolve(scenario.cwd) : undefined;

    if (typeof scenario.command === 'string') {
      return { command: settings.shell, args: ['-c', scenario.command], env, cwd };
    }
    const [command, ...args] = scenario.command;
    return { command, args, env, cwd };
  }
}

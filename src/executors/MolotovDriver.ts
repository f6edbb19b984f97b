/**
 * Molotov executor.
 *
 * Molotov runs with `--use-extension`; the extension writes one JSON line per
 * request to the file named in MOLOTOV_LOADPLAN_REPORT, which this driver
 * tails for samples.
 */

import * as path from 'path';

import { z } from 'zod';

import { toWholeSeconds } from '../utils/duration.js';

import { JsonLinesDriver } from './JsonLinesDriver.js';
import type { CommandLine, ProcessDriverOptions } from './ProcessDriver.js';
import { envSchema, loadFields, toolPath } from './schema.js';

export const REPORT_ENV = 'MOLOTOV_LOADPLAN_REPORT';

export const molotovConfigSchema = z.object({
  ...loadFields,
  scenario: z.object({
    script: z.string().min(1),
    env: envSchema.default({})
  }),
  settings: z.object({
    path: toolPath('molotov'),
    extension: z.string().min(1).default('loadplan_molotov_ext')
  }).default({})
}).strict();

export type MolotovConfig = z.infer<typeof molotovConfigSchema>;

export class MolotovDriver extends JsonLinesDriver {
  private readonly config: MolotovConfig;

  constructor(options: ProcessDriverOptions, config: MolotovConfig) {
    super(options);
    this.config = config;
  }

  protected samplesPath(): string {
    return this.artifactPath('molotov-report.ldjson');
  }

  protected buildCommand(): CommandLine {
    const { settings, scenario } = this.config;
    const args: string[] = [];

    if (this.config.concurrency !== undefined) {
      args.push('--workers', String(this.config.concurrency));
    }

    let duration = 0;
    const rampUp = this.config['ramp-up'];
    if (rampUp) {
      const seconds = toWholeSeconds(rampUp);
      duration += seconds;
      args.push('--ramp-up', String(seconds));
    }
    const holdFor = this.config['hold-for'];
    if (holdFor) {
      duration += toWholeSeconds(holdFor);
    }
    if (duration > 0) {
      args.push('--duration', String(duration));
    }
    if (this.config.iterations !== undefined) {
      args.push('--max-runs', String(this.config.iterations));
    }

    args.push(`--use-extension=${settings.extension}`, path.resolve(scenario.script));

    return {
      command: settings.path,
      args,
      env: { ...scenario.env, [REPORT_ENV]: this.samplesPath() }
    };
  }
}

/**
 * Mocha executor for browser-automation suites.
 *
 * The suite runs under the json-stream reporter, which prints one JSON array
 * per event on stdout. Each finished test becomes a latency sample and a
 * throughput sample; failing tests also count as errors.
 */

import * as path from 'path';

import { z } from 'zod';

import { FileTail } from '../utils/FileTail.js';

import { ProcessDriver, type CommandLine, type ProcessDriverOptions } from './ProcessDriver.js';
import { tryParseJson } from './samples.js';
import { envSchema, loadShape, toolPath } from './schema.js';
import type { Sample } from './types.js';

// A suite runs once per attempt; only `concurrency` (parallel jobs) applies
export const mochaConfigSchema = loadShape.pick({ concurrency: true }).extend({
  scenario: z.object({
    script: z.string().min(1),
    browser: z.string().min(1).optional(),
    'default-address': z.string().url().optional(),
    timeout: z.number().int().positive().optional(),
    env: envSchema.default({})
  }),
  settings: z.object({
    path: toolPath('mocha')
  }).default({})
}).strict();

export type MochaConfig = z.infer<typeof mochaConfigSchema>;

const testEventSchema = z.object({
  title: z.string(),
  fullTitle: z.string().optional(),
  duration: z.number().nonnegative().optional()
});

export type MochaTestEvent = z.infer<typeof testEventSchema>;

export type MochaStreamEvent =
  | { event: 'pass' | 'fail'; test: MochaTestEvent }
  | { event: 'start' | 'end' };

const streamEventSchema = z.union([
  z.tuple([z.enum(['pass', 'fail']), testEventSchema])
    .transform(([event, test]): MochaStreamEvent => ({ event, test })),
  z.tuple([z.enum(['start', 'end']), z.object({}).passthrough()])
    .transform(([event]): MochaStreamEvent => ({ event }))
]);

export function parseMochaEvent(line: string): MochaStreamEvent | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith('[')) {
    return null;
  }
  const parsed = streamEventSchema.safeParse(tryParseJson(trimmed));
  return parsed.success ? parsed.data : null;
}

export class MochaDriver extends ProcessDriver {
  private readonly config: MochaConfig;
  private tail: FileTail | null = null;
  private sawEnd = false;

  constructor(options: ProcessDriverOptions, config: MochaConfig) {
    super(options);
    this.config = config;
  }

  protected buildCommand(): CommandLine {
    const { scenario, settings } = this.config;
    const args = ['--reporter', 'json-stream'];

    if (scenario.timeout !== undefined) {
      args.push('--timeout', String(scenario.timeout));
    }
    const concurrency = this.config.concurrency ?? 1;
    if (concurrency > 1) {
      args.push('--parallel', '--jobs', String(concurrency));
    }
    args.push(path.resolve(scenario.script));

    const env: Record<string, string> = { ...scenario.env };
    if (scenario['default-address']) {
      env.BASE_URL = scenario['default-address'];
    }
    if (scenario.browser) {
      env.BROWSER = scenario.browser;
    }

    return { command: settings.path, args, env };
  }

  protected async collectSamples(final: boolean): Promise<Sample[]> {
    if (!this.tail) {
      this.tail = new FileTail(this.stdoutPath);
    }

    const samples: Sample[] = [];
    for (const line of await this.tail.readLines(final)) {
      const event = parseMochaEvent(line);
      if (!event) {
        continue;
      }

      if ('test' in event) {
        const now = Date.now();
        const label = event.test.fullTitle ?? event.test.title;
        if (event.test.duration !== undefined) {
          samples.push(this.sample('latency', event.test.duration, now, label));
        }
        samples.push(this.sample('throughput', 1, now, label));
        if (event.event === 'fail') {
          samples.push(this.sample('error', 1, now, label));
        }
      } else if (event.event === 'end') {
        this.sawEnd = true;
      }
    }
    return samples;
  }

  /**
   * Mocha's exit code is its failure count; once the reporter printed "end"
   * the suite ran to completion.
   */
  protected exitFailure(code: number | null, signal: NodeJS.Signals | null): string | null {
    if (!signal && code !== null && this.sawEnd) {
      return null;
    }
    return super.exitFailure(code, signal);
  }
}

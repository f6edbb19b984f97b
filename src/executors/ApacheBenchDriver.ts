/**
 * Apache Bench (ab) executor.
 *
 * ab only reports progress ("Completed 100 requests") on stderr while it
 * runs and prints its statistics once at exit, so samples are synthesized
 * from those running totals.
 */

import { z } from 'zod';

import { toWholeSeconds } from '../utils/duration.js';
import { FileTail } from '../utils/FileTail.js';
import { readOptionalFile } from '../utils/files.js';

import { ProcessDriver, type CommandLine, type ProcessDriverOptions } from './ProcessDriver.js';
import { TotalsTracker, type ToolTotals } from './samples.js';
import { loadShape, toolPath } from './schema.js';
import type { Sample } from './types.js';

// ab has no ramp-up
export const abConfigSchema = loadShape.pick({ concurrency: true, 'hold-for': true, iterations: true }).extend({
  scenario: z.object({
    requests: z.array(z.string().url()).length(1, 'ab supports exactly one request URL'),
    'keep-alive': z.boolean().default(true),
    headers: z.record(z.string()).default({}),
    timeout: z.number().int().positive().optional()
  }),
  settings: z.object({
    path: toolPath('ab')
  }).default({})
}).strict();

export type AbConfig = z.infer<typeof abConfigSchema>;

const PROGRESS_PATTERN = /^(?:Completed|Finished) (\d+) requests/;

export function parseAbProgress(line: string): number | null {
  const match = PROGRESS_PATTERN.exec(line.trim());
  return match ? parseInt(match[1], 10) : null;
}

export function parseAbSummary(text: string): ToolTotals | null {
  const complete = /^Complete requests:\s+(\d+)/m.exec(text);
  if (!complete) {
    return null;
  }
  const failed = /^Failed requests:\s+(\d+)/m.exec(text);
  const non2xx = /^Non-2xx responses:\s+(\d+)/m.exec(text);
  const perRequest = /^Time per request:\s+([\d.]+) \[ms\] \(mean\)$/m.exec(text);

  return {
    requests: parseInt(complete[1], 10),
    errors: (failed ? parseInt(failed[1], 10) : 0) + (non2xx ? parseInt(non2xx[1], 10) : 0),
    ...(perRequest ? { meanLatencyMs: parseFloat(perRequest[1]) } : {})
  };
}

export class ApacheBenchDriver extends ProcessDriver {
  private readonly config: AbConfig;
  private readonly totals: TotalsTracker;
  private progress: FileTail | null = null;

  constructor(options: ProcessDriverOptions, config: AbConfig) {
    super(options);
    this.config = config;
    this.totals = new TotalsTracker(options.executorId);
  }

  protected buildCommand(): CommandLine {
    const { scenario, settings } = this.config;
    const args: string[] = [];

    const concurrency = this.config.concurrency ?? 1;
    args.push('-c', String(concurrency));

    // -t implies -n 50000, so an explicit -n has to come after it
    const holdFor = this.config['hold-for'];
    if (holdFor) {
      args.push('-t', String(toWholeSeconds(holdFor)));
    }
    if (this.config.iterations !== undefined) {
      args.push('-n', String(this.config.iterations));
    }
    if (scenario['keep-alive']) {
      args.push('-k');
    }
    if (scenario.timeout !== undefined) {
      args.push('-s', String(scenario.timeout));
    }
    for (const [name, value] of Object.entries(scenario.headers)) {
      args.push('-H', `${name}: ${value}`);
    }
    args.push('-d', '-S', scenario.requests[0]);

    return { command: settings.path, args };
  }

  protected async collectSamples(final: boolean): Promise<Sample[]> {
    if (!this.progress) {
      this.progress = new FileTail(this.stderrPath);
    }

    const samples: Sample[] = [];
    for (const line of await this.progress.readLines(final)) {
      const completed = parseAbProgress(line);
      if (completed !== null) {
        samples.push(...this.totals.update({ ...this.totals.current, requests: completed }));
      }
    }

    if (final) {
      const summary = parseAbSummary(await readOptionalFile(this.stdoutPath));
      if (summary) {
        samples.push(...this.totals.update(summary));
      }
    }
    return samples;
  }
}

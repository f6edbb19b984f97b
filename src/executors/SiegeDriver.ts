/**
 * Siege executor.
 *
 * Siege has no progress output; the final summary (JSON on stdout for
 * siege 4, tab-aligned text on stderr for older releases) is the only source
 * of totals.
 */

import { writeFile } from 'fs/promises';

import { z } from 'zod';

import { toWholeSeconds } from '../utils/duration.js';
import { readOptionalFile } from '../utils/files.js';

import { ProcessDriver, type CommandLine, type ProcessDriverOptions } from './ProcessDriver.js';
import { TotalsTracker, tryParseJson, type ToolTotals } from './samples.js';
import { loadShape, toolPath } from './schema.js';
import type { Sample } from './types.js';

// With both `hold-for` and `iterations`, siege runs for the time limit
export const siegeConfigSchema = loadShape.pick({ concurrency: true, 'hold-for': true, iterations: true }).extend({
  scenario: z.object({
    requests: z.array(z.string().url()).min(1),
    'think-time': z.number().nonnegative().optional()
  }),
  settings: z.object({
    path: toolPath('siege')
  }).default({})
}).strict();

export type SiegeConfig = z.infer<typeof siegeConfigSchema>;

const jsonSummarySchema = z.object({
  transactions: z.number(),
  failed_transactions: z.number(),
  response_time: z.number()
});

export function parseSiegeSummary(stdout: string, stderr: string): ToolTotals | null {
  const start = stdout.indexOf('{');
  const end = stdout.lastIndexOf('}');
  if (start >= 0 && end > start) {
    const parsed = jsonSummarySchema.safeParse(tryParseJson(stdout.slice(start, end + 1)));
    if (parsed.success) {
      return fromSiegeFigures(parsed.data.transactions, parsed.data.failed_transactions, parsed.data.response_time);
    }
  }

  const text = `${stdout}\n${stderr}`;
  const transactions = /^Transactions:\s+(\d+) hits/m.exec(text);
  if (!transactions) {
    return null;
  }
  const failed = /^Failed transactions:\s+(\d+)/m.exec(text);
  const responseTime = /^Response time:\s+([\d.]+) secs/m.exec(text);

  return fromSiegeFigures(
    parseInt(transactions[1], 10),
    failed ? parseInt(failed[1], 10) : 0,
    responseTime ? parseFloat(responseTime[1]) : undefined
  );
}

function fromSiegeFigures(transactions: number, failed: number, responseTimeSecs?: number): ToolTotals {
  return {
    requests: transactions + failed,
    errors: failed,
    ...(responseTimeSecs !== undefined ? { meanLatencyMs: responseTimeSecs * 1000 } : {})
  };
}

export class SiegeDriver extends ProcessDriver {
  private readonly config: SiegeConfig;
  private readonly totals: TotalsTracker;

  constructor(options: ProcessDriverOptions, config: SiegeConfig) {
    super(options);
    this.config = config;
    this.totals = new TotalsTracker(options.executorId);
  }

  protected async buildCommand(): Promise<CommandLine> {
    const { scenario, settings } = this.config;
    const urlFile = this.artifactPath('siege.url');
    await writeFile(urlFile, scenario.requests.join('\n') + '\n', 'utf-8');

    const args = [
      '--benchmark',
      `--concurrent=${this.config.concurrency ?? 1}`,
      `--file=${urlFile}`,
      `--log=${this.artifactPath('siege.log')}`
    ];

    const holdFor = this.config['hold-for'];
    if (holdFor) {
      args.push(`--time=${toWholeSeconds(holdFor)}S`);
    } else if (this.config.iterations !== undefined) {
      args.push(`--reps=${this.config.iterations}`);
    }
    if (scenario['think-time'] !== undefined) {
      args.push(`--delay=${scenario['think-time']}`);
    }

    return { command: settings.path, args };
  }

  protected async collectSamples(final: boolean): Promise<Sample[]> {
    if (!final) {
      return [];
    }
    const summary = parseSiegeSummary(
      await readOptionalFile(this.stdoutPath),
      await readOptionalFile(this.stderrPath)
    );
    return summary ? this.totals.update(summary) : [];
  }
}

/**
 * Locust executor (headless mode).
 *
 * Locust appends rows to `<prefix>_stats_history.csv` every few seconds. The
 * "Aggregated" rows carry cumulative request and failure counts, which are
 * turned into delta samples.
 */

import * as path from 'path';

import { z } from 'zod';

import { toWholeSeconds } from '../utils/duration.js';
import { FileTail } from '../utils/FileTail.js';

import { ProcessDriver, type CommandLine, type ProcessDriverOptions } from './ProcessDriver.js';
import { TotalsTracker, type ToolTotals } from './samples.js';
import { loadFields, toolPath } from './schema.js';
import type { Sample } from './types.js';

export const locustConfigSchema = z.object({
  ...loadFields,
  scenario: z.object({
    script: z.string().min(1),
    'default-address': z.string().url().optional()
  }),
  settings: z.object({
    path: toolPath('locust')
  }).default({})
}).strict();

export type LocustConfig = z.infer<typeof locustConfigSchema>;

const CSV_PREFIX = 'locust';

/**
 * Split one CSV record; handles quoted fields and doubled quotes.
 */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

export interface LocustHistoryRow {
  timestamp: number;
  totals: ToolTotals;
}

/**
 * Parses stats-history rows against the header seen first in the file.
 */
export class LocustHistoryParser {
  private columns: Map<string, number> | null = null;

  parse(line: string): LocustHistoryRow | null {
    const fields = splitCsvLine(line);
    if (!this.columns) {
      this.columns = new Map(fields.map((name, index) => [name.trim(), index]));
      return null;
    }

    if (this.field(fields, 'Name') !== 'Aggregated') {
      return null;
    }

    const timestamp = Number(this.field(fields, 'Timestamp'));
    const requests = Number(this.field(fields, 'Total Request Count'));
    const errors = Number(this.field(fields, 'Total Failure Count'));
    const mean = Number(this.field(fields, 'Total Average Response Time'));
    if (!Number.isFinite(timestamp) || !Number.isFinite(requests) || !Number.isFinite(errors)) {
      return null;
    }

    return {
      timestamp: timestamp * 1000,
      totals: {
        requests,
        errors,
        ...(Number.isFinite(mean) && requests > 0 ? { meanLatencyMs: mean } : {})
      }
    };
  }

  private field(fields: string[], name: string): string | undefined {
    const index = this.columns?.get(name);
    return index === undefined ? undefined : fields[index];
  }
}

export class LocustDriver extends ProcessDriver {
  private readonly config: LocustConfig;
  private readonly totals: TotalsTracker;
  private readonly history = new LocustHistoryParser();
  private tail: FileTail | null = null;
  private sawRows = false;

  constructor(options: ProcessDriverOptions, config: LocustConfig) {
    super(options);
    this.config = config;
    this.totals = new TotalsTracker(options.executorId);
  }

  protected buildCommand(artifactDir: string): CommandLine {
    const { scenario, settings } = this.config;
    const users = this.config.concurrency ?? 1;
    const rampUp = this.config['ramp-up'];
    const spawnRate = rampUp ? Math.max(users / Math.max(rampUp / 1000, 1), 0.01) : users;

    const args = [
      '-f', path.resolve(scenario.script),
      '--headless',
      '--users', String(users),
      '--spawn-rate', String(Number(spawnRate.toFixed(3))),
      '--csv', path.join(artifactDir, CSV_PREFIX),
      '--csv-full-history',
      '--only-summary'
    ];

    const duration = (rampUp ?? 0) + (this.config['hold-for'] ?? 0);
    if (duration > 0) {
      args.push('--run-time', `${toWholeSeconds(duration)}s`);
    }
    if (this.config.iterations !== undefined) {
      args.push('--iterations', String(this.config.iterations));
    }
    if (scenario['default-address']) {
      args.push('--host', scenario['default-address']);
    }

    return { command: settings.path, args };
  }

  protected async collectSamples(final: boolean): Promise<Sample[]> {
    if (!this.tail) {
      this.tail = new FileTail(this.artifactPath(`${CSV_PREFIX}_stats_history.csv`));
    }

    const samples: Sample[] = [];
    for (const line of await this.tail.readLines(final)) {
      const row = this.history.parse(line);
      if (row) {
        this.sawRows = true;
        samples.push(...this.totals.update(row.totals, row.timestamp));
      }
    }
    return samples;
  }

  /**
   * Locust exits with 1 when any request failed; that is a finished run
   * with errors, not a tool failure.
   */
  protected exitFailure(code: number | null, signal: NodeJS.Signals | null): string | null {
    if (code === 1 && this.sawRows) {
      return null;
    }
    return super.exitFailure(code, signal);
  }
}

/**
 * MetricsAggregator: merges every executor's sample stream into one report.
 *
 * Running statistics are kept per executor and for the synthetic `overall`
 * key. Latency quantiles come from prom-client summaries (t-digest) living
 * in a registry owned by the run, which is also what `metrics.prom` exports.
 * Raw samples are spooled to `samples.jsonl` in each executor's directory.
 *
 * The aggregator is written to from the scheduler's control loop only.
 */

import * as fs from 'fs';
import * as path from 'path';

import { Counter, Summary, type Registry } from 'prom-client';
import type { Logger } from 'winston';

import type { ErrorRecord } from '../errors.js';
import type { LifecycleState, Sample } from '../executors/types.js';

export const OVERALL_KEY = 'overall';
export const SAMPLES_FILE = 'samples.jsonl';

const PERCENTILES = [0.5, 0.9, 0.95, 0.99] as const;

export interface LatencyStats {
  count: number;
  mean: number;
  min: number;
  max: number;
  p50: number;
  p90: number;
  p95: number;
  p99: number;
}

export interface ExecutorSummary {
  samples: number;
  requests: number;
  errors: number;
  errorRate: number;
  latency: LatencyStats | null;
  throughput: {
    total: number;
    /** requests per second over the executor's first-to-last sample span */
    perSecond: number;
  };
  firstTimestamp?: number;
  lastTimestamp?: number;
  state?: LifecycleState;
  error?: ErrorRecord;
}

export interface AggregateReport {
  /** Keyed by executor id plus `overall` */
  readonly summaries: Readonly<Record<string, Readonly<ExecutorSummary>>>;
  readonly timeline: readonly Readonly<Sample>[];
}

export interface AggregatorOptions {
  registry: Registry;
  logger: Logger;
}

interface RunningStats {
  samples: number;
  latencyCount: number;
  latencySum: number;
  latencyMin: number;
  latencyMax: number;
  throughput: number;
  errors: number;
  first?: number;
  last?: number;
}

interface Tracked {
  stats: RunningStats;
  samples: Array<{ sample: Sample; seq: number }>;
  spoolDir?: string;
  spool: fs.WriteStream | null;
  outcome?: { state: LifecycleState; error?: ErrorRecord };
}

function emptyStats(): RunningStats {
  return {
    samples: 0,
    latencyCount: 0,
    latencySum: 0,
    latencyMin: Infinity,
    latencyMax: -Infinity,
    throughput: 0,
    errors: 0
  };
}

export class MetricsAggregator {
  private readonly executors = new Map<string, Tracked>();
  private readonly overall = emptyStats();
  private readonly logger: Logger;
  private readonly latency: Summary<'executor'>;
  private readonly sampleCounter: Counter<'executor' | 'kind'>;
  private seq = 0;
  private finalizing = false;

  constructor(options: AggregatorOptions) {
    this.logger = options.logger.child({ component: 'aggregator' });

    this.latency = new Summary({
      name: 'loadplan_latency_ms',
      help: 'Request latency reported by executors in milliseconds',
      labelNames: ['executor'],
      percentiles: [...PERCENTILES],
      registers: [options.registry]
    });

    this.sampleCounter = new Counter({
      name: 'loadplan_samples_total',
      help: 'Samples ingested by executor and kind',
      labelNames: ['executor', 'kind'],
      registers: [options.registry]
    });
  }

  /**
   * Declare an executor; samples for undeclared ids are rejected.
   */
  register(executorId: string, spoolDir?: string): void {
    this.assertOpen();
    if (executorId === OVERALL_KEY) {
      throw new Error(`"${OVERALL_KEY}" is reserved`);
    }
    if (this.executors.has(executorId)) {
      throw new Error(`Executor ${executorId} is already registered`);
    }
    this.executors.set(executorId, {
      stats: emptyStats(),
      samples: [],
      spool: null,
      ...(spoolDir !== undefined ? { spoolDir } : {})
    });
  }

  ingest(executorId: string, samples: readonly Sample[]): void {
    this.assertOpen();
    const tracked = this.executors.get(executorId);
    if (!tracked) {
      throw new Error(`Samples for unknown executor ${executorId}`);
    }

    for (const sample of samples) {
      if (sample.executorId !== executorId) {
        throw new Error(`Sample for ${sample.executorId} ingested as ${executorId}`);
      }
      const copy: Sample = { ...sample };
      tracked.samples.push({ sample: copy, seq: this.seq++ });
      accumulate(tracked.stats, copy);
      accumulate(this.overall, copy);

      this.sampleCounter.inc({ executor: executorId, kind: copy.kind });
      if (copy.kind === 'latency') {
        this.latency.observe({ executor: executorId }, copy.value);
        this.latency.observe({ executor: OVERALL_KEY }, copy.value);
      }
    }

    if (samples.length > 0 && tracked.spoolDir !== undefined) {
      this.spoolFor(tracked, tracked.spoolDir).write(samples.map(s => JSON.stringify(s)).join('\n') + '\n');
    }
  }

  /**
   * Record an executor's final state in its summary.
   */
  annotate(executorId: string, outcome: { state: LifecycleState; error?: ErrorRecord }): void {
    this.assertOpen();
    const tracked = this.executors.get(executorId);
    if (!tracked) {
      throw new Error(`Outcome for unknown executor ${executorId}`);
    }
    tracked.outcome = { ...outcome };
  }

  /**
   * Number of samples ingested so far, per executor or in total.
   */
  count(executorId?: string): number {
    if (executorId === undefined) {
      return this.overall.samples;
    }
    return this.executors.get(executorId)?.stats.samples ?? 0;
  }

  /**
   * Close the spools and build the frozen report. One-way: ingest, annotate
   * and a second finalize all throw afterwards.
   */
  async finalize(): Promise<AggregateReport> {
    this.assertOpen();
    this.finalizing = true;

    for (const tracked of this.executors.values()) {
      await closeSpool(tracked.spool);
      tracked.spool = null;
    }

    const summaries: Record<string, ExecutorSummary> = {};
    for (const [executorId, tracked] of this.executors) {
      summaries[executorId] = await this.summarize(executorId, tracked.stats, tracked.outcome);
    }
    // Executors without throughput samples count one request per latency
    // sample, so the overall figure is the sum of the per-executor ones.
    const overallRequests = [...this.executors.values()].reduce((sum, t) => sum + requestCount(t.stats), 0);
    summaries[OVERALL_KEY] = await this.summarize(OVERALL_KEY, this.overall, undefined, overallRequests);

    const timeline = mergeTimelines([...this.executors.values()].map(t => t.samples));

    const report: AggregateReport = deepFreeze({ summaries, timeline });
    this.logger.debug(`[aggregator] Finalized ${timeline.length} samples from ${this.executors.size} executors`);
    return report;
  }

  private async summarize(
    key: string,
    stats: RunningStats,
    outcome?: { state: LifecycleState; error?: ErrorRecord },
    requests = requestCount(stats)
  ): Promise<ExecutorSummary> {
    const span = stats.first !== undefined && stats.last !== undefined ? stats.last - stats.first : 0;

    return {
      samples: stats.samples,
      requests,
      errors: stats.errors,
      errorRate: requests > 0 ? Math.min(stats.errors / requests, 1) : 0,
      latency: stats.latencyCount > 0 ? await this.latencyStats(key, stats) : null,
      throughput: {
        total: requests,
        perSecond: span > 0 ? requests / (span / 1000) : 0
      },
      ...(stats.first !== undefined ? { firstTimestamp: stats.first } : {}),
      ...(stats.last !== undefined ? { lastTimestamp: stats.last } : {}),
      ...(outcome ? { state: outcome.state } : {}),
      ...(outcome?.error ? { error: outcome.error } : {})
    };
  }

  private async latencyStats(key: string, stats: RunningStats): Promise<LatencyStats> {
    const metric = await this.latency.get();
    const quantiles = new Map<number, number>();
    // `_sum` and `_count` entries carry no quantile label
    for (const entry of metric.values) {
      const labels = entry.labels;
      if (labels.executor === key && 'quantile' in labels) {
        quantiles.set(Number(labels.quantile), entry.value);
      }
    }

    const mean = stats.latencySum / stats.latencyCount;
    const quantile = (q: number) => quantiles.get(q) ?? mean;
    return {
      count: stats.latencyCount,
      mean,
      min: stats.latencyMin,
      max: stats.latencyMax,
      p50: quantile(0.5),
      p90: quantile(0.9),
      p95: quantile(0.95),
      p99: quantile(0.99)
    };
  }

  private spoolFor(tracked: Tracked, dir: string): fs.WriteStream {
    if (!tracked.spool) {
      fs.mkdirSync(dir, { recursive: true });
      const stream = fs.createWriteStream(path.join(dir, SAMPLES_FILE), { flags: 'a' });
      stream.on('error', err => {
        this.logger.error(`[aggregator] Sample spool ${stream.path.toString()} failed: ${err.message}`);
      });
      tracked.spool = stream;
    }
    return tracked.spool;
  }

  private assertOpen(): void {
    if (this.finalizing) {
      throw new Error('Aggregate report is already finalized');
    }
  }
}

function requestCount(stats: RunningStats): number {
  return stats.throughput > 0 ? stats.throughput : stats.latencyCount;
}

function accumulate(stats: RunningStats, sample: Sample): void {
  stats.samples++;
  stats.first = stats.first === undefined ? sample.timestamp : Math.min(stats.first, sample.timestamp);
  stats.last = stats.last === undefined ? sample.timestamp : Math.max(stats.last, sample.timestamp);

  switch (sample.kind) {
    case 'latency':
      stats.latencyCount++;
      stats.latencySum += sample.value;
      stats.latencyMin = Math.min(stats.latencyMin, sample.value);
      stats.latencyMax = Math.max(stats.latencyMax, sample.value);
      break;
    case 'throughput':
      stats.throughput += sample.value;
      break;
    case 'error':
      stats.errors += sample.value;
      break;
  }
}

/**
 * Timeline order: timestamp, then executor id, then insertion order.
 */
export function mergeTimelines(streams: ReadonlyArray<ReadonlyArray<{ sample: Sample; seq: number }>>): Sample[] {
  return streams
    .flat()
    .sort((a, b) =>
      a.sample.timestamp - b.sample.timestamp ||
      (a.sample.executorId < b.sample.executorId ? -1 : a.sample.executorId > b.sample.executorId ? 1 : 0) ||
      a.seq - b.seq
    )
    .map(entry => entry.sample);
}

function closeSpool(stream: fs.WriteStream | null): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!stream) {
      resolve();
      return;
    }
    stream.end((err?: Error | null) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

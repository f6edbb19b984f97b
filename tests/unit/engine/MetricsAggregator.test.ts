import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';

import { Registry } from 'prom-client';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { MetricsAggregator, OVERALL_KEY, SAMPLES_FILE, mergeTimelines } from '../../../src/engine/MetricsAggregator.js';
import type { MetricKind, Sample } from '../../../src/executors/types.js';
import { createSilentLogger } from '../../../src/utils/logger.js';

function sample(executorId: string, timestamp: number, kind: MetricKind, value: number): Sample {
  return { executorId, timestamp, kind, value };
}

describe('MetricsAggregator', () => {
  let registry: Registry;
  let aggregator: MetricsAggregator;

  beforeEach(() => {
    registry = new Registry();
    aggregator = new MetricsAggregator({ registry, logger: createSilentLogger() });
  });

  it('should keep every ingested sample', async () => {
    aggregator.register('a');
    aggregator.register('b');
    aggregator.ingest('a', [sample('a', 1, 'latency', 10), sample('a', 2, 'throughput', 1)]);
    aggregator.ingest('b', [sample('b', 1, 'latency', 20)]);
    aggregator.ingest('a', []);

    expect(aggregator.count('a')).toBe(2);
    expect(aggregator.count('b')).toBe(1);
    expect(aggregator.count()).toBe(3);

    const report = await aggregator.finalize();
    expect(report.timeline).toHaveLength(3);
    expect(report.summaries.a.samples + report.summaries.b.samples).toBe(report.summaries[OVERALL_KEY].samples);
  });

  it('should order the timeline by timestamp, then executor, then arrival', async () => {
    aggregator.register('b');
    aggregator.register('a');
    aggregator.ingest('b', [sample('b', 5, 'latency', 1), sample('b', 1, 'latency', 2)]);
    aggregator.ingest('a', [sample('a', 5, 'latency', 3), sample('a', 5, 'error', 1)]);

    const { timeline } = await aggregator.finalize();

    expect(timeline.map(s => `${s.executorId}:${s.timestamp}:${s.kind}`)).toEqual([
      'b:1:latency',
      'a:5:latency',
      'a:5:error',
      'b:5:latency'
    ]);
  });

  it('should summarize requests, errors and latency per executor', async () => {
    aggregator.register('ab-1');
    aggregator.ingest('ab-1', [
      sample('ab-1', 1000, 'throughput', 40),
      sample('ab-1', 1000, 'latency', 10),
      sample('ab-1', 3000, 'throughput', 60),
      sample('ab-1', 3000, 'error', 5),
      sample('ab-1', 3000, 'latency', 10)
    ]);
    aggregator.annotate('ab-1', { state: 'Completed' });

    const { summaries } = await aggregator.finalize();
    const summary = summaries['ab-1'];

    expect(summary.requests).toBe(100);
    expect(summary.errors).toBe(5);
    expect(summary.errorRate).toBe(0.05);
    expect(summary.throughput).toEqual({ total: 100, perSecond: 50 });
    expect(summary.state).toBe('Completed');
    expect(summary.latency).toEqual({
      count: 2,
      mean: 10,
      min: 10,
      max: 10,
      p50: 10,
      p90: 10,
      p95: 10,
      p99: 10
    });
  });

  it('should count one request per latency sample without throughput samples', async () => {
    aggregator.register('mocha-1');
    aggregator.register('ab-1');
    aggregator.ingest('mocha-1', [sample('mocha-1', 1, 'latency', 100), sample('mocha-1', 2, 'latency', 300)]);
    aggregator.ingest('ab-1', [sample('ab-1', 1, 'throughput', 8)]);

    const { summaries } = await aggregator.finalize();

    expect(summaries['mocha-1'].requests).toBe(2);
    expect(summaries['mocha-1'].latency?.mean).toBe(200);
    expect(summaries['ab-1'].latency).toBeNull();
    expect(summaries[OVERALL_KEY].requests).toBe(10);
  });

  it('should cap the error rate at one', async () => {
    aggregator.register('x');
    aggregator.ingest('x', [sample('x', 1, 'throughput', 2), sample('x', 1, 'error', 3)]);

    const { summaries } = await aggregator.finalize();
    expect(summaries.x.errorRate).toBe(1);
  });

  it('should reject samples it cannot attribute', () => {
    aggregator.register('a');

    expect(() => aggregator.ingest('missing', [sample('missing', 1, 'latency', 1)])).toThrow('unknown executor missing');
    expect(() => aggregator.ingest('a', [sample('b', 1, 'latency', 1)])).toThrow('Sample for b ingested as a');
    expect(() => aggregator.register('a')).toThrow('already registered');
    expect(() => aggregator.register(OVERALL_KEY)).toThrow('reserved');
  });

  it('should be read-only once finalized', async () => {
    aggregator.register('a');
    const report = await aggregator.finalize();

    expect(Object.isFrozen(report.summaries)).toBe(true);
    expect(() => aggregator.ingest('a', [])).toThrow('already finalized');
    await expect(aggregator.finalize()).rejects.toThrow('already finalized');
  });

  it('should not keep references to the caller samples', async () => {
    aggregator.register('a');
    const input = sample('a', 1, 'latency', 10);
    aggregator.ingest('a', [input]);
    input.value = 999;

    const { timeline } = await aggregator.finalize();
    expect(timeline[0].value).toBe(10);
  });

  it('should export the latency summary through the registry', async () => {
    aggregator.register('a');
    aggregator.ingest('a', [sample('a', 1, 'latency', 10)]);
    await aggregator.finalize();

    const text = await registry.metrics();
    expect(text).toContain('loadplan_latency_ms_count{executor="a"} 1');
    expect(text).toContain('loadplan_samples_total{executor="a",kind="latency"} 1');
  });

  describe('sample spool', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), 'loadplan-agg-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should append samples to the executor directory', async () => {
      const spoolDir = path.join(dir, 'a');
      aggregator.register('a', spoolDir);
      aggregator.ingest('a', [sample('a', 1, 'latency', 10)]);
      aggregator.ingest('a', [sample('a', 2, 'error', 1)]);
      await aggregator.finalize();

      const lines = (await readFile(path.join(spoolDir, SAMPLES_FILE), 'utf-8')).trim().split('\n');
      expect(lines.map(line => JSON.parse(line))).toEqual([
        { executorId: 'a', timestamp: 1, kind: 'latency', value: 10 },
        { executorId: 'a', timestamp: 2, kind: 'error', value: 1 }
      ]);
    });
  });
});

describe('mergeTimelines', () => {
  it('should merge streams into one ordered list', () => {
    const merged = mergeTimelines([
      [{ sample: sample('a', 3, 'latency', 1), seq: 0 }],
      [{ sample: sample('b', 2, 'latency', 1), seq: 1 }, { sample: sample('b', 3, 'latency', 1), seq: 2 }]
    ]);
    expect(merged.map(s => `${s.executorId}${s.timestamp}`)).toEqual(['b2', 'a3', 'b3']);
  });
});

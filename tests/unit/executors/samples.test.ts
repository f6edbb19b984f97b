import { describe, it, expect } from 'vitest';

import { TotalsTracker, parseSampleLine } from '../../../src/executors/samples.js';

describe('parseSampleLine', () => {
  it('should parse a metric line', () => {
    expect(parseSampleLine('{"ts": 1000, "kind": "latency", "value": 12.5, "label": "home"}', 'ext-1')).toEqual([
      { timestamp: 1000, executorId: 'ext-1', kind: 'latency', value: 12.5, label: 'home' }
    ]);
  });

  it('should expand a successful request line into latency and throughput', () => {
    expect(parseSampleLine('{"ts": 2000, "elapsed_ms": 30, "success": true}', 'ext-1')).toEqual([
      { timestamp: 2000, executorId: 'ext-1', kind: 'latency', value: 30 },
      { timestamp: 2000, executorId: 'ext-1', kind: 'throughput', value: 1 }
    ]);
  });

  it('should add an error sample for a failed request', () => {
    const samples = parseSampleLine('{"ts": 3000, "label": "login", "elapsed_ms": 80, "success": false}', 'ext-1');
    expect(samples.map(s => s.kind)).toEqual(['latency', 'throughput', 'error']);
    expect(samples[2]).toEqual({ timestamp: 3000, executorId: 'ext-1', kind: 'error', value: 1, label: 'login' });
  });

  it('should ignore lines that are not sample records', () => {
    expect(parseSampleLine('starting workers...', 'ext-1')).toEqual([]);
    expect(parseSampleLine('{"ts": 1000, "kind": "latency"', 'ext-1')).toEqual([]);
    expect(parseSampleLine('{"ts": 1000, "kind": "bandwidth", "value": 3}', 'ext-1')).toEqual([]);
    expect(parseSampleLine('', 'ext-1')).toEqual([]);
  });
});

describe('TotalsTracker', () => {
  it('should emit deltas from cumulative totals', () => {
    const tracker = new TotalsTracker('ab-1');

    expect(tracker.update({ requests: 10, errors: 1, meanLatencyMs: 5 }, 1000)).toEqual([
      { timestamp: 1000, executorId: 'ab-1', kind: 'throughput', value: 10 },
      { timestamp: 1000, executorId: 'ab-1', kind: 'error', value: 1 },
      { timestamp: 1000, executorId: 'ab-1', kind: 'latency', value: 5 }
    ]);
    expect(tracker.update({ requests: 15, errors: 1, meanLatencyMs: 5 }, 2000)).toEqual([
      { timestamp: 2000, executorId: 'ab-1', kind: 'throughput', value: 5 }
    ]);
  });

  it('should ignore totals that go backwards', () => {
    const tracker = new TotalsTracker('ab-1');
    tracker.update({ requests: 20, errors: 2 }, 1000);

    expect(tracker.update({ requests: 12, errors: 0 }, 2000)).toEqual([]);
    expect(tracker.current).toEqual({ requests: 20, errors: 2 });
  });
});

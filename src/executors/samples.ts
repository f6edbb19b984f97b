/**
 * Sample extraction helpers shared by the drivers.
 */

import { z } from 'zod';

import type { Sample } from './types.js';

/**
 * JSON.parse that yields undefined for malformed text.
 */
export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

const metricLineSchema = z.object({
  ts: z.number(),
  kind: z.enum(['latency', 'throughput', 'error']),
  value: z.number().finite(),
  label: z.string().optional()
});

const requestLineSchema = z.object({
  ts: z.number(),
  label: z.string().optional(),
  elapsed_ms: z.number().finite().nonnegative(),
  success: z.boolean()
});

/**
 * Parse one JSON-lines record. Two shapes are accepted:
 *
 *   {"ts": 1700000000000, "kind": "latency", "value": 12.5, "label": "home"}
 *   {"ts": 1700000000000, "label": "home", "elapsed_ms": 12.5, "success": true}
 *
 * The request form expands into a latency sample, a throughput sample of 1
 * and, for failures, an error sample of 1. Anything else yields nothing.
 */
export function parseSampleLine(line: string, executorId: string): Sample[] {
  const trimmed = line.trim();
  if (!trimmed.startsWith('{')) {
    return [];
  }

  const raw = tryParseJson(trimmed);

  const metric = metricLineSchema.safeParse(raw);
  if (metric.success) {
    const { ts, kind, value, label } = metric.data;
    return [{ timestamp: ts, executorId, kind, value, ...(label !== undefined ? { label } : {}) }];
  }

  const request = requestLineSchema.safeParse(raw);
  if (request.success) {
    const { ts, label, elapsed_ms: elapsedMs, success } = request.data;
    const extra = label !== undefined ? { label } : {};
    const samples: Sample[] = [
      { timestamp: ts, executorId, kind: 'latency', value: elapsedMs, ...extra },
      { timestamp: ts, executorId, kind: 'throughput', value: 1, ...extra }
    ];
    if (!success) {
      samples.push({ timestamp: ts, executorId, kind: 'error', value: 1, ...extra });
    }
    return samples;
  }

  return [];
}

export interface ToolTotals {
  requests: number;
  errors: number;
  /** Mean latency over the whole run so far, when the tool reports one */
  meanLatencyMs?: number;
}

/**
 * Turns cumulative totals into delta samples for tools that only report
 * running totals or an end-of-run summary.
 */
export class TotalsTracker {
  private requests = 0;
  private errors = 0;
  private meanLatencyMs: number | undefined;

  constructor(private readonly executorId: string) {}

  update(totals: ToolTotals, timestamp = Date.now()): Sample[] {
    const samples: Sample[] = [];
    const requestDelta = totals.requests - this.requests;
    const errorDelta = totals.errors - this.errors;

    // Totals never go backwards; a smaller figure is a tool restart
    // artefact and is ignored.
    if (requestDelta > 0) {
      samples.push({ timestamp, executorId: this.executorId, kind: 'throughput', value: requestDelta });
      this.requests = totals.requests;
    }
    if (errorDelta > 0) {
      samples.push({ timestamp, executorId: this.executorId, kind: 'error', value: errorDelta });
      this.errors = totals.errors;
    }
    if (totals.meanLatencyMs !== undefined && totals.meanLatencyMs !== this.meanLatencyMs) {
      samples.push({ timestamp, executorId: this.executorId, kind: 'latency', value: totals.meanLatencyMs });
      this.meanLatencyMs = totals.meanLatencyMs;
    }

    return samples;
  }

  get current(): ToolTotals {
    return {
      requests: this.requests,
      errors: this.errors,
      ...(this.meanLatencyMs !== undefined ? { meanLatencyMs: this.meanLatencyMs } : {})
    };
  }
}

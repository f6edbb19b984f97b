/**
 * Run Metrics Registry
 *
 * Each run owns a prom-client Registry; the aggregator registers its
 * latency summary and sample counters there, and the run controller records
 * executor outcomes. The registry is dumped to `metrics.prom` at run end.
 */

import { Gauge, Registry, collectDefaultMetrics } from 'prom-client';

import type { LifecycleState } from '../executors/types.js';

export interface RunRegistryOptions {
  /** Include Node.js process metrics */
  defaultMetrics?: boolean;
}

export function createRunRegistry(options: RunRegistryOptions = {}): Registry {
  const registry = new Registry();
  if (options.defaultMetrics) {
    collectDefaultMetrics({ register: registry, prefix: 'loadplan_' });
  }
  return registry;
}

export interface RunMetrics {
  recordOutcome(executorId: string, type: string, state: LifecycleState, attempts: number): void;
  recordDuration(seconds: number): void;
}

export function createRunMetrics(registry: Registry): RunMetrics {
  const executorState = new Gauge({
    name: 'loadplan_executor_state',
    help: 'Terminal state of each executor (1 for the state it ended in)',
    labelNames: ['executor', 'type', 'state'],
    registers: [registry]
  });

  const executorAttempts = new Gauge({
    name: 'loadplan_executor_attempts',
    help: 'Launch attempts per executor',
    labelNames: ['executor'],
    registers: [registry]
  });

  const runDuration = new Gauge({
    name: 'loadplan_run_duration_seconds',
    help: 'Wall-clock duration of the run',
    registers: [registry]
  });

  return {
    recordOutcome(executorId, type, state, attempts) {
      executorState.set({ executor: executorId, type, state }, 1);
      executorAttempts.set({ executor: executorId }, attempts);
    },
    recordDuration(seconds) {
      runDuration.set(seconds);
    }
  };
}

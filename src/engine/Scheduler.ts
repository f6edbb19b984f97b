// Scheduler: drives executor instances through their lifecycle on one control loop
import * as path from 'path';
import { setTimeout as sleep } from 'timers/promises';

import type { Logger } from 'winston';

import type { ArtifactStore } from '../artifacts/ArtifactStore.js';
import type { RunSettings } from '../config/settings.js';
import { CancellationError, ExecutorRuntimeError, TimeoutError } from '../errors.js';
import type { ExecutorRegistry } from '../executors/registry.js';
import type { LifecycleState, PollResult } from '../executors/types.js';
import type { ExecutorSpec } from '../plan/TestPlan.js';

import { ExecutorInstance } from './ExecutorInstance.js';
import type { MetricsAggregator } from './MetricsAggregator.js';

export type SchedulerSettings = Pick<
  RunSettings,
  'policy' | 'maxConcurrency' | 'timeoutMs' | 'pollIntervalMs' | 'stopGraceMs' | 'heartbeatTimeoutMs'
>;

export interface SchedulerOptions {
  settings: SchedulerSettings;
  registry: ExecutorRegistry;
  store: ArtifactStore;
  aggregator: MetricsAggregator;
  logger: Logger;
  /** Aborting stops every running instance and skips the pending ones */
  signal?: AbortSignal;
  clock?: () => number;
}

export interface SchedulerResult {
  instances: ExecutorInstance[];
  cancelled: boolean;
  timedOut: boolean;
  /** The control loop itself failed; active executors were stopped as Failed */
  fault?: Error;
}

/**
 * One loop serves both policies: each tick launches pending instances up to
 * the concurrency limit (1 when sequential), polls every active instance,
 * enforces deadlines, then sleeps for the poll interval.
 */
export class Scheduler {
  private readonly settings: SchedulerSettings;
  private readonly registry: ExecutorRegistry;
  private readonly store: ArtifactStore;
  private readonly aggregator: MetricsAggregator;
  private readonly logger: Logger;
  private readonly signal: AbortSignal | undefined;
  private readonly clock: () => number;

  constructor(options: SchedulerOptions) {
    this.settings = options.settings;
    this.registry = options.registry;
    this.store = options.store;
    this.aggregator = options.aggregator;
    this.logger = options.logger.child({ component: 'scheduler' });
    this.signal = options.signal;
    this.clock = options.clock ?? Date.now;
  }

  get concurrencyLimit(): number {
    if (this.settings.policy === 'sequential') {
      return 1;
    }
    return this.settings.maxConcurrency > 0 ? this.settings.maxConcurrency : Infinity;
  }

  async run(specs: readonly ExecutorSpec[]): Promise<SchedulerResult> {
    const instances = specs.map(spec => new ExecutorInstance(spec, this.clock));

    let outcome: { cancelled: boolean; timedOut: boolean };
    try {
      outcome = await this.drive(instances);
    } catch (err) {
      const fault = err instanceof Error ? err : new Error(String(err));
      this.logger.error(`[scheduler] Control loop failed: ${fault.message}`);
      await this.abandon(instances, fault);
      return { instances, cancelled: this.signal?.aborted ?? false, timedOut: false, fault };
    }

    this.logger.info(`[scheduler] Done: ${instances.map(i => `${i.id}=${i.state}`).join(', ') || 'no executors'}`);
    return { instances, ...outcome };
  }

  private async drive(instances: ExecutorInstance[]): Promise<{ cancelled: boolean; timedOut: boolean }> {
    for (const instance of instances) {
      instance.artifactDir = this.store.allocate(instance.id);
      this.aggregator.register(instance.id, instance.artifactDir);
    }

    const startedAt = this.clock();
    const runDeadline = this.settings.timeoutMs !== undefined ? startedAt + this.settings.timeoutMs : undefined;

    this.logger.info(
      `[scheduler] Running ${instances.length} executor(s), policy=${this.settings.policy}, limit=${this.concurrencyLimit}`
    );

    while (instances.some(instance => !instance.terminal)) {
      if (this.signal?.aborted) {
        await this.shutdown(instances, 'Stopped', new CancellationError(abortReason(this.signal)));
        return { cancelled: true, timedOut: false };
      }
      if (runDeadline !== undefined && this.clock() >= runDeadline) {
        await this.shutdown(
          instances,
          'TimedOut',
          new TimeoutError(`Run timeout of ${this.settings.timeoutMs}ms exceeded`, this.settings.timeoutMs ?? 0)
        );
        return { cancelled: false, timedOut: true };
      }

      await this.launchPending(instances);
      for (const instance of instances) {
        if (instance.state === 'Running') {
          await this.tick(instance);
        }
      }

      if (instances.every(instance => instance.terminal)) {
        break;
      }
      await this.pause(runDeadline);
    }
    return { cancelled: false, timedOut: false };
  }

  /**
   * Stop whatever is still active after a control loop failure.
   */
  private async abandon(instances: ExecutorInstance[], fault: Error): Promise<void> {
    try {
      await this.shutdown(instances, 'Failed', new ExecutorRuntimeError(`Scheduler fault: ${fault.message}`, [], fault));
    } catch (err) {
      this.logger.error(`[scheduler] Cleanup after control loop failure failed: ${errorMessage(err)}`);
    }
  }

  private async launchPending(instances: ExecutorInstance[]): Promise<void> {
    const active = instances.filter(i => i.state === 'Starting' || i.state === 'Running').length;
    const slots = this.concurrencyLimit - active;
    if (slots <= 0) {
      return;
    }

    const batch = instances.filter(i => i.state === 'Pending').slice(0, slots);
    await Promise.all(batch.map(instance => this.launch(instance)));
  }

  private async launch(instance: ExecutorInstance): Promise<void> {
    const { spec } = instance;
    instance.transition('Starting');
    const now = this.clock();
    instance.deadline = spec.timeoutMs !== undefined ? now + spec.timeoutMs : undefined;
    instance.attempts = 1;

    try {
      await this.startAttempt(instance, this.subpath(instance));
      instance.transition('Running');
      this.logger.info(`[scheduler] ${instance.id} running (pid ${instance.handle?.pid ?? '?'})`);
    } catch (err) {
      this.logger.error(`[scheduler] ${instance.id} failed to start: ${errorMessage(err)}`);
      this.finish(instance, 'Failed', err);
    }
  }

  private async startAttempt(instance: ExecutorInstance, artifactDir: string): Promise<void> {
    const { spec } = instance;
    const driver = this.registry.resolve(
      spec.type,
      spec.id,
      spec.config,
      { logger: this.logger },
      `execution[${spec.index}]`
    );
    instance.driver = driver;
    // Never pair the new driver with the previous attempt's handle
    instance.handle = null;
    instance.handle = await driver.start(artifactDir);
    instance.heartbeat(this.clock());
  }

  /**
   * One poll of a Running instance, plus deadline, heartbeat and retry handling.
   */
  private async tick(instance: ExecutorInstance): Promise<void> {
    const now = this.clock();

    if (instance.deadline !== undefined && now >= instance.deadline) {
      await this.stopInstance(
        instance,
        'TimedOut',
        new TimeoutError(`${instance.id}: executor timeout of ${instance.spec.timeoutMs}ms exceeded`, instance.spec.timeoutMs ?? 0)
      );
      return;
    }

    if (instance.retryAt !== undefined) {
      if (now >= instance.retryAt) {
        await this.retry(instance);
      }
      return;
    }

    const { driver, handle } = instance;
    if (!driver || !handle) {
      return;
    }

    let result: PollResult;
    try {
      result = await driver.poll(handle);
    } catch (err) {
      this.logger.error(`[scheduler] ${instance.id} poll failed: ${errorMessage(err)}`);
      await this.stopInstance(instance, 'Failed', err);
      return;
    }

    if (result.samples.length > 0) {
      this.aggregator.ingest(instance.id, result.samples);
      instance.recordSamples(result.samples.length, this.clock());
    }
    instance.heartbeat(result.lastActivityAt);

    switch (result.state) {
      case 'Completed':
        await this.collect(instance);
        this.finish(instance, 'Completed');
        return;
      case 'Failed': {
        const error = result.error ?? new ExecutorRuntimeError(`${instance.id}: executor failed`);
        await this.collect(instance);
        if (instance.attempts <= instance.spec.retries) {
          this.logger.warn(
            `[scheduler] ${instance.id} attempt ${instance.attempts} failed (${error.message}); retrying`
          );
          instance.driver = null;
          instance.retryAt = this.clock() + instance.spec.retryDelayMs;
          return;
        }
        this.finish(instance, 'Failed', error);
        return;
      }
      default:
        break;
    }

    const heartbeatTimeout = this.settings.heartbeatTimeoutMs;
    const quietFor = this.clock() - (instance.lastHeartbeatAt ?? now);
    if (heartbeatTimeout > 0 && quietFor > heartbeatTimeout) {
      this.logger.warn(`[scheduler] ${instance.id} unresponsive for ${quietFor}ms, stopping`);
      await this.stopInstance(
        instance,
        'Failed',
        new ExecutorRuntimeError(`${instance.id}: no activity for ${quietFor}ms (heartbeat timeout ${heartbeatTimeout}ms)`)
      );
    }
  }

  private async retry(instance: ExecutorInstance): Promise<void> {
    instance.retryAt = undefined;
    instance.attempts++;
    const dir = path.join(this.subpath(instance), `attempt-${instance.attempts}`);
    this.logger.info(`[scheduler] ${instance.id} starting attempt ${instance.attempts} in ${dir}`);

    try {
      await this.startAttempt(instance, dir);
    } catch (err) {
      this.logger.error(`[scheduler] ${instance.id} attempt ${instance.attempts} failed to start: ${errorMessage(err)}`);
      this.finish(instance, 'Failed', err);
    }
  }

  /**
   * Stop an instance and move it to a terminal state. A terminal instance is
   * left as it is.
   */
  async stopInstance(instance: ExecutorInstance, state: LifecycleState, error?: unknown): Promise<void> {
    if (instance.terminal) {
      return;
    }
    if (instance.state === 'Pending') {
      this.finish(instance, 'Stopped', error);
      return;
    }

    const { driver, handle } = instance;
    if (driver && handle && instance.retryAt === undefined) {
      try {
        await driver.stop(handle, this.settings.stopGraceMs);
        // Drain whatever the tool wrote before it went down
        const last = await driver.poll(handle);
        if (last.samples.length > 0) {
          this.aggregator.ingest(instance.id, last.samples);
          instance.recordSamples(last.samples.length, this.clock());
        }
      } catch (err) {
        this.logger.error(`[scheduler] ${instance.id} stop failed: ${errorMessage(err)}`);
        instance.diagnostics.push(`stop failed: ${errorMessage(err)}`);
      }
      await this.collect(instance);
    }
    this.finish(instance, state, error);
  }

  private async shutdown(instances: ExecutorInstance[], runningState: LifecycleState, error: Error): Promise<void> {
    this.logger.warn(`[scheduler] ${error.message}; stopping active executors`);
    await Promise.all(
      instances
        .filter(instance => !instance.terminal)
        .map(instance =>
          instance.state === 'Pending'
            ? this.stopInstance(instance, 'Stopped', error)
            : this.stopInstance(instance, runningState, error)
        )
    );
  }

  /**
   * Harvest the current attempt into the instance's artifact and diagnostic lists.
   */
  private async collect(instance: ExecutorInstance): Promise<void> {
    const { driver, handle } = instance;
    if (!driver || !handle) {
      return;
    }

    try {
      const harvested = await driver.harvest(handle);
      const relativeDir = path.relative(this.subpath(instance), handle.artifactDir);
      const known = new Set(instance.artifacts);
      for (const file of harvested.artifacts) {
        const entry = relativeDir ? `${relativeDir}/${file}` : file;
        if (!known.has(entry)) {
          known.add(entry);
          instance.artifacts.push(entry);
        }
      }
      instance.diagnostics.push(
        ...harvested.diagnostics.map(d => (instance.attempts > 1 ? `[attempt ${instance.attempts}] ${d}` : d))
      );
    } catch (err) {
      this.logger.error(`[scheduler] ${instance.id} harvest failed: ${errorMessage(err)}`);
      instance.diagnostics.push(`harvest failed: ${errorMessage(err)}`);
    }
  }

  private finish(instance: ExecutorInstance, state: LifecycleState, error?: unknown): void {
    instance.transition(state, error);
    this.aggregator.annotate(instance.id, {
      state,
      ...(instance.error ? { error: instance.error } : {})
    });

    const message = `[scheduler] ${instance.id} ${state}${instance.error ? `: ${instance.error.message}` : ''}`;
    if (state === 'Completed') {
      this.logger.info(message);
    } else {
      this.logger.warn(message);
    }
  }

  private subpath(instance: ExecutorInstance): string {
    if (instance.artifactDir === undefined) {
      throw new Error(`${instance.id}: no artifact directory allocated`);
    }
    return instance.artifactDir;
  }

  private async pause(runDeadline: number | undefined): Promise<void> {
    const untilDeadline = runDeadline !== undefined ? Math.max(runDeadline - this.clock(), 0) : Infinity;
    const delay = Math.min(this.settings.pollIntervalMs, untilDeadline);
    try {
      await sleep(delay, undefined, { signal: this.signal });
    } catch (err) {
      // An abort wakes the loop early; the next iteration handles it
      if (!this.signal?.aborted) {
        throw err;
      }
    }
  }
}

function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason.message;
  }
  return typeof reason === 'string' ? reason : 'Run cancelled';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

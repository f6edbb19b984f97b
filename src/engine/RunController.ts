/**
 * RunController: top-level coordinator for one run.
 *
 * runPlan() merges the layered settings, the plan and the `-o` overrides,
 * validates the result, prepares the artifacts directory, hands the
 * executors to the Scheduler and writes the final artifacts:
 *
 *   <artifacts-dir>/
 *     effective-plan.json   merged document that was run
 *     loadplan.log          consolidated run log
 *     <executor-id>/        one per executor (tool output, samples.jsonl)
 *     report.json           per-executor and overall statistics, states
 *     timeline.jsonl        merged sample timeline
 *     metrics.prom          Prometheus exposition of the run registry
 *     summary.txt           plain-text summary
 *
 * A plan that fails validation launches nothing; the only file written is
 * `error-report.json` in the run directory.
 */

import * as path from 'path';

import type { Logger } from 'winston';

import { ArtifactStore } from '../artifacts/ArtifactStore.js';
import { DEFAULT_ARTIFACTS_DIR, expandArtifactsDir, settingsSchema } from '../config/settings.js';
import { CancellationError, ConfigurationError, toErrorRecord, type ErrorRecord } from '../errors.js';
import { createDefaultRegistry, type ExecutorRegistry } from '../executors/registry.js';
import type { LifecycleState } from '../executors/types.js';
import { createRunMetrics, createRunRegistry } from '../metrics/registry.js';
import { applyOverrides } from '../plan/overrides.js';
import { buildTestPlan, type TestPlan } from '../plan/TestPlan.js';
import { formatRunSummary } from '../reporting/summary.js';
import { createRunLogger, fileTransport } from '../utils/logger.js';
import { isPlainObject, mergeAll, type PlainObject } from '../utils/merge.js';

import type { ExecutorInstanceSnapshot } from './ExecutorInstance.js';
import { MetricsAggregator, type AggregateReport } from './MetricsAggregator.js';
import { Scheduler } from './Scheduler.js';

export const RUN_LOG_FILE = 'loadplan.log';
export const ERROR_REPORT_FILE = 'error-report.json';

/** Top-level files of a run directory; executor subpaths never take these names */
export const RUN_FILES = [
  'effective-plan.json',
  RUN_LOG_FILE,
  'report.json',
  'timeline.jsonl',
  'metrics.prom',
  'summary.txt',
  ERROR_REPORT_FILE
] as const;

/**
 * Everything outside the plan document that shapes a run, assembled once by
 * the caller.
 */
export interface GlobalConfig {
  /** Merged settings-directory documents; lowest precedence */
  baseDocument?: PlainObject;
  /** Raw `key=value` overrides; highest precedence */
  overrides?: string[];
  /** Base for a relative artifacts directory */
  cwd?: string;
}

export interface RunControllerOptions {
  registry?: ExecutorRegistry;
  logger?: Logger;
  clock?: () => number;
  /** Include Node.js process metrics in metrics.prom */
  defaultMetrics?: boolean;
}

export type ExitStatus = 0 | 1 | 2;

export interface RunResult {
  artifactsDir: string;
  exitStatus: ExitStatus;
  report: AggregateReport;
  executors: ExecutorInstanceSnapshot[];
  cancelled: boolean;
  timedOut: boolean;
  /** Set when the scheduler's control loop failed */
  fault?: ErrorRecord;
  startedAt: number;
  finishedAt: number;
}

export function computeExitStatus(
  states: readonly LifecycleState[],
  options: { bestEffort: boolean; cancelled: boolean; faulted?: boolean }
): ExitStatus {
  if (options.cancelled) {
    return 2;
  }
  if (options.faulted) {
    return 1;
  }
  if (states.every(state => state === 'Completed')) {
    return 0;
  }
  if (options.bestEffort && states.some(state => state === 'Completed')) {
    return 0;
  }
  return 1;
}

export class RunController {
  private readonly registry: ExecutorRegistry;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly defaultMetrics: boolean;
  private readonly abort = new AbortController();

  constructor(options: RunControllerOptions = {}) {
    this.registry = options.registry ?? createDefaultRegistry();
    this.logger = options.logger ?? createRunLogger();
    this.clock = options.clock ?? Date.now;
    this.defaultMetrics = options.defaultMetrics ?? false;
  }

  get cancelled(): boolean {
    return this.abort.signal.aborted;
  }

  /**
   * Stop running executors (after the grace period) and skip pending ones.
   * Safe to call more than once and before the run starts.
   */
  cancel(reason = 'Run cancelled'): void {
    if (!this.abort.signal.aborted) {
      this.logger.warn(`[run] Cancelling: ${reason}`);
      this.abort.abort(new CancellationError(reason));
    }
  }

  async runPlan(planDoc: PlainObject, globalConfig: GlobalConfig = {}): Promise<RunResult> {
    const startedAt = this.clock();
    const cwd = globalConfig.cwd ?? process.cwd();

    const document = mergeAll([globalConfig.baseDocument ?? {}, planDoc]);
    const runDirFor = (pattern: string) => path.resolve(cwd, expandArtifactsDir(pattern, new Date(startedAt)));

    let effective: PlainObject | undefined;
    let validated: { effective: PlainObject; plan: TestPlan };
    try {
      effective = applyOverrides(document, globalConfig.overrides ?? []);
      validated = { effective, plan: buildTestPlan(effective, this.registry) };
    } catch (err) {
      if (err instanceof ConfigurationError) {
        await this.writeErrorReport(runDirFor(artifactsPattern(effective ?? document)), err);
      }
      throw err;
    }

    const { plan } = validated;
    const runDir = runDirFor(plan.settings.artifactsDir);
    const store = new ArtifactStore(runDir, { reserved: RUN_FILES });
    await store.init();

    const transport = fileTransport(store.path(RUN_LOG_FILE));
    this.logger.add(transport);
    try {
      return await this.execute(plan, validated.effective, store, startedAt);
    } finally {
      this.logger.remove(transport);
      transport.close?.();
    }
  }

  private async execute(plan: TestPlan, effective: PlainObject, store: ArtifactStore, startedAt: number): Promise<RunResult> {
    const { settings } = plan;
    this.logger.info(`[run] Artifacts directory: ${store.root}`);
    await store.writeJson('effective-plan.json', effective);

    const registry = createRunRegistry({ defaultMetrics: this.defaultMetrics });
    const metrics = createRunMetrics(registry);
    const aggregator = new MetricsAggregator({ registry, logger: this.logger });
    const scheduler = new Scheduler({
      settings,
      registry: this.registry,
      store,
      aggregator,
      logger: this.logger,
      signal: this.abort.signal,
      clock: this.clock
    });

    const outcome = await scheduler.run(plan.executors);
    const report = await aggregator.finalize();
    const finishedAt = this.clock();

    const executors = outcome.instances.map(instance => instance.snapshot());
    for (const executor of executors) {
      metrics.recordOutcome(executor.id, executor.type, executor.state, executor.attempts);
    }
    metrics.recordDuration((finishedAt - startedAt) / 1000);

    const fault = outcome.fault ? toErrorRecord(outcome.fault) : undefined;
    const exitStatus = computeExitStatus(
      executors.map(executor => executor.state),
      { bestEffort: settings.bestEffort, cancelled: outcome.cancelled, faulted: fault !== undefined }
    );

    const result: RunResult = {
      artifactsDir: store.root,
      exitStatus,
      report,
      executors,
      cancelled: outcome.cancelled,
      timedOut: outcome.timedOut,
      ...(fault ? { fault } : {}),
      startedAt,
      finishedAt
    };

    await store.writeJson('report.json', {
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
      exitStatus,
      cancelled: outcome.cancelled,
      timedOut: outcome.timedOut,
      ...(fault ? { fault } : {}),
      policy: settings.policy,
      executors,
      summaries: report.summaries
    });
    await store.writeText(
      'timeline.jsonl',
      report.timeline.map(sample => JSON.stringify(sample)).join('\n') + (report.timeline.length > 0 ? '\n' : '')
    );
    await store.writeText('metrics.prom', await registry.metrics());
    await store.writeText('summary.txt', formatRunSummary(result) + '\n');

    this.logger.info(`[run] Finished with exit status ${exitStatus}`);
    return result;
  }

  private async writeErrorReport(runDir: string, error: ConfigurationError): Promise<void> {
    const store = new ArtifactStore(runDir);
    try {
      await store.init();
      await store.writeJson(ERROR_REPORT_FILE, { ...toErrorRecord(error), issues: error.issues });
    } catch (writeErr) {
      this.logger.error(
        `[run] Could not write ${ERROR_REPORT_FILE}: ${writeErr instanceof Error ? writeErr.message : String(writeErr)}`
      );
    }
  }
}

/**
 * Artifacts directory pattern, readable even from a document that fails
 * validation so the error report has somewhere to go.
 */
function artifactsPattern(document: PlainObject): string {
  const settings = isPlainObject(document.settings) ? document.settings : {};
  const parsed = settingsSchema.safeParse(settings);
  if (parsed.success) {
    return parsed.data['artifacts-dir'];
  }
  const raw = settings['artifacts-dir'];
  return typeof raw === 'string' && raw.length > 0 ? raw : DEFAULT_ARTIFACTS_DIR;
}

import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { RunController, computeExitStatus } from '../../../src/engine/RunController.js';
import { ConfigurationError } from '../../../src/errors.js';
import { createSilentLogger } from '../../../src/utils/logger.js';

import { Journal, createFakeRegistry } from './fakeDriver.js';

const fastSettings = { 'artifacts-dir': 'run', 'check-interval': '10ms', 'stop-grace': '100ms' };

describe('computeExitStatus', () => {
  it('should be 0 only when every executor completed', () => {
    expect(computeExitStatus([], { bestEffort: false, cancelled: false })).toBe(0);
    expect(computeExitStatus(['Completed', 'Completed'], { bestEffort: false, cancelled: false })).toBe(0);
    expect(computeExitStatus(['Completed', 'Failed'], { bestEffort: false, cancelled: false })).toBe(1);
    expect(computeExitStatus(['TimedOut'], { bestEffort: false, cancelled: false })).toBe(1);
  });

  it('should accept a partial success in best-effort mode', () => {
    expect(computeExitStatus(['Completed', 'Failed'], { bestEffort: true, cancelled: false })).toBe(0);
    expect(computeExitStatus(['Failed', 'TimedOut'], { bestEffort: true, cancelled: false })).toBe(1);
  });

  it('should be 2 for a cancelled run', () => {
    expect(computeExitStatus(['Completed'], { bestEffort: true, cancelled: true })).toBe(2);
  });

  it('should be 1 when the scheduler faulted', () => {
    expect(computeExitStatus(['Completed'], { bestEffort: true, cancelled: false, faulted: true })).toBe(1);
  });
});

describe('RunController', () => {
  let dir: string;
  let journal: Journal;
  let controller: RunController;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'loadplan-run-'));
    journal = new Journal();
    controller = new RunController({ registry: createFakeRegistry(journal), logger: createSilentLogger() });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should exit 0 for a plan without executors', async () => {
    const result = await controller.runPlan({ settings: fastSettings }, { cwd: dir });

    expect(result.exitStatus).toBe(0);
    expect(result.executors).toEqual([]);
    expect(result.artifactsDir).toBe(path.join(dir, 'run'));

    const files = await readdir(result.artifactsDir);
    expect(files).toEqual(expect.arrayContaining([
      'effective-plan.json',
      'report.json',
      'timeline.jsonl',
      'metrics.prom',
      'summary.txt'
    ]));
    expect(await readFile(path.join(result.artifactsDir, 'timeline.jsonl'), 'utf-8')).toBe('');
  });

  it('should exit 1 when a sequential run has a failure but still run the rest', async () => {
    const result = await controller.runPlan({
      execution: [
        { executor: 'fake', id: 'first', scenario: { outcome: 'Failed' } },
        { executor: 'fake', id: 'second', scenario: { latencies: [10, 20] } }
      ],
      settings: { ...fastSettings, sequential: true }
    }, { cwd: dir });

    expect(result.exitStatus).toBe(1);
    expect(result.executors.map(e => [e.id, e.state])).toEqual([['first', 'Failed'], ['second', 'Completed']]);
    expect(journal.at('second', 'start')).toBeGreaterThanOrEqual(journal.at('first', 'end'));

    const report = JSON.parse(await readFile(path.join(result.artifactsDir, 'report.json'), 'utf-8'));
    expect(report.exitStatus).toBe(1);
    expect(report.policy).toBe('sequential');
    expect(report.summaries.second.requests).toBe(2);
    expect(report.summaries.first.state).toBe('Failed');
    expect(report.summaries.overall.samples).toBe(2);

    const timeline = (await readFile(path.join(result.artifactsDir, 'timeline.jsonl'), 'utf-8')).trim().split('\n');
    expect(timeline.map(line => JSON.parse(line).value)).toEqual([10, 20]);

    const summary = await readFile(path.join(result.artifactsDir, 'summary.txt'), 'utf-8');
    expect(summary.split('\n')).toContain('Exit status: 1');
  });

  it('should exit 0 in best-effort mode when something completed', async () => {
    const result = await controller.runPlan({
      execution: [
        { executor: 'fake', scenario: { outcome: 'Failed' } },
        { executor: 'fake' }
      ],
      settings: fastSettings
    }, { cwd: dir, overrides: ['settings.best-effort=true'] });

    expect(result.executors.map(e => e.state)).toEqual(['Failed', 'Completed']);
    expect(result.exitStatus).toBe(0);
  });

  it('should layer settings, plan and overrides in that order', async () => {
    const result = await controller.runPlan(
      { settings: { 'best-effort': true, 'check-interval': '50ms' } },
      {
        cwd: dir,
        baseDocument: { settings: { 'artifacts-dir': 'run', 'best-effort': false, 'max-concurrency': 4 } },
        overrides: ['settings.check-interval=10ms']
      }
    );

    const effective = JSON.parse(await readFile(path.join(result.artifactsDir, 'effective-plan.json'), 'utf-8'));
    expect(effective).toEqual({
      settings: {
        'artifacts-dir': 'run',
        'best-effort': true,
        'max-concurrency': 4,
        'check-interval': '10ms'
      }
    });
  });

  it('should launch nothing and write only the error report for an invalid plan', async () => {
    const plan = {
      execution: [
        { executor: 'fake', id: 'ok' },
        { executor: 'fake', scenario: { outcome: 'Sometimes' } }
      ],
      settings: fastSettings
    };

    await expect(controller.runPlan(plan, { cwd: dir })).rejects.toBeInstanceOf(ConfigurationError);
    expect(journal.starts.size).toBe(0);

    const runDir = path.join(dir, 'run');
    expect(await readdir(runDir)).toEqual(['error-report.json']);
    const report = JSON.parse(await readFile(path.join(runDir, 'error-report.json'), 'utf-8'));
    expect(report.kind).toBe('ConfigurationError');
    expect(report.issues.map((issue: { path: string }) => issue.path)).toEqual(['execution[1].scenario.outcome']);
  });

  it('should reject the reserved overall id before creating the run', async () => {
    const plan = {
      execution: [{ executor: 'fake', id: 'overall' }, { executor: 'fake', id: 'b' }],
      settings: fastSettings
    };

    await expect(controller.runPlan(plan, { cwd: dir })).rejects.toBeInstanceOf(ConfigurationError);
    expect(journal.starts.size).toBe(0);
    expect(await readdir(path.join(dir, 'run'))).toEqual(['error-report.json']);
  });

  it('should keep executor directories apart from the run files', async () => {
    const result = await controller.runPlan({
      execution: [{ executor: 'fake', id: 'report.json' }, { executor: 'fake', id: 'b' }],
      settings: fastSettings
    }, { cwd: dir });

    expect(result.exitStatus).toBe(0);
    expect(result.executors.map(e => e.artifactDir)).toEqual([
      path.join(result.artifactsDir, 'report.json-2'),
      path.join(result.artifactsDir, 'b')
    ]);
    const report = JSON.parse(await readFile(path.join(result.artifactsDir, 'report.json'), 'utf-8'));
    expect(report.summaries['report.json'].state).toBe('Completed');
  });

  it('should still write the report when the control loop fails', async () => {
    const result = await controller.runPlan({
      execution: [
        { executor: 'fake', id: 'broken', scenario: { latencies: [5], 'foreign-samples': true } },
        { executor: 'fake', id: 'next' }
      ],
      settings: { ...fastSettings, sequential: true }
    }, { cwd: dir });

    expect(result.exitStatus).toBe(1);
    expect(result.fault).toEqual({ kind: 'Error', message: 'Sample for broken-other ingested as broken' });
    expect(result.executors.map(e => [e.id, e.state])).toEqual([['broken', 'Failed'], ['next', 'Stopped']]);
    expect(result.executors[0].error).toEqual({
      kind: 'ExecutorRuntimeError',
      message: 'Scheduler fault: Sample for broken-other ingested as broken'
    });
    expect(journal.starts.has('next')).toBe(false);

    const report = JSON.parse(await readFile(path.join(result.artifactsDir, 'report.json'), 'utf-8'));
    expect(report.exitStatus).toBe(1);
    expect(report.fault.message).toBe('Sample for broken-other ingested as broken');
    const summary = await readFile(path.join(result.artifactsDir, 'summary.txt'), 'utf-8');
    expect(summary.split('\n')).toContain('Scheduler fault: Sample for broken-other ingested as broken');
  });

  it('should reject an invalid override before running anything', async () => {
    await expect(controller.runPlan({ execution: [{ executor: 'fake' }], settings: fastSettings }, {
      cwd: dir,
      overrides: ['no-equals-sign']
    })).rejects.toThrow('expected key=value');
    expect(journal.starts.size).toBe(0);
  });

  it('should exit 2 and stop every executor when cancelled', async () => {
    controller.cancel('test cancel');
    controller.cancel('second call is ignored');
    expect(controller.cancelled).toBe(true);

    const result = await controller.runPlan({
      execution: [{ executor: 'fake', scenario: { 'run-for': 10_000 } }],
      settings: fastSettings
    }, { cwd: dir });

    expect(result.exitStatus).toBe(2);
    expect(result.cancelled).toBe(true);
    expect(result.executors.map(e => e.state)).toEqual(['Stopped']);
    expect(result.executors[0].error).toEqual({ kind: 'CancellationError', message: 'test cancel' });
  });

  it('should record a run timeout', async () => {
    const result = await controller.runPlan({
      execution: [{ executor: 'fake', scenario: { 'run-for': 10_000 } }],
      settings: { ...fastSettings, timeout: '100ms' }
    }, { cwd: dir });

    expect(result.timedOut).toBe(true);
    expect(result.exitStatus).toBe(1);
    expect(result.executors[0].state).toBe('TimedOut');
    expect(result.executors[0].artifacts).toEqual(['fake.out']);
  });
});

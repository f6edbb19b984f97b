import { describe, it, expect } from 'vitest';

import { ExecutorInstance } from '../../../src/engine/ExecutorInstance.js';
import { IllegalTransitionError, TimeoutError } from '../../../src/errors.js';
import type { ExecutorSpec } from '../../../src/plan/TestPlan.js';

const spec: ExecutorSpec = {
  id: 'ab-1',
  index: 0,
  type: 'ab',
  config: {},
  retries: 0,
  retryDelayMs: 0
};

function fixedClock(start: number): () => number {
  let now = start;
  return () => now++;
}

describe('ExecutorInstance', () => {
  it('should start Pending with a timestamped history', () => {
    const instance = new ExecutorInstance(spec, fixedClock(100));

    expect(instance.state).toBe('Pending');
    expect(instance.terminal).toBe(false);
    expect(instance.history).toEqual([{ state: 'Pending', at: 100 }]);
  });

  it('should follow the normal lifecycle', () => {
    const instance = new ExecutorInstance(spec, fixedClock(100));
    instance.transition('Starting');
    instance.transition('Running');
    instance.transition('Completed');

    expect(instance.state).toBe('Completed');
    expect(instance.terminal).toBe(true);
    expect(instance.history.map(change => change.state)).toEqual(['Pending', 'Starting', 'Running', 'Completed']);
    expect(instance.history[2]).toEqual({ state: 'Running', at: 102 });
  });

  it('should reject transitions the lifecycle does not allow', () => {
    const instance = new ExecutorInstance(spec);

    expect(() => instance.transition('Running')).toThrow(IllegalTransitionError);
    expect(() => instance.transition('Completed')).toThrow('ab-1: illegal transition Pending -> Completed');
    expect(instance.state).toBe('Pending');
  });

  it('should never leave a terminal state', () => {
    const instance = new ExecutorInstance(spec);
    instance.transition('Stopped');

    for (const next of ['Pending', 'Starting', 'Running', 'Completed', 'Failed', 'TimedOut', 'Stopped'] as const) {
      expect(() => instance.transition(next)).toThrow(IllegalTransitionError);
    }
    expect(instance.state).toBe('Stopped');
  });

  it('should record the error that ended the instance', () => {
    const instance = new ExecutorInstance(spec);
    instance.transition('Starting');
    instance.transition('TimedOut', new TimeoutError('ab-1: executor timeout of 100ms exceeded', 100));

    expect(instance.error).toEqual({ kind: 'TimeoutError', message: 'ab-1: executor timeout of 100ms exceeded' });
    expect(instance.snapshot().error).toEqual(instance.error);
  });

  it('should track samples and the latest heartbeat', () => {
    const instance = new ExecutorInstance(spec);
    instance.recordSamples(3, 500);
    instance.recordSamples(2, 400);
    instance.heartbeat(450);

    expect(instance.sampleCount).toBe(5);
    expect(instance.lastHeartbeatAt).toBe(500);
  });

  it('should produce a detached snapshot', () => {
    const instance = new ExecutorInstance(spec, fixedClock(1));
    instance.artifactDir = '/tmp/run/ab-1';
    instance.artifacts.push('ab.out');

    const snapshot = instance.snapshot();
    instance.artifacts.push('ab.err');
    instance.transition('Starting');

    expect(snapshot).toEqual({
      id: 'ab-1',
      type: 'ab',
      state: 'Pending',
      artifactDir: '/tmp/run/ab-1',
      attempts: 0,
      sampleCount: 0,
      history: [{ state: 'Pending', at: 1 }],
      artifacts: ['ab.out'],
      diagnostics: []
    });
  });
});

/**
 * ExecutorInstance: runtime record of one ExecutorSpec.
 *
 * Owns the lifecycle state machine. Transitions outside ALLOWED_TRANSITIONS
 * throw IllegalTransitionError; terminal states have no exits.
 */

import { IllegalTransitionError, toErrorRecord, type ErrorRecord } from '../errors.js';
import type { DriverHandle, ExecutorDriver, LifecycleState } from '../executors/types.js';
import { isTerminalState } from '../executors/types.js';
import type { ExecutorSpec } from '../plan/TestPlan.js';

const ALLOWED_TRANSITIONS: Record<LifecycleState, readonly LifecycleState[]> = {
  Pending: ['Starting', 'Stopped'],
  Starting: ['Running', 'Failed', 'TimedOut', 'Stopped'],
  Running: ['Completed', 'Failed', 'TimedOut', 'Stopped'],
  Completed: [],
  Failed: [],
  TimedOut: [],
  Stopped: []
};

export interface StateChange {
  state: LifecycleState;
  at: number;
}

export interface ExecutorInstanceSnapshot {
  id: string;
  type: string;
  state: LifecycleState;
  pid?: number;
  artifactDir?: string;
  attempts: number;
  sampleCount: number;
  lastHeartbeatAt?: number;
  history: StateChange[];
  error?: ErrorRecord;
  artifacts: string[];
  diagnostics: string[];
}

export class ExecutorInstance {
  readonly spec: ExecutorSpec;
  private current: LifecycleState = 'Pending';
  private readonly changes: StateChange[];
  private readonly clock: () => number;

  driver: ExecutorDriver | null = null;
  handle: DriverHandle | null = null;
  artifactDir: string | undefined;
  attempts = 0;
  sampleCount = 0;
  lastHeartbeatAt: number | undefined;
  /** Absolute deadline of the per-executor timeout, set on start */
  deadline: number | undefined;
  /** Earliest time the next retry attempt may launch */
  retryAt: number | undefined;
  artifacts: string[] = [];
  diagnostics: string[] = [];
  private failure: ErrorRecord | undefined;

  constructor(spec: ExecutorSpec, clock: () => number = Date.now) {
    this.spec = spec;
    this.clock = clock;
    this.changes = [{ state: 'Pending', at: clock() }];
  }

  get id(): string {
    return this.spec.id;
  }

  get state(): LifecycleState {
    return this.current;
  }

  get terminal(): boolean {
    return isTerminalState(this.current);
  }

  get history(): readonly StateChange[] {
    return this.changes;
  }

  get error(): ErrorRecord | undefined {
    return this.failure;
  }

  transition(next: LifecycleState, error?: unknown): void {
    if (!ALLOWED_TRANSITIONS[this.current].includes(next)) {
      throw new IllegalTransitionError(this.id, this.current, next);
    }
    this.current = next;
    this.changes.push({ state: next, at: this.clock() });
    if (error !== undefined) {
      this.failure = toErrorRecord(error);
    }
  }

  recordSamples(count: number, at: number): void {
    this.sampleCount += count;
    this.heartbeat(at);
  }

  heartbeat(at: number): void {
    this.lastHeartbeatAt = Math.max(this.lastHeartbeatAt ?? 0, at);
  }

  snapshot(): ExecutorInstanceSnapshot {
    return {
      id: this.id,
      type: this.spec.type,
      state: this.current,
      ...(this.handle?.pid !== undefined ? { pid: this.handle.pid } : {}),
      ...(this.artifactDir !== undefined ? { artifactDir: this.artifactDir } : {}),
      attempts: this.attempts,
      sampleCount: this.sampleCount,
      ...(this.lastHeartbeatAt !== undefined ? { lastHeartbeatAt: this.lastHeartbeatAt } : {}),
      history: this.changes.map(change => ({ ...change })),
      ...(this.failure ? { error: this.failure } : {}),
      artifacts: [...this.artifacts],
      diagnostics: [...this.diagnostics]
    };
  }
}

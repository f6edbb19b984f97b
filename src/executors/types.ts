/**
 * Executor driver contract shared by every load-tool integration.
 */

export type LifecycleState =
  | 'Pending'
  | 'Starting'
  | 'Running'
  | 'Completed'
  | 'Failed'
  | 'TimedOut'
  | 'Stopped';

export const TERMINAL_STATES: readonly LifecycleState[] = ['Completed', 'Failed', 'TimedOut', 'Stopped'];

export function isTerminalState(state: LifecycleState): boolean {
  return TERMINAL_STATES.includes(state);
}

/**
 * What a driver can say about its own process. TimedOut, Stopped and Pending
 * are decided by the scheduler, never by a driver.
 */
export type DriverState = Extract<LifecycleState, 'Starting' | 'Running' | 'Completed' | 'Failed'>;

export type MetricKind = 'latency' | 'throughput' | 'error';

export interface Sample {
  /** epoch milliseconds */
  timestamp: number;
  executorId: string;
  kind: MetricKind;
  value: number;
  label?: string;
}

export interface DriverHandle {
  executorId: string;
  pid?: number;
  artifactDir: string;
  startedAt: number;
}

export interface PollResult {
  state: DriverState;
  samples: Sample[];
  /** Timestamp of the last sign of life (output or samples) */
  lastActivityAt: number;
  /** Set when state is Failed */
  error?: Error;
}

export interface HarvestResult {
  artifacts: string[];
  diagnostics: string[];
}

export interface ExecutorDriver {
  readonly executorId: string;
  readonly type: string;
  start(artifactDir: string): Promise<DriverHandle>;
  poll(handle: DriverHandle): Promise<PollResult>;
  stop(handle: DriverHandle, graceMs: number): Promise<void>;
  harvest(handle: DriverHandle): Promise<HarvestResult>;
}

/**
 * Load profile shared by every execution item.
 */
export interface LoadProfile {
  concurrency?: number;
  rampUpMs?: number;
  holdForMs?: number;
  iterations?: number;
}

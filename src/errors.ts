/**
 * Error taxonomy for plan validation, environment problems and executor failures.
 *
 * Only ConfigurationError and artifact-root EnvironmentErrors abort a run;
 * everything else is recorded against the executor that raised it.
 */

export type LoadplanErrorCode =
  | 'configuration'
  | 'environment'
  | 'executor_runtime'
  | 'timeout'
  | 'cancelled'
  | 'illegal_transition';

export class LoadplanError extends Error {
  constructor(
    public readonly code: LoadplanErrorCode,
    message: string,
    public readonly underlyingError?: unknown
  ) {
    super(message);
    this.name = 'LoadplanError';
  }
}

export interface ConfigurationIssue {
  path: string;
  message: string;
}

export class ConfigurationError extends LoadplanError {
  readonly issues: ConfigurationIssue[];
  /** Message without the issue list */
  readonly summary: string;

  constructor(message: string, issues: ConfigurationIssue[] = []) {
    const detail = issues.length > 0
      ? `${message}: ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`
      : message;
    super('configuration', detail);
    this.name = 'ConfigurationError';
    this.issues = issues;
    this.summary = message;
  }
}

export class EnvironmentError extends LoadplanError {
  constructor(message: string, underlyingError?: unknown) {
    super('environment', message, underlyingError);
    this.name = 'EnvironmentError';
  }
}

export class ExecutorRuntimeError extends LoadplanError {
  constructor(
    message: string,
    public readonly diagnostics: string[] = [],
    underlyingError?: unknown
  ) {
    super('executor_runtime', message, underlyingError);
    this.name = 'ExecutorRuntimeError';
  }
}

export class TimeoutError extends LoadplanError {
  constructor(message: string, public readonly limitMs: number) {
    super('timeout', message);
    this.name = 'TimeoutError';
  }
}

export class CancellationError extends LoadplanError {
  constructor(message = 'Run cancelled') {
    super('cancelled', message);
    this.name = 'CancellationError';
  }
}

export class IllegalTransitionError extends LoadplanError {
  constructor(
    public readonly executorId: string,
    public readonly from: string,
    public readonly to: string
  ) {
    super('illegal_transition', `${executorId}: illegal transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

/**
 * Serializable view of an error, as stored on instances and in reports.
 */
export interface ErrorRecord {
  kind: string;
  message: string;
  diagnostics?: string[];
}

export function toErrorRecord(error: unknown): ErrorRecord {
  if (error instanceof ExecutorRuntimeError) {
    return {
      kind: error.name,
      message: error.message,
      ...(error.diagnostics.length > 0 ? { diagnostics: error.diagnostics } : {})
    };
  }
  if (error instanceof Error) {
    return { kind: error.name, message: error.message };
  }
  return { kind: 'Error', message: String(error) };
}

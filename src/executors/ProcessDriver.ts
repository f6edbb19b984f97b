/**
 * ProcessDriver: base class for executors backed by one external process.
 *
 * The process writes stdout/stderr straight into `<type>.out` / `<type>.err`
 * inside the executor's artifact directory; subclasses turn whatever the tool
 * writes there (or into its own report files) into samples.
 *
 * Lifecycle:
 *   start()   spawn, resolve once the OS confirms the process exists
 *   poll()    read new output, never waits for the process
 *   stop()    SIGTERM, SIGKILL after the grace window, then harvest
 *   harvest() list artifacts and collect stdout/stderr tails
 */

import { spawn, type ChildProcess } from 'child_process';
import type { Dirent } from 'fs';
import { mkdir, open, readdir, stat, type FileHandle } from 'fs/promises';
import * as path from 'path';

import type { Logger } from 'winston';

import { EnvironmentError, ExecutorRuntimeError } from '../errors.js';
import { isMissingFileError } from '../utils/files.js';
import { settlesWithin } from '../utils/timing.js';

import type {
  DriverHandle,
  DriverState,
  ExecutorDriver,
  HarvestResult,
  PollResult,
  Sample
} from './types.js';

export interface CommandLine {
  command: string;
  args: string[];
  env?: Record<string, string>;
  cwd?: string;
}

export interface ProcessDriverOptions {
  executorId: string;
  type: string;
  logger: Logger;
}

interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

const DIAGNOSTIC_TAIL_LINES = 20;
const DIAGNOSTIC_TAIL_BYTES = 64 * 1024;
const KILL_WAIT_MS = 5000;

export abstract class ProcessDriver implements ExecutorDriver {
  readonly executorId: string;
  readonly type: string;
  protected readonly logger: Logger;

  private started = false;
  private child: ChildProcess | null = null;
  private handle: DriverHandle | null = null;
  private exitInfo: ExitInfo | null = null;
  private exited: Promise<void> = Promise.resolve();
  private drained = false;
  private failure: Error | undefined;
  private harvested: HarvestResult | null = null;
  private lastActivityAt = 0;
  private outputSizes = new Map<string, number>();

  constructor(options: ProcessDriverOptions) {
    this.executorId = options.executorId;
    this.type = options.type;
    this.logger = options.logger.child({ executor: options.executorId });
  }

  /**
   * Command to launch; called once from start() after the artifact
   * directory exists.
   */
  protected abstract buildCommand(artifactDir: string): CommandLine | Promise<CommandLine>;

  /**
   * New samples since the previous call. `final` is true exactly once, after
   * the process exited; implementations flush partial lines and emit
   * end-of-run totals then.
   */
  protected abstract collectSamples(final: boolean): Promise<Sample[]>;

  /**
   * Decide whether an exit means failure. Tools with their own exit-code
   * conventions override this.
   */
  protected exitFailure(code: number | null, signal: NodeJS.Signals | null): string | null {
    if (signal) {
      return `${this.type} terminated by ${signal}`;
    }
    if (code !== 0) {
      return `${this.type} exited with non-zero code: ${code}`;
    }
    return null;
  }

  protected get stdoutPath(): string {
    return this.artifactPath(`${this.type}.out`);
  }

  protected get stderrPath(): string {
    return this.artifactPath(`${this.type}.err`);
  }

  protected artifactPath(name: string): string {
    if (!this.handle) {
      throw new ExecutorRuntimeError(`${this.executorId}: not started`);
    }
    return path.join(this.handle.artifactDir, name);
  }

  protected sample(kind: Sample['kind'], value: number, timestamp = Date.now(), label?: string): Sample {
    return {
      timestamp,
      executorId: this.executorId,
      kind,
      value,
      ...(label !== undefined ? { label } : {})
    };
  }

  async start(artifactDir: string): Promise<DriverHandle> {
    if (this.started) {
      throw new ExecutorRuntimeError(`${this.executorId}: start called twice`);
    }
    this.started = true;

    try {
      await mkdir(artifactDir, { recursive: true });
    } catch (err) {
      throw new EnvironmentError(`${this.executorId}: cannot create ${artifactDir}`, err);
    }

    const startedAt = Date.now();
    this.handle = { executorId: this.executorId, artifactDir, startedAt };
    this.lastActivityAt = startedAt;

    const commandLine = await this.buildCommand(artifactDir);
    const stdout = await open(this.stdoutPath, 'w');
    const stderr = await open(this.stderrPath, 'w');

    this.logger.info(`[${this.type}] Starting: ${[commandLine.command, ...commandLine.args].join(' ')}`);

    try {
      const child = spawn(commandLine.command, commandLine.args, {
        cwd: commandLine.cwd,
        env: { ...process.env, ...commandLine.env },
        stdio: ['ignore', stdout.fd, stderr.fd]
      });
      this.child = child;
      child.on('error', err => {
        this.logger.error(`[${this.type}] Process error: ${err.message}`);
      });

      this.exited = new Promise<void>(resolve => {
        child.once('exit', (code, signal) => {
          this.exitInfo = { code, signal };
          this.logger.debug(`[${this.type}] Process exited`, { code, signal });
          resolve();
        });
      });

      await new Promise<void>((resolve, reject) => {
        child.once('spawn', () => resolve());
        child.once('error', reject);
      });

      this.handle.pid = child.pid;
      return this.handle;
    } catch (err) {
      this.exitInfo = { code: null, signal: null };
      if (isMissingFileError(err)) {
        throw new EnvironmentError(
          `${this.executorId}: required tool not found: ${commandLine.command}`,
          err
        );
      }
      throw new ExecutorRuntimeError(
        `${this.executorId}: failed to launch ${commandLine.command}`,
        [],
        err
      );
    } finally {
      await stdout.close();
      await stderr.close();
    }
  }

  async poll(handle: DriverHandle): Promise<PollResult> {
    this.assertHandle(handle);

    // Read the exit flag before collecting so output written just before
    // exit is never mistaken for the final batch.
    const exit = this.exitInfo;
    let samples: Sample[] = [];

    if (!this.drained) {
      samples = await this.collectSamples(exit !== null);
      if (exit !== null) {
        this.drained = true;
      }
    }

    await this.refreshActivity(samples);

    if (exit === null) {
      return { state: 'Running', samples, lastActivityAt: this.lastActivityAt };
    }

    const state = await this.resolveExitState(exit);
    return {
      state,
      samples,
      lastActivityAt: this.lastActivityAt,
      ...(this.failure ? { error: this.failure } : {})
    };
  }

  async stop(handle: DriverHandle, graceMs: number): Promise<void> {
    this.assertHandle(handle);
    const child = this.child;

    if (child && this.exitInfo === null) {
      this.logger.info(`[${this.type}] Stopping (grace ${graceMs}ms)`);
      child.kill('SIGTERM');

      if (!(await settlesWithin(this.exited, graceMs))) {
        this.logger.warn(`[${this.type}] Grace period elapsed, killing process ${child.pid}`);
        child.kill('SIGKILL');
        if (!(await settlesWithin(this.exited, KILL_WAIT_MS))) {
          this.logger.error(`[${this.type}] Process ${child.pid} did not exit after SIGKILL`);
        }
      }
    }

    await this.harvest(handle);
  }

  async harvest(handle: DriverHandle): Promise<HarvestResult> {
    this.assertHandle(handle);
    if (this.harvested) {
      return this.harvested;
    }

    const result: HarvestResult = {
      artifacts: await listFiles(handle.artifactDir),
      diagnostics: await this.readDiagnostics()
    };

    if (this.exitInfo !== null) {
      this.harvested = result;
    }
    return result;
  }

  /**
   * Non-empty tails of the tool's stdout and stderr.
   */
  protected async readDiagnostics(): Promise<string[]> {
    const diagnostics: string[] = [];
    for (const [label, filePath] of [['STDOUT', this.stdoutPath], ['STDERR', this.stderrPath]] as const) {
      const contents = await readTail(filePath, DIAGNOSTIC_TAIL_LINES);
      if (contents) {
        diagnostics.push(`${this.type} ${label}:\n${contents}`);
      }
    }
    return diagnostics;
  }

  private async resolveExitState(exit: ExitInfo): Promise<DriverState> {
    if (this.failure) {
      return 'Failed';
    }
    const message = this.exitFailure(exit.code, exit.signal);
    if (message === null) {
      return 'Completed';
    }
    this.failure = new ExecutorRuntimeError(message, await this.readDiagnostics());
    return 'Failed';
  }

  private async refreshActivity(samples: Sample[]): Promise<void> {
    for (const s of samples) {
      this.lastActivityAt = Math.max(this.lastActivityAt, s.timestamp);
    }

    for (const filePath of [this.stdoutPath, this.stderrPath]) {
      try {
        const { size } = await stat(filePath);
        if (size !== (this.outputSizes.get(filePath) ?? 0)) {
          this.outputSizes.set(filePath, size);
          this.lastActivityAt = Date.now();
        }
      } catch (err) {
        if (!isMissingFileError(err)) {
          throw err;
        }
      }
    }
  }

  private assertHandle(handle: DriverHandle): void {
    if (!this.handle || handle.executorId !== this.executorId || handle !== this.handle) {
      throw new ExecutorRuntimeError(`${this.executorId}: unknown driver handle`);
    }
  }
}

async function listFiles(dir: string, prefix = ''): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isMissingFileError(err)) {
      return [];
    }
    throw err;
  }

  const files: string[] = [];
  for (const entry of entries) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listFiles(path.join(dir, entry.name), relative)));
    } else {
      files.push(relative);
    }
  }
  return files.sort();
}

async function readTail(filePath: string, lines: number): Promise<string> {
  let handle: FileHandle;
  try {
    handle = await open(filePath, 'r');
  } catch (err) {
    if (isMissingFileError(err)) {
      return '';
    }
    throw err;
  }

  try {
    const { size } = await handle.stat();
    const length = Math.min(size, DIAGNOSTIC_TAIL_BYTES);
    const buffer = Buffer.alloc(length);
    await handle.read(buffer, 0, length, size - length);
    const contents = buffer.toString('utf-8').trim();
    return contents.split('\n').slice(-lines).join('\n');
  } finally {
    await handle.close();
  }
}

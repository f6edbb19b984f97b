/**
 * ArtifactStore: the per-run artifacts directory.
 *
 * Every executor gets its own subdirectory; names are handed out once per
 * store and never reused, even if the same id is requested again. Nothing
 * here ever deletes a file.
 */

import { access, constants, mkdir, writeFile } from 'fs/promises';
import * as path from 'path';

import { EnvironmentError } from '../errors.js';

const SAFE_NAME = /[^A-Za-z0-9._-]+/g;

export interface ArtifactStoreOptions {
  /** Names the store's owner writes at the root; never handed out as subpaths */
  reserved?: readonly string[];
}

export class ArtifactStore {
  readonly root: string;
  private readonly allocated = new Set<string>();
  private readonly reserved: ReadonlySet<string>;
  private ready = false;

  constructor(root: string, options: ArtifactStoreOptions = {}) {
    this.root = path.resolve(root);
    this.reserved = new Set(options.reserved ?? []);
  }

  /**
   * Create the root (if absent) and check that it is writable.
   */
  async init(): Promise<void> {
    try {
      await mkdir(this.root, { recursive: true });
      await access(this.root, constants.W_OK);
    } catch (err) {
      throw new EnvironmentError(`Artifacts directory ${this.root} cannot be created or written`, err);
    }
    this.ready = true;
  }

  /**
   * Reserve a fresh subpath for an executor. The directory itself is created
   * by the driver on start.
   */
  allocate(name: string): string {
    this.assertReady();
    const sanitized = name.replace(SAFE_NAME, '_');
    // '', '.' and '..' would not name a directory of its own
    const base = /^\.*$/.test(sanitized) ? 'executor' : sanitized;
    let candidate = base;
    for (let n = 2; this.allocated.has(candidate) || this.reserved.has(candidate); n++) {
      candidate = `${base}-${n}`;
    }
    this.allocated.add(candidate);
    return path.join(this.root, candidate);
  }

  path(...segments: string[]): string {
    return path.join(this.root, ...segments);
  }

  async writeJson(name: string, value: unknown): Promise<string> {
    return this.writeText(name, JSON.stringify(value, null, 2) + '\n');
  }

  async writeText(name: string, contents: string): Promise<string> {
    this.assertReady();
    const target = this.path(name);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, contents, 'utf-8');
    return target;
  }

  get subpaths(): string[] {
    return [...this.allocated];
  }

  private assertReady(): void {
    if (!this.ready) {
      throw new EnvironmentError(`Artifacts directory ${this.root} is not initialized`);
    }
  }
}

/**
 * Executor registry: maps a plan's `executor:` type to its config schema and
 * driver factory.
 *
 * Registration happens once at startup; after `seal()` the registry is
 * read-only, so a plan validated against it can always be launched.
 */

import type { Logger } from 'winston';
import type { z } from 'zod';

import { ConfigurationError, type ConfigurationIssue } from '../errors.js';

import { ApacheBenchDriver, abConfigSchema } from './ApacheBenchDriver.js';
import { ExternalDriver, externalConfigSchema } from './ExternalDriver.js';
import { LocustDriver, locustConfigSchema } from './LocustDriver.js';
import { MochaDriver, mochaConfigSchema } from './MochaDriver.js';
import { MolotovDriver, molotovConfigSchema } from './MolotovDriver.js';
import { SiegeDriver, siegeConfigSchema } from './SiegeDriver.js';
import type { ExecutorDriver } from './types.js';

export interface DriverContext {
  logger: Logger;
}

export interface ExecutorDefinition<C> {
  type: string;
  description: string;
  schema: z.ZodType<C, z.ZodTypeDef, unknown>;
  create(executorId: string, config: C, context: DriverContext): ExecutorDriver;
}

interface RegistryEntry {
  description: string;
  validate(config: unknown, pathPrefix: string): ConfigurationIssue[];
  create(executorId: string, config: unknown, context: DriverContext, pathPrefix: string): ExecutorDriver;
}

/**
 * `execution[1].scenario.requests[0]` style path for a zod issue.
 */
export function formatIssuePath(prefix: string, issuePath: ReadonlyArray<string | number>): string {
  return issuePath.reduce<string>(
    (acc, segment) => (typeof segment === 'number' ? `${acc}[${segment}]` : acc ? `${acc}.${segment}` : segment),
    prefix
  );
}

export function toConfigurationIssues(error: z.ZodError, pathPrefix: string): ConfigurationIssue[] {
  return error.issues.map(issue => ({
    path: formatIssuePath(pathPrefix, issue.path) || '(root)',
    message: issue.message
  }));
}

export class ExecutorRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  private sealed = false;

  register<C>(definition: ExecutorDefinition<C>): this {
    if (this.sealed) {
      throw new Error(`Executor registry is sealed; cannot register "${definition.type}"`);
    }
    if (this.entries.has(definition.type)) {
      throw new Error(`Executor type "${definition.type}" is already registered`);
    }

    const parse = (config: unknown, pathPrefix: string): C => {
      const result = definition.schema.safeParse(config);
      if (!result.success) {
        throw new ConfigurationError(
          `Invalid ${definition.type} executor configuration`,
          toConfigurationIssues(result.error, pathPrefix)
        );
      }
      return result.data;
    };

    this.entries.set(definition.type, {
      description: definition.description,
      validate: (config, pathPrefix) => {
        const result = definition.schema.safeParse(config);
        return result.success ? [] : toConfigurationIssues(result.error, pathPrefix);
      },
      create: (executorId, config, context, pathPrefix) =>
        definition.create(executorId, parse(config, pathPrefix), context)
    });
    return this;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  has(type: string): boolean {
    return this.entries.has(type);
  }

  types(): string[] {
    return [...this.entries.keys()].sort();
  }

  describe(): Array<{ type: string; description: string }> {
    return this.types().map(type => ({ type, description: this.entry(type).description }));
  }

  validate(type: string, config: unknown, pathPrefix = ''): ConfigurationIssue[] {
    const entry = this.entries.get(type);
    if (!entry) {
      return [{ path: formatIssuePath(pathPrefix, ['executor']), message: unknownTypeMessage(type, this.types()) }];
    }
    return entry.validate(config, pathPrefix);
  }

  /**
   * Build a fresh driver. Each call returns a new instance, so retries never
   * reuse a driver that already started.
   */
  resolve(type: string, executorId: string, config: unknown, context: DriverContext, pathPrefix = ''): ExecutorDriver {
    return this.entry(type).create(executorId, config, context, pathPrefix);
  }

  private entry(type: string): RegistryEntry {
    const entry = this.entries.get(type);
    if (!entry) {
      throw new ConfigurationError(unknownTypeMessage(type, this.types()));
    }
    return entry;
  }
}

function unknownTypeMessage(type: string, known: string[]): string {
  return `Unknown executor type "${type}" (known: ${known.join(', ')})`;
}

export function createDefaultRegistry(): ExecutorRegistry {
  return new ExecutorRegistry()
    .register({
      type: 'ab',
      description: 'Apache Bench against a single URL',
      schema: abConfigSchema,
      create: (executorId, config, { logger }) => new ApacheBenchDriver({ executorId, type: 'ab', logger }, config)
    })
    .register({
      type: 'siege',
      description: 'Siege against a list of URLs',
      schema: siegeConfigSchema,
      create: (executorId, config, { logger }) => new SiegeDriver({ executorId, type: 'siege', logger }, config)
    })
    .register({
      type: 'locust',
      description: 'Locust in headless mode',
      schema: locustConfigSchema,
      create: (executorId, config, { logger }) => new LocustDriver({ executorId, type: 'locust', logger }, config)
    })
    .register({
      type: 'molotov',
      description: 'Molotov scenarios with the JSON-lines report extension',
      schema: molotovConfigSchema,
      create: (executorId, config, { logger }) => new MolotovDriver({ executorId, type: 'molotov', logger }, config)
    })
    .register({
      type: 'mocha',
      description: 'Mocha browser-automation suite (json-stream reporter)',
      schema: mochaConfigSchema,
      create: (executorId, config, { logger }) => new MochaDriver({ executorId, type: 'mocha', logger }, config)
    })
    .register({
      type: 'external',
      description: 'Any command writing JSON-lines samples',
      schema: externalConfigSchema,
      create: (executorId, config, { logger }) => new ExternalDriver({ executorId, type: 'external', logger }, config)
    })
    .seal();
}

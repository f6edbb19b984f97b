/**
 * TestPlan: the validated, immutable view of a merged plan document.
 *
 * Document shape:
 *
 *   execution:
 *     - executor: ab
 *       concurrency: 10
 *       hold-for: 30s
 *       scenario: homepage        # name from `scenarios`, or inline
 *       timeout: 2m               # per-executor deadline
 *       retries: 1
 *   scenarios:
 *     homepage:
 *       requests: [http://localhost:8080/]
 *   modules:
 *     ab:
 *       path: /usr/bin/ab         # becomes the driver's `settings`
 *   settings:
 *     sequential: true
 *
 * Building collects every structural problem and every executor config issue
 * into one ConfigurationError; nothing is launched from a plan that failed.
 */

import { z } from 'zod';

import { durationSchema, settingsSchema, toRunSettings, type RunSettings } from '../config/settings.js';
import { ConfigurationError, type ConfigurationIssue } from '../errors.js';
import { OVERALL_KEY } from '../engine/MetricsAggregator.js';
import { toConfigurationIssues, type ExecutorRegistry } from '../executors/registry.js';
import { isPlainObject, type PlainObject } from '../utils/merge.js';

export interface ExecutorSpec {
  readonly id: string;
  /** Position in the plan's `execution` list */
  readonly index: number;
  readonly type: string;
  /** Config handed to the registry: load fields, resolved scenario and module settings */
  readonly config: Readonly<PlainObject>;
  readonly timeoutMs?: number;
  readonly retries: number;
  readonly retryDelayMs: number;
}

export interface TestPlan {
  readonly settings: Readonly<RunSettings>;
  readonly executors: readonly ExecutorSpec[];
}

const ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

// Keys consumed by the plan itself; everything else on an execution item
// belongs to the executor's config.
const PLAN_KEYS = new Set(['executor', 'id', 'scenario', 'timeout', 'retries', 'retry-delay']);

const executionItemSchema = z.object({
  executor: z.string().min(1).optional(),
  id: z.string().regex(ID_PATTERN, 'must be letters, digits, ".", "_" or "-"').optional(),
  scenario: z.union([z.string().min(1), z.record(z.unknown())]).optional(),
  timeout: durationSchema.optional(),
  retries: z.number().int().nonnegative().default(0),
  'retry-delay': durationSchema.default(0)
}).passthrough();

const documentSchema = z.object({
  // A single mapping is a one-item list; an empty `execution:` is no items
  execution: z.preprocess(
    value => (value === null ? undefined : isPlainObject(value) ? [value] : value),
    z.array(executionItemSchema).default([])
  ),
  scenarios: z.record(z.record(z.unknown())).default({}),
  modules: z.record(z.record(z.unknown())).default({}),
  settings: settingsSchema.default({})
}).passthrough();

type ExecutionItem = z.infer<typeof executionItemSchema>;

export function buildTestPlan(document: PlainObject, registry: ExecutorRegistry): TestPlan {
  const parsed = documentSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid test plan', toConfigurationIssues(parsed.error, ''));
  }

  const { execution, scenarios, modules } = parsed.data;
  const settings = toRunSettings(parsed.data.settings);
  const issues: ConfigurationIssue[] = [];
  const executors: ExecutorSpec[] = [];
  const seenIds = new Set<string>();
  const perType = new Map<string, number>();

  execution.forEach((item, index) => {
    const prefix = `execution[${index}]`;
    const type = item.executor ?? settings.defaultExecutor;
    if (!type) {
      issues.push({ path: `${prefix}.executor`, message: 'executor type is required (or set settings.default-executor)' });
      return;
    }

    const ordinal = (perType.get(type) ?? 0) + 1;
    perType.set(type, ordinal);
    const id = item.id ?? `${type}-${ordinal}`;
    if (id === OVERALL_KEY) {
      issues.push({ path: `${prefix}.id`, message: `"${OVERALL_KEY}" is reserved for the run-wide summary` });
    } else if (seenIds.has(id)) {
      issues.push({ path: `${prefix}.id`, message: `duplicate executor id "${id}"` });
    }
    seenIds.add(id);

    const before = issues.length;
    const scenario = resolveScenario(item, scenarios, prefix, issues);
    const scenarioResolved = issues.length === before;
    const config: PlainObject = {
      ...executorFields(item),
      ...(scenario !== undefined ? { scenario } : {}),
      settings: modules[type] ?? {}
    };

    if (scenarioResolved) {
      issues.push(...registry.validate(type, config, prefix));
    }

    executors.push(Object.freeze({
      id,
      index,
      type,
      config: Object.freeze(config),
      ...(item.timeout !== undefined ? { timeoutMs: item.timeout } : {}),
      retries: item.retries,
      retryDelayMs: item['retry-delay']
    }));
  });

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid test plan', issues);
  }

  return Object.freeze({
    settings: Object.freeze(settings),
    executors: Object.freeze(executors)
  });
}

function executorFields(item: ExecutionItem): PlainObject {
  const fields: PlainObject = {};
  for (const [key, value] of Object.entries(item)) {
    if (!PLAN_KEYS.has(key)) {
      fields[key] = value;
    }
  }
  return fields;
}

function resolveScenario(
  item: ExecutionItem,
  scenarios: Record<string, Record<string, unknown>>,
  prefix: string,
  issues: ConfigurationIssue[]
): PlainObject | undefined {
  const { scenario } = item;
  if (scenario === undefined || isPlainObject(scenario)) {
    return scenario;
  }

  const named = scenarios[scenario];
  if (!named) {
    const known = Object.keys(scenarios);
    issues.push({
      path: `${prefix}.scenario`,
      message: `unknown scenario "${scenario}"${known.length > 0 ? ` (known: ${known.join(', ')})` : ''}`
    });
    return undefined;
  }
  return named;
}

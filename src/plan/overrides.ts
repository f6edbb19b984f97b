/**
 * `-o key=value` overrides applied on top of the merged plan document.
 *
 * Keys are dotted paths; numeric segments index into lists
 * (`execution.0.concurrency=5`). Values are parsed as YAML scalars, so
 * `true`, `10` and `1.5` keep their types and anything else stays a string.
 */

import { parse as parseYaml } from 'yaml';

import { ConfigurationError } from '../errors.js';
import { deepMerge, isPlainObject, type PlainObject } from '../utils/merge.js';

// Segments that would reach into Object.prototype
const FORBIDDEN_SEGMENTS = new Set(['__proto__', 'constructor', 'prototype']);

export interface Override {
  path: string[];
  value: unknown;
}

export function parseOverride(raw: string): Override {
  const eq = raw.indexOf('=');
  if (eq <= 0) {
    throw new ConfigurationError('Invalid override', [
      { path: raw, message: 'expected key=value' }
    ]);
  }

  const key = raw.slice(0, eq).trim();
  const segments = key.split('.');
  if (segments.some(segment => segment.length === 0)) {
    throw new ConfigurationError('Invalid override', [
      { path: raw, message: 'empty path segment' }
    ]);
  }
  const forbidden = segments.find(segment => FORBIDDEN_SEGMENTS.has(segment));
  if (forbidden !== undefined) {
    throw new ConfigurationError('Invalid override', [
      { path: raw, message: `"${forbidden}" cannot be overridden` }
    ]);
  }

  return { path: segments, value: parseScalar(raw.slice(eq + 1)) };
}

function parseScalar(text: string): unknown {
  if (text.trim() === '') {
    return '';
  }
  try {
    const value: unknown = parseYaml(text);
    return value ?? text;
  } catch {
    return text;
  }
}

export function applyOverrides(document: PlainObject, overrides: string[]): PlainObject {
  // Copy first so overrides never touch caller-owned structures
  const result = deepMerge({}, document);
  for (const raw of overrides) {
    const override = parseOverride(raw);
    setPath(result, override.path, override.value, raw);
  }
  return result;
}

function setPath(root: PlainObject, segments: string[], value: unknown, raw: string): void {
  let cursor: PlainObject | unknown[] = root;

  segments.forEach((segment, index) => {
    const last = index === segments.length - 1;

    if (Array.isArray(cursor)) {
      const position = Number(segment);
      if (!Number.isInteger(position) || position < 0) {
        throw new ConfigurationError('Invalid override', [
          { path: raw, message: `"${segment}" is not a list index` }
        ]);
      }
      if (last) {
        cursor[position] = value;
        return;
      }
      const next: unknown = cursor[position];
      if (isPlainObject(next) || Array.isArray(next)) {
        cursor = next;
      } else {
        const created: PlainObject = {};
        cursor[position] = created;
        cursor = created;
      }
      return;
    }

    if (last) {
      cursor[segment] = value;
      return;
    }
    const next: unknown = cursor[segment];
    if (isPlainObject(next) || Array.isArray(next)) {
      cursor = next;
    } else {
      const created: PlainObject = {};
      cursor[segment] = created;
      cursor = created;
    }
  });
}

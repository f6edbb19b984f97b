import { describe, it, expect } from 'vitest';

import { ConfigurationError } from '../../../src/errors.js';
import { applyOverrides, parseOverride } from '../../../src/plan/overrides.js';

describe('parseOverride', () => {
  it('should split dotted keys and parse scalar values', () => {
    expect(parseOverride('settings.artifacts-dir=/tmp/run')).toEqual({
      path: ['settings', 'artifacts-dir'],
      value: '/tmp/run'
    });
    expect(parseOverride('execution.0.concurrency=5')).toEqual({
      path: ['execution', '0', 'concurrency'],
      value: 5
    });
    expect(parseOverride('settings.sequential=true').value).toBe(true);
    expect(parseOverride('settings.timeout=1m30s').value).toBe('1m30s');
  });

  it('should keep an empty value as an empty string', () => {
    expect(parseOverride('modules.ab.path=').value).toBe('');
  });

  it('should split on the first equals sign only', () => {
    expect(parseOverride('scenarios.s.env.QUERY=a=b').value).toBe('a=b');
  });

  it('should reject overrides without a key', () => {
    expect(() => parseOverride('novalue')).toThrow(ConfigurationError);
    expect(() => parseOverride('=value')).toThrow(ConfigurationError);
    expect(() => parseOverride('settings..timeout=1')).toThrow('empty path segment');
  });

  it('should refuse keys that reach into the object prototype', () => {
    expect(() => applyOverrides({}, ['__proto__.polluted=yes'])).toThrow(
      'Invalid override: __proto__.polluted=yes: "__proto__" cannot be overridden'
    );
    expect(() => parseOverride('settings.constructor.prototype.x=1')).toThrow('"constructor" cannot be overridden');
    expect(Object.prototype).not.toHaveProperty('polluted');
  });
});

describe('applyOverrides', () => {
  it('should set nested values and list items without touching the input', () => {
    const document = {
      execution: [{ executor: 'ab', concurrency: 1 }],
      settings: { sequential: false }
    };

    const result = applyOverrides(document, [
      'execution.0.concurrency=5',
      'settings.sequential=true',
      'settings.artifacts-dir=out'
    ]);

    expect(result).toEqual({
      execution: [{ executor: 'ab', concurrency: 5 }],
      settings: { sequential: true, 'artifacts-dir': 'out' }
    });
    expect(document.execution[0].concurrency).toBe(1);
    expect(document.settings.sequential).toBe(false);
  });

  it('should create missing intermediate objects', () => {
    expect(applyOverrides({}, ['modules.locust.path=/opt/locust'])).toEqual({
      modules: { locust: { path: '/opt/locust' } }
    });
  });

  it('should apply later overrides over earlier ones', () => {
    expect(applyOverrides({}, ['settings.timeout=10', 'settings.timeout=20'])).toEqual({
      settings: { timeout: 20 }
    });
  });

  it('should reject a non-numeric segment inside a list', () => {
    expect(() => applyOverrides({ execution: [{}] }, ['execution.first.concurrency=1']))
      .toThrow('"first" is not a list index');
  });
});

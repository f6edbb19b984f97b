import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigurationError } from '../../../src/errors.js';
import {
  loadSettingsDir,
  parsePlanText,
  readPlanDocument,
  readPlanDocuments
} from '../../../src/plan/documents.js';

describe('parsePlanText', () => {
  it('should parse YAML and JSON documents', () => {
    expect(parsePlanText('execution:\n  - executor: ab\n', 'plan.yml')).toEqual({
      execution: [{ executor: 'ab' }]
    });
    expect(parsePlanText('{"settings": {"sequential": true}}', 'plan.json')).toEqual({
      settings: { sequential: true }
    });
  });

  it('should treat an empty document as an empty mapping', () => {
    expect(parsePlanText('', 'empty.yml')).toEqual({});
    expect(parsePlanText('# nothing here\n', 'comment.yml')).toEqual({});
  });

  it('should reject documents whose top level is not a mapping', () => {
    expect(() => parsePlanText('- a\n- b\n', 'list.yml')).toThrow(ConfigurationError);
    expect(() => parsePlanText('42', 'scalar.yml')).toThrow('top level must be a mapping');
  });

  it('should report syntax errors as configuration errors', () => {
    expect(() => parsePlanText('settings: [1, 2', 'broken.yml')).toThrow(ConfigurationError);
  });
});

describe('plan and settings files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'loadplan-docs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should merge several plan files in order', async () => {
    const first = path.join(dir, 'base.yml');
    const second = path.join(dir, 'local.yml');
    await writeFile(first, 'execution:\n  - executor: ab\nsettings:\n  timeout: 10\n');
    await writeFile(second, 'execution:\n  - executor: siege\nsettings:\n  timeout: 20\n');

    expect(await readPlanDocuments([first, second])).toEqual({
      execution: [{ executor: 'ab' }, { executor: 'siege' }],
      settings: { timeout: 20 }
    });
  });

  it('should raise a configuration error for a missing plan file', async () => {
    await expect(readPlanDocument(path.join(dir, 'missing.yml'))).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should merge settings files in numeric file-name order', async () => {
    await writeFile(path.join(dir, '10-base.yml'), 'settings:\n  timeout: 10\n  sequential: true\n');
    await writeFile(path.join(dir, '2-first.json'), '{"settings": {"timeout": 2, "best-effort": true}}');
    await writeFile(path.join(dir, '99-local.yaml'), 'settings:\n  timeout: 99\n');
    await writeFile(path.join(dir, 'README.txt'), 'not a settings file');

    expect(await loadSettingsDir(dir)).toEqual({
      settings: { timeout: 99, sequential: true, 'best-effort': true }
    });
  });

  it('should treat a missing settings directory as empty', async () => {
    expect(await loadSettingsDir(path.join(dir, 'nope'))).toEqual({});
  });
});

import { describe, it, expect } from 'vitest';

import {
  DEFAULT_ARTIFACTS_DIR,
  expandArtifactsDir,
  settingsSchema,
  toRunSettings
} from '../../../src/config/settings.js';

describe('settingsSchema', () => {
  it('should apply defaults for an empty settings section', () => {
    const settings = toRunSettings(settingsSchema.parse({}));

    expect(settings).toEqual({
      artifactsDir: DEFAULT_ARTIFACTS_DIR,
      policy: 'parallel',
      maxConcurrency: 0,
      timeoutMs: undefined,
      pollIntervalMs: 1000,
      stopGraceMs: 5000,
      heartbeatTimeoutMs: 0,
      bestEffort: false,
      defaultExecutor: undefined
    });
  });

  it('should convert durations and the sequential flag', () => {
    const settings = toRunSettings(settingsSchema.parse({
      sequential: true,
      timeout: '2m',
      'check-interval': '250ms',
      'stop-grace': 1,
      'heartbeat-timeout': '30s',
      'max-concurrency': 3,
      'best-effort': true,
      'default-executor': 'external'
    }));

    expect(settings.policy).toBe('sequential');
    expect(settings.timeoutMs).toBe(120000);
    expect(settings.pollIntervalMs).toBe(250);
    expect(settings.stopGraceMs).toBe(1000);
    expect(settings.heartbeatTimeoutMs).toBe(30000);
    expect(settings.maxConcurrency).toBe(3);
    expect(settings.bestEffort).toBe(true);
    expect(settings.defaultExecutor).toBe('external');
  });

  it('should never poll faster than once per millisecond', () => {
    expect(toRunSettings(settingsSchema.parse({ 'check-interval': 0 })).pollIntervalMs).toBe(1);
  });

  it('should report malformed durations at their key', () => {
    const result = settingsSchema.safeParse({ timeout: 'soon' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['timeout']);
      expect(result.error.issues[0].message).toBe('Invalid duration: "soon"');
    }
  });

  it('should keep unknown keys', () => {
    expect(settingsSchema.parse({ 'custom-key': 1 })['custom-key']).toBe(1);
  });
});

describe('expandArtifactsDir', () => {
  const now = new Date(2024, 0, 2, 3, 4, 5, 6);

  it('should expand the default pattern', () => {
    expect(expandArtifactsDir(DEFAULT_ARTIFACTS_DIR, now)).toBe('2024-01-02_03-04-05');
  });

  it('should expand microseconds and escaped percent signs', () => {
    expect(expandArtifactsDir('run-%f-%%Y', now)).toBe('run-006000-%Y');
  });

  it('should leave plain names and unknown tokens alone', () => {
    expect(expandArtifactsDir('results/%q', now)).toBe('results/%q');
  });
});

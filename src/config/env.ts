/**
 * Process environment for the CLI.
 *
 * Read once at startup and handed to the run controller as part of its global
 * configuration; nothing below the CLI reads process.env directly.
 */

import { z } from 'zod';

const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

/**
 * Parse a boolean flag; "false" and "0" must not read as truthy.
 */
export function parseBoolEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const normalized = value.toLowerCase().trim();
  if (['true', '1', 'yes'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no'].includes(normalized)) {
    return false;
  }
  return defaultValue;
}

export function parseEnumEnv<T extends string>(
  value: string | undefined,
  allowedValues: readonly T[],
  defaultValue: T
): T {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const normalized = value.toLowerCase().trim();
  const match = allowedValues.find(allowed => allowed === normalized);
  return match ?? defaultValue;
}

const rawEnvSchema = z.object({
  LOADPLAN_SETTINGS_DIR: z.string().optional(),
  LOADPLAN_LOG_LEVEL: z.string().optional(),
  LOADPLAN_NO_COLOR: z.string().optional(),
  NO_COLOR: z.string().optional()
});

export interface LoadplanEnv {
  settingsDir?: string;
  logLevel: LogLevel;
  colorize: boolean;
}

export function readEnv(source: NodeJS.ProcessEnv = process.env): LoadplanEnv {
  const raw = rawEnvSchema.parse(source);
  const settingsDir = raw.LOADPLAN_SETTINGS_DIR?.trim();

  return {
    settingsDir: settingsDir ? settingsDir : undefined,
    logLevel: parseEnumEnv(raw.LOADPLAN_LOG_LEVEL, LOG_LEVELS, 'info'),
    colorize: !parseBoolEnv(raw.LOADPLAN_NO_COLOR, false) && raw.NO_COLOR === undefined
  };
}

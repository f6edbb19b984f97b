/**
 * Human duration parsing: `90`, `"90"`, `"1m30s"`, `"500ms"`, `"1h"`, `"2d"`.
 * Bare numbers are seconds.
 */

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000
};

const DURATION_PATTERN = /^(?:\s*\d+(?:\.\d+)?\s*(?:ms|s|m|h|d)\s*)+$/i;
const PART_PATTERN = /(\d+(?:\.\d+)?)\s*(ms|s|m|h|d)/gi;

export function parseDuration(value: number | string): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`Invalid duration: ${value}`);
    }
    return Math.round(value * 1000);
  }

  const trimmed = value.trim();
  if (/^\d+(?:\.\d+)?$/.test(trimmed)) {
    return Math.round(parseFloat(trimmed) * 1000);
  }

  if (!DURATION_PATTERN.test(trimmed)) {
    throw new Error(`Invalid duration: "${value}"`);
  }

  let total = 0;
  for (const match of trimmed.matchAll(PART_PATTERN)) {
    total += parseFloat(match[1]) * UNIT_MS[match[2].toLowerCase()];
  }
  return Math.round(total);
}

/**
 * Whole seconds for tools that take `-t <seconds>` style flags (rounded up).
 */
export function toWholeSeconds(ms: number): number {
  return Math.ceil(ms / 1000);
}

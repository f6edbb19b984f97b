// Argument helpers for the CLI: legacy single-dash flags and option collectors

/**
 * Long flags that older invocations spell with a single dash
 * (`run plan.yml -sequential`).
 */
const LEGACY_FLAGS = new Set(['sequential', 'best-effort', 'settings-dir', 'verbose', 'log', 'option']);

export function normalizeLegacyFlags(args: readonly string[]): string[] {
  let passthrough = false;
  return args.map(arg => {
    if (passthrough) {
      return arg;
    }
    if (arg === '--') {
      passthrough = true;
      return arg;
    }
    const match = /^-([a-z][a-z-]+)(=.*)?$/.exec(arg);
    if (match && LEGACY_FLAGS.has(match[1])) {
      return `--${match[1]}${match[2] ?? ''}`;
    }
    return arg;
  });
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Overrides implied by CLI flags. They come before the user's `-o` values
 * so an explicit `-o` still wins.
 */
export function flagOverrides(flags: { sequential?: boolean; bestEffort?: boolean }): string[] {
  return [
    ...(flags.sequential ? ['settings.sequential=true'] : []),
    ...(flags.bestEffort ? ['settings.best-effort=true'] : [])
  ];
}

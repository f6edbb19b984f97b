#!/usr/bin/env node
// CLI entry point: `loadplan run <plan...>` and `loadplan executors`
import fs from 'fs';
import { fileURLToPath } from 'url';

import { Command } from 'commander';
import dotenv from 'dotenv';

import { readEnv } from '../config/env.js';
import { RunController } from '../engine/RunController.js';
import { ConfigurationError, LoadplanError } from '../errors.js';
import { createDefaultRegistry } from '../executors/registry.js';
import { loadSettingsDir, readPlanDocuments } from '../plan/documents.js';
import { formatRunSummary } from '../reporting/summary.js';
import { createRunLogger } from '../utils/logger.js';

import { collect, flagOverrides, normalizeLegacyFlags } from './args.js';

interface RunOptions {
  option: string[];
  sequential?: boolean;
  bestEffort?: boolean;
  log?: string;
  settingsDir?: string;
  verbose?: boolean;
}

const program = new Command();

program
  .name('loadplan')
  .description('Run declarative load-test plans across external load tools')
  .version('0.1.0');

program
  .command('run')
  .description('Run one or more plan files (merged in order)')
  .argument('<plan...>', 'plan files (YAML or JSON)')
  .option('-o, --option <key=value>', 'override a document value (repeatable)', collect, [])
  .option('--sequential', 'run executors one after another')
  .option('--best-effort', 'exit 0 when at least one executor completed')
  .option('-l, --log <path>', 'additional log file')
  .option('--settings-dir <dir>', 'layered settings directory (overrides LOADPLAN_SETTINGS_DIR)')
  .option('-v, --verbose', 'debug logging')
  .action(async (plans: string[], options: RunOptions) => {
    const env = readEnv();
    const logger = createRunLogger({
      level: options.verbose ? 'debug' : env.logLevel,
      colorize: env.colorize,
      ...(options.log ? { logFile: options.log } : {})
    });

    const settingsDir = options.settingsDir ?? env.settingsDir;
    const baseDocument = settingsDir ? await loadSettingsDir(settingsDir) : {};
    const planDoc = await readPlanDocuments(plans);
    const controller = new RunController({ logger });

    let interrupts = 0;
    const onSignal = (signal: NodeJS.Signals) => {
      interrupts++;
      if (interrupts > 1) {
        logger.error(`[cli] ${signal} received again, exiting without cleanup`);
        process.exit(2);
      }
      controller.cancel(`received ${signal}`);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    try {
      const result = await controller.runPlan(planDoc, {
        baseDocument,
        overrides: [...flagOverrides(options), ...options.option],
        cwd: process.cwd()
      });
      console.log(formatRunSummary(result));
      process.exitCode = result.exitStatus;
    } finally {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    }
  });

program
  .command('executors')
  .description('List the registered executor types')
  .action(() => {
    const registry = createDefaultRegistry();
    const width = Math.max(...registry.types().map(type => type.length));
    for (const { type, description } of registry.describe()) {
      console.log(`${type.padEnd(width)}  ${description}`);
    }
  });

function handleCliError(err: unknown): void {
  if (err instanceof ConfigurationError) {
    console.error(`[loadplan] ${err.summary}`);
    for (const issue of err.issues) {
      console.error(`  ${issue.path}: ${issue.message}`);
    }
  } else if (err instanceof LoadplanError) {
    console.error(`[loadplan] ${err.name}: ${err.message}`);
  } else {
    console.error('[loadplan] Unexpected error:', err);
  }
  process.exitCode = 1;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  dotenv.config({ quiet: true });
  await program.parseAsync(normalizeLegacyFlags(argv)).catch(handleCliError);
}

export { program };

const entryFile = typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const isDirectExecution = entryFile === fileURLToPath(import.meta.url);

if (isDirectExecution) {
  await main();
}

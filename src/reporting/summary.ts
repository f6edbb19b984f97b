// Plain-text run summary printed by the CLI and written to summary.txt
import type { ExecutorSummary } from '../engine/MetricsAggregator.js';
import { OVERALL_KEY } from '../engine/MetricsAggregator.js';
import type { RunResult } from '../engine/RunController.js';

const DIAGNOSTIC_LINES = 5;

function formatMs(value: number): string {
  return `${value.toFixed(1)}ms`;
}

export function formatFigures(summary: ExecutorSummary): string {
  const parts = [
    `requests=${summary.requests}`,
    `errors=${summary.errors}`,
    `error rate=${(summary.errorRate * 100).toFixed(1)}%`
  ];
  if (summary.latency) {
    parts.push(`mean=${formatMs(summary.latency.mean)}`, `p95=${formatMs(summary.latency.p95)}`);
  }
  return parts.join(' ');
}

export function formatRunSummary(result: RunResult): string {
  const lines: string[] = ['=== RUN SUMMARY ===', `Artifacts: ${result.artifactsDir}`];

  const counts = new Map<string, number>();
  for (const executor of result.executors) {
    counts.set(executor.state, (counts.get(executor.state) ?? 0) + 1);
  }
  const breakdown = [...counts.entries()].map(([state, n]) => `${n} ${state}`).join(', ');
  lines.push(`Executors: ${result.executors.length}${breakdown ? ` (${breakdown})` : ''}`);

  const width = Math.max(0, ...result.executors.map(e => e.id.length));
  for (const executor of result.executors) {
    const summary = result.report.summaries[executor.id];
    const detail = executor.error ? executor.error.message : summary ? formatFigures(summary) : '';
    lines.push(`  ${executor.id.padEnd(width)}  ${executor.state.padEnd(9)}  ${detail}`.trimEnd());

    if (executor.state !== 'Completed') {
      for (const diagnostic of executor.diagnostics) {
        for (const line of diagnostic.split('\n').slice(-DIAGNOSTIC_LINES)) {
          lines.push(`      ${line}`);
        }
      }
    }
  }

  const overall = result.report.summaries[OVERALL_KEY];
  if (overall) {
    lines.push(`Overall: ${formatFigures(overall)}`);
  }
  if (result.fault) {
    lines.push(`Scheduler fault: ${result.fault.message}`);
  }
  if (result.cancelled) {
    lines.push('Run was cancelled');
  } else if (result.timedOut) {
    lines.push('Run timeout exceeded');
  }
  lines.push(`Exit status: ${result.exitStatus}`, '===================');
  return lines.join('\n');
}

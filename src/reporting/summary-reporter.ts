/**
 * Run summary for the terminal: files parsed, files skipped, output path
 * and technique count, one line each.
 */

import chalk from 'chalk';

import type { RunStats } from '../types/coverage.js';
import type { ReportLabels } from '../types/config.js';

export const DEFAULT_REPORT_LABELS: ReportLabels = Object.freeze({
  parsed: 'Parsed YAML files with techniques',
  skipped: 'Skipped YAML files (no techniques found)',
  written: 'Wrote layer',
  techniques: 'Techniques in layer',
});

/**
 * Plain summary lines, no colors.
 */
export function formatRunSummary(
  stats: RunStats,
  outputPath: string,
  labels: ReportLabels = DEFAULT_REPORT_LABELS,
): string[] {
  return [
    `${labels.parsed}: ${stats.parsed}`,
    `${labels.skipped}: ${stats.skipped}`,
    `${labels.written}: ${outputPath}`,
    `${labels.techniques}: ${stats.techniques}`,
  ];
}

export function printRunSummary(
  stats: RunStats,
  outputPath: string,
  labels: ReportLabels = DEFAULT_REPORT_LABELS,
): void {
  const rows: Array<[string, string]> = [
    [labels.parsed, chalk.green(String(stats.parsed))],
    [labels.skipped, stats.skipped > 0 ? chalk.yellow(String(stats.skipped)) : String(stats.skipped)],
    [labels.written, outputPath],
    [labels.techniques, chalk.green(String(stats.techniques))],
  ];

  for (const [label, value] of rows) {
    console.log(`${chalk.cyan(`${label}:`)} ${value}`);
  }
}

/**
 * Shared CLI option helpers for techmap commands.
 */

import type { Command } from 'commander';
import chalk from 'chalk';

// ---------------------------------------------------------------------------
// Option registration helpers
// ---------------------------------------------------------------------------

/**
 * Add the required --repo option (root of the detection rule tree).
 */
export function addRepoOption(cmd: Command): Command {
  return cmd.requiredOption(
    '-r, --repo <dir>',
    'Path to the detection rules directory',
  );
}

/**
 * Add the -o/--out option for the layer file.
 */
export function addOutOption(cmd: Command, defaultValue: string): Command {
  return cmd.option('-o, --out <file>', 'Output Navigator layer JSON path', defaultValue);
}

/**
 * Add the -n/--name option for the layer display name.
 */
export function addNameOption(cmd: Command, defaultValue: string): Command {
  return cmd.option('-n, --name <name>', 'Navigator layer name', defaultValue);
}

export function addConfigOption(cmd: Command): Command {
  return cmd.option('-c, --config <file>', 'YAML/JSON config file overriding the built-in defaults');
}

export function addVerboseOption(cmd: Command): Command {
  return cmd.option('--verbose', 'Debug logging and per-file warnings');
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse a comma-separated platform list, dropping blanks.
 *
 * @example parsePlatformList('Cloudflare, Okta,,') => ['Cloudflare', 'Okta']
 */
export function parsePlatformList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

// ---------------------------------------------------------------------------
// Console output
// ---------------------------------------------------------------------------

export function printBanner(title: string): void {
  console.log('');
  console.log(chalk.bold.cyan(`  ${title}`));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log('');
}

/**
 * Print a user-friendly error message with optional details.
 */
export function printError(message: string, detail?: string): void {
  console.error(chalk.red(`\nError: ${message}`));
  if (detail) {
    console.error(chalk.gray(`  ${detail}`));
  }
  console.error('');
}

export function printInfo(message: string): void {
  console.log(chalk.cyan(`  ${message}`));
}

export function printWarning(message: string): void {
  console.log(chalk.yellow(`  ${message}`));
}

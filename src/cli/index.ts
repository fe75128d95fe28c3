#!/usr/bin/env node

/**
 * techmap CLI: ATT&CK Navigator coverage layers from detection rules
 *
 * Usage:
 *   techmap coverage --repo ./detections --out out/layers/coverage_all.json
 *   techmap network --repo ./detections --name "Coverage - Network"
 */

import 'dotenv/config';

import { Command, CommanderError } from 'commander';
import { readFileSync } from 'node:fs';

import { errorMessage } from '../utils/errors.js';
import { registerCoverageCommand } from './commands/coverage.js';
import { registerNetworkCommand } from './commands/network.js';
import { printError } from './options.js';

function readVersion(): string {
  const pkg: unknown = JSON.parse(
    readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'),
  );
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('techmap')
    .description('Aggregate ATT&CK technique coverage from detection rules into Navigator layers')
    .version(readVersion())
    // Before registration so subcommands inherit it.
    .exitOverride();

  registerCoverageCommand(program);
  registerNetworkCommand(program);

  return program;
}

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync();
  } catch (err) {
    // Help and version output surface as CommanderErrors; they are not failures.
    if (
      err instanceof CommanderError &&
      (err.code === 'commander.helpDisplayed' || err.code === 'commander.version')
    ) {
      return;
    }
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }

    printError(errorMessage(err), 'Run "techmap --help" for usage information.');
    process.exit(1);
  }
}

void main();

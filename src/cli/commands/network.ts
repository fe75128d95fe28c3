/**
 * Network command: Navigator layer restricted to network platform folders
 * (first-level folders under the rules root).
 */

import type { Command } from 'commander';

import { DEFAULT_NETWORK_PLATFORMS } from '../../config/defaults.js';
import { NETWORK_VARIANT } from '../../config/variants.js';
import {
  addConfigOption,
  addNameOption,
  addOutOption,
  addRepoOption,
  addVerboseOption,
} from '../options.js';
import { runLayerCommand, type LayerCommandOptions } from './layer.js';

export function registerNetworkCommand(program: Command): void {
  const cmd = program
    .command('network')
    .description('Build an ATT&CK Navigator layer from network platform detections only');

  addRepoOption(cmd);
  addOutOption(cmd, NETWORK_VARIANT.defaultOutput);
  addNameOption(cmd, NETWORK_VARIANT.defaultName);
  cmd.option(
    '-p, --platforms <list>',
    `Comma-separated platform folders (default: ${DEFAULT_NETWORK_PLATFORMS.join(', ')})`,
  );
  addConfigOption(cmd);
  addVerboseOption(cmd);

  cmd.action((options: LayerCommandOptions) => {
    runLayerCommand(NETWORK_VARIANT, options);
  });
}

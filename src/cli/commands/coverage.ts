/**
 * Coverage command: Navigator layer from every detection rule.
 */

import type { Command } from 'commander';

import { ALL_DETECTIONS_VARIANT } from '../../config/variants.js';
import {
  addConfigOption,
  addNameOption,
  addOutOption,
  addRepoOption,
  addVerboseOption,
} from '../options.js';
import { runLayerCommand, type LayerCommandOptions } from './layer.js';

export function registerCoverageCommand(program: Command): void {
  const cmd = program
    .command('coverage')
    .description('Build an ATT&CK Navigator layer from all detection rules');

  addRepoOption(cmd);
  addOutOption(cmd, ALL_DETECTIONS_VARIANT.defaultOutput);
  addNameOption(cmd, ALL_DETECTIONS_VARIANT.defaultName);
  addConfigOption(cmd);
  addVerboseOption(cmd);

  cmd.action((options: LayerCommandOptions) => {
    runLayerCommand(ALL_DETECTIONS_VARIANT, options);
  });
}

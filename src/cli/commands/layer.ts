/**
 * Shared runner behind the `coverage` and `network` commands.
 */

import ora from 'ora';

import { loadCoverageConfig } from '../../config/loader.js';
import type { LayerVariant } from '../../config/variants.js';
import { generateCoverageLayer, type CoverageRunResult } from '../../pipeline.js';
import { printRunSummary } from '../../reporting/summary-reporter.js';
import { errorMessage } from '../../utils/errors.js';
import { setLogLevel } from '../../utils/logger.js';
import { printBanner, printInfo, printWarning, parsePlatformList } from '../options.js';

export interface LayerCommandOptions {
  repo: string;
  out: string;
  name: string;
  config?: string;
  platforms?: string;
  verbose?: boolean;
}

export function runLayerCommand(variant: LayerVariant, options: LayerCommandOptions): CoverageRunResult {
  if (options.verbose) {
    setLogLevel('debug');
  }

  printBanner(`techmap: ${variant.defaultName}`);

  const config = loadCoverageConfig(options.config);
  const platforms = options.platforms ? parsePlatformList(options.platforms) : undefined;
  const policy = variant.createPolicy(config, platforms);

  printInfo(`Rules:  ${options.repo}`);
  printInfo(`Policy: ${policy.name}`);
  console.log('');

  const spinner = ora('Aggregating ATT&CK techniques...').start();
  let result: CoverageRunResult;
  try {
    result = generateCoverageLayer({
      root: options.repo,
      outputPath: options.out,
      layerName: options.name,
      variant,
      config,
      policy,
    });
  } catch (err) {
    spinner.fail(`Layer generation failed: ${errorMessage(err)}`);
    throw err;
  }
  spinner.succeed(`Aggregated ${result.stats.candidates} rule files`);
  console.log('');

  printRunSummary(result.stats, result.outputPath, variant.labels);

  if (options.verbose && result.warnings.length > 0) {
    console.log('');
    for (const warning of result.warnings) {
      printWarning(`${warning.name}: ${warning.message}`);
    }
  }

  return result;
}

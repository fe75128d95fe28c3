/**
 * Coverage pipeline: enumerate → extract → aggregate → build → write.
 *
 * One synchronous pass over the sorted rule files. Every run starts from
 * scratch, so re-running over the same tree reproduces the same layer.
 */

import { readFileSync } from 'node:fs';

import type { CoverageConfig } from './types/config.js';
import type { RuleFile, RunStats, TechniqueSummary } from './types/coverage.js';
import type { NavigatorLayer } from './types/navigator-layer.js';
import { DEFAULT_CONFIG } from './config/defaults.js';
import { ALL_DETECTIONS_VARIANT, type LayerVariant } from './config/variants.js';
import { TechniqueAggregator } from './aggregation/aggregator.js';
import { extractRuleFacts } from './extraction/rule-fact-extractor.js';
import { defaultTechniqueStrategies } from './extraction/technique-strategies.js';
import { enumerateRuleFiles } from './ingestion/source-enumerator.js';
import type { SourcePolicy } from './ingestion/source-policy.js';
import { buildNavigatorLayer } from './reporting/navigator-layer.js';
import { writeNavigatorLayer } from './reporting/layer-writer.js';
import type { MalformedRuleError, RuleWarning } from './utils/errors.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('pipeline');

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface AggregateOptions {
  variant?: LayerVariant;
  config?: CoverageConfig;
  /** Overrides the variant's policy, e.g. a custom platform list. */
  policy?: SourcePolicy;
}

export interface AggregateResult {
  summaries: ReadonlyMap<string, TechniqueSummary>;
  stats: RunStats;
  warnings: RuleWarning[];
}

export interface CoverageRunOptions extends AggregateOptions {
  root: string;
  outputPath?: string;
  layerName?: string;
}

export interface CoverageRunResult {
  layer: NavigatorLayer;
  stats: RunStats;
  warnings: RuleWarning[];
  /** Output path as passed in, or the variant default. */
  outputPath: string;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function readRuleFile(path: string): RuleFile {
  return { path, raw: readFileSync(path, 'utf-8') };
}

/**
 * Aggregate technique facts from every rule file under `root`. No writes.
 *
 * @throws NoInputError when no candidate rule files are found.
 */
export function aggregateCoverage(root: string, options: AggregateOptions = {}): AggregateResult {
  const variant = options.variant ?? ALL_DETECTIONS_VARIANT;
  const config = options.config ?? DEFAULT_CONFIG;
  const policy = options.policy ?? variant.createPolicy(config);

  const files = enumerateRuleFiles(root, {
    policy,
    config,
    noInputMessage: variant.noInputMessage,
  });

  const strategies = defaultTechniqueStrategies(config.techniqueFields);
  const aggregator = new TechniqueAggregator(config.exampleLimit);
  const malformed: MalformedRuleError[] = [];

  for (const path of files) {
    const file = readRuleFile(path);
    const facts = extractRuleFacts(file.raw, {
      path: file.path,
      severityFields: config.severityFields,
      strategies,
      onMalformed: (error) => malformed.push(error),
    });
    aggregator.add(file.path, facts);
  }

  const warnings: RuleWarning[] = [...malformed, ...aggregator.skippedFiles()];
  for (const warning of warnings) {
    logger.debug(`${warning.name}: ${warning.message}`);
  }

  return {
    summaries: aggregator.snapshot(),
    stats: { ...aggregator.stats(), candidates: files.length },
    warnings,
  };
}

/**
 * Run the full pipeline and write the Navigator layer.
 * Nothing is written when aggregation fails.
 */
export function generateCoverageLayer(options: CoverageRunOptions): CoverageRunResult {
  const variant = options.variant ?? ALL_DETECTIONS_VARIANT;
  const outputPath = options.outputPath ?? variant.defaultOutput;
  const layerName = options.layerName ?? variant.defaultName;

  logger.debug(`Building "${layerName}" layer (${variant.id}) from ${options.root}`);

  const { summaries, stats, warnings } = aggregateCoverage(options.root, { ...options, variant });

  const layer = buildNavigatorLayer({ name: layerName, description: variant.description }, summaries);
  writeNavigatorLayer(layer, outputPath);

  logger.debug(
    `Layer complete: ${stats.techniques} techniques from ${stats.parsed}/${stats.candidates} rule files`,
  );

  return { layer, stats, warnings, outputPath };
}

/**
 * techmap: ATT&CK Navigator coverage layers from detection rule repositories.
 */

export * from './types/index.js';

export {
  generateCoverageLayer,
  aggregateCoverage,
  readRuleFile,
  type AggregateOptions,
  type AggregateResult,
  type CoverageRunOptions,
  type CoverageRunResult,
} from './pipeline.js';

export {
  DEFAULT_CONFIG,
  DEFAULT_EXCLUDED_DIRECTORIES,
  DEFAULT_NETWORK_PLATFORMS,
  EXAMPLE_LIMIT,
} from './config/defaults.js';
export { loadCoverageConfig, mergeConfig, ConfigFileSchema, type ConfigFile } from './config/loader.js';
export {
  ALL_DETECTIONS_VARIANT,
  NETWORK_VARIANT,
  type LayerVariant,
} from './config/variants.js';

export {
  SEVERITY_SCORES,
  DEFAULT_SEVERITY_SCORE,
  UNKNOWN_SEVERITY,
  severityToScore,
} from './knowledge/severity-scale.js';

export * from './ingestion/index.js';
export * from './extraction/index.js';
export { TechniqueAggregator, locationLabel } from './aggregation/aggregator.js';
export * from './reporting/index.js';

export {
  TechmapError,
  NoInputError,
  MalformedRuleError,
  WriteError,
  ConfigError,
  NoTechniqueFoundWarning,
  type RuleWarning,
} from './utils/errors.js';

/**
 * Configuration types for techmap.
 */

export interface CoverageConfig {
  /** Directory names never descended into, at any depth. */
  excludedDirectories: ReadonlySet<string>;
  /** Lowercase file-name suffixes that mark a rule file. */
  ruleFileExtensions: readonly string[];
  /** Field names checked, in order, for a severity label. */
  severityFields: readonly string[];
  /** Field names checked, in order, for a technique list. */
  techniqueFields: readonly string[];
  /** First-level folder names accepted by the network variant. */
  networkPlatforms: readonly string[];
  /** Maximum example locations kept per technique. */
  exampleLimit: number;
}

export type LayerVariantId = 'all' | 'network';

export interface ReportLabels {
  parsed: string;
  skipped: string;
  written: string;
  techniques: string;
}

/**
 * Built-in defaults. Frozen at module load; never mutated at runtime.
 */

import type { CoverageConfig } from '../types/config.js';

export const DEFAULT_EXCLUDED_DIRECTORIES: readonly string[] = Object.freeze([
  // VCS / tooling
  '.git',
  '.github',
  '.codebuild',
  '.cursor',
  '.hooks',
  '.hooks_scripts',

  // Language caches and build output
  '__pycache__',
  '.venv',
  'venv',
  'node_modules',
  'dist',
  'build',

  // Non-detection project dirs
  'docs',
  'infra',
  'templates',
  'tests',

  // Rule-repo subtrees that are not detections
  'global_helpers',
  'procedures',
  'schemas',
  'signals',
  'watchdogs',
]);

export const DEFAULT_RULE_FILE_EXTENSIONS: readonly string[] = Object.freeze(['.yml', '.yaml']);

export const DEFAULT_SEVERITY_FIELDS: readonly string[] = Object.freeze(['Severity', 'severity']);

export const DEFAULT_TECHNIQUE_FIELDS: readonly string[] = Object.freeze(['MitreTechniques']);

export const DEFAULT_NETWORK_PLATFORMS: readonly string[] = Object.freeze([
  'Cloudflare',
  'Netcraft',
  'Datadog',
]);

export const EXAMPLE_LIMIT = 5;

export function freezeConfig(config: CoverageConfig): CoverageConfig {
  return Object.freeze({
    ...config,
    excludedDirectories: new Set(config.excludedDirectories),
    ruleFileExtensions: Object.freeze([...config.ruleFileExtensions]),
    severityFields: Object.freeze([...config.severityFields]),
    techniqueFields: Object.freeze([...config.techniqueFields]),
    networkPlatforms: Object.freeze([...config.networkPlatforms]),
  });
}

export const DEFAULT_CONFIG: CoverageConfig = freezeConfig({
  excludedDirectories: new Set(DEFAULT_EXCLUDED_DIRECTORIES),
  ruleFileExtensions: DEFAULT_RULE_FILE_EXTENSIONS,
  severityFields: DEFAULT_SEVERITY_FIELDS,
  techniqueFields: DEFAULT_TECHNIQUE_FIELDS,
  networkPlatforms: DEFAULT_NETWORK_PLATFORMS,
  exampleLimit: EXAMPLE_LIMIT,
});

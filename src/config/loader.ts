/**
 * Optional user configuration file (YAML or JSON).
 *
 * Example:
 *
 * ```yaml
 * exclude: [archive, drafts]
 * networkPlatforms: [Cloudflare, Zscaler]
 * severityFields: [Severity, level]
 * techniqueFields: [MitreTechniques, attack_ids]
 * ```
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';

import type { CoverageConfig } from '../types/config.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { parseYaml } from '../utils/yaml.js';
import { DEFAULT_CONFIG, freezeConfig } from './defaults.js';

const logger = createLogger('config');

const nameList = z.array(z.string().trim().min(1));

export const ConfigFileSchema = z
  .object({
    exclude: nameList.default([]),
    networkPlatforms: nameList.min(1).optional(),
    severityFields: nameList.min(1).optional(),
    techniqueFields: nameList.min(1).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Merge validated file settings over a base configuration.
 * `exclude` extends the base exclusion set; the other lists replace it.
 */
export function mergeConfig(base: CoverageConfig, file: ConfigFile): CoverageConfig {
  return freezeConfig({
    ...base,
    excludedDirectories: new Set([...base.excludedDirectories, ...file.exclude]),
    networkPlatforms: file.networkPlatforms ?? base.networkPlatforms,
    severityFields: file.severityFields ?? base.severityFields,
    techniqueFields: file.techniqueFields ?? base.techniqueFields,
  });
}

/**
 * Resolve the run configuration. Without a path the built-in defaults apply.
 */
export function loadCoverageConfig(configPath?: string): CoverageConfig {
  if (!configPath) {
    return DEFAULT_CONFIG;
  }

  const resolved = resolve(configPath);
  let raw: string;
  try {
    raw = readFileSync(resolved, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${resolved}: ${errorMessage(err)}`, resolved, {
      cause: err,
    });
  }

  let data: unknown;
  try {
    // JSON is a subset of YAML, so one parser covers both.
    data = parseYaml(raw) ?? {};
  } catch (err) {
    throw new ConfigError(`Config file ${resolved} is not valid YAML/JSON: ${errorMessage(err)}`, resolved, {
      cause: err,
    });
  }

  const result = ConfigFileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${resolved}: ${issues}`, resolved);
  }

  logger.debug(`Loaded config from ${resolved}`);
  return mergeConfig(DEFAULT_CONFIG, result.data);
}

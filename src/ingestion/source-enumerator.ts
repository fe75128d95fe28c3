/**
 * Rule file discovery.
 *
 * Walks a rule repository synchronously and returns every YAML rule file,
 * sorted by path, skipping excluded directories and anything the source
 * policy rejects.
 */

import { readdirSync, statSync, type Dirent } from 'node:fs';
import { join, resolve } from 'node:path';

import type { CoverageConfig } from '../types/config.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { NoInputError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { allDetections, type SourcePolicy } from './source-policy.js';

const logger = createLogger('enumerator');

export interface EnumerateOptions {
  policy?: SourcePolicy;
  config?: CoverageConfig;
  /** Message for the `NoInputError` raised when nothing is found. */
  noInputMessage?: (root: string) => string;
}

export function defaultNoInputMessage(root: string): string {
  return `No .yaml/.yml files found under: ${root}`;
}

/**
 * Whether a file name carries one of the rule-file extensions.
 */
export function isRuleFileName(name: string, extensions: readonly string[]): boolean {
  const lower = name.toLowerCase();
  return extensions.some((ext) => lower.endsWith(ext));
}

/**
 * Enumerate candidate rule files below `root`.
 *
 * @returns Absolute paths, sorted.
 * @throws NoInputError when the root is not a directory or nothing matches.
 */
export function enumerateRuleFiles(root: string, options: EnumerateOptions = {}): string[] {
  const policy = options.policy ?? allDetections;
  const config = options.config ?? DEFAULT_CONFIG;
  const noInputMessage = options.noInputMessage ?? defaultNoInputMessage;
  const rootPath = resolve(root);

  if (!isDirectory(rootPath)) {
    throw new NoInputError(`Input root is not a directory: ${rootPath}`, rootPath);
  }

  const results: string[] = [];
  walk(rootPath, undefined, policy, config, results);
  results.sort();

  if (results.length === 0) {
    throw new NoInputError(noInputMessage(rootPath), rootPath);
  }

  logger.debug(`Found ${results.length} rule files under ${rootPath} (policy: ${policy.name})`);
  return results;
}

function walk(
  dir: string,
  platform: string | undefined,
  policy: SourcePolicy,
  config: CoverageConfig,
  results: string[],
): void {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    logger.warn(`Skipping unreadable directory ${dir}: ${errorMessage(err)}`);
    return;
  }

  const atRoot = platform === undefined;

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (config.excludedDirectories.has(entry.name)) continue;
      if (atRoot && !policy.allows(entry.name)) continue;
      walk(fullPath, platform ?? entry.name, policy, config, results);
      continue;
    }

    if (!isRuleFileName(entry.name, config.ruleFileExtensions)) continue;
    if (atRoot && !policy.allows(undefined)) continue;

    // Linked files count; linked directories are not followed.
    if (entry.isFile() || (entry.isSymbolicLink() && isFile(fullPath))) {
      results.push(fullPath);
    }
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

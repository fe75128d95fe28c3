/**
 * Navigator layer serialization and file output.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

import type { NavigatorLayer } from '../types/navigator-layer.js';
import { WriteError, errorMessage } from '../utils/errors.js';

/** Pretty-printed JSON, 2-space indentation. */
export function serializeNavigatorLayer(layer: NavigatorLayer): string {
  return JSON.stringify(layer, null, 2);
}

/**
 * Write the layer to disk, creating parent directories as needed.
 *
 * @returns The absolute output path.
 * @throws WriteError when the directory or file cannot be written.
 */
export function writeNavigatorLayer(layer: NavigatorLayer, outputPath: string): string {
  const resolved = resolve(outputPath);
  const dir = dirname(resolved);

  try {
    mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new WriteError(`Could not create output directory ${dir}: ${errorMessage(err)}`, resolved, {
      cause: err,
    });
  }

  try {
    writeFileSync(resolved, serializeNavigatorLayer(layer), 'utf-8');
  } catch (err) {
    throw new WriteError(`Could not write layer ${resolved}: ${errorMessage(err)}`, resolved, {
      cause: err,
    });
  }

  return resolved;
}

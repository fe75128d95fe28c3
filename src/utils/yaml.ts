/**
 * YAML parsing helpers.
 * Wraps the 'yaml' package so callers get a mapping or a typed failure.
 */

import { parse, parseDocument } from 'yaml';

import { errorMessage } from './errors.js';

export type YamlMapping = Record<string, unknown>;

export type MappingParseResult =
  | { ok: true; data: YamlMapping }
  | { ok: false; reason: string; cause?: unknown };

export function parseYaml(input: string): unknown {
  return parse(input);
}

export function isYamlMapping(value: unknown): value is YamlMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a single YAML document and require a top-level mapping.
 * Repeated keys resolve to their last value. Syntax errors, multi-document
 * streams, unresolved tags and scalar/sequence roots all fail.
 */
export function parseYamlMapping(input: string): MappingParseResult {
  let parsed: unknown;
  try {
    const doc = parseDocument(input, { uniqueKeys: false });
    const problem = doc.errors[0] ?? doc.warnings[0];
    if (problem) {
      return { ok: false, reason: `invalid YAML: ${problem.message}`, cause: problem };
    }
    parsed = doc.toJS();
  } catch (e) {
    return { ok: false, reason: `invalid YAML: ${errorMessage(e)}`, cause: e };
  }

  if (!isYamlMapping(parsed)) {
    const kind = parsed === null || parsed === undefined
      ? 'empty document'
      : Array.isArray(parsed) ? 'sequence' : typeof parsed;
    return { ok: false, reason: `top-level value is a ${kind}, not a mapping` };
  }

  return { ok: true, data: parsed };
}

/**
 * Rule fact extraction: severity label and ATT&CK technique IDs from one
 * rule file's raw text. Never throws on malformed content.
 */

import type { RuleFacts } from '../types/coverage.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { UNKNOWN_SEVERITY } from '../knowledge/severity-scale.js';
import { MalformedRuleError } from '../utils/errors.js';
import { parseYamlMapping, type YamlMapping } from '../utils/yaml.js';
import {
  defaultTechniqueStrategies,
  resolveTechniques,
  type RuleDocument,
  type TechniqueStrategy,
} from './technique-strategies.js';

export interface ExtractOptions {
  /** Used in error messages only. */
  path?: string;
  severityFields?: readonly string[];
  strategies?: readonly TechniqueStrategy[];
  /** Receives the recovered parse failure, if any. */
  onMalformed?: (error: MalformedRuleError) => void;
}

export interface ParsedRuleDocument extends RuleDocument {
  error?: MalformedRuleError;
}

export function parseRuleDocument(raw: string, path = '<inline>'): ParsedRuleDocument {
  const result = parseYamlMapping(raw);
  if (result.ok) {
    return { raw, data: result.data };
  }
  return {
    raw,
    data: undefined,
    error: new MalformedRuleError(`${path}: ${result.reason}`, path, { cause: result.cause }),
  };
}

/**
 * First listed field holding a non-blank string, trimmed and lowercased.
 */
export function extractSeverity(
  data: YamlMapping | undefined,
  fields: readonly string[] = DEFAULT_CONFIG.severityFields,
): string {
  if (!data) return UNKNOWN_SEVERITY;

  for (const field of fields) {
    const value = data[field];
    if (typeof value === 'string' && value.trim()) {
      return value.trim().toLowerCase();
    }
  }
  return UNKNOWN_SEVERITY;
}

export function extractRuleFacts(raw: string, options: ExtractOptions = {}): RuleFacts {
  const doc = parseRuleDocument(raw, options.path);
  if (doc.error && options.onMalformed) {
    options.onMalformed(doc.error);
  }

  const strategies = options.strategies ?? defaultTechniqueStrategies(DEFAULT_CONFIG.techniqueFields);
  const { techniques, source } = resolveTechniques(doc, strategies);

  return {
    severity: extractSeverity(doc.data, options.severityFields),
    techniques,
    techniqueSource: source,
    malformed: doc.error !== undefined,
  };
}

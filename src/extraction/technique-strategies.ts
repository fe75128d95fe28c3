/**
 * ATT&CK technique ID extraction strategies.
 *
 * Strategies are tried in order; the first one that yields at least one
 * technique ID wins. The structured field comes first, then a scan of the
 * raw file text for IDs in comments or loosely-typed fields.
 */

import type { YamlMapping } from '../utils/yaml.js';

/** T1234 or T1234.001, case-insensitive. */
export const TECHNIQUE_ID_PATTERN = /\bT\d{4}(?:\.\d{3})?\b/gi;

export interface RuleDocument {
  raw: string;
  /** Parsed mapping, or `undefined` when structured parsing failed. */
  data: YamlMapping | undefined;
}

export interface TechniqueStrategy {
  readonly name: string;
  extract(doc: RuleDocument): string[];
}

export interface TechniqueResolution {
  techniques: string[];
  /** Strategy that produced the IDs, or `'none'`. */
  source: string;
}

/**
 * Find every technique ID in `text`, uppercased, de-duplicated and sorted.
 *
 * @example findTechniqueIds('t1059, T1059 and T1110.001') => ['T1059', 'T1110.001']
 */
export function findTechniqueIds(text: string): string[] {
  const matches = text.match(TECHNIQUE_ID_PATTERN) ?? [];
  return [...new Set(matches.map((m) => m.toUpperCase()))].sort();
}

/**
 * Normalize a technique field value. Handles a single string
 * (`"T1059"`, `"T1059, T1110"`) or a list; non-string list items are ignored.
 */
export function normalizeTechniqueValue(value: unknown): string[] {
  if (typeof value === 'string') {
    return findTechniqueIds(value);
  }

  if (Array.isArray(value)) {
    const found = new Set<string>();
    for (const item of value) {
      if (typeof item !== 'string') continue;
      for (const id of findTechniqueIds(item)) found.add(id);
    }
    return [...found].sort();
  }

  return [];
}

/**
 * Read the first listed field that is present and yields technique IDs.
 */
export function structuredFieldStrategy(fields: readonly string[]): TechniqueStrategy {
  return {
    name: 'structured-field',
    extract: ({ data }) => {
      if (!data) return [];
      for (const field of fields) {
        if (!Object.hasOwn(data, field)) continue;
        const techniques = normalizeTechniqueValue(data[field]);
        if (techniques.length > 0) return techniques;
      }
      return [];
    },
  };
}

/** Scan the whole raw text, structured or not. */
export const rawTextStrategy: TechniqueStrategy = Object.freeze({
  name: 'raw-text',
  extract: ({ raw }: RuleDocument) => findTechniqueIds(raw),
});

export function defaultTechniqueStrategies(fields: readonly string[]): TechniqueStrategy[] {
  return [structuredFieldStrategy(fields), rawTextStrategy];
}

export function resolveTechniques(
  doc: RuleDocument,
  strategies: readonly TechniqueStrategy[],
): TechniqueResolution {
  for (const strategy of strategies) {
    const techniques = strategy.extract(doc);
    if (techniques.length > 0) {
      return { techniques, source: strategy.name };
    }
  }
  return { techniques: [], source: 'none' };
}

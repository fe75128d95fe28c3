/**
 * ATT&CK Navigator layer builder.
 *
 * Turns finalized technique summaries into a Navigator layer with one
 * scored, commented entry per technique. Output is deterministic for a
 * given summary map: entries are sorted by technique ID and the
 * presentation fields are constants.
 */

import type { TechniqueSummary } from '../types/coverage.js';
import type { NavigatorLayer, NavigatorTechnique } from '../types/navigator-layer.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const NAVIGATOR_DOMAIN = 'enterprise-attack';

export const DEFAULT_LAYER_DESCRIPTION =
  'Auto-generated from detection YAML files in repo (technique + severity).';

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export interface LayerOptions {
  name: string;
  description?: string;
}

/**
 * Fixed-format comment for one technique.
 *
 * @example 'detections=2; max_sev=sev1; examples=ruleA/rule.yml, ruleB/rule.yml'
 */
export function formatTechniqueComment(summary: TechniqueSummary): string {
  return (
    `detections=${summary.count}; ` +
    `max_sev=${summary.bestSeverity}; ` +
    `examples=${summary.examples.join(', ')}`
  );
}

export function buildTechniqueEntry(summary: TechniqueSummary): NavigatorTechnique {
  return {
    techniqueID: summary.techniqueId,
    score: summary.bestScore,
    comment: formatTechniqueComment(summary),
    metadata: [
      { name: 'detections_count', value: String(summary.count) },
      { name: 'max_severity', value: summary.bestSeverity },
    ],
  };
}

export function buildNavigatorLayer(
  options: LayerOptions,
  summaries: ReadonlyMap<string, TechniqueSummary>,
): NavigatorLayer {
  const techniques = [...summaries.keys()]
    .sort()
    .map((techniqueId) => {
      const summary = summaries.get(techniqueId);
      if (!summary) {
        throw new Error(`Missing summary for ${techniqueId}`);
      }
      return buildTechniqueEntry(summary);
    });

  return {
    name: options.name,
    domain: NAVIGATOR_DOMAIN,
    description: options.description ?? DEFAULT_LAYER_DESCRIPTION,
    gradient: { minValue: 0, maxValue: 100 },
    layout: { layout: 'side' },
    hideDisabled: false,
    techniques,
  };
}

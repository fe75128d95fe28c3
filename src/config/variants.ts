/**
 * Layer variants. Both run the same engine; they differ in source policy,
 * defaults and wording.
 */

import type { CoverageConfig, LayerVariantId, ReportLabels } from '../types/config.js';
import { allDetections, platformAllowList, type SourcePolicy } from '../ingestion/source-policy.js';
import { DEFAULT_LAYER_DESCRIPTION } from '../reporting/navigator-layer.js';
import { DEFAULT_REPORT_LABELS } from '../reporting/summary-reporter.js';

export interface LayerVariant {
  id: LayerVariantId;
  defaultOutput: string;
  defaultName: string;
  description: string;
  labels: ReportLabels;
  noInputMessage: (root: string) => string;
  createPolicy: (config: CoverageConfig, platforms?: readonly string[]) => SourcePolicy;
}

export const ALL_DETECTIONS_VARIANT: LayerVariant = Object.freeze({
  id: 'all',
  defaultOutput: 'out/layers/coverage_all.json',
  defaultName: 'Coverage - All',
  description: DEFAULT_LAYER_DESCRIPTION,
  labels: DEFAULT_REPORT_LABELS,
  noInputMessage: (root: string) => `No .yaml/.yml files found under: ${root}`,
  createPolicy: () => allDetections,
});

export const NETWORK_VARIANT: LayerVariant = Object.freeze({
  id: 'network',
  defaultOutput: 'out/layers/coverage_network.json',
  defaultName: 'Coverage - Network',
  description: 'Auto-generated network-only ATT&CK coverage from detection YAML files.',
  labels: Object.freeze({
    parsed: 'Network detections parsed',
    skipped: 'Skipped (no techniques)',
    written: 'Layer written to',
    techniques: 'Techniques in layer',
  }),
  noInputMessage: (root: string) => `No Network detection YAML files found under: ${root}`,
  createPolicy: (config: CoverageConfig, platforms?: readonly string[]) =>
    platformAllowList(platforms && platforms.length > 0 ? platforms : config.networkPlatforms),
});


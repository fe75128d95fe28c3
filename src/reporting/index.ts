/**
 * Barrel exports for the layer builder and emitters.
 */

export {
  buildNavigatorLayer,
  buildTechniqueEntry,
  formatTechniqueComment,
  NAVIGATOR_DOMAIN,
  DEFAULT_LAYER_DESCRIPTION,
  type LayerOptions,
} from './navigator-layer.js';

export { serializeNavigatorLayer, writeNavigatorLayer } from './layer-writer.js';

export {
  formatRunSummary,
  printRunSummary,
  DEFAULT_REPORT_LABELS,
} from './summary-reporter.js';

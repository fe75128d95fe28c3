/**
 * Rule repository ingestion: source policies and file enumeration.
 */

export {
  allDetections,
  normalizePlatformName,
  platformAllowList,
  type SourcePolicy,
} from './source-policy.js';

export {
  enumerateRuleFiles,
  isRuleFileName,
  defaultNoInputMessage,
  type EnumerateOptions,
} from './source-enumerator.js';

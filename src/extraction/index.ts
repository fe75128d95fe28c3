/**
 * Rule fact extraction.
 */

export {
  TECHNIQUE_ID_PATTERN,
  findTechniqueIds,
  normalizeTechniqueValue,
  structuredFieldStrategy,
  rawTextStrategy,
  defaultTechniqueStrategies,
  resolveTechniques,
  type RuleDocument,
  type TechniqueStrategy,
  type TechniqueResolution,
} from './technique-strategies.js';

export {
  parseRuleDocument,
  extractSeverity,
  extractRuleFacts,
  type ExtractOptions,
  type ParsedRuleDocument,
} from './rule-fact-extractor.js';

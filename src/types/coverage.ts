/**
 * Core data model of a coverage run.
 */

export interface RuleFile {
  path: string;
  raw: string;
}

export interface RuleFacts {
  /** Lowercase severity label, or `unknown`. */
  severity: string;
  /** Uppercased, de-duplicated, sorted technique IDs. */
  techniques: readonly string[];
  /** Extraction strategy that produced `techniques` (`none` if empty). */
  techniqueSource: string;
  /** Content did not parse to a YAML mapping. */
  malformed: boolean;
}

export interface TechniqueSummary {
  techniqueId: string;
  /** Number of contributing rule files. */
  count: number;
  bestScore: number;
  /** Severity label that first produced `bestScore`. */
  bestSeverity: string;
  /** First contributing locations (`<rule-folder>/<file>`), capped. */
  examples: readonly string[];
}

export interface RunStats {
  /** Candidate rule files enumerated. */
  candidates: number;
  /** Files that contributed at least one technique. */
  parsed: number;
  /** Files skipped for lacking any technique. */
  skipped: number;
  /** Distinct techniques aggregated. */
  techniques: number;
}

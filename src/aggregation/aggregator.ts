/**
 * Folds per-file rule facts into per-technique summaries.
 *
 * Pure accumulation: callers feed files in their processing order and the
 * aggregator keeps counts, the best severity score and the first few
 * example locations for every technique ID.
 */

import { basename, dirname } from 'node:path';

import type { RuleFacts, RunStats, TechniqueSummary } from '../types/coverage.js';
import { EXAMPLE_LIMIT } from '../config/defaults.js';
import { UNKNOWN_SEVERITY, severityToScore } from '../knowledge/severity-scale.js';
import { NoTechniqueFoundWarning } from '../utils/errors.js';

interface MutableSummary {
  count: number;
  bestScore: number;
  bestSeverity: string;
  examples: string[];
}

/**
 * `<parent-directory>/<file-name>`, the rule folder naming the detection.
 *
 * @example locationLabel('/repo/Okta/brute_force/rule.yml') => 'brute_force/rule.yml'
 */
export function locationLabel(path: string): string {
  return `${basename(dirname(path))}/${basename(path)}`;
}

export class TechniqueAggregator {
  private readonly summaries = new Map<string, MutableSummary>();
  private readonly warnings: NoTechniqueFoundWarning[] = [];
  private parsed = 0;
  private skipped = 0;

  constructor(private readonly exampleLimit: number = EXAMPLE_LIMIT) {}

  /**
   * Record one rule file.
   *
   * @returns `false` when the file had no techniques and was skipped.
   */
  add(path: string, facts: RuleFacts): boolean {
    if (facts.techniques.length === 0) {
      this.skipped++;
      this.warnings.push(new NoTechniqueFoundWarning(path));
      return false;
    }

    this.parsed++;
    const score = severityToScore(facts.severity);
    const location = locationLabel(path);

    for (const techniqueId of facts.techniques) {
      let summary = this.summaries.get(techniqueId);
      if (!summary) {
        summary = { count: 0, bestScore: 0, bestSeverity: UNKNOWN_SEVERITY, examples: [] };
        this.summaries.set(techniqueId, summary);
      }

      summary.count++;
      if (summary.examples.length < this.exampleLimit) {
        summary.examples.push(location);
      }
      // Strictly greater: on equal scores the first-seen label stays.
      if (score > summary.bestScore) {
        summary.bestScore = score;
        summary.bestSeverity = facts.severity;
      }
    }

    return true;
  }

  /** Read-only copies keyed by technique ID. */
  snapshot(): ReadonlyMap<string, TechniqueSummary> {
    const out = new Map<string, TechniqueSummary>();
    for (const [techniqueId, s] of this.summaries) {
      out.set(
        techniqueId,
        Object.freeze({
          techniqueId,
          count: s.count,
          bestScore: s.bestScore,
          bestSeverity: s.bestSeverity,
          examples: Object.freeze([...s.examples]),
        }),
      );
    }
    return out;
  }

  skippedFiles(): readonly NoTechniqueFoundWarning[] {
    return [...this.warnings];
  }

  stats(): RunStats {
    return {
      candidates: this.parsed + this.skipped,
      parsed: this.parsed,
      skipped: this.skipped,
      techniques: this.summaries.size,
    };
  }
}

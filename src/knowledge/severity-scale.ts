/**
 * Severity tier → Navigator score table.
 *
 * Five tiers, `sev0` being the most critical. Labels outside the scale
 * (including `unknown`) score 50, between `sev2` and `sev3`.
 */

export const SEVERITY_TIERS = ['sev0', 'sev1', 'sev2', 'sev3', 'sev4'] as const;

export type SeverityTier = (typeof SEVERITY_TIERS)[number];

export const SEVERITY_SCORES: Readonly<Record<SeverityTier, number>> = Object.freeze({
  sev0: 100,
  sev1: 90,
  sev2: 70,
  sev3: 40,
  sev4: 20,
});

export const UNKNOWN_SEVERITY = 'unknown';

export const DEFAULT_SEVERITY_SCORE = 50;

export function isSeverityTier(label: string): label is SeverityTier {
  return (SEVERITY_TIERS as readonly string[]).includes(label);
}

/**
 * Map a severity label to its score. Case-insensitive.
 *
 * @example severityToScore('Sev1') => 90
 * @example severityToScore('critical') => 50
 */
export function severityToScore(severity: string): number {
  const label = severity.toLowerCase();
  return isSeverityTier(label) ? SEVERITY_SCORES[label] : DEFAULT_SEVERITY_SCORE;
}

/**
 * Source policies decide which top-level folders of a rule repository are
 * scanned. The enumerator consults the policy with the first path segment
 * below the root before descending.
 */

export interface SourcePolicy {
  readonly name: string;
  /**
   * @param segment - First path segment below the root, or `undefined`
   *   for files that sit directly in the root.
   */
  allows(segment: string | undefined): boolean;
}

/** Accepts every folder and root-level file. */
export const allDetections: SourcePolicy = Object.freeze({
  name: 'all',
  allows: () => true,
});

/**
 * Normalize a platform folder name for comparison.
 *
 * @example normalizePlatformName('Net_Craft') => 'netcraft'
 */
export function normalizePlatformName(name: string): string {
  return name.toLowerCase().replace(/[ _]/g, '');
}

/**
 * Accept only first-level folders whose normalized name is in `platforms`.
 * Root-level files carry no platform and are rejected.
 */
export function platformAllowList(platforms: readonly string[]): SourcePolicy {
  const allowed = new Set(platforms.map(normalizePlatformName));

  return Object.freeze({
    name: `platforms(${[...allowed].sort().join(',')})`,
    allows: (segment: string | undefined) =>
      segment !== undefined && allowed.has(normalizePlatformName(segment)),
  });
}

/**
 * Percentile Ranking Domain Logic
 *
 * A percentile rank is the share of the reference population at or below a
 * value, scaled to 0-100 and rounded. For lower-is-better stats the share at
 * or above the value is used instead, so a low turnover rate ranks high.
 *
 * Distributions are kept sorted ascending so a rank is two binary searches.
 * When there is nothing to rank against the result is UNRANKED, never a
 * made-up number.
 *
 * No async I/O.
 */

import { StatDefinition, StatDirection } from './stat-definitions';
import { StatMap } from './stat-extraction';

export const UNRANKED = 'unranked' as const;
export type Unranked = typeof UNRANKED;

/** Integer in [0, 100], or UNRANKED */
export type PercentileRank = number | Unranked;

export function isRanked(rank: PercentileRank): rank is number {
  return rank !== UNRANKED;
}

/** Sorted ascending, finite values only */
export type Distribution = readonly number[];

/** Stat key -> distribution, for one season */
export type SeasonDistributions = ReadonlyMap<string, Distribution>;

export interface DistributionLookup {
  getDistribution(season: string, statKey: string): Distribution | undefined;
}

export function buildDistribution(values: readonly number[]): Distribution {
  return Object.freeze(values.filter((v) => Number.isFinite(v)).sort((a, b) => a - b));
}

/**
 * Build one distribution per defined stat from a league-wide sample.
 * Stats nobody in the sample has are left out (and rank as UNRANKED).
 */
export function buildSeasonDistributions(
  sample: readonly StatMap[],
  definitions: readonly StatDefinition[]
): SeasonDistributions {
  const distributions = new Map<string, Distribution>();
  for (const definition of definitions) {
    const values: number[] = [];
    for (const stats of sample) {
      const value = stats[definition.key];
      if (value !== undefined) values.push(value);
    }
    if (values.length > 0) {
      distributions.set(definition.key, buildDistribution(values));
    }
  }
  return distributions;
}

/** Index of the first element greater than value */
function upperBound(sorted: Distribution, value: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] <= value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** Index of the first element greater than or equal to value */
function lowerBound(sorted: Distribution, value: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

export function clampPercentile(value: number): number {
  return Math.min(100, Math.max(0, Math.round(value)));
}

export function percentileOf(
  value: number,
  distribution: Distribution,
  direction: StatDirection = 'higher'
): PercentileRank {
  if (distribution.length === 0 || !Number.isFinite(value)) return UNRANKED;

  const count =
    direction === 'higher'
      ? upperBound(distribution, value)
      : distribution.length - lowerBound(distribution, value);

  return clampPercentile((count / distribution.length) * 100);
}

/**
 * Ranks stat values against per-season reference distributions.
 * Holds no mutable state of its own; distributions come from the lookup.
 */
export class PercentileEngine {
  private readonly definitions: ReadonlyMap<string, StatDefinition>;

  constructor(
    config: { readonly statDefinitions: readonly StatDefinition[] },
    private readonly lookup: DistributionLookup
  ) {
    this.definitions = new Map(config.statDefinitions.map((d) => [d.key, d]));
  }

  rank(statKey: string, value: number, season: string): PercentileRank {
    const definition = this.definitions.get(statKey);
    if (!definition) return UNRANKED;

    const distribution = this.lookup.getDistribution(season, statKey);
    if (!distribution) return UNRANKED;

    return percentileOf(value, distribution, definition.direction);
  }
}

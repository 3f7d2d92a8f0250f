import { VarianceResult, VarianceStatistics } from '@variance-review/shared/types/variance.types';
import { compareCodes } from '../catalog/account-catalog';

export type VarianceRanking = 'percent' | 'amount';

function median(sorted: number[]): number {
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

/**
 * Variance Statistics
 * Aggregate figures over the variance results of one analysis run, on absolute percent changes.
 * Pairs without a percentage (zero base) count toward totals only.
 */
export function summarizeVariances(results: VarianceResult[]): VarianceStatistics {
  const percents: number[] = [];
  for (const result of results) {
    if (result.percentChange !== null) {
      percents.push(Math.abs(result.percentChange));
    }
  }
  const significant = results.filter((result) => result.isSignificant).length;

  if (percents.length === 0) {
    return {
      totalResults: results.length,
      significantVariances: significant,
      significantPercentage: results.length > 0 ? (significant / results.length) * 100 : 0,
      averageVariancePercent: 0,
      medianVariancePercent: 0,
      maxVariancePercent: 0,
      minVariancePercent: 0,
    };
  }

  const sorted = [...percents].sort((a, b) => a - b);

  return {
    totalResults: results.length,
    significantVariances: significant,
    significantPercentage: (significant / results.length) * 100,
    averageVariancePercent: percents.reduce((sum, value) => sum + value, 0) / percents.length,
    medianVariancePercent: median(sorted),
    maxVariancePercent: sorted[sorted.length - 1],
    minVariancePercent: sorted[0],
  };
}

/**
 * Largest movements first, by absolute percent or absolute amount
 */
export function topVariances(results: VarianceResult[], limit: number, by: VarianceRanking = 'percent'): VarianceResult[] {
  const magnitude = (result: VarianceResult): number =>
    by === 'amount' ? Math.abs(result.absoluteChange) : Math.abs(result.percentChange ?? 0);

  return [...results]
    .sort(
      (a, b) =>
        magnitude(b) - magnitude(a) ||
        compareCodes(a.accountCode, b.accountCode) ||
        compareCodes(a.periodTo, b.periodTo),
    )
    .slice(0, Math.max(0, limit));
}

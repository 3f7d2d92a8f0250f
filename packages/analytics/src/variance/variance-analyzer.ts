import { Account, AccountCategory, AccountSeries, StatementSnapshot } from '@variance-review/shared/types/statement.types';
import { AnalysisConfig, QuarterlyPattern } from '@variance-review/shared/types/analysis-config.types';
import {
  QuarterlyDeviation,
  QuarterlyDeviationReason,
  QuarterPosition,
  RecurringDeviation,
  VarianceComputation,
  VarianceResult,
} from '@variance-review/shared/types/variance.types';
import { ComputationWarning } from '@variance-review/shared/types/warning.types';
import { alignSnapshot } from '../periods/period-alignment';
import { quarterPosition } from '../periods/period-calendar';
import { mergeWarnings } from '../pipeline/warnings';

export interface VarianceAnalysis {
  /** Oldest first */
  periods: string[];
  accounts: Account[];
  results: VarianceResult[];
  recurringDeviations: RecurringDeviation[];
  quarterlyDeviations: QuarterlyDeviation[];
  insufficientHistory: string[];
  warnings: ComputationWarning[];
}

interface AccountVariance {
  results: VarianceResult[];
  recurringDeviations: RecurringDeviation[];
  quarterlyDeviations: QuarterlyDeviation[];
  insufficientHistory: boolean;
  warnings: ComputationWarning[];
}

/**
 * Period-over-period change between two amounts.
 * A zero base yields no percentage: it is new activity, or no change at all.
 */
export function computeVariance(current: number, previous: number): VarianceComputation {
  const absoluteChange = current - previous;

  if (previous === 0) {
    return {
      currentValue: current,
      previousValue: previous,
      absoluteChange,
      percentChange: current === 0 ? 0 : null,
      activity: current === 0 ? null : 'new',
    };
  }

  return {
    currentValue: current,
    previousValue: previous,
    absoluteChange,
    percentChange: (absoluteChange * 100) / Math.abs(previous),
    activity: current === 0 ? 'ceased' : null,
  };
}

/**
 * True only when both amounts are non-zero and of opposite sign
 */
export function detectSignChange(current: number, previous: number): boolean {
  return (current > 0 && previous < 0) || (current < 0 && previous > 0);
}

/**
 * Recurring categories are held to their own tolerance, even below the global threshold
 */
export function detectRecurringDeviation(
  account: Account,
  result: VarianceResult,
  tolerances: Partial<Record<AccountCategory, number>>,
): boolean {
  const tolerance = tolerances[account.category];
  if (tolerance === undefined || result.percentChange === null) {
    return false;
  }
  return Math.abs(result.percentChange) > tolerance;
}

/**
 * Compare the change observed at a period boundary with the expected quarterly pattern
 */
export function evaluateQuarterlyPattern(
  result: VarianceResult,
  pattern: QuarterlyPattern,
  position: QuarterPosition,
): QuarterlyDeviationReason | null {
  if (result.percentChange === null) {
    return null;
  }

  const sign = pattern.direction === 'increase' ? 1 : -1;
  const spiked = result.percentChange * sign >= pattern.minChangePercent;
  const atBoundary = position === pattern.boundary;

  if (atBoundary && !spiked) return 'missing_expected_change';
  if (!atBoundary && spiked) return 'unexpected_change';
  return null;
}

export function detectQuarterlyPatternDeviation(
  account: Account,
  result: VarianceResult,
  patterns: Partial<Record<AccountCategory, QuarterlyPattern>>,
): boolean {
  const pattern = patterns[account.category];
  const position = quarterPosition(result.periodTo);
  if (!pattern || !position) {
    return false;
  }
  return evaluateQuarterlyPattern(result, pattern, position) !== null;
}

/**
 * Variance Analyzer
 * Computes every adjacent period-pair variance per account and flags deviations
 */
export class VarianceAnalyzer {
  private readonly varianceThreshold: number;
  private readonly criticalThreshold: number;
  private readonly recurringAccounts: Partial<Record<AccountCategory, number>>;
  private readonly quarterlyPatterns: Partial<Record<AccountCategory, QuarterlyPattern>>;

  constructor(config: AnalysisConfig) {
    this.varianceThreshold = config.varianceThreshold;
    this.criticalThreshold = config.criticalThreshold;
    this.recurringAccounts = { ...config.recurringAccounts };
    this.quarterlyPatterns = { ...config.quarterlyPatterns };
  }

  analyze(snapshot: StatementSnapshot): VarianceAnalysis {
    const aligned = alignSnapshot(snapshot);
    const perAccount = aligned.accounts.map((entry) => this.analyzeAccount(entry));

    return {
      periods: aligned.periods,
      accounts: aligned.accounts.map((entry) => entry.account),
      results: perAccount.flatMap((entry) => entry.results),
      recurringDeviations: perAccount.flatMap((entry) => entry.recurringDeviations),
      quarterlyDeviations: perAccount.flatMap((entry) => entry.quarterlyDeviations),
      insufficientHistory: aligned.accounts
        .filter((_, index) => perAccount[index].insufficientHistory)
        .map((entry) => entry.account.code),
      warnings: mergeWarnings(perAccount.map((entry) => entry.warnings)),
    };
  }

  private analyzeAccount({ account, series }: AccountSeries): AccountVariance {
    const warnings: ComputationWarning[] = [];
    const results: VarianceResult[] = [];
    const recurringDeviations: RecurringDeviation[] = [];
    const quarterlyDeviations: QuarterlyDeviation[] = [];

    for (const point of series) {
      if (point.value === null) {
        warnings.push({
          code: 'period_gap',
          subject: `${account.code}:${point.period}`,
          message: `Account ${account.code} has no value for ${point.period}; comparisons touching it are skipped`,
        });
      }
    }

    const reported = series.filter((point) => point.value !== null).length;
    if (reported < 2) {
      warnings.push({
        code: 'insufficient_history',
        subject: account.code,
        message: `Account ${account.code} has fewer than two reported periods; no variance computed`,
      });
      return { results, recurringDeviations, quarterlyDeviations, insufficientHistory: true, warnings };
    }

    for (let index = 1; index < series.length; index++) {
      const previous = series[index - 1];
      const current = series[index];
      if (previous.value === null || current.value === null) {
        continue;
      }

      const result = this.buildResult(account, previous.period, current.period, current.value, previous.value);
      results.push(result);

      if (detectRecurringDeviation(account, result, this.recurringAccounts)) {
        recurringDeviations.push({ result, tolerance: this.recurringAccounts[account.category] ?? 0 });
      }

      const pattern = this.quarterlyPatterns[account.category];
      if (pattern) {
        const position = quarterPosition(current.period);
        if (!position) {
          warnings.push({
            code: 'period_label_unparsed',
            subject: current.period,
            message: `Period ${current.period} carries no month; quarterly pattern checks are skipped for it`,
          });
          continue;
        }
        const reason = evaluateQuarterlyPattern(result, pattern, position);
        if (reason) {
          quarterlyDeviations.push({ result, pattern, position, reason });
        }
      }
    }

    return { results, recurringDeviations, quarterlyDeviations, insufficientHistory: false, warnings };
  }

  private buildResult(
    account: Account,
    periodFrom: string,
    periodTo: string,
    current: number,
    previous: number,
  ): VarianceResult {
    const variance = computeVariance(current, previous);
    const magnitude = variance.percentChange === null ? null : Math.abs(variance.percentChange);

    return {
      ...variance,
      accountCode: account.code,
      accountName: account.name,
      category: account.category,
      statementType: account.statementType,
      periodFrom,
      periodTo,
      isSignificant: magnitude !== null && magnitude >= this.varianceThreshold,
      isCritical: magnitude !== null && magnitude >= this.criticalThreshold,
      signChanged: detectSignChange(current, previous),
    };
  }
}

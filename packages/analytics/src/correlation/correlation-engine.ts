import { AccountCategory } from '@variance-review/shared/types/statement.types';
import {
  AggregationMethod,
  AnalysisConfig,
  CorrelationRule,
  QuarterlyTiming,
} from '@variance-review/shared/types/analysis-config.types';
import { CorrelationViolation } from '@variance-review/shared/types/correlation.types';
import { VarianceResult } from '@variance-review/shared/types/variance.types';
import { ComputationWarning } from '@variance-review/shared/types/warning.types';
import { AccountCatalog } from '../catalog/account-catalog';
import { formatCategory, formatPercent } from '../format/number-format';
import { quarterPosition } from '../periods/period-calendar';
import { mergeWarnings } from '../pipeline/warnings';
import { computeVariance, VarianceAnalysis } from '../variance/variance-analyzer';

export interface CorrelationAnalysis {
  violations: CorrelationViolation[];
  rulesEvaluated: number;
  warnings: ComputationWarning[];
}

interface AggregatedChange {
  percentChange: number;
  currentTotal: number;
}

interface RuleCheck {
  expected: number;
  deviationScore: number;
  description: string;
}

type ResultIndex = Map<string, Map<string, VarianceResult>>;

function indexResults(results: VarianceResult[]): ResultIndex {
  const index: ResultIndex = new Map();
  for (const result of results) {
    const byPeriod = index.get(result.accountCode) ?? new Map<string, VarianceResult>();
    byPeriod.set(result.periodTo, result);
    index.set(result.accountCode, byPeriod);
  }
  return index;
}

/**
 * Correlation Engine
 * Validates that related account categories move together the way each rule expects
 */
export class CorrelationEngine {
  private readonly rules: CorrelationRule[];

  constructor(
    private readonly config: AnalysisConfig,
    private readonly catalog: AccountCatalog,
  ) {
    this.rules = config.correlationRules.filter((rule) => rule.enabled).sort((a, b) => a.id - b.id);
  }

  evaluate(analysis: VarianceAnalysis): CorrelationAnalysis {
    const index = indexResults(analysis.results);
    const violations: CorrelationViolation[] = [];
    const warnings: ComputationWarning[] = [];
    let rulesEvaluated = 0;

    for (const rule of this.rules) {
      const primaryAccounts = this.membersOf(rule.primaryCategory, index);
      const correlatedAccounts = this.membersOf(rule.correlatedCategory, index);

      const empty = [
        ...(primaryAccounts.length === 0 ? [rule.primaryCategory] : []),
        ...(correlatedAccounts.length === 0 && rule.correlatedCategory !== rule.primaryCategory
          ? [rule.correlatedCategory]
          : []),
      ];
      if (primaryAccounts.length === 0 || correlatedAccounts.length === 0) {
        warnings.push({
          code: 'empty_category',
          subject: `rule:${rule.id}`,
          message: `Rule ${rule.id} (${rule.name}) skipped: no accounts present for ${empty.join(', ')}`,
        });
        continue;
      }

      rulesEvaluated++;
      for (let i = 1; i < analysis.periods.length; i++) {
        const periodFrom = analysis.periods[i - 1];
        const periodTo = analysis.periods[i];

        const primary = this.aggregate(rule.primaryCategory, primaryAccounts, periodTo, index);
        const correlated = this.aggregate(rule.correlatedCategory, correlatedAccounts, periodTo, index);
        if (!primary || !correlated) {
          continue;
        }

        const check = this.check(rule, primary, correlated.percentChange, periodTo, warnings);
        if (!check) {
          continue;
        }

        violations.push({
          ruleId: rule.id,
          ruleName: rule.name,
          ruleDescription: rule.description ?? '',
          relationshipType: rule.relationshipType,
          periodFrom,
          periodTo,
          primaryCategory: rule.primaryCategory,
          correlatedCategory: rule.correlatedCategory,
          primaryAccounts: [...primaryAccounts],
          correlatedAccounts: [...correlatedAccounts],
          primaryChangePercent: primary.percentChange,
          correlatedChangePercent: correlated.percentChange,
          expectedChangePercent: check.expected,
          deviationScore: check.deviationScore,
          description: check.description,
        });
      }
    }

    return { violations, rulesEvaluated, warnings: mergeWarnings([warnings]) };
  }

  private membersOf(category: AccountCategory, index: ResultIndex): string[] {
    return this.catalog.codesFor(category).filter((code) => index.has(code));
  }

  private aggregate(
    category: AccountCategory,
    accounts: string[],
    periodTo: string,
    index: ResultIndex,
  ): AggregatedChange | null {
    const results: VarianceResult[] = [];
    for (const code of accounts) {
      const result = index.get(code)?.get(periodTo);
      if (result) {
        results.push(result);
      }
    }
    if (results.length === 0) {
      return null;
    }

    const currentTotal = results.reduce((sum, result) => sum + result.currentValue, 0);
    const method: AggregationMethod = this.config.categoryAggregation[category] ?? 'sum';

    if (method === 'mean') {
      const percents: number[] = [];
      for (const result of results) {
        if (result.percentChange !== null) {
          percents.push(result.percentChange);
        }
      }
      if (percents.length === 0) {
        return null;
      }
      return { percentChange: percents.reduce((sum, value) => sum + value, 0) / percents.length, currentTotal };
    }

    const previousTotal = results.reduce((sum, result) => sum + result.previousValue, 0);
    const { percentChange } = computeVariance(currentTotal, previousTotal);
    return percentChange === null ? null : { percentChange, currentTotal };
  }

  private check(
    rule: CorrelationRule,
    primary: AggregatedChange,
    correlated: number,
    periodTo: string,
    warnings: ComputationWarning[],
  ): RuleCheck | null {
    const p = primary.percentChange;
    const label = `${formatCategory(rule.primaryCategory)} moved ${formatPercent(p)} but ${formatCategory(
      rule.correlatedCategory,
    )} moved ${formatPercent(correlated)}`;

    switch (rule.relationshipType) {
      case 'positive':
      case 'negative': {
        if (Math.abs(p) < this.config.varianceThreshold) return null;
        const expected = rule.relationshipType === 'positive' ? p : -p;
        const comovement = (correlated * Math.sign(expected)) / Math.abs(p);
        if (comovement >= this.config.minComovementRatio) return null;
        return {
          expected,
          deviationScore: Math.abs(expected - correlated),
          description: `${label}; expected about ${formatPercent(expected)}`,
        };
      }
      case 'conditional': {
        if (Math.abs(p) < this.config.varianceThreshold) return null;
        if (Math.abs(correlated) >= this.config.minComovementRatio * Math.abs(p)) return null;
        return {
          expected: correlated < 0 ? -Math.abs(p) : Math.abs(p),
          deviationScore: Math.abs(Math.abs(p) - Math.abs(correlated)),
          description: `${label}; expected a response of similar magnitude`,
        };
      }
      case 'quarterly_timing':
        return rule.timing ? this.checkQuarterlyTiming(rule.timing, primary, correlated, periodTo, label, warnings) : null;
    }
  }

  private checkQuarterlyTiming(
    timing: QuarterlyTiming,
    primary: AggregatedChange,
    correlated: number,
    periodTo: string,
    label: string,
    warnings: ComputationWarning[],
  ): RuleCheck | null {
    if (primary.currentTotal === 0) {
      return null;
    }

    const position = quarterPosition(periodTo);
    if (!position) {
      warnings.push({
        code: 'period_label_unparsed',
        subject: periodTo,
        message: `Period ${periodTo} carries no month; quarterly pattern checks are skipped for it`,
      });
      return null;
    }

    const sign = timing.direction === 'increase' ? 1 : -1;
    const moved = correlated * sign >= this.config.varianceThreshold;
    const atBoundary = position === timing.boundary;
    if (atBoundary === moved) {
      return null;
    }

    const expected = atBoundary ? sign * this.config.varianceThreshold : 0;
    const boundary = formatCategory(timing.boundary);
    const movement = timing.direction === 'increase' ? 'an increase' : 'a decrease';
    return {
      expected,
      deviationScore: Math.abs(expected - correlated),
      description: atBoundary
        ? `${label}; ${movement} of at least ${this.config.varianceThreshold.toFixed(1)}% was expected at ${boundary}`
        : `${label}; ${movement} of this size is only expected at ${boundary}`,
    };
  }
}

import {
  Anomaly,
  ANOMALY_TYPES,
  AnomalySeverity,
  AnomalySummary,
  AnomalyType,
} from '@variance-review/shared/types/anomaly.types';
import { AnalysisConfig, SeverityBands } from '@variance-review/shared/types/analysis-config.types';
import { CorrelationViolation } from '@variance-review/shared/types/correlation.types';
import { Account } from '@variance-review/shared/types/statement.types';
import {
  QuarterlyDeviation,
  RecurringDeviation,
  VarianceResult,
} from '@variance-review/shared/types/variance.types';
import { formatAmount, formatCategory, formatPercent } from '../format/number-format';
import { compareCodes } from '../catalog/account-catalog';
import { VarianceAnalysis } from '../variance/variance-analyzer';
import { atLeast, classifySeverity, percentBands, priorityScore, SEVERITY_RANK } from './severity';

/** Metric used for new activity, where no percentage exists */
export const NEW_ACTIVITY_METRIC = 100;

export interface DetectionInput {
  variance: VarianceAnalysis;
  violations: CorrelationViolation[];
}

type AnomalyDraft = Omit<Anomaly, 'priorityScore'> & { scale: number };

/**
 * Anomaly Detector
 * Turns variance results and correlation violations into ranked, classified anomalies
 */
export class AnomalyDetector {
  private readonly percentBands: SeverityBands;
  private readonly deviationBands: SeverityBands;

  constructor(config: AnalysisConfig) {
    this.percentBands = percentBands(config);
    this.deviationBands = { ...config.correlationSeverityBands };
  }

  /**
   * Detect all types of anomalies
   */
  detect({ variance, violations }: DetectionInput): AnomalySummary {
    const accounts = new Map(variance.accounts.map((account) => [account.code, account]));
    const periodIndex = new Map(variance.periods.map((period, index) => [period, index]));

    const drafts: AnomalyDraft[] = [
      ...variance.results.filter((result) => result.isSignificant).map((result) => this.fromVariance(result)),
      ...variance.results
        .filter((result) => result.signChanged || result.activity !== null)
        .map((result) => this.fromSignChange(result)),
      ...variance.recurringDeviations.map((deviation) => this.fromRecurring(deviation)),
      ...variance.quarterlyDeviations.map((deviation) => this.fromQuarterly(deviation)),
      ...violations.flatMap((violation) => this.fromViolation(violation, accounts)),
    ];

    const anomalies = drafts
      .map(({ scale, ...draft }) => ({ ...draft, priorityScore: priorityScore(draft.severity, draft.metricValue, scale) }))
      .sort(
        (a, b) =>
          b.priorityScore - a.priorityScore ||
          SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
          compareCodes(a.accountCode, b.accountCode) ||
          ANOMALY_TYPES.indexOf(a.type) - ANOMALY_TYPES.indexOf(b.type) ||
          (periodIndex.get(a.period) ?? 0) - (periodIndex.get(b.period) ?? 0) ||
          compareCodes(a.id, b.id),
      );

    const bySeverity: Record<AnomalySeverity, number> = { critical: 0, high: 0, medium: 0, low: 0 };
    const byType: Record<AnomalyType, number> = {
      variance: 0,
      correlation_violation: 0,
      sign_change: 0,
      recurring_spike: 0,
      quarterly_pattern: 0,
    };
    for (const anomaly of anomalies) {
      bySeverity[anomaly.severity]++;
      byType[anomaly.type]++;
    }

    return {
      totalAccountsAnalyzed: variance.accounts.length,
      accountsWithAnomalies: new Set(anomalies.map((anomaly) => anomaly.accountCode)).size,
      totalAnomalies: anomalies.length,
      correlationViolations: violations.length,
      bySeverity,
      byType,
      anomalies,
    };
  }

  private fromVariance(result: VarianceResult): AnomalyDraft {
    const magnitude = Math.abs(result.percentChange ?? 0);
    const severity = classifySeverity(magnitude, this.percentBands);
    const direction = result.absoluteChange > 0 ? 'increased' : 'decreased';

    return {
      ...this.base('variance', result),
      severity,
      description:
        `${result.accountName} ${direction} by ${magnitude.toFixed(1)}% ` +
        `from ${formatAmount(result.previousValue)} to ${formatAmount(result.currentValue)} ` +
        `between ${result.periodFrom} and ${result.periodTo}`,
      metricValue: magnitude,
      recommendedAction: this.varianceAction(result, severity),
      details: this.valueDetails(result, this.percentBands.medium),
      scale: this.percentBands.critical,
    };
  }

  private fromSignChange(result: VarianceResult): AnomalyDraft {
    const magnitude = result.percentChange === null ? NEW_ACTIVITY_METRIC : Math.abs(result.percentChange);
    const previous = formatAmount(result.previousValue);
    const current = formatAmount(result.currentValue);

    let description: string;
    if (result.activity === 'new') {
      description = `${result.accountName} went from zero to ${current} in ${result.periodTo}`;
    } else if (result.activity === 'ceased') {
      description = `${result.accountName} went from ${previous} to zero in ${result.periodTo}`;
    } else if (result.previousValue > 0) {
      description = `${result.accountName} changed from positive (${previous}) to negative (${current}) in ${result.periodTo}`;
    } else {
      description = `${result.accountName} changed from negative (${previous}) to positive (${current}) in ${result.periodTo}`;
    }

    return {
      ...this.base('sign_change', result),
      // Fixed at high; the variance anomaly for the same pair carries the magnitude
      severity: 'high',
      description,
      metricValue: magnitude,
      recommendedAction: 'Investigate the cause of the sign change: possible data error or significant business event',
      details: this.valueDetails(result),
      scale: this.percentBands.critical,
    };
  }

  private fromRecurring({ result, tolerance }: RecurringDeviation): AnomalyDraft {
    const magnitude = Math.abs(result.percentChange ?? 0);

    return {
      ...this.base('recurring_spike', result),
      severity: atLeast(classifySeverity(magnitude, this.percentBands), 'medium'),
      description:
        `${result.accountName} moved ${formatPercent(result.percentChange ?? 0)} in ${result.periodTo}; ` +
        `recurring ${formatCategory(result.category)} accounts are expected to stay within ${tolerance}%`,
      metricValue: magnitude,
      recommendedAction: this.recurringAction(result),
      details: this.valueDetails(result, tolerance),
      scale: this.percentBands.critical,
    };
  }

  private fromQuarterly({ result, pattern, position, reason }: QuarterlyDeviation): AnomalyDraft {
    const magnitude = Math.abs(result.percentChange ?? 0);
    const change = formatPercent(result.percentChange ?? 0);
    const boundary = formatCategory(pattern.boundary);

    return {
      ...this.base('quarterly_pattern', result),
      severity: atLeast(classifySeverity(magnitude, this.percentBands), 'medium'),
      description:
        reason === 'missing_expected_change'
          ? `${result.accountName} moved ${change} at ${boundary} (${result.periodTo}); ` +
            `${pattern.direction === 'increase' ? 'an' : 'a'} ${pattern.direction} of at least ${pattern.minChangePercent}% is expected there`
          : `${result.accountName} moved ${change} at ${formatCategory(position)} (${result.periodTo}); ` +
            `changes of this size are expected only at ${boundary}`,
      metricValue: magnitude,
      recommendedAction: 'Verify quarterly billing timing and collection patterns',
      details: this.valueDetails(result, pattern.minChangePercent),
      scale: this.percentBands.critical,
    };
  }

  private fromViolation(violation: CorrelationViolation, accounts: Map<string, Account>): AnomalyDraft[] {
    const severity = classifySeverity(violation.deviationScore, this.deviationBands);
    const drafts: AnomalyDraft[] = [];

    for (const code of violation.correlatedAccounts) {
      const account = accounts.get(code);
      if (!account) {
        continue;
      }
      drafts.push({
        id: `correlation_violation:${violation.ruleId}:${code}:${violation.periodTo}`,
        type: 'correlation_violation',
        severity,
        accountCode: account.code,
        accountName: account.name,
        category: account.category,
        statementType: account.statementType,
        period: violation.periodTo,
        description: `Rule ${violation.ruleId} (${violation.ruleName}): ${violation.description}`,
        metricValue: violation.deviationScore,
        recommendedAction:
          `Review the relationship between ${formatCategory(violation.primaryCategory)} ` +
          `and ${formatCategory(violation.correlatedCategory)}: verify the business logic and postings`,
        ruleId: violation.ruleId,
        details: {
          percentChange: violation.correlatedChangePercent,
          deviationScore: violation.deviationScore,
          threshold: violation.expectedChangePercent,
        },
        scale: this.deviationBands.critical,
      });
    }

    return drafts;
  }

  private base(type: AnomalyType, result: VarianceResult) {
    return {
      id: `${type}:${result.accountCode}:${result.periodTo}`,
      type,
      accountCode: result.accountCode,
      accountName: result.accountName,
      category: result.category,
      statementType: result.statementType,
      period: result.periodTo,
    };
  }

  private valueDetails(result: VarianceResult, threshold?: number): Anomaly['details'] {
    return {
      currentValue: result.currentValue,
      previousValue: result.previousValue,
      percentChange: result.percentChange,
      ...(threshold === undefined ? {} : { threshold }),
    };
  }

  private varianceAction(result: VarianceResult, severity: AnomalySeverity): string {
    switch (severity) {
      case 'critical':
        return `URGENT: investigate ${result.accountName}; verify data accuracy and the underlying business reasons`;
      case 'high':
        return `Review ${result.accountName}; check supporting documentation and business events`;
      default:
        return `Monitor ${result.accountName}; document an explanation for the variance`;
    }
  }

  private recurringAction(result: VarianceResult): string {
    switch (result.category) {
      case 'depreciation':
        return 'Check for asset additions, disposals or changes in depreciation method';
      case 'revenue':
        return 'Verify lease agreements, occupancy changes or billing timing';
      case 'opex':
        return 'Review operating expense categories for unusual items or timing differences';
      default:
        return `Review ${result.accountName} for changes in the underlying recurring arrangement`;
    }
  }
}

/**
 * Group anomalies by account code, preserving rank order within each group
 */
export function groupAnomaliesByAccount(anomalies: Anomaly[]): Map<string, Anomaly[]> {
  const groups = new Map<string, Anomaly[]>();
  for (const anomaly of anomalies) {
    const group = groups.get(anomaly.accountCode) ?? [];
    group.push(anomaly);
    groups.set(anomaly.accountCode, group);
  }
  return groups;
}

/**
 * Anomalies at or above the given severity
 */
export function filterBySeverity(anomalies: Anomaly[], minimum: AnomalySeverity): Anomaly[] {
  return anomalies.filter((anomaly) => SEVERITY_RANK[anomaly.severity] >= SEVERITY_RANK[minimum]);
}

export function filterByType(anomalies: Anomaly[], type: AnomalyType): Anomaly[] {
  return anomalies.filter((anomaly) => anomaly.type === type);
}

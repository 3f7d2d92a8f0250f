import { AccountCategory, StatementType } from './statement.types';
import { CorrelationViolation } from './correlation.types';
import { VarianceResult, VarianceStatistics } from './variance.types';
import { ComputationWarning } from './warning.types';

export type AnomalyType =
  | 'variance'
  | 'correlation_violation'
  | 'sign_change'
  | 'recurring_spike'
  | 'quarterly_pattern';

export type AnomalySeverity = 'low' | 'medium' | 'high' | 'critical';

export const ANOMALY_TYPES: readonly AnomalyType[] = [
  'variance',
  'correlation_violation',
  'sign_change',
  'recurring_spike',
  'quarterly_pattern',
];

export const ANOMALY_SEVERITIES: readonly AnomalySeverity[] = ['critical', 'high', 'medium', 'low'];

export interface Anomaly {
  id: string;
  type: AnomalyType;
  severity: AnomalySeverity;
  accountCode: string;
  accountName: string;
  category: AccountCategory;
  statementType: StatementType;
  period: string;
  description: string;
  metricValue: number;
  priorityScore: number;
  recommendedAction: string;
  ruleId?: number;
  details: {
    currentValue?: number;
    previousValue?: number;
    percentChange?: number | null;
    deviationScore?: number;
    threshold?: number;
  };
}

export interface AnomalySummary {
  totalAccountsAnalyzed: number;
  accountsWithAnomalies: number;
  totalAnomalies: number;
  correlationViolations: number;
  bySeverity: Record<AnomalySeverity, number>;
  byType: Record<AnomalyType, number>;
  anomalies: Anomaly[];
}

export interface AnalysisReport {
  periods: string[];
  summary: AnomalySummary;
  violations: CorrelationViolation[];
  /** Every account and period pair, by account code then period */
  variances: VarianceResult[];
  varianceStatistics: VarianceStatistics;
  warnings: ComputationWarning[];
}

import { AccountCategory } from './statement.types';

export type RelationshipType = 'positive' | 'negative' | 'quarterly_timing' | 'conditional';

export type QuarterBoundary = 'quarter_start' | 'quarter_end';

export type ChangeDirection = 'increase' | 'decrease';

export type AggregationMethod = 'sum' | 'mean';

export interface QuarterlyTiming {
  boundary: QuarterBoundary;
  direction: ChangeDirection;
}

export interface QuarterlyPattern extends QuarterlyTiming {
  minChangePercent: number;
}

export interface CorrelationRule {
  id: number;
  name: string;
  primaryCategory: AccountCategory;
  correlatedCategory: AccountCategory;
  relationshipType: RelationshipType;
  enabled: boolean;
  description?: string;
  timing?: QuarterlyTiming;
}

export interface SeverityBands {
  critical: number;
  high: number;
  medium: number;
}

export interface AnalysisConfig {
  varianceThreshold: number;
  criticalThreshold: number;
  criticalSeverityThreshold: number;
  highSeverityThreshold: number;
  mediumSeverityThreshold: number;
  correlationSeverityBands: SeverityBands;
  minComovementRatio: number;
  recurringAccounts: Partial<Record<AccountCategory, number>>;
  quarterlyPatterns: Partial<Record<AccountCategory, QuarterlyPattern>>;
  categoryAggregation: Partial<Record<AccountCategory, AggregationMethod>>;
  correlationRules: CorrelationRule[];
}

/**
 * Partial configuration supplied by a caller; validated when merged.
 */
export interface AnalysisConfigOverrides {
  varianceThreshold?: number;
  criticalThreshold?: number;
  criticalSeverityThreshold?: number;
  highSeverityThreshold?: number;
  mediumSeverityThreshold?: number;
  correlationSeverityBands?: Partial<SeverityBands>;
  minComovementRatio?: number;
  recurringAccounts?: Record<string, unknown>;
  quarterlyPatterns?: Record<string, unknown>;
  categoryAggregation?: Record<string, unknown>;
  correlationRules?: Record<string, unknown>[];
  disabledRuleIds?: number[];
}

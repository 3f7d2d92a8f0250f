import { AnalysisConfig } from '@variance-review/shared/types/analysis-config.types';
import { DEFAULT_CORRELATION_RULES } from './correlation-rules';

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  varianceThreshold: 5.0,
  criticalThreshold: 10.0,
  criticalSeverityThreshold: 20.0,
  highSeverityThreshold: 10.0,
  mediumSeverityThreshold: 5.0,
  correlationSeverityBands: {
    critical: 50.0,
    high: 20.0,
    medium: 10.0,
  },
  minComovementRatio: 0.3,
  // Stable accounts are held to a tighter bar than the global threshold
  recurringAccounts: {
    depreciation: 3.0,
    revenue: 3.0,
    opex: 5.0,
    interest_expense: 3.0,
    interest_income: 3.0,
  },
  quarterlyPatterns: {
    trade_receivables: { boundary: 'quarter_start', direction: 'increase', minChangePercent: 10.0 },
    unbilled_revenue: { boundary: 'quarter_end', direction: 'increase', minChangePercent: 10.0 },
    unearned_revenue: { boundary: 'quarter_start', direction: 'increase', minChangePercent: 10.0 },
  },
  categoryAggregation: {},
  correlationRules: DEFAULT_CORRELATION_RULES,
};

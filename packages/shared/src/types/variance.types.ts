import { AccountCategory, StatementType } from './statement.types';
import { QuarterBoundary, QuarterlyPattern } from './analysis-config.types';

export type ActivityChange = 'new' | 'ceased';

export interface VarianceComputation {
  currentValue: number;
  previousValue: number;
  absoluteChange: number;
  percentChange: number | null;
  activity: ActivityChange | null;
}

export interface VarianceResult extends VarianceComputation {
  accountCode: string;
  accountName: string;
  category: AccountCategory;
  statementType: StatementType;
  periodFrom: string;
  periodTo: string;
  isSignificant: boolean;
  isCritical: boolean;
  signChanged: boolean;
}

export interface RecurringDeviation {
  result: VarianceResult;
  tolerance: number;
}

export type QuarterPosition = QuarterBoundary | 'mid_quarter';

export type QuarterlyDeviationReason = 'missing_expected_change' | 'unexpected_change';

export interface QuarterlyDeviation {
  result: VarianceResult;
  pattern: QuarterlyPattern;
  position: QuarterPosition;
  reason: QuarterlyDeviationReason;
}

export interface VarianceStatistics {
  totalResults: number;
  significantVariances: number;
  significantPercentage: number;
  averageVariancePercent: number;
  medianVariancePercent: number;
  maxVariancePercent: number;
  minVariancePercent: number;
}

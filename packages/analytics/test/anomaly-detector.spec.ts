import { AnalysisConfig } from '@variance-review/shared/types/analysis-config.types';
import { StatementSnapshot } from '@variance-review/shared/types/statement.types';
import {
  AnomalyDetector,
  filterBySeverity,
  filterByType,
  groupAnomaliesByAccount,
} from '../src/anomaly/anomaly-detector';
import { classifySeverity, percentBands, priorityScore, SEVERITY_RANK } from '../src/anomaly/severity';
import { DEFAULT_ANALYSIS_CONFIG } from '../src/config/default-config';
import { CorrelationEngine } from '../src/correlation/correlation-engine';
import { VarianceAnalyzer } from '../src/variance/variance-analyzer';
import { buildSnapshot, catalog, configWith, NO_RULES_CONFIG } from './fixtures';

function detect(snapshot: StatementSnapshot, config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG) {
  const variance = new VarianceAnalyzer(config).analyze(snapshot);
  const { violations } = new CorrelationEngine(config, catalog).evaluate(variance);
  return new AnomalyDetector(config).detect({ variance, violations });
}

describe('Anomaly Detector', () => {
  const periods = ['Apr_2025', 'May_2025'];

  it('should report the property variance and the depreciation rule violation', () => {
    const summary = detect(
      buildSnapshot(periods, [
        { code: '217000001', values: [1000, 1253] },
        { code: '632100001', values: [100, 102] },
      ]),
    );

    expect(summary.anomalies).toHaveLength(2);
    const [variance, violation] = summary.anomalies;

    expect(variance).toMatchObject({
      id: 'variance:217000001:May_2025',
      type: 'variance',
      severity: 'critical',
      accountCode: '217000001',
      accountName: 'Investment Properties: Land Use Rights',
      period: 'May_2025',
      priorityScore: 4,
      description:
        'Investment Properties: Land Use Rights increased by 25.3% from 1,000.00 to 1,253.00 between Apr_2025 and May_2025',
      recommendedAction:
        'URGENT: investigate Investment Properties: Land Use Rights; verify data accuracy and the underlying business reasons',
    });
    expect(variance.metricValue).toBeCloseTo(25.3, 10);

    expect(violation).toMatchObject({
      id: 'correlation_violation:1:632100001:May_2025',
      type: 'correlation_violation',
      severity: 'high',
      accountCode: '632100001',
      category: 'depreciation',
      statementType: 'income_statement',
      ruleId: 1,
      description:
        'Rule 1 (Investment Properties vs Depreciation): investment properties moved +25.3% but depreciation moved +2.0%; expected about +25.3%',
    });
    expect(violation.metricValue).toBeCloseTo(23.3, 10);
    expect(violation.priorityScore).toBeCloseTo(1.398, 10);

    expect(summary).toMatchObject({
      totalAccountsAnalyzed: 2,
      accountsWithAnomalies: 2,
      totalAnomalies: 2,
      correlationViolations: 1,
      bySeverity: { critical: 1, high: 1, medium: 0, low: 0 },
      byType: { variance: 1, correlation_violation: 1, sign_change: 0, recurring_spike: 0, quarterly_pattern: 0 },
    });
  });

  describe('sign changes', () => {
    const snapshot = buildSnapshot(periods, [{ code: '217000001', values: [10, -5] }]);

    it('should rank the critical variance ahead of the high sign change', () => {
      const { anomalies } = detect(snapshot, NO_RULES_CONFIG);

      expect(anomalies.map(({ type, severity, priorityScore: score }) => ({ type, severity, score }))).toEqual([
        { type: 'variance', severity: 'critical', score: 4 },
        { type: 'sign_change', severity: 'high', score: 3 },
      ]);
      expect(anomalies[1].description).toBe(
        'Investment Properties: Land Use Rights changed from positive (10.00) to negative (-5.00) in May_2025',
      );
    });

    it('should stay high whatever the thresholds', () => {
      const config = configWith({
        varianceThreshold: 200,
        criticalThreshold: 300,
        criticalSeverityThreshold: 500,
        highSeverityThreshold: 400,
        mediumSeverityThreshold: 300,
        correlationRules: [],
      });

      const { anomalies } = detect(snapshot, config);

      expect(anomalies.map(({ type, severity }) => ({ type, severity }))).toEqual([
        { type: 'sign_change', severity: 'high' },
      ]);
    });
  });

  it('should report new activity without a percentage', () => {
    const { anomalies } = detect(buildSnapshot(periods, [{ code: '511100001', values: [0, 100] }]), NO_RULES_CONFIG);

    expect(anomalies).toHaveLength(1);
    expect(anomalies[0]).toMatchObject({
      type: 'sign_change',
      severity: 'high',
      metricValue: 100,
      priorityScore: 3,
      description: 'Rental Revenue went from zero to 100.00 in May_2025',
      details: { currentValue: 100, previousValue: 0, percentChange: null },
    });
  });

  it('should report ceased activity even when the drop is below the variance threshold', () => {
    const config = configWith({ varianceThreshold: 150, criticalThreshold: 150, correlationRules: [] });
    const { anomalies } = detect(buildSnapshot(periods, [{ code: '217000001', values: [500, 0] }]), config);

    expect(anomalies).toHaveLength(1);
    expect(anomalies[0]).toMatchObject({
      type: 'sign_change',
      severity: 'high',
      metricValue: 100,
      priorityScore: 3,
      description: 'Investment Properties: Land Use Rights went from 500.00 to zero in May_2025',
      details: { currentValue: 0, previousValue: 500, percentChange: -100 },
    });
  });

  it('should break ties on account code by code point', () => {
    const { anomalies } = detect(
      buildSnapshot(periods, [
        { code: 'a-100', values: [100, 150] },
        { code: 'B-100', values: [100, 150] },
      ]),
      NO_RULES_CONFIG,
    );

    expect(anomalies.map(({ accountCode, priorityScore: score }) => ({ accountCode, score }))).toEqual([
      { accountCode: 'B-100', score: 4 },
      { accountCode: 'a-100', score: 4 },
    ]);
  });

  it('should hold recurring deviations at medium or above', () => {
    const { anomalies } = detect(buildSnapshot(periods, [{ code: '632100001', values: [100, 104] }]), NO_RULES_CONFIG);

    expect(anomalies).toHaveLength(1);
    expect(anomalies[0]).toMatchObject({
      type: 'recurring_spike',
      severity: 'medium',
      metricValue: 4,
      priorityScore: 0.4,
      description:
        'Amortization Expense: Land Use Rights moved +4.0% in May_2025; recurring depreciation accounts are expected to stay within 3%',
      recommendedAction: 'Check for asset additions, disposals or changes in depreciation method',
      details: { threshold: 3 },
    });
  });

  it('should describe a missing quarterly spike', () => {
    const { anomalies } = detect(
      buildSnapshot(['Mar_2025', 'Apr_2025'], [{ code: '131100001', values: [100, 102] }]),
      NO_RULES_CONFIG,
    );

    expect(anomalies).toHaveLength(1);
    expect(anomalies[0]).toMatchObject({
      type: 'quarterly_pattern',
      severity: 'medium',
      description:
        'Trade Receivable: Tenant moved +2.0% at quarter start (Apr_2025); an increase of at least 10% is expected there',
      recommendedAction: 'Verify quarterly billing timing and collection patterns',
    });
  });

  it('should never lower severity as the change grows', () => {
    const ranks = [5, 7.5, 10, 15, 20, 60].map((percent) => {
      const { anomalies } = detect(
        buildSnapshot(periods, [{ code: '217000001', values: [100, 100 + percent] }]),
        NO_RULES_CONFIG,
      );
      return SEVERITY_RANK[anomalies[0].severity];
    });

    expect(ranks).toEqual([1, 1, 2, 2, 3, 3]);
    expect(ranks.every((rank, index) => index === 0 || rank >= ranks[index - 1])).toBe(true);
  });

  it('should break priority ties by account code', () => {
    const { anomalies } = detect(
      buildSnapshot(periods, [
        { code: '217000006', values: [100, 150] },
        { code: '217000001', values: [100, 150] },
      ]),
      NO_RULES_CONFIG,
    );

    expect(anomalies.map((anomaly) => anomaly.accountCode)).toEqual(['217000001', '217000006']);
  });

  it('should return an empty summary when nothing moves', () => {
    const summary = detect(
      buildSnapshot(['Apr_2025', 'May_2025', 'Jun_2025'], [
        { code: '217000001', values: [1000, 1000, 1000] },
        { code: '632100001', values: [100, 100, 100] },
      ]),
    );

    expect(summary).toEqual({
      totalAccountsAnalyzed: 2,
      accountsWithAnomalies: 0,
      totalAnomalies: 0,
      correlationViolations: 0,
      bySeverity: { critical: 0, high: 0, medium: 0, low: 0 },
      byType: { variance: 0, correlation_violation: 0, sign_change: 0, recurring_spike: 0, quarterly_pattern: 0 },
      anomalies: [],
    });
  });

  it('should produce identical output for identical input', () => {
    const snapshot = buildSnapshot(['Mar_2025', 'Apr_2025', 'May_2025'], [
      { code: '217000001', values: [1000, 1253, 1100] },
      { code: '632100001', values: [100, 102, 90] },
      { code: '131100001', values: [500, 505, 700] },
      { code: '511100001', values: [300, 0, 280] },
    ]);

    expect(JSON.stringify(detect(snapshot))).toBe(JSON.stringify(detect(snapshot)));
  });

  describe('helpers', () => {
    const { anomalies } = detect(buildSnapshot(periods, [{ code: '217000001', values: [10, -5] }]), NO_RULES_CONFIG);

    it('should group anomalies by account', () => {
      const groups = groupAnomaliesByAccount(anomalies);
      expect([...groups.keys()]).toEqual(['217000001']);
      expect(groups.get('217000001')?.map((anomaly) => anomaly.type)).toEqual(['variance', 'sign_change']);
    });

    it('should filter by minimum severity and by type', () => {
      expect(filterBySeverity(anomalies, 'critical').map((anomaly) => anomaly.type)).toEqual(['variance']);
      expect(filterBySeverity(anomalies, 'high')).toHaveLength(2);
      expect(filterByType(anomalies, 'sign_change')).toHaveLength(1);
    });
  });

  describe('severity', () => {
    const bands = percentBands(DEFAULT_ANALYSIS_CONFIG);

    it('should classify inclusively at each band', () => {
      expect([0, 4.9, 5, 9.9, 10, 19.9, 20, 150].map((value) => classifySeverity(value, bands))).toEqual([
        'low',
        'low',
        'medium',
        'medium',
        'high',
        'high',
        'critical',
        'critical',
      ]);
    });

    it('should cap the magnitude factor at one', () => {
      expect(priorityScore('critical', 40, 20)).toBe(4);
      expect(priorityScore('high', 10, 20)).toBe(1.5);
      expect(priorityScore('low', -5, 20)).toBe(0.25);
    });
  });
});

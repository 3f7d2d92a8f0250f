import { DEFAULT_ANALYSIS_CONFIG } from '../src/config/default-config';
import {
  computeVariance,
  detectQuarterlyPatternDeviation,
  detectRecurringDeviation,
  detectSignChange,
  VarianceAnalyzer,
} from '../src/variance/variance-analyzer';
import { summarizeVariances, topVariances } from '../src/metrics/variance-statistics';
import { buildSnapshot, catalog } from './fixtures';

describe('Variance Analyzer', () => {
  const analyzer = new VarianceAnalyzer(DEFAULT_ANALYSIS_CONFIG);
  const months = ['Apr_2025', 'May_2025', 'Jun_2025'];

  describe('computeVariance', () => {
    it('should compute percent change relative to the absolute previous value', () => {
      expect(computeVariance(110, 100)).toEqual({
        currentValue: 110,
        previousValue: 100,
        absoluteChange: 10,
        percentChange: 10,
        activity: null,
      });
      expect(computeVariance(-50, -100).percentChange).toBe(50);
      expect(computeVariance(-150, -100).percentChange).toBe(-50);
    });

    it('should report new activity instead of dividing by zero', () => {
      expect(computeVariance(500, 0)).toEqual({
        currentValue: 500,
        previousValue: 0,
        absoluteChange: 500,
        percentChange: null,
        activity: 'new',
      });
    });

    it('should treat two zero values as no change', () => {
      const result = computeVariance(0, 0);
      expect(result.percentChange).toBe(0);
      expect(result.activity).toBeNull();
    });

    it('should flag ceased activity', () => {
      const result = computeVariance(0, 200);
      expect(result.percentChange).toBe(-100);
      expect(result.activity).toBe('ceased');
    });
  });

  describe('detectSignChange', () => {
    it('should require both values to be non-zero with opposite signs', () => {
      expect(detectSignChange(-5, 10)).toBe(true);
      expect(detectSignChange(5, -10)).toBe(true);
      expect(detectSignChange(5, 10)).toBe(false);
      expect(detectSignChange(0, 10)).toBe(false);
      expect(detectSignChange(10, 0)).toBe(false);
    });
  });

  describe('analyze', () => {
    it('should produce one result per adjacent period pair', () => {
      const analysis = analyzer.analyze(buildSnapshot(months, [{ code: '217000001', values: [1000, 1253, 1253] }]));

      expect(analysis.periods).toEqual(months);
      expect(analysis.results).toHaveLength(2);

      const [first, second] = analysis.results;
      expect(first.accountName).toBe('Investment Properties: Land Use Rights');
      expect(first.category).toBe('investment_properties');
      expect(first.periodFrom).toBe('Apr_2025');
      expect(first.periodTo).toBe('May_2025');
      expect(first.absoluteChange).toBe(253);
      expect(first.percentChange).toBeCloseTo(25.3, 10);
      expect(first.isSignificant).toBe(true);
      expect(first.isCritical).toBe(true);

      expect(second.percentChange).toBe(0);
      expect(second.isSignificant).toBe(false);
      expect(analysis.warnings).toEqual([]);
    });

    it('should apply the significance and critical thresholds inclusively', () => {
      const analysis = analyzer.analyze(buildSnapshot(months, [{ code: '217000001', values: [100, 105, 115.5] }]));

      expect(analysis.results.map((result) => result.percentChange)).toEqual([5, 10]);
      expect(analysis.results.map((result) => result.isSignificant)).toEqual([true, true]);
      expect(analysis.results.map((result) => result.isCritical)).toEqual([false, true]);
    });

    it('should mark sign changes on the result', () => {
      const [result] = analyzer.analyze(buildSnapshot(months.slice(0, 2), [{ code: '217000001', values: [10, -5] }]))
        .results;

      expect(result.signChanged).toBe(true);
      expect(result.percentChange).toBe(-150);
    });

    it('should flag recurring accounts beyond their own tolerance', () => {
      const analysis = analyzer.analyze(
        buildSnapshot(months, [{ code: '632100001', values: [100, 104, 106] }]),
      );

      // 4% breaks the 3% depreciation tolerance; 1.9% does not
      expect(analysis.results[0].isSignificant).toBe(false);
      expect(analysis.recurringDeviations).toHaveLength(1);
      expect(analysis.recurringDeviations[0].tolerance).toBe(3);
      expect(analysis.recurringDeviations[0].result.periodTo).toBe('May_2025');
    });

    it('should flag a missing quarter-start spike and a spike off the boundary', () => {
      const analysis = analyzer.analyze(
        buildSnapshot(['Mar_2025', 'Apr_2025', 'May_2025'], [{ code: '131100001', values: [100, 102, 130] }]),
      );

      expect(
        analysis.quarterlyDeviations.map(({ result, position, reason }) => ({
          period: result.periodTo,
          position,
          reason,
        })),
      ).toEqual([
        { period: 'Apr_2025', position: 'quarter_start', reason: 'missing_expected_change' },
        { period: 'May_2025', position: 'mid_quarter', reason: 'unexpected_change' },
      ]);
    });

    it('should accept the expected quarterly cycle', () => {
      const analysis = analyzer.analyze(
        buildSnapshot(['Mar_2025', 'Apr_2025', 'May_2025'], [{ code: '131100001', values: [100, 115, 115] }]),
      );

      expect(analysis.quarterlyDeviations).toEqual([]);
    });

    it('should skip pairs touching a missing value and warn', () => {
      const analysis = analyzer.analyze(
        buildSnapshot([...months, 'Jul_2025'], [{ code: '217000001', values: [100, null, 120, 130] }]),
      );

      expect(analysis.results).toHaveLength(1);
      expect(analysis.results[0].periodFrom).toBe('Jun_2025');
      expect(analysis.warnings).toEqual([
        {
          code: 'period_gap',
          subject: '217000001:May_2025',
          message: 'Account 217000001 has no value for May_2025; comparisons touching it are skipped',
        },
      ]);
    });

    it('should report accounts with fewer than two values as insufficient history', () => {
      const analysis = analyzer.analyze(buildSnapshot(months, [{ code: '217000006', values: [null, 50, null] }]));

      expect(analysis.results).toEqual([]);
      expect(analysis.insufficientHistory).toEqual(['217000006']);
      expect(analysis.warnings.map((warning) => warning.code)).toEqual([
        'period_gap',
        'period_gap',
        'insufficient_history',
      ]);
    });

    it('should skip the quarterly check for labels without a month', () => {
      const analysis = analyzer.analyze(buildSnapshot(['P1', 'P2'], [{ code: '131100001', values: [100, 120] }]));

      expect(analysis.results).toHaveLength(1);
      expect(analysis.quarterlyDeviations).toEqual([]);
      expect(analysis.warnings).toEqual([
        {
          code: 'period_label_unparsed',
          subject: 'P2',
          message: 'Period P2 carries no month; quarterly pattern checks are skipped for it',
        },
      ]);
    });

    it('should normalize newest-first snapshots to chronological order', () => {
      const analysis = analyzer.analyze(
        buildSnapshot(['May_2025', 'Apr_2025'], [{ code: '217000001', values: [120, 100] }], 'newest_first'),
      );

      expect(analysis.periods).toEqual(['Apr_2025', 'May_2025']);
      expect(analysis.results[0].periodFrom).toBe('Apr_2025');
      expect(analysis.results[0].periodTo).toBe('May_2025');
      expect(analysis.results[0].percentChange).toBe(20);
    });
  });

  describe('deviation helpers', () => {
    const depreciation = catalog.resolveAccount('632100001', '', 'income_statement');
    const receivables = catalog.resolveAccount('131100001', '', 'balance_sheet');

    it('should only apply tolerances configured for the account category', () => {
      const [result] = analyzer.analyze(buildSnapshot(months.slice(0, 2), [{ code: '632100001', values: [100, 104] }]))
        .results;

      expect(detectRecurringDeviation(depreciation, result, { depreciation: 3 })).toBe(true);
      expect(detectRecurringDeviation(depreciation, result, { depreciation: 5 })).toBe(false);
      expect(detectRecurringDeviation(depreciation, result, {})).toBe(false);
    });

    it('should evaluate quarterly patterns by the position of the later period', () => {
      const [result] = analyzer.analyze(
        buildSnapshot(['Mar_2025', 'Apr_2025'], [{ code: '131100001', values: [100, 101] }]),
      ).results;

      expect(detectQuarterlyPatternDeviation(receivables, result, DEFAULT_ANALYSIS_CONFIG.quarterlyPatterns)).toBe(
        true,
      );
      expect(detectQuarterlyPatternDeviation(receivables, result, {})).toBe(false);
    });
  });

  describe('statistics', () => {
    const analysis = analyzer.analyze(
      buildSnapshot(months, [
        { code: '217000001', values: [100, 110, 99] },
        { code: '217000006', values: [50, 0, 0] },
      ]),
    );

    it('should summarize absolute percent changes', () => {
      expect(summarizeVariances(analysis.results)).toEqual({
        totalResults: 4,
        significantVariances: 3,
        significantPercentage: 75,
        averageVariancePercent: 30,
        medianVariancePercent: 10,
        maxVariancePercent: 100,
        minVariancePercent: 0,
      });
    });

    it('should return zeros for an empty result set', () => {
      expect(summarizeVariances([])).toEqual({
        totalResults: 0,
        significantVariances: 0,
        significantPercentage: 0,
        averageVariancePercent: 0,
        medianVariancePercent: 0,
        maxVariancePercent: 0,
        minVariancePercent: 0,
      });
    });

    it('should rank the largest movements first', () => {
      const byPercent = topVariances(analysis.results, 2);
      expect(byPercent.map((result) => `${result.accountCode}:${result.periodTo}`)).toEqual([
        '217000006:May_2025',
        '217000001:Jun_2025',
      ]);

      const byAmount = topVariances(analysis.results, 2, 'amount');
      expect(byAmount.map((result) => result.absoluteChange)).toEqual([-50, -11]);
    });
  });
});

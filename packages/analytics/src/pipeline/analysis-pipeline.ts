import { Logger } from '@nestjs/common';
import { AnalysisReport } from '@variance-review/shared/types/anomaly.types';
import { AnalysisConfig } from '@variance-review/shared/types/analysis-config.types';
import { StatementSnapshot } from '@variance-review/shared/types/statement.types';
import { ComputationWarning, ComputationWarningCode } from '@variance-review/shared/types/warning.types';
import { AnomalyDetector } from '../anomaly/anomaly-detector';
import { AccountCatalog, compareCodes } from '../catalog/account-catalog';
import { validateAnalysisConfig } from '../config/config-validator';
import { DEFAULT_ANALYSIS_CONFIG } from '../config/default-config';
import { CorrelationEngine } from '../correlation/correlation-engine';
import { summarizeVariances } from '../metrics/variance-statistics';
import { VarianceAnalyzer } from '../variance/variance-analyzer';
import { mergeWarnings } from './warnings';

export interface PipelineOptions {
  config?: AnalysisConfig;
  catalog?: AccountCatalog;
}

const WARNING_ORDER: ComputationWarningCode[] = [
  'empty_category',
  'insufficient_history',
  'period_gap',
  'period_label_unparsed',
];

function sortWarnings(warnings: ComputationWarning[]): ComputationWarning[] {
  return [...warnings].sort(
    (a, b) =>
      WARNING_ORDER.indexOf(a.code) - WARNING_ORDER.indexOf(b.code) ||
      a.subject.localeCompare(b.subject, 'en', { numeric: true }),
  );
}

/**
 * Analysis Pipeline
 * Catalog, variance analysis, correlation rules and anomaly detection over one snapshot.
 * Configuration is validated before any data is read.
 */
export class AnalysisPipeline {
  private readonly logger = new Logger(AnalysisPipeline.name);
  private readonly config: AnalysisConfig;
  private readonly catalog: AccountCatalog;

  constructor(options: PipelineOptions = {}) {
    this.config = validateAnalysisConfig(options.config ?? DEFAULT_ANALYSIS_CONFIG);
    this.catalog = options.catalog ?? new AccountCatalog();
  }

  run(snapshot: StatementSnapshot): AnalysisReport {
    const variance = new VarianceAnalyzer(this.config).analyze(snapshot);
    this.logger.debug(
      `Variance analysis: ${variance.results.length} results over ${variance.accounts.length} accounts`,
    );

    const correlation = new CorrelationEngine(this.config, this.catalog).evaluate(variance);
    this.logger.debug(
      `Correlation analysis: ${correlation.rulesEvaluated} rules evaluated, ${correlation.violations.length} violations`,
    );

    const summary = new AnomalyDetector(this.config).detect({ variance, violations: correlation.violations });
    const warnings = sortWarnings(mergeWarnings([variance.warnings, correlation.warnings]));

    for (const warning of warnings) {
      this.logger.warn(warning.message);
    }
    this.logger.log(
      `Anomaly detection completed: ${summary.totalAnomalies} anomalies across ${summary.accountsWithAnomalies} accounts`,
    );

    const periodIndex = new Map(variance.periods.map((period, index) => [period, index]));
    const variances = [...variance.results].sort(
      (a, b) =>
        compareCodes(a.accountCode, b.accountCode) ||
        (periodIndex.get(a.periodTo) ?? 0) - (periodIndex.get(b.periodTo) ?? 0),
    );

    return {
      periods: variance.periods,
      summary,
      violations: correlation.violations,
      variances,
      varianceStatistics: summarizeVariances(variance.results),
      warnings,
    };
  }
}

export function runAnomalyAnalysis(snapshot: StatementSnapshot, options: PipelineOptions = {}): AnalysisReport {
  return new AnalysisPipeline(options).run(snapshot);
}

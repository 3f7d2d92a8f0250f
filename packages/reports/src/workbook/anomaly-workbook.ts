import * as XLSX from 'xlsx';
import { ANOMALY_SEVERITIES, ANOMALY_TYPES, AnalysisReport } from '@variance-review/shared/types/anomaly.types';

export const WORKBOOK_SHEETS = ['Summary', 'Anomalies', 'Variances', 'Correlation Violations', 'Warnings'] as const;

function round(value: number | null | undefined): number | string {
  return value === null || value === undefined ? '' : Math.round(value * 100) / 100;
}

function flag(value: boolean): string {
  return value ? 'Yes' : 'No';
}

function summaryRows(report: AnalysisReport): (string | number)[][] {
  const { summary, varianceStatistics } = report;
  return [
    ['Metric', 'Value'],
    ['Periods', report.periods.join(', ')],
    ['Accounts analyzed', summary.totalAccountsAnalyzed],
    ['Accounts with anomalies', summary.accountsWithAnomalies],
    ['Total anomalies', summary.totalAnomalies],
    ['Correlation violations', summary.correlationViolations],
    ...ANOMALY_SEVERITIES.map((severity) => [`Severity: ${severity}`, summary.bySeverity[severity]]),
    ...ANOMALY_TYPES.map((type) => [`Type: ${type}`, summary.byType[type]]),
    ['Variance results', varianceStatistics.totalResults],
    ['Significant variances', varianceStatistics.significantVariances],
    ['Average variance %', round(varianceStatistics.averageVariancePercent)],
    ['Median variance %', round(varianceStatistics.medianVariancePercent)],
    ['Warnings', report.warnings.length],
  ];
}

/**
 * Render an analysis report as an xlsx workbook
 */
export function buildAnomalyWorkbook(report: AnalysisReport): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();

  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(summaryRows(report)), 'Summary');

  const anomalies = report.summary.anomalies.map((anomaly, index) => ({
    Rank: index + 1,
    Severity: anomaly.severity,
    Type: anomaly.type,
    'Account Code': anomaly.accountCode,
    'Account Name': anomaly.accountName,
    Category: anomaly.category,
    Statement: anomaly.statementType,
    Period: anomaly.period,
    Metric: round(anomaly.metricValue),
    Priority: round(anomaly.priorityScore),
    Rule: anomaly.ruleId ?? '',
    Description: anomaly.description,
    'Recommended Action': anomaly.recommendedAction,
  }));
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(anomalies), 'Anomalies');

  const variances = report.variances.map((result) => ({
    'Account Code': result.accountCode,
    'Account Name': result.accountName,
    Category: result.category,
    Statement: result.statementType,
    From: result.periodFrom,
    To: result.periodTo,
    Previous: round(result.previousValue),
    Current: round(result.currentValue),
    'Absolute Change': round(result.absoluteChange),
    'Change %': round(result.percentChange),
    Significant: flag(result.isSignificant),
    Critical: flag(result.isCritical),
    'Sign Changed': flag(result.signChanged),
    Activity: result.activity ?? '',
  }));
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(variances), 'Variances');

  const violations = report.violations.map((violation) => ({
    'Rule ID': violation.ruleId,
    Rule: violation.ruleName,
    'Rule Description': violation.ruleDescription,
    Relationship: violation.relationshipType,
    From: violation.periodFrom,
    To: violation.periodTo,
    'Primary Category': violation.primaryCategory,
    'Correlated Category': violation.correlatedCategory,
    'Primary Change %': round(violation.primaryChangePercent),
    'Correlated Change %': round(violation.correlatedChangePercent),
    'Expected Change %': round(violation.expectedChangePercent),
    'Deviation Score': round(violation.deviationScore),
    Description: violation.description,
  }));
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(violations), 'Correlation Violations');

  const warnings = report.warnings.map((warning) => ({
    Code: warning.code,
    Subject: warning.subject,
    Message: warning.message,
  }));
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(warnings), 'Warnings');

  return workbook;
}

export function renderAnomalyWorkbook(report: AnalysisReport): Buffer {
  const output: Buffer = XLSX.write(buildAnomalyWorkbook(report), { type: 'buffer', bookType: 'xlsx' });
  return output;
}

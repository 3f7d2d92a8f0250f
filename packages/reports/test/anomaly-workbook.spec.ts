import { Logger } from '@nestjs/common';
import * as XLSX from 'xlsx';
import { runAnomalyAnalysis } from '@variance-review/analytics/pipeline/analysis-pipeline';
import { buildSnapshotFromCsv } from '../src/parsers/statement-csv-parser';
import { buildAnomalyWorkbook, renderAnomalyWorkbook, WORKBOOK_SHEETS } from '../src/workbook/anomaly-workbook';

describe('Anomaly workbook', () => {
  Logger.overrideLogger(false);

  const report = runAnomalyAnalysis(
    buildSnapshotFromCsv(
      ['account_code,account_name,Apr_2025,May_2025', '217000001,,1000,1253'].join('\n'),
      ['account_code,account_name,Apr_2025,May_2025', '632100001,,100,102'].join('\n'),
    ),
  );

  it('should lay out one sheet per section', () => {
    expect(buildAnomalyWorkbook(report).SheetNames).toEqual([...WORKBOOK_SHEETS]);
  });

  it('should list ranked anomalies', () => {
    const workbook = buildAnomalyWorkbook(report);
    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets['Anomalies']);

    expect(rows).toHaveLength(2);
    expect(rows[0]).toMatchObject({
      Rank: 1,
      Severity: 'critical',
      Type: 'variance',
      'Account Code': '217000001',
      Period: 'May_2025',
      Metric: 25.3,
      Priority: 4,
    });
    expect(rows[1]).toMatchObject({ Rank: 2, Type: 'correlation_violation', Rule: 1, Metric: 23.3 });
  });

  it('should list every account and period pair', () => {
    const workbook = buildAnomalyWorkbook(report);
    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets['Variances']);

    expect(rows).toHaveLength(2);
    expect(rows[0]).toMatchObject({
      'Account Code': '217000001',
      'Account Name': 'Investment Properties: Land Use Rights',
      Category: 'investment_properties',
      Statement: 'balance_sheet',
      From: 'Apr_2025',
      To: 'May_2025',
      Previous: 1000,
      Current: 1253,
      'Absolute Change': 253,
      'Change %': 25.3,
      Significant: 'Yes',
      Critical: 'Yes',
      'Sign Changed': 'No',
    });
    expect(rows[1]).toMatchObject({
      'Account Code': '632100001',
      Statement: 'income_statement',
      Previous: 100,
      Current: 102,
      'Absolute Change': 2,
      'Change %': 2,
      Significant: 'No',
      Critical: 'No',
      'Sign Changed': 'No',
    });
  });

  it('should show the rule description beside each violation', () => {
    const workbook = buildAnomalyWorkbook(report);
    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets['Correlation Violations']);

    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      'Rule ID': 1,
      Rule: 'Investment Properties vs Depreciation',
      'Rule Description': 'Depreciation should follow changes in the investment property base',
    });
  });

  it('should summarize counts', () => {
    const workbook = buildAnomalyWorkbook(report);
    const rows = XLSX.utils.sheet_to_json<(string | number)[]>(workbook.Sheets['Summary'], { header: 1 });

    expect(rows[0]).toEqual(['Metric', 'Value']);
    expect(rows[1]).toEqual(['Periods', 'Apr_2025, May_2025']);
    expect(rows[2]).toEqual(['Accounts analyzed', 2]);
    expect(rows[4]).toEqual(['Total anomalies', 2]);
  });

  it('should render an xlsx buffer', () => {
    const buffer = renderAnomalyWorkbook(report);
    const workbook = XLSX.read(buffer, { type: 'buffer' });

    expect(workbook.SheetNames).toEqual([...WORKBOOK_SHEETS]);
    expect(XLSX.utils.sheet_to_json(workbook.Sheets['Warnings'])).toHaveLength(12);
  });
});

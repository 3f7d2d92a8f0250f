import { Injectable, Logger } from '@nestjs/common';
import { AnalysisReport } from '@variance-review/shared/types/anomaly.types';
import { CorrelationRule } from '@variance-review/shared/types/analysis-config.types';
import { StatementSnapshot, StatementType } from '@variance-review/shared/types/statement.types';
import { AccountCatalog, CatalogEntry } from '@variance-review/analytics/catalog/account-catalog';
import { AnalysisPipeline } from '@variance-review/analytics/pipeline/analysis-pipeline';
import { buildSnapshotFromCsv } from '@variance-review/reports/parsers/statement-csv-parser';
import { renderAnomalyWorkbook } from '@variance-review/reports/workbook/anomaly-workbook';
import { AnalysisConfigService } from './analysis-config.service';
import { AccountSeriesDto, AnalyzeSnapshotDto } from './dto/analyze-snapshot.dto';
import { AnalyzeCsvDto } from './dto/analyze-csv.dto';
import { AnalysisConfigOverridesDto } from './dto/config-overrides.dto';

/**
 * Analysis service
 */
@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(
    private readonly analysisConfig: AnalysisConfigService,
    private readonly catalog: AccountCatalog,
  ) {}

  /**
   * Run the anomaly analysis on a JSON snapshot
   */
  analyzeSnapshot(dto: AnalyzeSnapshotDto): AnalysisReport {
    const snapshot: StatementSnapshot = {
      periods: dto.periods,
      periodOrder: dto.periodOrder,
      statements: {
        balance_sheet: this.toSeries(dto.statements.balance_sheet, 'balance_sheet'),
        income_statement: this.toSeries(dto.statements.income_statement, 'income_statement'),
      },
    };
    return this.run(snapshot, dto.config);
  }

  /**
   * Run the anomaly analysis on the two statement CSV exports
   */
  analyzeCsv(dto: AnalyzeCsvDto): AnalysisReport {
    const snapshot = buildSnapshotFromCsv(dto.balanceSheetCsv, dto.incomeStatementCsv, this.catalog, dto.periodOrder);
    return this.run(snapshot, dto.config);
  }

  /**
   * Analyse CSV exports and render the xlsx workbook
   */
  renderReport(dto: AnalyzeCsvDto): Buffer {
    return renderAnomalyWorkbook(this.analyzeCsv(dto));
  }

  listRules(): CorrelationRule[] {
    return this.analysisConfig.config.correlationRules;
  }

  listCatalog(): CatalogEntry[] {
    return this.catalog.listEntries();
  }

  private run(snapshot: StatementSnapshot, overrides?: AnalysisConfigOverridesDto): AnalysisReport {
    const config = this.analysisConfig.resolve(overrides ? { ...overrides } : undefined);
    this.logger.log(`Analysing ${snapshot.periods.length} periods`);
    return new AnalysisPipeline({ config, catalog: this.catalog }).run(snapshot);
  }

  private toSeries(accounts: AccountSeriesDto[], statementType: StatementType) {
    return accounts.map((entry) => ({
      account: this.catalog.resolveAccount(entry.code, entry.name ?? '', statementType),
      series: entry.series.map((point) => ({ period: point.period, value: point.value })),
    }));
  }
}

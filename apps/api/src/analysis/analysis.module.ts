import { Module } from '@nestjs/common';
import { AccountCatalog } from '@variance-review/analytics/catalog/account-catalog';
import { AnalysisController } from './analysis.controller';
import { AnalysisService } from './analysis.service';
import { AnalysisConfigService } from './analysis-config.service';

@Module({
  controllers: [AnalysisController],
  providers: [AnalysisService, AnalysisConfigService, { provide: AccountCatalog, useValue: new AccountCatalog() }],
  exports: [AnalysisConfigService],
})
export class AnalysisModule {}

import { IsIn, IsNotEmpty, IsOptional, IsString, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { PeriodOrder } from '@variance-review/shared/types/statement.types';
import { AnalysisConfigOverridesDto } from './config-overrides.dto';
import { PERIOD_ORDERS } from './analyze-snapshot.dto';

/**
 * DTO for analysing the two statement CSV exports
 */
export class AnalyzeCsvDto {
  @IsString()
  @IsNotEmpty()
  balanceSheetCsv!: string;

  @IsString()
  @IsNotEmpty()
  incomeStatementCsv!: string;

  @IsIn(PERIOD_ORDERS)
  @IsOptional()
  periodOrder?: PeriodOrder;

  @ValidateNested()
  @Type(() => AnalysisConfigOverridesDto)
  @IsOptional()
  config?: AnalysisConfigOverridesDto;
}

import {
  IsArray,
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { PeriodOrder } from '@variance-review/shared/types/statement.types';
import { AnalysisConfigOverridesDto } from './config-overrides.dto';

export const PERIOD_ORDERS: PeriodOrder[] = ['chronological', 'newest_first'];

/**
 * DTO for one period value; null marks an explicitly missing value
 */
export class PeriodValueDto {
  @IsString()
  @IsNotEmpty()
  period!: string;

  @ValidateIf((point: PeriodValueDto) => point.value !== null)
  @IsNumber()
  value!: number | null;
}

export class AccountSeriesDto {
  @IsString()
  @IsNotEmpty()
  code!: string;

  @IsString()
  @IsOptional()
  name?: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PeriodValueDto)
  series!: PeriodValueDto[];
}

export class StatementsDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => AccountSeriesDto)
  balance_sheet!: AccountSeriesDto[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => AccountSeriesDto)
  income_statement!: AccountSeriesDto[];
}

/**
 * DTO for analysing a statement snapshot
 */
export class AnalyzeSnapshotDto {
  @IsArray()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  periods!: string[];

  @IsIn(PERIOD_ORDERS)
  @IsOptional()
  periodOrder?: PeriodOrder;

  @ValidateNested()
  @Type(() => StatementsDto)
  statements!: StatementsDto;

  @ValidateNested()
  @Type(() => AnalysisConfigOverridesDto)
  @IsOptional()
  config?: AnalysisConfigOverridesDto;
}

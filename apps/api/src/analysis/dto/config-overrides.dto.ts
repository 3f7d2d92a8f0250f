import { IsArray, IsInt, IsNumber, IsObject, IsOptional } from 'class-validator';

/**
 * Per-request configuration overrides.
 * Only the shape is checked here; values are validated when merged into the base configuration.
 */
export class AnalysisConfigOverridesDto {
  @IsNumber()
  @IsOptional()
  varianceThreshold?: number;

  @IsNumber()
  @IsOptional()
  criticalThreshold?: number;

  @IsNumber()
  @IsOptional()
  criticalSeverityThreshold?: number;

  @IsNumber()
  @IsOptional()
  highSeverityThreshold?: number;

  @IsNumber()
  @IsOptional()
  mediumSeverityThreshold?: number;

  @IsObject()
  @IsOptional()
  correlationSeverityBands?: Record<string, unknown>;

  @IsNumber()
  @IsOptional()
  minComovementRatio?: number;

  @IsObject()
  @IsOptional()
  recurringAccounts?: Record<string, unknown>;

  @IsObject()
  @IsOptional()
  quarterlyPatterns?: Record<string, unknown>;

  @IsObject()
  @IsOptional()
  categoryAggregation?: Record<string, unknown>;

  @IsArray()
  @IsObject({ each: true })
  @IsOptional()
  correlationRules?: Record<string, unknown>[];

  @IsArray()
  @IsInt({ each: true })
  @IsOptional()
  disabledRuleIds?: number[];
}

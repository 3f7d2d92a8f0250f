import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { envValidationSchema } from './config/env.validation';
import { AnalysisExceptionFilter } from './common/filters/analysis-exception.filter';
import { AnalysisModule } from './analysis/analysis.module';
import { HealthModule } from './health/health.module';

/**
 * Root application module
 */
@Module({
  imports: [
    // Global configuration
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validationSchema: envValidationSchema,
    }),

    // Analysis
    AnalysisModule,

    // Health
    HealthModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: AnalysisExceptionFilter }],
})
export class AppModule {}

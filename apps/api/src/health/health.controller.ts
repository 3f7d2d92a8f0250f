import { Controller, Get } from '@nestjs/common';
import { AnalysisConfigService } from '../analysis/analysis-config.service';

/**
 * Health check controller
 */
@Controller('health')
export class HealthController {
  constructor(private readonly analysisConfig: AnalysisConfigService) {}

  @Get()
  check() {
    const { config } = this.analysisConfig;

    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      thresholds: {
        varianceThreshold: config.varianceThreshold,
        criticalThreshold: config.criticalThreshold,
        criticalSeverityThreshold: config.criticalSeverityThreshold,
        highSeverityThreshold: config.highSeverityThreshold,
        mediumSeverityThreshold: config.mediumSeverityThreshold,
        minComovementRatio: config.minComovementRatio,
      },
      enabledRules: config.correlationRules.filter((rule) => rule.enabled).length,
    };
  }
}

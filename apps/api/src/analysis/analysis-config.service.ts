import { readFileSync } from 'fs';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AnalysisConfig } from '@variance-review/shared/types/analysis-config.types';
import { mergeAnalysisConfig } from '@variance-review/analytics/config/config-validator';
import { DEFAULT_ANALYSIS_CONFIG } from '@variance-review/analytics/config/default-config';
import { ConfigurationError } from '@variance-review/analytics/errors/analysis-errors';

const THRESHOLD_VARIABLES = {
  varianceThreshold: 'VARIANCE_THRESHOLD',
  criticalThreshold: 'CRITICAL_THRESHOLD',
  criticalSeverityThreshold: 'CRITICAL_SEVERITY_THRESHOLD',
  highSeverityThreshold: 'HIGH_SEVERITY_THRESHOLD',
  mediumSeverityThreshold: 'MEDIUM_SEVERITY_THRESHOLD',
  minComovementRatio: 'MIN_COMOVEMENT_RATIO',
} as const;

/**
 * Analysis configuration service
 * Resolves the base configuration once at startup: defaults, then the overrides file, then environment
 */
@Injectable()
export class AnalysisConfigService {
  private readonly logger = new Logger(AnalysisConfigService.name);
  readonly config: AnalysisConfig;

  constructor(private readonly configService: ConfigService) {
    const fromFile = mergeAnalysisConfig(DEFAULT_ANALYSIS_CONFIG, this.readOverridesFile());
    this.config = mergeAnalysisConfig(fromFile, this.environmentOverrides());
    this.logger.log(
      `Variance threshold ${this.config.varianceThreshold}%, ` +
        `${this.config.correlationRules.filter((rule) => rule.enabled).length} correlation rules enabled`,
    );
  }

  /**
   * Base configuration with per-request overrides layered on top
   */
  resolve(overrides?: unknown): AnalysisConfig {
    return overrides === undefined ? this.config : mergeAnalysisConfig(this.config, overrides);
  }

  private environmentOverrides(): Record<string, number> {
    const overrides: Record<string, number> = {};
    for (const [key, variable] of Object.entries(THRESHOLD_VARIABLES)) {
      const raw = this.configService.get<string | number>(variable);
      if (raw !== undefined && raw !== '') {
        overrides[key] = Number(raw);
      }
    }
    return overrides;
  }

  private readOverridesFile(): unknown {
    const path = this.configService.get<string>('ANALYSIS_CONFIG_PATH');
    if (!path) {
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
      this.logger.log(`Loaded analysis configuration overrides from ${path}`);
      return parsed;
    } catch (error) {
      throw new ConfigurationError(`Could not read analysis configuration file ${path}`, [
        error instanceof Error ? error.message : String(error),
      ]);
    }
  }
}

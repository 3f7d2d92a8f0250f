import { AnomalySeverity } from '@variance-review/shared/types/anomaly.types';
import { AnalysisConfig, SeverityBands } from '@variance-review/shared/types/analysis-config.types';

export const SEVERITY_RANK: Record<AnomalySeverity, number> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3,
};

export const SEVERITY_WEIGHT: Record<AnomalySeverity, number> = {
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

export function percentBands(config: AnalysisConfig): SeverityBands {
  return {
    critical: config.criticalSeverityThreshold,
    high: config.highSeverityThreshold,
    medium: config.mediumSeverityThreshold,
  };
}

/**
 * Map a non-negative magnitude onto severity bands, inclusive at each lower bound
 */
export function classifySeverity(magnitude: number, bands: SeverityBands): AnomalySeverity {
  if (magnitude >= bands.critical) return 'critical';
  if (magnitude >= bands.high) return 'high';
  if (magnitude >= bands.medium) return 'medium';
  return 'low';
}

export function atLeast(severity: AnomalySeverity, floor: AnomalySeverity): AnomalySeverity {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[floor] ? severity : floor;
}

/**
 * Severity weight scaled by how far the magnitude reaches toward the critical band
 */
export function priorityScore(severity: AnomalySeverity, magnitude: number, scale: number): number {
  const factor = scale > 0 ? Math.min(Math.abs(magnitude) / scale, 1) : 1;
  return SEVERITY_WEIGHT[severity] * factor;
}

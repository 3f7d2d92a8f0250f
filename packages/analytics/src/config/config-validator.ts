import * as Joi from 'joi';
import { ACCOUNT_CATEGORIES } from '@variance-review/shared/types/statement.types';
import {
  AnalysisConfig,
  AnalysisConfigOverrides,
  SeverityBands,
} from '@variance-review/shared/types/analysis-config.types';
import { ConfigurationError } from '../errors/analysis-errors';

const categorySchema = Joi.string().valid(...ACCOUNT_CATEGORIES);

// Rules must point at a real category; uncategorized is a catch-all, not a relationship side
const ruleCategorySchema = Joi.string().valid(
  ...ACCOUNT_CATEGORIES.filter((category) => category !== 'uncategorized'),
);

const timingSchema = Joi.object({
  boundary: Joi.string().valid('quarter_start', 'quarter_end').required(),
  direction: Joi.string().valid('increase', 'decrease').required(),
});

const quarterlyPatternSchema = timingSchema.keys({
  minChangePercent: Joi.number().positive().required(),
});

const correlationRuleSchema = Joi.object({
  id: Joi.number().integer().positive().required(),
  name: Joi.string().min(1).required(),
  primaryCategory: ruleCategorySchema.required(),
  correlatedCategory: ruleCategorySchema.required(),
  relationshipType: Joi.string().valid('positive', 'negative', 'quarterly_timing', 'conditional').required(),
  enabled: Joi.boolean().default(true),
  description: Joi.string().allow(''),
  timing: timingSchema.when('relationshipType', {
    is: 'quarterly_timing',
    then: Joi.required(),
    otherwise: Joi.optional(),
  }),
});

const severityBandsSchema = Joi.object({
  critical: Joi.number().positive().required(),
  high: Joi.number().positive().required(),
  medium: Joi.number().positive().required(),
});

/**
 * Analysis configuration validation schema
 */
export const analysisConfigSchema = Joi.object<AnalysisConfig>({
  varianceThreshold: Joi.number().positive().required(),
  criticalThreshold: Joi.number().positive().required(),
  criticalSeverityThreshold: Joi.number().positive().required(),
  highSeverityThreshold: Joi.number().positive().required(),
  mediumSeverityThreshold: Joi.number().positive().required(),
  correlationSeverityBands: severityBandsSchema.required(),
  minComovementRatio: Joi.number().greater(0).required(),
  recurringAccounts: Joi.object().pattern(categorySchema, Joi.number().positive()).required(),
  quarterlyPatterns: Joi.object().pattern(categorySchema, quarterlyPatternSchema).required(),
  categoryAggregation: Joi.object().pattern(categorySchema, Joi.string().valid('sum', 'mean')).required(),
  correlationRules: Joi.array().items(correlationRuleSchema).unique('id').required(),
});

/**
 * Shape check for caller-supplied overrides; values are checked again after merging
 */
export const analysisConfigOverridesSchema = Joi.object<AnalysisConfigOverrides>({
  varianceThreshold: Joi.number(),
  criticalThreshold: Joi.number(),
  criticalSeverityThreshold: Joi.number(),
  highSeverityThreshold: Joi.number(),
  mediumSeverityThreshold: Joi.number(),
  correlationSeverityBands: Joi.object({
    critical: Joi.number(),
    high: Joi.number(),
    medium: Joi.number(),
  }),
  minComovementRatio: Joi.number(),
  recurringAccounts: Joi.object().unknown(true),
  quarterlyPatterns: Joi.object().unknown(true),
  categoryAggregation: Joi.object().unknown(true),
  correlationRules: Joi.array().items(Joi.object().unknown(true)),
  disabledRuleIds: Joi.array().items(Joi.number().integer()),
});

function withoutUndefined(source: object = {}): Record<string, unknown> {
  return Object.fromEntries(Object.entries(source).filter(([, value]) => value !== undefined));
}

function checkBands(label: string, bands: SeverityBands): string[] {
  if (bands.critical > bands.high && bands.high > bands.medium) {
    return [];
  }
  return [
    `${label} must decrease strictly: critical ${bands.critical} > high ${bands.high} > medium ${bands.medium}`,
  ];
}

function checkConsistency(config: AnalysisConfig): string[] {
  const problems: string[] = [];

  if (config.criticalThreshold < config.varianceThreshold) {
    problems.push(
      `criticalThreshold (${config.criticalThreshold}) must not be lower than varianceThreshold (${config.varianceThreshold})`,
    );
  }

  problems.push(
    ...checkBands('severity thresholds', {
      critical: config.criticalSeverityThreshold,
      high: config.highSeverityThreshold,
      medium: config.mediumSeverityThreshold,
    }),
  );
  problems.push(...checkBands('correlationSeverityBands', config.correlationSeverityBands));

  return problems;
}

/**
 * Validate a complete configuration, failing the run before analysis starts
 */
export function validateAnalysisConfig(input: unknown): AnalysisConfig {
  const result = analysisConfigSchema.validate(input, { abortEarly: false });
  if (result.error) {
    throw new ConfigurationError(
      'Invalid analysis configuration',
      result.error.details.map((detail) => detail.message),
    );
  }

  const config = result.value;
  const problems = checkConsistency(config);
  if (problems.length > 0) {
    throw new ConfigurationError('Inconsistent analysis configuration', problems);
  }

  return config;
}

/**
 * Layer overrides on top of a base configuration and validate the result.
 * Category maps merge key by key; a supplied rule list replaces the base list.
 */
export function mergeAnalysisConfig(base: AnalysisConfig, overrides: unknown): AnalysisConfig {
  const parsed = analysisConfigOverridesSchema.validate(overrides ?? {}, { abortEarly: false });
  if (parsed.error) {
    throw new ConfigurationError(
      'Invalid analysis configuration overrides',
      parsed.error.details.map((detail) => detail.message),
    );
  }

  const {
    correlationSeverityBands,
    recurringAccounts,
    quarterlyPatterns,
    categoryAggregation,
    correlationRules,
    disabledRuleIds = [],
    ...thresholds
  } = parsed.value;

  const rules: Record<string, unknown>[] =
    correlationRules ?? base.correlationRules.map((rule) => ({ ...rule }));

  const candidate: Record<string, unknown> = {
    ...base,
    ...withoutUndefined(thresholds),
    correlationSeverityBands: { ...base.correlationSeverityBands, ...withoutUndefined(correlationSeverityBands) },
    recurringAccounts: { ...base.recurringAccounts, ...withoutUndefined(recurringAccounts) },
    quarterlyPatterns: { ...base.quarterlyPatterns, ...withoutUndefined(quarterlyPatterns) },
    categoryAggregation: { ...base.categoryAggregation, ...withoutUndefined(categoryAggregation) },
    correlationRules: rules.map((rule) =>
      typeof rule.id === 'number' && disabledRuleIds.includes(rule.id) ? { ...rule, enabled: false } : rule,
    ),
  };

  return validateAnalysisConfig(candidate);
}

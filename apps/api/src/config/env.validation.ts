import * as Joi from 'joi';

/**
 * Environment variable validation schema
 */
export const envValidationSchema = Joi.object({
  // Node
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  PORT: Joi.number().port().default(3000),

  // CORS
  CORS_ORIGIN: Joi.string().default('*'),

  // Analysis thresholds; unset values keep the engine defaults
  VARIANCE_THRESHOLD: Joi.number().positive(),
  CRITICAL_THRESHOLD: Joi.number().positive(),
  CRITICAL_SEVERITY_THRESHOLD: Joi.number().positive(),
  HIGH_SEVERITY_THRESHOLD: Joi.number().positive(),
  MEDIUM_SEVERITY_THRESHOLD: Joi.number().positive(),
  MIN_COMOVEMENT_RATIO: Joi.number().positive(),

  // JSON file with analysis configuration overrides
  ANALYSIS_CONFIG_PATH: Joi.string(),

  // Optional
  LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'debug', 'verbose').default('info'),
});


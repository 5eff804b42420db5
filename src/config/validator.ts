import Joi from 'joi';
import { ConfigValidationResult, RawRunConfig } from './types';

const relativePath = (label: string) =>
  Joi.string()
    .trim()
    .min(1)
    .messages({
      'string.empty': `${label} must not be empty`,
      'string.base': `${label} must be a string`
    });

const seconds = (label: string) =>
  Joi.number()
    .integer()
    .min(1)
    .messages({
      'number.base': `${label} must be a number of seconds`,
      'number.integer': `${label} must be a whole number of seconds`,
      'number.min': `${label} must be at least 1 second`
    });

const healthCheckSchema = Joi.object({
  timeout: seconds('Health check timeout').required(),
  interval: seconds('Health check interval')
    .max(Joi.ref('timeout'))
    .required()
    .messages({
      'number.max': 'Health check interval must not exceed the health check timeout'
    })
});

const auditSchema = Joi.object({
  file: relativePath('Audit file').required(),
  image: Joi.string()
    .pattern(/^[a-z0-9][a-z0-9._\/-]*(:[A-Za-z0-9._-]+)?$/)
    .required()
    .messages({
      'string.pattern.base': 'Audit image must be a repository reference such as nginx:alpine'
    })
});

const runConfigSchema = Joi.object<RawRunConfig>({
  compose_file: relativePath('Compose file').required(),
  manifest_dir: relativePath('Manifest directory').required(),
  log_file: relativePath('Log file').required(),
  audit: auditSchema.required(),
  base_url: Joi.string()
    .uri({ scheme: ['http', 'https'] })
    .required()
    .messages({
      'string.uri': 'Base URL must be an http or https URL',
      'string.uriCustomScheme': 'Base URL must be an http or https URL'
    }),
  health_check: healthCheckSchema.required(),
  readiness_timeout: seconds('Readiness timeout').required(),
  settle_delay: Joi.number()
    .integer()
    .min(0)
    .required()
    .messages({
      'number.min': 'Settle delay must not be negative'
    }),
  required_ports: Joi.array()
    .items(Joi.number().integer().min(1).max(65535))
    .unique()
    .required()
    .messages({
      'number.min': 'Ports must be between 1 and 65535',
      'number.max': 'Ports must be between 1 and 65535',
      'array.unique': 'Required ports must not repeat'
    })
}).unknown(false);

/**
 * Validates merged run configuration tunables against the schema
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = runConfigSchema.validate(config, { abortEarly: false });

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return { valid: true, errors: [] };
}

/**
 * Validates the tunables and returns them with string values converted
 * (environment overrides arrive as strings).
 * @throws Error listing every validation failure
 */
export function validateAndNormalizeConfig(config: unknown): RawRunConfig {
  const { error, value } = runConfigSchema.validate(config, { abortEarly: false });

  if (error) {
    const errors = error.details.map(detail => detail.message);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return value;
}

export function getConfigSchema(): Joi.ObjectSchema<RawRunConfig> {
  return runConfigSchema;
}

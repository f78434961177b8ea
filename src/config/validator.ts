import Joi from 'joi';
import type { BootstrapConfig } from '../types';
import { InvalidConfigError } from '../errors';
import type { ConfigValidationResult } from './types';

const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

const dnsLabel = () =>
  Joi.string()
    .pattern(DNS_LABEL)
    .max(63)
    .messages({
      'string.pattern.base': '{{#label}} must be a lowercase DNS label (letters, digits and hyphens)',
      'string.max': '{{#label}} must be no more than 63 characters long'
    });

const namingSchema = Joi.object({
  prefix: Joi.string()
    .pattern(/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/)
    .max(20)
    .optional()
    .messages({
      'string.pattern.base': 'Naming prefix must be lowercase alphanumeric with hyphens',
      'string.max': 'Naming prefix must be no more than 20 characters long'
    }),
  platformNamespace: dnsLabel().optional(),
  registryNamespace: dnsLabel().optional(),
  buildkitNamespace: dnsLabel().optional(),
  annotationPrefix: Joi.string()
    .domain({ tlds: false })
    .optional()
    .messages({
      'string.domain': 'Annotation prefix must be a DNS subdomain (e.g. bootstrap.example.io)'
    })
}).default();

const pollingSchema = Joi.object({
  intervalMs: Joi.number().integer().min(100).default(5_000).messages({
    'number.min': 'Polling interval must be at least 100ms'
  }),
  timeoutMs: Joi.number().integer().min(1_000).default(300_000).messages({
    'number.min': 'Polling timeout must be at least 1000ms'
  }),
  backoffFactor: Joi.number().min(1).max(10).default(1).messages({
    'number.min': 'Backoff factor must be at least 1 (1 disables backoff)'
  }),
  maxIntervalMs: Joi.number().integer().min(100).default(60_000)
}).default();

const componentsSchema = Joi.object({
  storage: Joi.boolean().default(true),
  acmeDns: Joi.boolean().default(true),
  ingress: Joi.boolean().default(true),
  registry: Joi.boolean().default(true),
  buildkit: Joi.boolean().default(true),
  webhook: Joi.boolean().default(true)
}).default();

const acmeDnsSchema = Joi.object({
  registrationUrl: Joi.string()
    .uri({ scheme: ['http', 'https'] })
    .optional()
    .messages({
      'string.uriCustomScheme': 'ACME-DNS registration URL must be an http(s) URL'
    }),
  allowFrom: Joi.array().items(Joi.string()).optional()
}).default();

const bootstrapConfigSchema = Joi.object<BootstrapConfig>({
  domain: Joi.string()
    .domain({ tlds: false })
    .empty('')
    .optional()
    .messages({
      'string.domain': 'Domain must be a valid domain name'
    }),
  acmeEmail: Joi.string()
    .email({ tlds: false })
    .empty('')
    .optional()
    .messages({
      'string.email': 'ACME email must be a valid email address'
    }),
  acmeEnvironment: Joi.string()
    .valid('production', 'staging')
    .default('production')
    .messages({
      'any.only': 'ACME environment must be one of: production, staging'
    }),
  gatewayClassName: Joi.string().default('cilium'),
  webhookUrl: Joi.string()
    .uri({ scheme: ['http', 'https'] })
    .empty('')
    .optional()
    .messages({
      'string.uriCustomScheme': 'Webhook URL must be an http(s) URL'
    }),
  naming: namingSchema,
  polling: pollingSchema,
  components: componentsSchema,
  acmeDns: acmeDnsSchema
}).unknown(false);

/**
 * Validates a bootstrap configuration object against the schema
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = bootstrapConfigSchema.validate(config, {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: false
  });

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return {
    valid: true,
    errors: []
  };
}

/**
 * Validates a configuration and fills in defaults.
 * @throws InvalidConfigError listing every problem found
 */
export function validateAndNormalizeConfig(config: unknown): BootstrapConfig {
  const { error, value } = bootstrapConfigSchema.validate(config, {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: false
  });

  if (error) {
    throw new InvalidConfigError(error.details.map(detail => detail.message));
  }

  return value;
}

/**
 * Gets the Joi schema for bootstrap configuration (useful for testing)
 */
export function getConfigSchema(): Joi.ObjectSchema<BootstrapConfig> {
  return bootstrapConfigSchema;
}

// Configuration-specific types
import type { BootstrapConfig } from '../types';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoader {
  load(path: string): Promise<BootstrapConfig>;
  validate(config: unknown): ConfigValidationResult;
}

/** Flat keys of the in-cluster configuration ConfigMap. */
export const FLAT_CONFIG_KEYS = {
  domain: 'PLATFORM_DOMAIN',
  acmeEmail: 'PLATFORM_ACME_EMAIL',
  acmeEnvironment: 'PLATFORM_ACME_ENVIRONMENT',
  gatewayClassName: 'PLATFORM_GATEWAY_CLASS_NAME',
  webhookUrl: 'WEBHOOK_TARGET_URL'
} as const;

export interface ConfigMapLocation {
  namespace: string;
  name: string;
}

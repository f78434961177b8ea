// Template-specific types
import type { ResourceNames } from '../config/naming';
import type { AcmeEnvironment } from '../types';

/**
 * Inputs every domain-bound template is computed from. Same inputs, same
 * manifests.
 */
export interface TemplateContext {
  domain: string;
  names: ResourceNames;
}

export interface IssuerContext extends TemplateContext {
  acmeEmail: string;
  acmeEnvironment: AcmeEnvironment;
}

export interface GatewayContext extends TemplateContext {
  gatewayClassName: string;
}

import { createHash } from 'crypto';
import type { BootstrapConfig, NamingSettings } from '../types';

export const DEFAULT_ANNOTATION_PREFIX = 'bootstrap.platform.io';

/**
 * Names of every resource the orchestrator reads or writes.
 *
 * Names of resources this tool owns end to end get the configured prefix.
 * Names shared with manifests installed elsewhere (storage classes, registry
 * and buildkit objects) are fixed.
 */
export interface ResourceNames {
  platformNamespace: string;
  registryNamespace: string;
  buildkitNamespace: string;

  storageClassReplica1: string;
  storageClassReplica2: string;

  clusterIssuer: string;
  issuerAccountKeySecret: string;
  wildcardCertificate: string;
  wildcardCertificateSecret: string;
  gateway: string;
  httpRedirectRoute: string;
  httpsRoute: string;
  acmeDnsApiRoute: string;
  /** Catch-all route, Deployment and Service answering hosts with no workload behind them */
  deploymentNotFound: string;

  acmeDnsConfigMap: string;
  acmeDnsDataClaim: string;
  acmeDnsDnsService: string;
  acmeDnsHttpService: string;
  acmeDnsDeployment: string;
  acmeDnsAccountSecret: string;

  registryHttpSecret: string;
  registryAuthKeysSecret: string;
  registryJwksSecret: string;
  registryTlsSecret: string;
  buildkitCaSecret: string;
  buildkitDeployment: string;

  webhookSecret: string;

  /** Pod template annotation recording the digest of a workload's inputs */
  inputsDigestAnnotation: string;
  /** Annotation on the webhook secret naming the delivery target */
  webhookTargetAnnotation: string;
}

/**
 * Resource naming utility class
 */
export class ResourceNamingService {
  private readonly maxNameLength = 63;

  /**
   * Generate all resource names for a configuration
   */
  generateResourceNames(config: Pick<BootstrapConfig, 'naming'>): ResourceNames {
    const naming: NamingSettings = config.naming;
    const owned = (base: string) => this.ownedName(base, naming.prefix);
    const annotationPrefix = naming.annotationPrefix ?? DEFAULT_ANNOTATION_PREFIX;
    const acmeDns = owned('acme-dns');

    return {
      platformNamespace: naming.platformNamespace ?? 'platform',
      registryNamespace: naming.registryNamespace ?? 'registry',
      buildkitNamespace: naming.buildkitNamespace ?? 'buildkit',

      storageClassReplica1: 'storage-replica-1',
      storageClassReplica2: 'storage-replica-2',

      clusterIssuer: owned('certmanager-acme-issuer'),
      issuerAccountKeySecret: owned('acme-certificates-private-key'),
      wildcardCertificate: owned('ingress-wildcard-certificate'),
      wildcardCertificateSecret: owned('ingress-wildcard-certificate'),
      gateway: owned('ingress-gateway'),
      httpRedirectRoute: owned('ingress-http-redirect'),
      httpsRoute: owned('ingress-https'),
      acmeDnsApiRoute: owned('acme-dns-api'),
      deploymentNotFound: owned('deployment-not-found'),

      acmeDnsConfigMap: this.validateAndTruncate(`${acmeDns}-config`),
      acmeDnsDataClaim: this.validateAndTruncate(`${acmeDns}-data`),
      acmeDnsDnsService: this.validateAndTruncate(`${acmeDns}-dns`),
      acmeDnsHttpService: acmeDns,
      acmeDnsDeployment: acmeDns,
      acmeDnsAccountSecret: this.validateAndTruncate(`${acmeDns}-account`),

      registryHttpSecret: 'registry-registry-auth',
      registryAuthKeysSecret: 'registry-auth-keys',
      registryJwksSecret: 'registry-auth-keys-jwks',
      registryTlsSecret: 'registry-tls',
      buildkitCaSecret: 'registry-ca-cert',
      buildkitDeployment: 'buildkitd',

      webhookSecret: owned('webhook-signing'),

      inputsDigestAnnotation: `${annotationPrefix}/inputs-digest`,
      webhookTargetAnnotation: `${annotationPrefix}/webhook-target`
    };
  }

  private ownedName(base: string, prefix?: string): string {
    const name = this.sanitizeName([prefix, base].filter(Boolean).join('-'));
    return this.validateAndTruncate(name);
  }

  /**
   * Sanitize name to be a DNS-1123 label
   * - Lowercase, invalid characters replaced with hyphens
   * - Consecutive hyphens collapsed
   * - Starts and ends with an alphanumeric character
   */
  sanitizeName(name: string): string {
    let sanitized = name.toLowerCase().replace(/[^a-z0-9-]/g, '-');

    sanitized = sanitized.replace(/-+/g, '-');

    sanitized = sanitized.replace(/^-+|-+$/g, '');

    if (!sanitized) {
      sanitized = 'resource';
    }

    return sanitized;
  }

  /**
   * Truncate name to the label length limit, keeping it unique with a hash suffix
   */
  validateAndTruncate(name: string, maxLength: number = this.maxNameLength): string {
    if (name.length <= maxLength) {
      return name;
    }

    const hash = this.generateShortHash(name);
    const truncatedLength = maxLength - hash.length - 1;
    const truncated = name.substring(0, truncatedLength).replace(/-+$/, '');

    return `${truncated}-${hash}`;
  }

  private generateShortHash(input: string): string {
    return createHash('sha256').update(input).digest('hex').substring(0, 6);
  }
}

/**
 * Convenience function to create a new resource naming service
 */
export function createNamingService(): ResourceNamingService {
  return new ResourceNamingService();
}

export function resourceNamesFor(config: Pick<BootstrapConfig, 'naming'>): ResourceNames {
  return createNamingService().generateResourceNames(config);
}

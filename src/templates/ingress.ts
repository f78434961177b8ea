import type { AcmeEnvironment, ResourceObject } from '../types';
import { ACCOUNT_STORE_KEY } from '../provisioning/account-synchronizer';
import { MANAGED_BY, managedLabels } from './common';
import { acmeDnsServiceUrl, acmeDnsZone } from './acme-dns';
import type { GatewayContext, IssuerContext, TemplateContext } from './types';

export const ACME_SERVERS: Record<AcmeEnvironment, string> = {
  production: 'https://acme-v02.api.letsencrypt.org/directory',
  staging: 'https://acme-staging-v02.api.letsencrypt.org/directory'
};

/** Subdomains the wildcard certificate covers, one per workload family. */
export const WILDCARD_SUBDOMAINS = ['apps', 'mysql', 'valkey', 'postgres'] as const;

export interface ListenerSpec {
  name: string;
  protocol: 'HTTP' | 'HTTPS' | 'TLS';
  port: number;
  hostname?: string;
  tls?: Record<string, unknown>;
  allowedRoutes: Record<string, unknown>;
}

/** Annotations the Gateway implementation copies onto its LoadBalancer Service. */
export const LOAD_BALANCER_ANNOTATIONS: Record<string, string> = {
  'service.beta.kubernetes.io/do-loadbalancer-tls-passthrough': 'true',
  'service.beta.kubernetes.io/aws-load-balancer-backend-protocol': 'tcp',
  'service.beta.kubernetes.io/azure-load-balancer-tcp-idle-timeout': '4'
};

const PASSTHROUGH_PORTS = [
  { name: 'mysql-tls', subdomain: 'mysql', port: 3306 },
  { name: 'valkey-tls', subdomain: 'valkey', port: 6379 },
  { name: 'postgres-tls', subdomain: 'postgres', port: 5432 }
] as const;

export function wildcardDnsNames(domain: string): string[] {
  return WILDCARD_SUBDOMAINS.map(subdomain => `*.${subdomain}.${domain}`);
}

export function clusterIssuer({ acmeEmail, acmeEnvironment, names }: IssuerContext): ResourceObject {
  return {
    apiVersion: 'cert-manager.io/v1',
    kind: 'ClusterIssuer',
    metadata: {
      name: names.clusterIssuer,
      labels: { 'app.kubernetes.io/managed-by': MANAGED_BY }
    },
    spec: {
      acme: {
        email: acmeEmail,
        server: ACME_SERVERS[acmeEnvironment],
        privateKeySecretRef: { name: names.issuerAccountKeySecret },
        solvers: [
          {
            dns01: {
              acmeDNS: {
                host: acmeDnsServiceUrl({ names }),
                accountSecretRef: { name: names.acmeDnsAccountSecret, key: ACCOUNT_STORE_KEY }
              }
            }
          }
        ]
      }
    }
  };
}

export function wildcardCertificate({ domain, names }: TemplateContext): ResourceObject {
  return {
    apiVersion: 'cert-manager.io/v1',
    kind: 'Certificate',
    metadata: {
      name: names.wildcardCertificate,
      namespace: names.platformNamespace,
      labels: managedLabels('ingress', 'certificate')
    },
    spec: {
      secretName: names.wildcardCertificateSecret,
      issuerRef: { name: names.clusterIssuer, kind: 'ClusterIssuer' },
      dnsNames: wildcardDnsNames(domain)
    }
  };
}

export function gatewayListeners({ domain, names }: TemplateContext): ListenerSpec[] {
  const fromAll = { namespaces: { from: 'All' } };
  return [
    { name: 'http', protocol: 'HTTP', port: 80, allowedRoutes: fromAll },
    {
      name: 'https',
      protocol: 'HTTPS',
      port: 443,
      tls: {
        mode: 'Terminate',
        certificateRefs: [{ name: names.wildcardCertificateSecret }]
      },
      allowedRoutes: fromAll
    },
    ...PASSTHROUGH_PORTS.map(({ name, subdomain, port }): ListenerSpec => ({
      name,
      protocol: 'TLS',
      port,
      hostname: `*.${subdomain}.${domain}`,
      tls: { mode: 'Passthrough' },
      allowedRoutes: { ...fromAll, kinds: [{ kind: 'TLSRoute' }] }
    }))
  ];
}

/**
 * Only built once the wildcard certificate secret holds a certificate, so
 * the listener set is complete from the start.
 */
export function gateway(context: GatewayContext): ResourceObject {
  const { names, gatewayClassName } = context;
  return {
    apiVersion: 'gateway.networking.k8s.io/v1',
    kind: 'Gateway',
    metadata: {
      name: names.gateway,
      namespace: names.platformNamespace,
      labels: managedLabels('ingress', 'gateway'),
      annotations: { ...LOAD_BALANCER_ANNOTATIONS }
    },
    spec: {
      gatewayClassName,
      listeners: gatewayListeners(context)
    }
  };
}

export function httpRedirectRoute({ domain, names }: TemplateContext): ResourceObject {
  return {
    apiVersion: 'gateway.networking.k8s.io/v1',
    kind: 'HTTPRoute',
    metadata: {
      name: names.httpRedirectRoute,
      namespace: names.platformNamespace,
      labels: managedLabels('ingress', 'route')
    },
    spec: {
      parentRefs: [{ name: names.gateway, namespace: names.platformNamespace, sectionName: 'http' }],
      hostnames: [`*.apps.${domain}`],
      rules: [
        {
          filters: [
            {
              type: 'RequestRedirect',
              requestRedirect: { scheme: 'https', statusCode: 301 }
            }
          ]
        }
      ]
    }
  };
}

export function acmeDnsApiRoute({ domain, names }: TemplateContext): ResourceObject {
  return {
    apiVersion: 'gateway.networking.k8s.io/v1',
    kind: 'HTTPRoute',
    metadata: {
      name: names.acmeDnsApiRoute,
      namespace: names.platformNamespace,
      labels: managedLabels('acme-dns', 'route')
    },
    spec: {
      parentRefs: [{ name: names.gateway, namespace: names.platformNamespace, sectionName: 'http' }],
      hostnames: [acmeDnsZone(domain)],
      rules: [
        {
          matches: [{ path: { type: 'PathPrefix', value: '/' } }],
          backendRefs: [{ name: names.acmeDnsHttpService, namespace: names.platformNamespace, port: 80 }]
        }
      ]
    }
  };
}

/** Sends HTTPS traffic for every host under the domain through the terminating listener. */
export function httpsRoute({ domain, names }: TemplateContext): ResourceObject {
  return {
    apiVersion: 'gateway.networking.k8s.io/v1',
    kind: 'HTTPRoute',
    metadata: {
      name: names.httpsRoute,
      namespace: names.platformNamespace,
      labels: managedLabels('ingress', 'route')
    },
    spec: {
      parentRefs: [{ name: names.gateway, namespace: names.platformNamespace, sectionName: 'https' }],
      hostnames: [`*.${domain}`]
    }
  };
}

// Fallback for hosts that match the wildcard but have no workload deployed yet.

export const DEPLOYMENT_NOT_FOUND_IMAGE = 'ghcr.io/kibamail/kibaship-404-deployment-not-found:latest';
export const DEPLOYMENT_NOT_FOUND_REPLICAS = 3;
const DEPLOYMENT_NOT_FOUND_PORT = 3000;

export function deploymentNotFoundRoute({ domain, names }: TemplateContext): ResourceObject {
  return {
    apiVersion: 'gateway.networking.k8s.io/v1',
    kind: 'HTTPRoute',
    metadata: {
      name: names.deploymentNotFound,
      namespace: names.platformNamespace,
      labels: managedLabels(names.deploymentNotFound, 'route')
    },
    spec: {
      parentRefs: [{ name: names.gateway, namespace: names.platformNamespace }],
      hostnames: [`*.${domain}`],
      rules: [
        {
          matches: [{ path: { type: 'PathPrefix', value: '/' } }],
          backendRefs: [{ name: names.deploymentNotFound, namespace: names.platformNamespace, port: 80 }]
        }
      ]
    }
  };
}

export function deploymentNotFoundDeployment({ names }: Pick<TemplateContext, 'names'>): ResourceObject {
  const app = names.deploymentNotFound;
  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: {
      name: app,
      namespace: names.platformNamespace,
      labels: managedLabels(app, 'fallback')
    },
    spec: {
      replicas: DEPLOYMENT_NOT_FOUND_REPLICAS,
      selector: { matchLabels: { app } },
      template: {
        metadata: { labels: { app } },
        spec: {
          containers: [
            {
              name: app,
              image: DEPLOYMENT_NOT_FOUND_IMAGE,
              ports: [{ containerPort: DEPLOYMENT_NOT_FOUND_PORT }]
            }
          ]
        }
      }
    }
  };
}

export function deploymentNotFoundService({ names }: Pick<TemplateContext, 'names'>): ResourceObject {
  const app = names.deploymentNotFound;
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name: app,
      namespace: names.platformNamespace,
      labels: managedLabels(app, 'fallback')
    },
    spec: {
      selector: { app },
      ports: [{ port: 80, targetPort: DEPLOYMENT_NOT_FOUND_PORT }]
    }
  };
}

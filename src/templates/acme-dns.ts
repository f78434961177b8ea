import type { ResourceObject } from '../types';
import { managedLabels } from './common';
import type { TemplateContext } from './types';

export const ACME_DNS_APP = 'acme-dns';
export const ACME_DNS_IMAGE = 'joohoi/acme-dns:v1.0';
export const ACME_DNS_CONFIG_FILE = 'config.cfg';
export const ACME_DNS_REPLICAS = 2;

/** DNS zone acme-dns is authoritative for. */
export function acmeDnsZone(domain: string): string {
  return `acme.${domain}`;
}

export function acmeDnsConfig(domain: string): string {
  const zone = acmeDnsZone(domain);
  const nsName = `ns1.${zone}`;
  return [
    '[general]',
    'listen = ":53"',
    'protocol = "both"',
    `domain = "${zone}"`,
    `nsname = "${nsName}"`,
    `nsadmin = "admin.${domain}"`,
    'records = [',
    `    "${zone}. A 127.0.0.1",`,
    `    "${zone}. NS ${nsName}.",`,
    ']',
    'debug = false',
    '',
    '[database]',
    'engine = "sqlite3"',
    'connection = "/var/lib/acme-dns/acme-dns.db"',
    '',
    '[api]',
    'ip = "0.0.0.0"',
    'port = "80"',
    'tls = "none"',
    'disable_registration = false',
    'corsorigins = [',
    '    "*"',
    ']',
    'use_header = false',
    'header_name = "X-Forwarded-For"',
    '',
    '[logconfig]',
    'loglevel = "info"',
    'logtype = "stdout"',
    'logformat = "text"'
  ].join('\n');
}

export function acmeDnsConfigMap({ domain, names }: TemplateContext): ResourceObject {
  return {
    apiVersion: 'v1',
    kind: 'ConfigMap',
    metadata: {
      name: names.acmeDnsConfigMap,
      namespace: names.platformNamespace,
      labels: managedLabels(ACME_DNS_APP, 'dns')
    },
    data: {
      [ACME_DNS_CONFIG_FILE]: acmeDnsConfig(domain)
    }
  };
}

export function acmeDnsDataClaim({ names }: TemplateContext): ResourceObject {
  return {
    apiVersion: 'v1',
    kind: 'PersistentVolumeClaim',
    metadata: {
      name: names.acmeDnsDataClaim,
      namespace: names.platformNamespace,
      labels: managedLabels(ACME_DNS_APP, 'dns')
    },
    spec: {
      accessModes: ['ReadWriteOnce'],
      storageClassName: names.storageClassReplica1,
      resources: {
        requests: { storage: '1Gi' }
      }
    }
  };
}

export function acmeDnsDnsService({ names }: TemplateContext): ResourceObject {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name: names.acmeDnsDnsService,
      namespace: names.platformNamespace,
      labels: { ...managedLabels(ACME_DNS_APP, 'dns'), 'service-type': 'dns' }
    },
    spec: {
      type: 'LoadBalancer',
      selector: { app: ACME_DNS_APP },
      ports: [
        { name: 'dns-udp', port: 53, targetPort: 'dns-udp', protocol: 'UDP' },
        { name: 'dns-tcp', port: 53, targetPort: 'dns-tcp', protocol: 'TCP' }
      ],
      sessionAffinity: 'ClientIP',
      sessionAffinityConfig: {
        clientIP: { timeoutSeconds: 10800 }
      }
    }
  };
}

export function acmeDnsHttpService({ names }: TemplateContext): ResourceObject {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name: names.acmeDnsHttpService,
      namespace: names.platformNamespace,
      labels: { ...managedLabels(ACME_DNS_APP, 'api'), 'service-type': 'http' }
    },
    spec: {
      type: 'ClusterIP',
      selector: { app: ACME_DNS_APP },
      ports: [{ name: 'http', port: 80, targetPort: 'http', protocol: 'TCP' }]
    }
  };
}

/**
 * @param configDigest - digest of the ConfigMap data the pods start with
 */
export function acmeDnsDeployment({ names }: TemplateContext, configDigest: string): ResourceObject {
  const healthProbe = (initialDelaySeconds: number, periodSeconds: number, timeoutSeconds: number) => ({
    httpGet: { path: '/health', port: 'http' },
    initialDelaySeconds,
    periodSeconds,
    timeoutSeconds,
    failureThreshold: 3
  });

  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: {
      name: names.acmeDnsDeployment,
      namespace: names.platformNamespace,
      labels: managedLabels(ACME_DNS_APP, 'dns')
    },
    spec: {
      replicas: ACME_DNS_REPLICAS,
      selector: { matchLabels: { app: ACME_DNS_APP } },
      template: {
        metadata: {
          labels: {
            app: ACME_DNS_APP,
            'app.kubernetes.io/name': ACME_DNS_APP,
            'app.kubernetes.io/component': 'dns'
          },
          annotations: {
            [names.inputsDigestAnnotation]: configDigest
          }
        },
        spec: {
          securityContext: { runAsUser: 0, runAsGroup: 0, fsGroup: 0 },
          containers: [
            {
              name: ACME_DNS_APP,
              image: ACME_DNS_IMAGE,
              imagePullPolicy: 'IfNotPresent',
              ports: [
                { name: 'dns-udp', containerPort: 53, protocol: 'UDP' },
                { name: 'dns-tcp', containerPort: 53, protocol: 'TCP' },
                { name: 'http', containerPort: 80, protocol: 'TCP' }
              ],
              env: [{ name: 'ACMEDNS_CONFIG', value: `/etc/acme-dns/${ACME_DNS_CONFIG_FILE}` }],
              volumeMounts: [
                { name: 'config', mountPath: '/etc/acme-dns', readOnly: true },
                { name: 'data', mountPath: '/var/lib/acme-dns' }
              ],
              resources: {
                requests: { cpu: '100m', memory: '128Mi' },
                limits: { cpu: '500m', memory: '256Mi' }
              },
              livenessProbe: healthProbe(30, 10, 5),
              readinessProbe: healthProbe(10, 5, 3),
              securityContext: {
                allowPrivilegeEscalation: true,
                runAsNonRoot: false,
                runAsUser: 0,
                capabilities: { add: ['NET_BIND_SERVICE'] }
              }
            }
          ],
          volumes: [
            { name: 'config', configMap: { name: names.acmeDnsConfigMap } },
            { name: 'data', persistentVolumeClaim: { claimName: names.acmeDnsDataClaim } }
          ],
          affinity: {
            podAntiAffinity: {
              preferredDuringSchedulingIgnoredDuringExecution: [
                {
                  weight: 100,
                  podAffinityTerm: {
                    labelSelector: { matchLabels: { app: ACME_DNS_APP } },
                    topologyKey: 'kubernetes.io/hostname'
                  }
                }
              ]
            }
          }
        }
      }
    }
  };
}

/** In-cluster base URL of the acme-dns HTTP API. */
export function acmeDnsServiceUrl({ names }: Pick<TemplateContext, 'names'>): string {
  return `http://${names.acmeDnsHttpService}.${names.platformNamespace}.svc.cluster.local`;
}
